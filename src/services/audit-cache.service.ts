import { AppDataSource } from '../db/data-source';
import { AuditRecordEntity } from '../db/entities/audit-record.entity';
import { IDataSource, IRepository } from '../db/interfaces';
import { logger, ILogger } from '../config/logger';
import { errorMessage } from '../utils/error.util';
import { ExecutionMode, FinalizedTaskResult, TaskErrorKind, TaskStatus } from '../types/task';
import { RetryOptions, RetryUtil } from '../utils/retry.util';

export interface AuditRecordDraft {
    invocationId: string;
    submissionId: string;
    taskName: string;
    status: TaskStatus;
    mode: ExecutionMode;
    errorKind: TaskErrorKind | null;
    rawOutput: unknown;
    elapsedMs: number;
}

export interface AuditRecord extends AuditRecordDraft {
    id: number;
    createdAt: Date;
}

export interface TaskExecutionStatus {
    task: string;
    mode: ExecutionMode;
    status: TaskStatus;
    errorKind: TaskErrorKind | null;
    elapsedMs: number;
}

export interface InvocationStatus {
    invocationId: string;
    submissionId: string;
    recordedAt: Date;
    tasks: TaskExecutionStatus[];
}

/**
 * Append-only storage for audit records: no update, no delete.
 */
export interface IAuditStore {
    append(record: AuditRecordDraft): Promise<AuditRecord>;
    findBySubmission(submissionId: string): Promise<AuditRecord[]>;
    /** Records of the invocation that wrote the newest record, oldest first. */
    findLatestInvocation(): Promise<AuditRecord[]>;
}

export interface IAuditCache {
    record(invocationId: string, submissionId: string, result: FinalizedTaskResult): Promise<void>;
    latestStatuses(): Promise<InvocationStatus | null>;
    recordsForSubmission(submissionId: string): Promise<AuditRecord[]>;
}

const TASK_STATUSES: readonly TaskStatus[] = ['pending', 'running', 'succeeded', 'failed', 'fell_back', 'timed_out'];
const EXECUTION_MODES: readonly ExecutionMode[] = ['backend', 'fallback'];
const ERROR_KINDS: readonly TaskErrorKind[] = [
    'backend_timeout',
    'backend_invalid_output',
    'backend_unavailable',
    'deadline_exceeded',
    'fallback_defect'
];

function oneOf<T extends string>(allowed: readonly T[], value: string | null): T | null {
    return allowed.find(candidate => candidate === value) ?? null;
}

/**
 * In-memory store for embedding the engine without a database, and for tests.
 */
export class InMemoryAuditStore implements IAuditStore {
    private readonly records: AuditRecord[] = [];
    private nextId = 1;

    constructor(private readonly now: () => Date = () => new Date()) { }

    async append(draft: AuditRecordDraft): Promise<AuditRecord> {
        const record: AuditRecord = Object.freeze({ ...draft, id: this.nextId++, createdAt: this.now() });
        this.records.push(record);
        return record;
    }

    async findBySubmission(submissionId: string): Promise<AuditRecord[]> {
        return this.records.filter(record => record.submissionId === submissionId);
    }

    async findLatestInvocation(): Promise<AuditRecord[]> {
        const newest = this.records[this.records.length - 1];
        if (!newest) {
            return [];
        }
        return this.records.filter(record => record.invocationId === newest.invocationId);
    }
}

/**
 * Postgres store. Inserts go through RetryUtil so a dropped connection does
 * not lose provenance.
 */
export class TypeOrmAuditStore implements IAuditStore {
    private readonly repository: IRepository<AuditRecordEntity>;

    constructor(
        dataSource: IDataSource,
        private readonly retryOptions: RetryOptions = { maxAttempts: 3, baseDelay: 200, maxDelay: 2000 }
    ) {
        this.repository = dataSource.getRepository(AuditRecordEntity);
    }

    static create(): TypeOrmAuditStore {
        return new TypeOrmAuditStore(AppDataSource);
    }

    async append(draft: AuditRecordDraft): Promise<AuditRecord> {
        const saved = await RetryUtil.executeWithRetry(
            () => this.repository.save({ ...draft }),
            { ...this.retryOptions, operationName: 'audit record insert' }
        );
        return this.toRecord(saved);
    }

    async findBySubmission(submissionId: string): Promise<AuditRecord[]> {
        const rows = await this.repository.find({
            where: { submissionId },
            order: { id: 'ASC' }
        });
        return rows.map(row => this.toRecord(row));
    }

    async findLatestInvocation(): Promise<AuditRecord[]> {
        const [newest] = await this.repository.find({ order: { id: 'DESC' }, take: 1 });
        if (!newest) {
            return [];
        }
        const rows = await this.repository.find({
            where: { invocationId: newest.invocationId },
            order: { id: 'ASC' }
        });
        return rows.map(row => this.toRecord(row));
    }

    private toRecord(row: AuditRecordEntity): AuditRecord {
        return {
            id: row.id,
            invocationId: row.invocationId,
            submissionId: row.submissionId,
            taskName: row.taskName,
            status: oneOf(TASK_STATUSES, row.status) ?? 'failed',
            mode: oneOf(EXECUTION_MODES, row.mode) ?? 'fallback',
            errorKind: oneOf(ERROR_KINDS, row.errorKind),
            rawOutput: row.rawOutput,
            elapsedMs: row.elapsedMs,
            createdAt: row.createdAt
        };
    }
}

/**
 * Audit Cache
 *
 * Turns finalized task results into audit records and answers the
 * diagnostics query. A failed write is logged and dropped: losing an audit
 * row never changes the outcome of an invocation.
 */
export class AuditCache implements IAuditCache {
    constructor(
        private readonly store: IAuditStore,
        private readonly logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): AuditCache {
        return new AuditCache(TypeOrmAuditStore.create(), logger);
    }

    async record(invocationId: string, submissionId: string, result: FinalizedTaskResult): Promise<void> {
        try {
            await this.store.append({
                invocationId,
                submissionId,
                taskName: result.task,
                status: result.status,
                mode: result.mode ?? 'fallback',
                errorKind: result.error?.kind ?? null,
                rawOutput: result.output ?? null,
                elapsedMs: result.elapsedMs
            });
        } catch (error) {
            this.logger.error({
                invocationId,
                submissionId,
                task: result.task,
                error: errorMessage(error)
            }, 'Failed to persist audit record');
        }
    }

    async latestStatuses(): Promise<InvocationStatus | null> {
        const records = await this.store.findLatestInvocation();
        const [first] = records;
        if (!first) {
            return null;
        }
        return {
            invocationId: first.invocationId,
            submissionId: first.submissionId,
            recordedAt: records[records.length - 1]?.createdAt ?? first.createdAt,
            tasks: records.map(record => ({
                task: record.taskName,
                mode: record.mode,
                status: record.status,
                errorKind: record.errorKind,
                elapsedMs: record.elapsedMs
            }))
        };
    }

    recordsForSubmission(submissionId: string): Promise<AuditRecord[]> {
        return this.store.findBySubmission(submissionId);
    }
}

// Singleton instance
let auditCache: AuditCache | null = null;

export function getAuditCache(): AuditCache {
    if (!auditCache) {
        auditCache = AuditCache.create();
    }
    return auditCache;
}
