import { UnrecoverableError } from 'bullmq';
import { AppDataSource } from '../db/data-source';
import { Submission, SubmissionStatus } from '../db/entities/submission.entity';
import { IDataSource, IRepository } from '../db/interfaces';
import { logger, ILogger } from '../config/logger';
import { errorMessage } from '../utils/error.util';
import { EngineConfig, loadEngineConfig } from '../config/engine.config';
import { EngineFatalError } from '../engine/errors';
import { IResumeOrchestrator, ResumeOrchestrator, TailoringOutcome } from '../engine/resume-orchestrator';
import { getAuditCache } from '../services/audit-cache.service';
import { TailorJob, TailorJobDataSchema } from '../queue/queue-config';
import { formatZodIssues } from '../engine/task-scheduler';

/** The parts of a BullMQ job the worker reads. */
export type TailorJobContext = Pick<TailorJob, 'id' | 'data' | 'attemptsMade' | 'opts'>;

export interface ITailoringWorker {
    processTailoring(job: TailorJobContext): Promise<TailoringOutcome>;
}

const PROCESSING_ERROR = 'processing_error';

/**
 * Tailoring Worker with Dependency Injection
 *
 * Runs one queued submission through the engine and keeps the submission
 * row's lifecycle in step: queued → processing → completed | failed.
 * Engine fatal errors are not retried; anything else is left to BullMQ's
 * backoff until the last attempt.
 */
export class TailoringWorker implements ITailoringWorker {
    private submissionRepository: IRepository<Submission>;

    constructor(
        dataSource: IDataSource,
        private orchestrator: IResumeOrchestrator,
        private logger: ILogger
    ) {
        this.submissionRepository = dataSource.getRepository(Submission);
    }

    /**
     * Factory method for production use. Builds the task graph, so a
     * misconfigured engine throws here rather than on the first job.
     */
    static create(config: EngineConfig = loadEngineConfig()): TailoringWorker {
        const orchestrator = ResumeOrchestrator.create(config, getAuditCache());
        return new TailoringWorker(AppDataSource, orchestrator, logger);
    }

    async processTailoring(job: TailorJobContext): Promise<TailoringOutcome> {
        const payload = TailorJobDataSchema.safeParse(job.data);
        if (!payload.success) {
            const issues = formatZodIssues(payload.error).join('; ');
            this.logger.error({ workerJobId: job.id, issues }, 'Malformed tailoring job');
            // Retrying cannot fix the payload.
            throw new UnrecoverableError(`invalid_job_payload: ${issues}`);
        }
        const { submissionId, profile, role } = payload.data;

        this.logger.info({
            submissionId,
            roleTitle: role.roleTitle,
            workerJobId: job.id,
            attempt: job.attemptsMade + 1
        }, 'Starting tailoring');

        try {
            await this.updateSubmission(submissionId, { status: 'processing' });

            const outcome = await this.orchestrator.tailor(String(submissionId), profile, role);

            await this.updateSubmission(submissionId, {
                status: 'completed',
                errorCode: null,
                lastInvocationId: outcome.invocationId
            });

            this.logger.info({
                submissionId,
                invocationId: outcome.invocationId,
                overall: outcome.score.overall
            }, 'Tailoring completed');

            return outcome;

        } catch (error) {
            const fatal = error instanceof EngineFatalError;
            const finalAttempt = fatal || job.attemptsMade + 1 >= (job.opts.attempts ?? 1);
            const errorCode = error instanceof EngineFatalError ? error.code : PROCESSING_ERROR;

            this.logger.error({
                submissionId,
                errorCode,
                finalAttempt,
                error: errorMessage(error)
            }, 'Tailoring failed');

            await this.updateSubmission(submissionId, {
                status: finalAttempt ? 'failed' : 'queued',
                errorCode,
                incrementAttempts: true
            });

            if (error instanceof EngineFatalError) {
                throw new UnrecoverableError(`${error.code}: ${error.message}`);
            }
            throw error;
        }
    }

    private async updateSubmission(
        submissionId: number,
        change: {
            status: SubmissionStatus;
            errorCode?: string | null;
            lastInvocationId?: string;
            incrementAttempts?: boolean;
        }
    ): Promise<void> {
        const submission = await this.submissionRepository.findOne({ where: { id: submissionId } });
        if (!submission) {
            this.logger.warn({ submissionId }, 'Submission not found, status not updated');
            return;
        }

        submission.status = change.status;
        if (change.errorCode !== undefined) {
            submission.error_code = change.errorCode;
        }
        if (change.lastInvocationId !== undefined) {
            submission.lastInvocationId = change.lastInvocationId;
        }
        if (change.incrementAttempts) {
            submission.attempts = (submission.attempts || 0) + 1;
        }
        await this.submissionRepository.save(submission);
    }
}

/**
 * BullMQ processor bound to a worker built up front. Call it at startup:
 * any configuration error surfaces before the queue is consumed.
 */
export function createTailoringProcessor(
    worker: ITailoringWorker = TailoringWorker.create()
): (job: TailorJobContext) => Promise<TailoringOutcome> {
    return job => worker.processTailoring(job);
}
