import { randomUUID } from 'crypto';
import { z } from 'zod';
import { ILogger, logger } from '../config/logger';
import { EngineConfig } from '../config/engine.config';
import { IAuditCache } from '../services/audit-cache.service';
import { IBackendAdapter, OpenAIBackendAdapter } from '../services/backend.service';
import { createDefaultTasks } from '../tasks';
import { ProfileSnapshotData, RoleContextData } from '../types/profile';
import { MatchScore, MatchScoreSchema, SynthesizedResume, SynthesizedResumeSchema } from '../types/resume';
import { AnyTaskSpec, ExecutionMode, FinalizedResults, TaskErrorKind, TaskStatus } from '../types/task';
import { frozenCopy } from '../utils/deep-freeze.util';
import { OutputContractError } from './errors';
import { MatchScorer } from './match-scorer';
import { synthesizeResume } from './resume-synthesizer';
import { formatZodIssues, TaskScheduler } from './task-scheduler';

export interface TaskSummary {
    task: string;
    status: TaskStatus;
    mode: ExecutionMode | null;
    errorKind: TaskErrorKind | null;
    elapsedMs: number;
}

export interface TailoringOutcome {
    invocationId: string;
    submissionId: string;
    resume: SynthesizedResume;
    score: MatchScore;
    tasks: TaskSummary[];
}

export interface IResumeOrchestrator {
    tailor(submissionId: string, profile: ProfileSnapshotData, role: RoleContextData): Promise<TailoringOutcome>;
}

/**
 * Resume Orchestrator
 *
 * One invocation end to end: freeze the inputs, run the task DAG, audit
 * each task as it finalizes, then synthesize and score. Resolves with a
 * fully shaped outcome or rejects with an EngineFatalError; backend
 * trouble only shows up in the task summaries and the audit trail.
 */
export class ResumeOrchestrator implements IResumeOrchestrator {
    constructor(
        private scheduler: TaskScheduler,
        private scorer: MatchScorer,
        private auditCache: IAuditCache,
        private logger: ILogger,
        private newInvocationId: () => string = randomUUID,
        private now: () => Date = () => new Date()
    ) { }

    /**
     * Factory method for production use
     */
    static create(config: EngineConfig, auditCache: IAuditCache): ResumeOrchestrator {
        const adapter: IBackendAdapter | undefined = config.backendEnabled
            ? OpenAIBackendAdapter.create(config)
            : undefined;

        return ResumeOrchestrator.withTasks(createDefaultTasks(adapter), config, auditCache);
    }

    static withTasks(
        tasks: readonly AnyTaskSpec[],
        config: Pick<EngineConfig, 'workerPoolSize' | 'taskTimeoutMs' | 'deadlineMs' | 'scoreWeights'>,
        auditCache: IAuditCache,
        engineLogger: ILogger = logger
    ): ResumeOrchestrator {
        const scheduler = new TaskScheduler(tasks, {
            workerPoolSize: config.workerPoolSize,
            taskTimeoutMs: config.taskTimeoutMs,
            deadlineMs: config.deadlineMs
        }, engineLogger);

        return new ResumeOrchestrator(scheduler, new MatchScorer(config.scoreWeights), auditCache, engineLogger);
    }

    async tailor(submissionId: string, profileInput: ProfileSnapshotData, roleInput: RoleContextData): Promise<TailoringOutcome> {
        const invocationId = this.newInvocationId();
        const startedAt = this.now();
        const profile = frozenCopy(profileInput);
        const role = frozenCopy(roleInput);

        this.logger.info({
            invocationId,
            submissionId,
            roleTitle: role.roleTitle,
            companyName: role.companyName
        }, 'Tailoring invocation started');

        const auditWrites: Promise<void>[] = [];
        let results: FinalizedResults;
        try {
            results = await this.scheduler.run(profile, role, {
                onFinalized: result => {
                    auditWrites.push(this.auditCache.record(invocationId, submissionId, result));
                }
            });
        } finally {
            await Promise.all(auditWrites);
        }

        const resume = this.validated('SynthesizedResume', SynthesizedResumeSchema, synthesizeResume(profile, role, results));
        const score = this.validated('MatchScore', MatchScoreSchema, this.scorer.score(resume, role, startedAt));

        const tasks: TaskSummary[] = [...results.values()].map(result => ({
            task: result.task,
            status: result.status,
            mode: result.mode,
            errorKind: result.error?.kind ?? null,
            elapsedMs: result.elapsedMs
        }));

        this.logger.info({
            invocationId,
            submissionId,
            overall: score.overall,
            defaultedFields: resume.defaultedFields,
            fallbackTasks: tasks.filter(task => task.mode === 'fallback').map(task => task.task)
        }, 'Tailoring invocation completed');

        return { invocationId, submissionId, resume, score, tasks };
    }

    private validated<T>(
        name: string,
        schema: z.ZodType<T, z.ZodTypeDef, unknown>,
        value: unknown
    ): T {
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            throw new OutputContractError(`${name} failed validation: ${formatZodIssues(parsed.error).join('; ')}`);
        }
        return parsed.data;
    }
}
