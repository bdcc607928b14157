import { Job, Queue, Worker, QueueEvents } from 'bullmq';
import { Redis } from 'ioredis';
import { z } from 'zod';
import { logger } from '../config/logger';
import { ProfileSnapshotSchema, RoleContextSchema } from '../types/profile';
import type { TailoringOutcome } from '../engine/resume-orchestrator';

export const TAILORING_QUEUE = 'tailoring';
export const TAILOR_JOB = 'tailor';
export const WORKER_CONCURRENCY = 1;

/**
 * Payload of a `tailor` job. Profile and role context live only here and in
 * Redis, never in Postgres.
 */
export const TailorJobDataSchema = z.object({
    submissionId: z.number().int().positive(),
    profile: ProfileSnapshotSchema,
    role: RoleContextSchema
});
export type TailorJobData = z.input<typeof TailorJobDataSchema>;

export type TailorJob = Job<TailorJobData, TailoringOutcome>;

export function tailorJobId(submissionId: number): string {
    return `submission-${submissionId}`;
}

/**
 * Queue Configuration
 *
 * BullMQ setup for asynchronous tailoring. Completed jobs are kept for a day
 * because their return value is the only copy of the tailored resume.
 */
export class QueueConfig {
    private redis: Redis;
    private tailoringQueue: Queue<TailorJobData, TailoringOutcome>;
    private tailoringWorker: Worker<TailorJobData, TailoringOutcome> | null = null;
    private queueEvents: QueueEvents;

    constructor() {
        this.redis = new Redis(process.env.REDIS_URL || 'redis://localhost:6379', {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.tailoringQueue = new Queue<TailorJobData, TailoringOutcome>(TAILORING_QUEUE, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: { age: 24 * 60 * 60, count: 1000 },
                removeOnFail: { age: 7 * 24 * 60 * 60 },
                attempts: parseInt(process.env.TAILOR_MAX_ATTEMPTS || '3', 10),
                backoff: {
                    type: 'exponential',
                    delay: parseInt(process.env.TAILOR_BACKOFF_MS || '1000', 10),
                },
            },
        });

        this.queueEvents = new QueueEvents(TAILORING_QUEUE, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    getTailoringQueue(): Queue<TailorJobData, TailoringOutcome> {
        return this.tailoringQueue;
    }

    startWorker(processor: (job: TailorJob) => Promise<TailoringOutcome>): Worker<TailorJobData, TailoringOutcome> {
        // One invocation at a time per process; tasks already run concurrently
        // inside it, and /status reads the newest invocation's records.
        const worker = new Worker<TailorJobData, TailoringOutcome>(TAILORING_QUEUE, processor, {
            connection: this.redis,
            concurrency: WORKER_CONCURRENCY,
        });

        worker.on('completed', (job) => {
            logger.info({
                jobId: job.id,
                jobName: job.name,
                duration: (job.finishedOn ?? Date.now()) - (job.processedOn ?? job.timestamp)
            }, 'Tailoring job completed');
        });

        worker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                jobName: job?.name,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Tailoring job failed');
        });

        worker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Tailoring job stalled');
        });

        this.tailoringWorker = worker;
        return worker;
    }

    private setupEventListeners() {
        this.queueEvents.on('waiting', ({ jobId }) => {
            logger.info({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            logger.info({ jobId }, 'Job started processing');
        });

        // The return value carries the whole resume; log only that it arrived.
        this.queueEvents.on('completed', ({ jobId }) => {
            logger.info({ jobId }, 'Job completed successfully');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error({ jobId, failedReason }, 'Job failed');
        });
    }

    async close() {
        await this.tailoringWorker?.close();
        await this.tailoringQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
