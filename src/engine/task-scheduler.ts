import { ZodError } from 'zod';
import { ILogger } from '../config/logger';
import { errorMessage } from '../utils/error.util';
import { ProfileSnapshot, RoleContext } from '../types/profile';
import {
    AnyTaskSpec,
    ExecutionMode,
    FinalizedResults,
    FinalizedTaskResult,
    TaskContext,
    TaskError,
    TaskResult,
    TaskStatus
} from '../types/task';
import { deepFreeze } from '../utils/deep-freeze.util';
import { withTimeout } from '../utils/timeout.util';
import {
    BackendError,
    BackendInvalidOutputError,
    BackendTimeoutError,
    BackendUnavailableError,
    EngineFatalError,
    FallbackDefectError,
    GraphConfigurationError
} from './errors';
import { TaskGraph } from './task-graph';

export interface SchedulerOptions {
    /** Maximum number of backend calls in flight at once. */
    workerPoolSize: number;
    /** Uniform per-task backend timeout, unless a task overrides it. */
    taskTimeoutMs: number;
    /** Top-level deadline for one invocation. */
    deadlineMs: number;
}

export interface SchedulerRunOptions {
    /** Called once per task, right after its result is finalized. */
    onFinalized?: (result: FinalizedTaskResult) => void;
}

export type Clock = () => number;

export function formatZodIssues(error: ZodError): string[] {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Task Scheduler
 *
 * Executes a validated task DAG. Ready tasks are dispatched as soon as all of
 * their dependencies are finalized; at most `workerPoolSize` backend calls run
 * concurrently. Each backend call is bounded by its timeout and by what is
 * left of the invocation deadline, and any backend failure is replaced by the
 * task's fallback. A run therefore always terminates with one finalized result
 * per task, or rejects with an EngineFatalError.
 */
export class TaskScheduler {
    readonly graph: TaskGraph;

    constructor(
        tasks: readonly AnyTaskSpec[],
        private readonly options: SchedulerOptions,
        private readonly logger: ILogger,
        private readonly clock: Clock = Date.now
    ) {
        if (!Number.isInteger(options.workerPoolSize) || options.workerPoolSize < 1) {
            throw new GraphConfigurationError(`workerPoolSize must be a positive integer, got ${options.workerPoolSize}`);
        }
        if (options.taskTimeoutMs <= 0 || options.deadlineMs <= 0) {
            throw new GraphConfigurationError('taskTimeoutMs and deadlineMs must be positive');
        }
        for (const task of tasks) {
            if (task.timeoutMs !== undefined && task.timeoutMs <= 0) {
                throw new GraphConfigurationError(`Task ${task.name} has a non-positive timeout`);
            }
        }

        this.graph = new TaskGraph(tasks);
    }

    /**
     * Upper bound on the wall-clock cost of one run.
     */
    worstCaseMs(): number {
        const longestTimeout = this.graph.tasks.reduce(
            (max, task) => Math.max(max, task.timeoutMs ?? this.options.taskTimeoutMs),
            0
        );
        return Math.min(this.options.deadlineMs, this.graph.depth() * longestTimeout);
    }

    run(
        profile: ProfileSnapshot,
        role: RoleContext,
        runOptions: SchedulerRunOptions = {}
    ): Promise<FinalizedResults> {
        const run = new SchedulerRun(this.graph, this.options, this.logger, this.clock, runOptions);
        return run.execute(profile, role);
    }
}

/**
 * State of a single invocation. The finalized map is written once per key,
 * by whichever continuation finished that task, and only read afterwards.
 */
class SchedulerRun {
    private readonly records = new Map<string, TaskResult>();
    private readonly finalized = new Map<string, FinalizedTaskResult>();
    private readonly waitingOn = new Map<string, number>();
    private readonly abortController = new AbortController();
    private readonly deadlineAt: number;
    private readyQueue: string[] = [];
    private inFlight = 0;
    private fatal: Error | null = null;
    private completed = false;
    private profile: ProfileSnapshot | null = null;
    private role: RoleContext | null = null;
    private resolveRun: (results: FinalizedResults) => void = () => undefined;
    private rejectRun: (error: Error) => void = () => undefined;

    constructor(
        private readonly graph: TaskGraph,
        private readonly options: SchedulerOptions,
        private readonly logger: ILogger,
        private readonly clock: Clock,
        private readonly runOptions: SchedulerRunOptions
    ) {
        this.deadlineAt = clock() + options.deadlineMs;
    }

    execute(profile: ProfileSnapshot, role: RoleContext): Promise<FinalizedResults> {
        this.profile = profile;
        this.role = role;

        return new Promise<FinalizedResults>((resolve, reject) => {
            this.resolveRun = resolve;
            this.rejectRun = reject;

            for (const name of this.graph.executionOrder) {
                const spec = this.graph.get(name);
                this.records.set(name, {
                    task: name,
                    status: 'pending',
                    output: null,
                    mode: null,
                    error: null,
                    startedAt: 0,
                    finishedAt: null,
                    elapsedMs: 0
                });
                this.waitingOn.set(name, spec.dependencies.length);
                if (spec.dependencies.length === 0) {
                    this.readyQueue.push(name);
                }
            }

            this.logger.info({
                tasks: this.graph.size,
                workerPoolSize: this.options.workerPoolSize,
                deadlineMs: this.options.deadlineMs
            }, 'Scheduler run started');

            this.pump();
        });
    }

    /**
     * Dispatches every ready task that can start now. Fallback-only tasks and
     * tasks past the deadline never wait for a worker slot.
     */
    private pump(): void {
        let progressed = true;
        while (progressed && !this.fatal) {
            progressed = false;
            for (const name of [...this.readyQueue]) {
                if (this.fatal) {
                    return;
                }
                const spec = this.graph.get(name);
                const needsWorker = spec.backend !== undefined && !this.deadlinePassed();
                if (needsWorker && this.inFlight >= this.options.workerPoolSize) {
                    continue;
                }

                this.readyQueue = this.readyQueue.filter(queued => queued !== name);
                progressed = true;
                try {
                    this.start(spec);
                } catch (error) {
                    this.failRun(error);
                    return;
                }
            }
        }

        if (!this.fatal && !this.completed && this.finalized.size === this.graph.size) {
            this.completed = true;
            this.logger.info({
                tasks: this.finalized.size,
                backend: this.countByMode('backend'),
                fallback: this.countByMode('fallback')
            }, 'Scheduler run completed');
            this.resolveRun(new Map(this.finalized));
        }
    }

    private start(spec: AnyTaskSpec): void {
        const record = this.record(spec.name);
        record.status = 'running';
        record.startedAt = this.clock();

        const context = this.contextFor(spec);

        if (!spec.backend) {
            this.finishWithFallback(spec, record, context, 'fell_back', {
                kind: 'backend_unavailable',
                message: 'No backend configured'
            });
            return;
        }

        const remaining = this.deadlineAt - this.clock();
        if (remaining <= 0) {
            this.finishWithFallback(spec, record, context, 'timed_out', {
                kind: 'deadline_exceeded',
                message: 'Invocation deadline passed before the task started'
            });
            return;
        }

        const timeoutMs = Math.min(spec.timeoutMs ?? this.options.taskTimeoutMs, remaining);
        this.inFlight++;
        this.invokeBackend(spec, record, context, timeoutMs).then(
            () => {
                this.inFlight--;
                this.pump();
            },
            (error: unknown) => {
                this.inFlight--;
                this.failRun(error);
            }
        );
    }

    private async invokeBackend(
        spec: AnyTaskSpec,
        record: TaskResult,
        context: TaskContext,
        timeoutMs: number
    ): Promise<void> {
        let outcome: { output: unknown } | { failure: BackendError };
        try {
            const raw = await withTimeout(
                signal => {
                    if (!spec.backend) {
                        throw new BackendUnavailableError(spec.name, 'No backend configured');
                    }
                    return spec.backend(context, signal);
                },
                timeoutMs,
                () => new BackendTimeoutError(spec.name, timeoutMs),
                this.abortController.signal
            );

            const parsed = spec.schema.safeParse(raw);
            outcome = parsed.success
                ? { output: parsed.data }
                : { failure: new BackendInvalidOutputError(spec.name, formatZodIssues(parsed.error)) };
        } catch (error) {
            outcome = { failure: classifyBackendError(spec.name, error) };
        }

        if (this.fatal) {
            return;
        }
        if ('output' in outcome) {
            this.finalize(record, 'succeeded', 'backend', outcome.output, null);
            return;
        }

        const failure = outcome.failure;
        this.logger.warn({
            task: spec.name,
            kind: failure.kind,
            error: failure.message
        }, 'Backend call failed, using fallback');

        const status: TaskStatus = failure instanceof BackendTimeoutError ? 'timed_out' : 'fell_back';
        this.finishWithFallback(spec, record, context, status, {
            kind: failure.kind,
            message: failure.message
        });
    }

    /**
     * Runs the fallback synchronously. A throwing or non-conforming fallback
     * is a defect and ends the invocation.
     */
    private finishWithFallback(
        spec: AnyTaskSpec,
        record: TaskResult,
        context: TaskContext,
        status: TaskStatus,
        cause: TaskError
    ): void {
        let output: unknown;
        try {
            output = spec.fallback(context);
        } catch (error) {
            this.finalize(record, 'failed', 'fallback', null, { kind: 'fallback_defect', message: errorMessage(error) });
            throw new FallbackDefectError(spec.name, errorMessage(error), { cause: error });
        }

        const parsed = spec.schema.safeParse(output);
        if (!parsed.success) {
            const issues = formatZodIssues(parsed.error).join('; ');
            this.finalize(record, 'failed', 'fallback', null, { kind: 'fallback_defect', message: issues });
            throw new FallbackDefectError(spec.name, `output failed validation: ${issues}`);
        }

        this.finalize(record, status, 'fallback', parsed.data, cause);
    }

    /**
     * Freezes the record and publishes it. Dependents only ever see it from
     * this point on.
     */
    private finalize(
        record: TaskResult,
        status: TaskStatus,
        mode: ExecutionMode,
        output: unknown,
        error: TaskError | null
    ): void {
        const finishedAt = this.clock();
        record.status = status;
        record.mode = mode;
        record.output = output;
        record.error = error;
        record.finishedAt = finishedAt;
        record.elapsedMs = Math.max(0, finishedAt - record.startedAt);

        const published = deepFreeze(record);
        this.finalized.set(record.task, published);

        this.logger.debug({
            task: record.task,
            status,
            mode,
            elapsedMs: record.elapsedMs
        }, 'Task finalized');

        this.runOptions.onFinalized?.(published);

        if (status === 'failed') {
            return;
        }
        for (const dependent of this.graph.dependentsOf(record.task)) {
            const count = (this.waitingOn.get(dependent) ?? 0) - 1;
            this.waitingOn.set(dependent, count);
            if (count === 0) {
                this.readyQueue.push(dependent);
            }
        }
    }

    private failRun(error: unknown): void {
        if (this.fatal) {
            return;
        }
        const fatal = error instanceof Error ? error : new Error(String(error));
        this.fatal = fatal;
        this.abortController.abort(fatal);

        this.logger.error({
            error: fatal.message,
            category: fatal instanceof EngineFatalError ? fatal.category : 'unknown',
            finalized: this.finalized.size,
            tasks: this.graph.size
        }, 'Scheduler run aborted');

        this.rejectRun(fatal);
    }

    private contextFor(spec: AnyTaskSpec): TaskContext {
        const dependencies: Record<string, FinalizedTaskResult> = {};
        for (const dependency of spec.dependencies) {
            const result = this.finalized.get(dependency);
            if (!result) {
                throw new GraphConfigurationError(
                    `Task ${spec.name} started before dependency ${dependency} was finalized`
                );
            }
            dependencies[dependency] = result;
        }

        if (!this.profile || !this.role) {
            throw new GraphConfigurationError('Scheduler run started without inputs');
        }
        return {
            profile: this.profile,
            role: this.role,
            dependencies: Object.freeze(dependencies)
        };
    }

    private record(name: string): TaskResult {
        const record = this.records.get(name);
        if (!record) {
            throw new GraphConfigurationError(`Unknown task: ${name}`);
        }
        return record;
    }

    private deadlinePassed(): boolean {
        return this.clock() >= this.deadlineAt;
    }

    private countByMode(mode: ExecutionMode): number {
        return [...this.finalized.values()].filter(result => result.mode === mode).length;
    }
}

function classifyBackendError(task: string, error: unknown): BackendError {
    if (error instanceof BackendError) {
        return error;
    }
    return new BackendUnavailableError(task, errorMessage(error));
}
