import { z } from 'zod';
import { ProfileSnapshot, RoleContext } from './profile';
import { DeepReadonly } from '../utils/deep-freeze.util';

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'fell_back' | 'timed_out';

export type ExecutionMode = 'backend' | 'fallback';

export type TaskErrorKind =
    | 'backend_timeout'
    | 'backend_invalid_output'
    | 'backend_unavailable'
    | 'deadline_exceeded'
    | 'fallback_defect';

export interface TaskError {
    kind: TaskErrorKind;
    message: string;
}

/**
 * Run-time record of one task. Mutable only inside the scheduler until it is
 * finalized; published to dependents and the synthesizer as FinalizedTaskResult.
 */
export interface TaskResult {
    task: string;
    status: TaskStatus;
    output: unknown;
    mode: ExecutionMode | null;
    error: TaskError | null;
    startedAt: number;
    finishedAt: number | null;
    elapsedMs: number;
}

export type FinalizedTaskResult = DeepReadonly<TaskResult>;

export type FinalizedResults = ReadonlyMap<string, FinalizedTaskResult>;

export interface TaskContext {
    profile: ProfileSnapshot;
    role: RoleContext;
    /** Finalized results of the declared dependencies, keyed by task name. */
    dependencies: Readonly<Record<string, FinalizedTaskResult>>;
}

/**
 * Task Contract
 *
 * Static definition of one analysis task. The fallback is mandatory and
 * must be synchronous, deterministic and schema-conforming. The backend is
 * optional and may be slow, fail, or return anything.
 */
export interface TaskSpec<TOutput = unknown> {
    name: string;
    dependencies: readonly string[];
    schema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;
    fallback(context: TaskContext): TOutput;
    backend?(context: TaskContext, signal: AbortSignal): Promise<unknown>;
    /** Overrides the scheduler's uniform per-task timeout. */
    timeoutMs?: number;
}

export type AnyTaskSpec = TaskSpec<unknown>;
