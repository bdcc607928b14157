import { TaskErrorKind } from '../types/task';

/**
 * Backend failures. All three are recovered inside the scheduler by running
 * the task's fallback; they never reach the caller, only the audit trail.
 */
export abstract class BackendError extends Error {
    abstract readonly kind: TaskErrorKind;

    constructor(readonly task: string, message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class BackendTimeoutError extends BackendError {
    readonly kind = 'backend_timeout';

    constructor(task: string, readonly timeoutMs: number) {
        super(task, `Backend call for ${task} exceeded ${timeoutMs}ms`);
    }
}

export class BackendInvalidOutputError extends BackendError {
    readonly kind = 'backend_invalid_output';

    constructor(task: string, readonly issues: string[]) {
        super(task, `Backend output for ${task} failed validation: ${issues.join('; ')}`);
    }
}

export class BackendUnavailableError extends BackendError {
    readonly kind = 'backend_unavailable';
}

export type FatalErrorCategory = 'configuration' | 'defect';

/**
 * The only error class an invocation rejects with. `category` tells a
 * misconfigured task graph apart from a broken fallback or synthesis step.
 */
export abstract class EngineFatalError extends Error {
    abstract readonly category: FatalErrorCategory;
    abstract readonly code: string;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class GraphConfigurationError extends EngineFatalError {
    readonly category = 'configuration';
    readonly code = 'graph_configuration';
}

export class FallbackDefectError extends EngineFatalError {
    readonly category = 'defect';
    readonly code = 'fallback_defect';

    constructor(readonly task: string, message: string, options?: { cause?: unknown }) {
        super(`Fallback for ${task} is defective: ${message}`, options);
    }
}

export class OutputContractError extends EngineFatalError {
    readonly category = 'defect';
    readonly code = 'output_contract';
}
