/** Failure kinds an Outcome can carry. */
export type FailureKind =
    | "TaskError"
    | "WorkerCrashed"
    | "PoolSaturated"
    | "Cancelled"
    | "PoolClosed"
    | "InvalidPayload";

/** Base class for every failure a task can settle with. */
export abstract class PoolError extends Error {
    abstract readonly kind: FailureKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** The registered function itself threw inside the worker. */
export class TaskError extends PoolError {
    readonly kind = "TaskError";
    readonly remoteName?: string;
    readonly remoteStack?: string;

    constructor(message: string, remoteName?: string, remoteStack?: string) {
        super(message);
        this.remoteName = remoteName;
        this.remoteStack = remoteStack;
    }
}

/** The execution context died mid-task and the retry budget is spent. */
export class WorkerCrashedError extends PoolError {
    readonly kind = "WorkerCrashed";
}

/** The queue was full; the task was never accepted. */
export class PoolSaturatedError extends PoolError {
    readonly kind = "PoolSaturated";
}

export class CancelledError extends PoolError {
    readonly kind = "Cancelled";
}

/** The pool was not running, or shut down before the task settled. */
export class PoolClosedError extends PoolError {
    readonly kind = "PoolClosed";
}

/** The payload could not be cloned to a worker, so the task never ran. */
export class InvalidPayloadError extends PoolError {
    readonly kind = "InvalidPayload";
}

/** The supervisor could not keep the pool alive. */
export class PoolFatalError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "PoolFatalError";
    }
}

/** Invalid pool options or environment. */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
