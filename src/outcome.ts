import type { FailureKind, PoolError } from "./errors.js";

export interface Success<T = unknown> {
    ok: true;
    taskId: string;
    value: T;
    workerId: string;
    /** Crashes survived before the successful run. */
    attempts: number;
    durationMs: number;
}

export interface Failure {
    ok: false;
    taskId: string;
    kind: FailureKind;
    detail: string;
    error: PoolError;
    workerId?: string;
    attempts: number;
}

/** Settled result of one task. Produced exactly once per task. */
export type Outcome<T = unknown> = Success<T> | Failure;

export function failure(
    taskId: string,
    error: PoolError,
    context: { workerId?: string; attempts?: number } = {},
): Failure {
    return {
        ok: false,
        taskId,
        kind: error.kind,
        detail: error.message,
        error,
        workerId: context.workerId,
        attempts: context.attempts ?? 0,
    };
}

/** Return the value of a successful outcome, or throw its error. */
export function unwrap<T>(outcome: Outcome<T>): T {
    if (outcome.ok) {
        return outcome.value;
    }
    throw outcome.error;
}
