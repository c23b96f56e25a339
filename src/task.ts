import { randomUUID } from "node:crypto";

/** Immutable description of one unit of work. */
export interface Task {
    readonly id: string;
    readonly functionId: string;
    readonly payload: unknown;
    /** Hand the payload's ArrayBuffers to the worker instead of copying them. */
    readonly transferable: boolean;
    readonly submittedAt: number;
}

export function createTask(functionId: string, payload: unknown, transferable = false): Task {
    return Object.freeze({
        id: randomUUID(),
        functionId,
        payload,
        transferable,
        submittedAt: Date.now(),
    });
}

/**
 * Pool-side bookkeeping for a task that has been accepted.
 * `attempts` counts the worker crashes the task has been through.
 */
export interface TaskEntry {
    task: Task;
    attempts: number;
    /** Set once the payload's buffers have left this thread. */
    transferred: boolean;
    workerId?: string;
    dispatchedAt?: number;
}
