import type { Outcome } from "./outcome.js";
import type { Task } from "./task.js";

export interface PendingRequest {
    taskId: string;
    functionId: string;
    submittedAt: number;
    resolve: (outcome: Outcome) => void;
    /** Runs once at settlement (detaches abort listeners and the like). */
    cleanup?: () => void;
}

/**
 * Maps outstanding task ids to the callers waiting on them.
 *
 * Settlement is keyed by task id only, so whichever worker finishes a task
 * and in whatever order, the outcome reaches the caller that submitted it.
 * A second settlement for the same id (duplicate, late or cancelled) is
 * dropped and reported as `false`.
 */
export class ResultChannel {
    private readonly pending: Map<string, PendingRequest> = new Map();

    open(task: Task): Promise<Outcome> {
        if (this.pending.has(task.id)) {
            throw new Error(`Task ${task.id} already has a pending request`);
        }
        return new Promise<Outcome>(resolve => {
            this.pending.set(task.id, {
                taskId: task.id,
                functionId: task.functionId,
                submittedAt: task.submittedAt,
                resolve,
            });
        });
    }

    /** Attach a cleanup hook to an open request. */
    onSettle(taskId: string, cleanup: () => void): void {
        const request = this.pending.get(taskId);
        if (request) {
            request.cleanup = cleanup;
        }
    }

    settle(taskId: string, outcome: Outcome): boolean {
        const request = this.pending.get(taskId);
        if (!request) {
            return false;
        }
        this.pending.delete(taskId);
        request.cleanup?.();
        request.resolve(outcome);
        return true;
    }

    /** Settle every open request, e.g. on shutdown. Returns how many were settled. */
    settleAll(makeOutcome: (request: PendingRequest) => Outcome): number {
        const requests = [...this.pending.values()];
        for (const request of requests) {
            this.settle(request.taskId, makeOutcome(request));
        }
        return requests.length;
    }

    has(taskId: string): boolean {
        return this.pending.has(taskId);
    }

    get(taskId: string): PendingRequest | undefined {
        return this.pending.get(taskId);
    }

    get size(): number {
        return this.pending.size;
    }
}
