/**
 * Unit tests for ResultChannel.
 *
 * Run with: node --import tsx --test tests/result_channel.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { ResultChannel } from "../src/result_channel.js";
import { createTask } from "../src/task.js";
import { failure } from "../src/outcome.js";
import type { Outcome } from "../src/outcome.js";
import { PoolClosedError } from "../src/errors.js";

function success(taskId: string, value: unknown): Outcome {
    return { ok: true, taskId, value, workerId: "worker-0", attempts: 0, durationMs: 1 };
}

describe("ResultChannel", () => {
    it("delivers the outcome to the request with the same task id", async () => {
        const channel = new ResultChannel();
        const first = createTask("echo", 1);
        const second = createTask("echo", 2);
        const firstOutcome = channel.open(first);
        const secondOutcome = channel.open(second);

        // Settled out of order
        assert.equal(channel.settle(second.id, success(second.id, "two")), true);
        assert.equal(channel.settle(first.id, success(first.id, "one")), true);

        const [a, b] = await Promise.all([firstOutcome, secondOutcome]);
        assert.equal(a.ok && a.value, "one");
        assert.equal(b.ok && b.value, "two");
        assert.equal(channel.size, 0);
    });

    it("drops a second settlement for the same id", async () => {
        const channel = new ResultChannel();
        const task = createTask("echo", null);
        const outcome = channel.open(task);

        assert.equal(channel.settle(task.id, success(task.id, "first")), true);
        assert.equal(channel.settle(task.id, success(task.id, "late")), false);

        const settled = await outcome;
        assert.equal(settled.ok && settled.value, "first");
    });

    it("ignores unknown ids", () => {
        const channel = new ResultChannel();
        assert.equal(channel.settle("nope", success("nope", 0)), false);
    });

    it("refuses to open the same task twice", () => {
        const channel = new ResultChannel();
        const task = createTask("echo", null);
        void channel.open(task);

        assert.throws(() => channel.open(task), { message: `Task ${task.id} already has a pending request` });
    });

    it("runs the cleanup hook once at settlement", () => {
        const channel = new ResultChannel();
        const task = createTask("echo", null);
        void channel.open(task);
        let calls = 0;
        channel.onSettle(task.id, () => calls++);

        channel.settle(task.id, success(task.id, 1));
        channel.settle(task.id, success(task.id, 2));

        assert.equal(calls, 1);
    });

    it("settles everything outstanding", async () => {
        const channel = new ResultChannel();
        const tasks = [createTask("a", null), createTask("b", null), createTask("c", null)];
        const outcomes = tasks.map(task => channel.open(task));

        const count = channel.settleAll(request => failure(request.taskId, new PoolClosedError("closing")));

        assert.equal(count, 3);
        assert.equal(channel.size, 0);
        for (const outcome of await Promise.all(outcomes)) {
            assert.equal(outcome.ok, false);
            assert.equal(!outcome.ok && outcome.kind, "PoolClosed");
            assert.equal(!outcome.ok && outcome.detail, "closing");
        }
    });

    it("reports pending requests", () => {
        const channel = new ResultChannel();
        const task = createTask("fib", 10);
        void channel.open(task);

        assert.equal(channel.has(task.id), true);
        assert.equal(channel.get(task.id)?.functionId, "fib");
    });
});
