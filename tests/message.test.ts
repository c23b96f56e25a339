/**
 * Unit tests for TaskMessage and the wire frame helpers.
 *
 * Run with: node --import tsx --test tests/message.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { Packr } from "msgpackr";
import {
    MessageType,
    PROTOCOL,
    TaskMessage,
    collectTransferables,
    isWireFrame,
} from "../src/message.js";

// ============================================================================
// Construction
// ============================================================================

describe("TaskMessage: construction", () => {
    it("fills protocol, id and timestamp", () => {
        const msg = new TaskMessage({ type: MessageType.PING });

        assert.equal(msg.protocol, PROTOCOL);
        assert.equal(typeof msg.id, "string");
        assert.ok(msg.id.length > 0);
        assert.ok(msg.timestamp > 0);
    });

    it("builds a task message that holds only metadata", () => {
        const msg = TaskMessage.createTask("task-1", "fib", { attempt: 1 });

        assert.equal(msg.type, MessageType.TASK);
        assert.equal(msg.id, "task-1");
        assert.equal(msg.function, "fib");
        assert.equal(msg.attempt, 1);
        assert.equal(msg.transfer, undefined);
        assert.deepEqual(Object.keys(msg.toDict()).sort(), ["attempt", "function", "id", "protocol", "timestamp", "type"]);
    });

    it("flags transfer mode and keeps the body out of the envelope", () => {
        const data = new Float32Array(4);
        const msg = TaskMessage.createTask("task-2", "scale", { transfer: true });

        assert.equal(msg.transfer, true);
        assert.equal(msg.attempt, 0);

        const frame = msg.toFrame(data);
        assert.equal(frame.body, data);
        assert.equal(TaskMessage.unpack(frame.envelope).transfer, true);
    });

    it("attaches a body only when one is given", () => {
        const msg = TaskMessage.createTask("task-3", "echo");

        assert.equal("body" in msg.toFrame(), false);
        assert.equal(msg.toFrame("hi").body, "hi");
    });

    it("builds results with the task id", () => {
        const copy = TaskMessage.createResult("task-7");
        const moved = TaskMessage.createResult("task-8", true);

        assert.equal(copy.type, MessageType.RESULT);
        assert.equal(copy.id, "task-7");
        assert.equal(copy.transfer, undefined);
        assert.equal(moved.transfer, true);
    });

    it("keeps Map, Set and BigInt bodies intact through structured clone", () => {
        const body = {
            map: new Map<number, string>([[1, "a"], [2, "b"]]),
            set: new Set([1, 2]),
            big: 2n ** 70n,
        };

        const frame = structuredClone(TaskMessage.createTask("task-9", "echo").toFrame(body));

        assert.equal(TaskMessage.unpack(frame.envelope).id, "task-9");
        assert.deepEqual(frame.body, body);
    });

    it("captures name and stack of thrown errors", () => {
        const msg = TaskMessage.createError(new TypeError("bad input"), "task-4");

        assert.equal(msg.type, MessageType.ERROR);
        assert.equal(msg.id, "task-4");
        assert.equal(msg.error, "bad input");
        assert.equal(msg.errorName, "TypeError");
        assert.equal(typeof msg.stack, "string");
    });

    it("stringifies non-Error throws", () => {
        const msg = TaskMessage.createError("plain failure", "task-5");

        assert.equal(msg.error, "plain failure");
        assert.equal(msg.errorName, undefined);
    });

    it("answers a ping with the same id and send time", () => {
        const ping = TaskMessage.createPing();
        const pong = TaskMessage.createPong(ping);

        assert.equal(pong.type, MessageType.PONG);
        assert.equal(pong.id, ping.id);
        assert.equal(pong.sentAt, ping.sentAt);
    });
});

// ============================================================================
// Serialization
// ============================================================================

describe("TaskMessage: pack / unpack", () => {
    it("restores every field that was set", () => {
        const original = TaskMessage.createTask("task-6", "echo", { attempt: 2, transfer: true });
        const restored = TaskMessage.unpack(original.pack());

        assert.deepEqual(restored.toDict(), original.toDict());
    });

    it("omits unset fields from the dictionary", () => {
        const dict = TaskMessage.createShutdown().toDict();
        assert.deepEqual(Object.keys(dict).sort(), ["id", "protocol", "timestamp", "type"]);
    });

    it("rejects msgpack that is not an envelope", () => {
        const bytes = new Packr({ useRecords: false }).pack({ hello: "world" });
        assert.throws(() => TaskMessage.unpack(bytes), {
            message: "Failed to unpack message: not a task envelope",
        });
    });

    it("rejects envelopes of another protocol", () => {
        const foreign = new TaskMessage({ type: MessageType.PING, protocol: "other/9" });
        assert.throws(() => TaskMessage.unpack(foreign.pack()), {
            message: "Failed to unpack message: unknown protocol 'other/9'",
        });
    });

    it("rejects bytes that are not msgpack at all", () => {
        assert.throws(() => TaskMessage.unpack(Uint8Array.from([0xc1])), /^Error: Failed to unpack message/);
    });
});

// ============================================================================
// Frames and transferables
// ============================================================================

describe("isWireFrame", () => {
    it("accepts frames and rejects everything else", () => {
        assert.equal(isWireFrame(TaskMessage.createPing().toFrame()), true);
        assert.equal(isWireFrame({ envelope: [1, 2, 3] }), false);
        assert.equal(isWireFrame("frame"), false);
        assert.equal(isWireFrame(null), false);
    });
});

describe("collectTransferables", () => {
    it("finds each distinct buffer once", () => {
        const floats = new Float32Array(4);
        const bytes = new Uint8Array(floats.buffer);
        const raw = new ArrayBuffer(8);

        const found = collectTransferables({ a: floats, nested: { list: [bytes, raw] } });

        assert.equal(found.length, 2);
        assert.equal(found[0], floats.buffer);
        assert.equal(found[1], raw);
    });

    it("skips shared memory", () => {
        const shared = new Int32Array(new SharedArrayBuffer(16));
        assert.deepEqual(collectTransferables([shared]), []);
    });

    it("does not walk class instances", () => {
        class Box {
            readonly buffer = new ArrayBuffer(4);
        }
        assert.deepEqual(collectTransferables(new Box()), []);
    });

    it("returns nothing for primitives", () => {
        assert.deepEqual(collectTransferables(42), []);
        assert.deepEqual(collectTransferables(undefined), []);
    });
});
