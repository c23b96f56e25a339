import { randomUUID } from "node:crypto";
import { Packr } from "msgpackr";

export const PROTOCOL = "corepool/1";

const packr = new Packr({ useRecords: false });

export enum MessageType {
    TASK = "task",
    RESULT = "result",
    ERROR = "error",
    PING = "ping",
    PONG = "pong",
    READY = "ready",
    SHUTDOWN = "shutdown",
}

const MESSAGE_TYPES = new Set<string>(Object.values(MessageType));

export interface TaskMessageData {
    protocol: string;
    id: string;
    type: MessageType;
    timestamp: number;
    function?: string;
    error?: string;
    errorName?: string;
    stack?: string;
    attempt?: number;
    transfer?: boolean;
    sentAt?: number;
    functions?: string[];
    workerId?: string;
}

/**
 * The unit posted across the isolation boundary.
 *
 * `envelope` is always a msgpack-encoded {@link TaskMessage} and holds only
 * metadata. `body` carries a task's payload or result by structured clone,
 * so Maps, Sets, BigInts and typed arrays arrive as they were sent. In
 * transfer mode its ArrayBuffers also ride in the transfer list.
 */
export interface WireFrame {
    envelope: Uint8Array;
    body?: unknown;
}

export function isWireFrame(value: unknown): value is WireFrame {
    return typeof value === "object" && value !== null && "envelope" in value && value.envelope instanceof Uint8Array;
}

export class TaskMessage {
    public protocol: string = PROTOCOL;
    public id: string;
    public type: MessageType;
    public timestamp: number;
    public function?: string;
    public error?: string;
    public errorName?: string;
    public stack?: string;
    public attempt?: number;
    public transfer?: boolean;
    public sentAt?: number;
    public functions?: string[];
    public workerId?: string;

    constructor(data: Partial<TaskMessageData> & { type: MessageType }) {
        this.id = data.id || randomUUID();
        this.type = data.type;
        this.timestamp = data.timestamp || Date.now();

        Object.assign(this, data);
    }

    /** The payload itself travels in the frame body, see {@link toFrame}. */
    static createTask(
        taskId: string,
        functionName: string,
        options: { attempt?: number; transfer?: boolean } = {},
    ): TaskMessage {
        return new TaskMessage({
            type: MessageType.TASK,
            id: taskId,
            function: functionName,
            attempt: options.attempt ?? 0,
            transfer: options.transfer || undefined,
        });
    }

    static createResult(taskId: string, transfer = false): TaskMessage {
        return new TaskMessage({
            type: MessageType.RESULT,
            id: taskId,
            transfer: transfer || undefined,
        });
    }

    static createError(error: unknown, taskId: string): TaskMessage {
        if (error instanceof Error) {
            return new TaskMessage({
                type: MessageType.ERROR,
                id: taskId,
                error: error.message,
                errorName: error.name,
                stack: error.stack,
            });
        }
        return new TaskMessage({ type: MessageType.ERROR, id: taskId, error: String(error) });
    }

    static createPing(): TaskMessage {
        return new TaskMessage({ type: MessageType.PING, sentAt: Date.now() });
    }

    static createPong(ping: TaskMessage): TaskMessage {
        return new TaskMessage({ type: MessageType.PONG, id: ping.id, sentAt: ping.sentAt });
    }

    static createReady(functions: string[], workerId?: string): TaskMessage {
        return new TaskMessage({ type: MessageType.READY, functions, workerId });
    }

    static createShutdown(): TaskMessage {
        return new TaskMessage({ type: MessageType.SHUTDOWN });
    }

    toDict(): TaskMessageData {
        const result: TaskMessageData = {
            protocol: this.protocol,
            id: this.id,
            type: this.type,
            timestamp: this.timestamp,
        };

        if (this.function !== undefined) result.function = this.function;
        if (this.error !== undefined) result.error = this.error;
        if (this.errorName !== undefined) result.errorName = this.errorName;
        if (this.stack !== undefined) result.stack = this.stack;
        if (this.attempt !== undefined) result.attempt = this.attempt;
        if (this.transfer !== undefined) result.transfer = this.transfer;
        if (this.sentAt !== undefined) result.sentAt = this.sentAt;
        if (this.functions !== undefined) result.functions = this.functions;
        if (this.workerId !== undefined) result.workerId = this.workerId;

        return result;
    }

    pack(): Uint8Array {
        // Copy out of msgpackr's shared encode buffer
        return Uint8Array.from(packr.pack(this.toDict()));
    }

    static unpack(data: Uint8Array): TaskMessage {
        let decoded: unknown;
        try {
            decoded = packr.unpack(data);
        } catch (error) {
            throw new Error(`Failed to unpack message: ${error}`);
        }
        if (!isMessageData(decoded)) {
            throw new Error("Failed to unpack message: not a task envelope");
        }
        if (decoded.protocol !== PROTOCOL) {
            throw new Error(`Failed to unpack message: unknown protocol '${decoded.protocol}'`);
        }
        return new TaskMessage(decoded);
    }

    /** Frame this message with an optional payload or result as `body`. */
    toFrame(body?: unknown): WireFrame {
        const frame: WireFrame = { envelope: this.pack() };
        if (body !== undefined) {
            frame.body = body;
        }
        return frame;
    }
}

function isMessageData(value: unknown): value is TaskMessageData {
    if (typeof value !== "object" || value === null) return false;
    if (!("protocol" in value) || typeof value.protocol !== "string") return false;
    if (!("id" in value) || typeof value.id !== "string") return false;
    if (!("type" in value) || typeof value.type !== "string") return false;
    return MESSAGE_TYPES.has(value.type);
}

/**
 * Collect the distinct ArrayBuffers reachable from `value` that can be moved
 * with a transfer list. SharedArrayBuffers are skipped: they are shared, not
 * moved.
 */
export function collectTransferables(value: unknown): ArrayBuffer[] {
    const found = new Set<ArrayBuffer>();
    const seen = new Set<object>();

    const visit = (item: unknown): void => {
        if (typeof item !== "object" || item === null || seen.has(item)) return;
        seen.add(item);

        if (item instanceof ArrayBuffer) {
            found.add(item);
            return;
        }
        if (ArrayBuffer.isView(item)) {
            if (item.buffer instanceof ArrayBuffer) {
                found.add(item.buffer);
            }
            return;
        }
        if (Array.isArray(item)) {
            for (const entry of item) visit(entry);
            return;
        }
        if (Object.getPrototypeOf(item) === Object.prototype) {
            for (const entry of Object.values(item)) visit(entry);
        }
    };

    visit(value);
    return [...found];
}
