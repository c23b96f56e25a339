/**
 * In-process stand-in for a worker context. Envelopes go through the real
 * msgpack codec and bodies through structured clone, so the pool, handles
 * and supervisor see the same traffic a thread would produce.
 */

import { MessageType, TaskMessage, collectTransferables } from "../../src/message.js";
import type { WireFrame } from "../../src/message.js";
import type { TransportFactory, TransportKind, TransportOptions, WorkerTransport } from "../../src/transport.js";

export interface FakeContext {
    transport: FakeTransport;
    attempt: number;
}

export type FakeFunction = (payload: unknown, context: FakeContext) => unknown;

export interface FakeBehavior {
    functions: Record<string, FakeFunction>;
    /** Exit with code 1 instead of reporting ready. */
    failStart?: boolean;
    /** Never report ready. */
    neverReady?: boolean;
    /** Ignore pings. */
    silent?: boolean;
}

let nextNativeId = 1000;

export class FakeTransport implements WorkerTransport {
    readonly nativeId = nextNativeId++;
    readonly received: TaskMessage[] = [];
    silent: boolean;
    exitCode?: number;

    private readonly messageListeners: Array<(frame: WireFrame) => void> = [];
    private readonly exitListeners: Array<(exitCode: number) => void> = [];

    constructor(
        readonly kind: TransportKind,
        readonly options: TransportOptions,
        private readonly behavior: FakeBehavior,
    ) {
        this.silent = behavior.silent ?? false;
        setImmediate(() => this.boot());
    }

    get exited(): boolean {
        return this.exitCode !== undefined;
    }

    private boot(): void {
        if (this.exited || this.behavior.neverReady) return;
        if (this.behavior.failStart) {
            this.exit(1);
            return;
        }
        this.emit(TaskMessage.createReady(Object.keys(this.behavior.functions), this.options.workerId));
    }

    send(frame: WireFrame, transferList: ArrayBuffer[]): void {
        if (this.exited) {
            throw new Error(`fake ${this.nativeId} has exited`);
        }
        const body: unknown = structuredClone(frame.body, { transfer: transferList });
        const message = TaskMessage.unpack(frame.envelope);
        this.received.push(message);
        setImmediate(() => this.handle(message, body));
    }

    private handle(message: TaskMessage, body: unknown): void {
        if (this.exited) return;
        switch (message.type) {
            case MessageType.TASK:
                this.runTask(message, body).catch(error => {
                    console.error(`fake ${this.nativeId} could not answer ${message.id}: ${error}`);
                });
                break;
            case MessageType.PING:
                if (!this.silent) this.emit(TaskMessage.createPong(message));
                break;
            case MessageType.SHUTDOWN:
                this.exit(0);
                break;
        }
    }

    private async runTask(message: TaskMessage, body: unknown): Promise<void> {
        const transfer = message.transfer === true;
        const fn = message.function === undefined ? undefined : this.behavior.functions[message.function];
        let response: TaskMessage;
        let result: unknown;
        try {
            if (!fn) {
                throw new Error(`Function '${message.function}' is not registered on this worker`);
            }
            result = await fn(body, { transport: this, attempt: message.attempt ?? 0 });
            response = TaskMessage.createResult(message.id, transfer);
        } catch (error) {
            response = TaskMessage.createError(error, message.id);
        }
        if (!this.exited) {
            this.emit(response, result);
        }
    }

    private emit(message: TaskMessage, body?: unknown): void {
        const transferList = message.transfer ? collectTransferables(body) : [];
        const frame = message.toFrame(structuredClone(body, { transfer: transferList }));
        for (const listener of this.messageListeners) listener(frame);
    }

    onMessage(listener: (frame: WireFrame) => void): void {
        this.messageListeners.push(listener);
    }

    onExit(listener: (exitCode: number) => void): void {
        this.exitListeners.push(listener);
    }

    onError(_listener: (error: Error) => void): void {}

    /** Simulate the context dying on its own. */
    exit(code: number): void {
        if (this.exited) return;
        this.exitCode = code;
        for (const listener of this.exitListeners) listener(code);
    }

    terminate(): Promise<number> {
        this.exit(1);
        return Promise.resolve(this.exitCode ?? 1);
    }
}

/** Factory that records every transport it creates. `behavior` may vary per spawn. */
export function fakeFactory(behavior: FakeBehavior | ((spawn: number) => FakeBehavior)): {
    factory: TransportFactory;
    spawned: FakeTransport[];
} {
    const spawned: FakeTransport[] = [];
    const factory: TransportFactory = (kind, options) => {
        const resolved = typeof behavior === "function" ? behavior(spawned.length) : behavior;
        const transport = new FakeTransport(kind, options, resolved);
        spawned.push(transport);
        return transport;
    };
    return { factory, spawned };
}

export interface Gate<T> {
    promise: Promise<T>;
    open(value: T): void;
}

export function gate<T = unknown>(): Gate<T> {
    let open: (value: T) => void = () => {};
    const promise = new Promise<T>(resolve => {
        open = resolve;
    });
    return { promise, open };
}

/** A task that never finishes. */
export function never(): Promise<never> {
    return new Promise<never>(() => {});
}
