import { isMainThread, parentPort, workerData } from "node:worker_threads";
import { MessageType, TaskMessage, collectTransferables, isWireFrame } from "./message.js";
import type { WireFrame } from "./message.js";
import { WORKER_ID_ENV } from "./transport.js";

/** The link back to the pool, over a MessagePort or the IPC channel. */
interface ParentChannel {
    send(frame: WireFrame, transferList: ArrayBuffer[]): void;
    onMessage(listener: (frame: WireFrame) => void): void;
    close(): void;
}

function threadChannel(): ParentChannel | undefined {
    const port = parentPort;
    if (isMainThread || !port) {
        return undefined;
    }
    return {
        send: (frame, transferList) => port.postMessage(frame, transferList),
        onMessage: listener =>
            port.on("message", (raw: unknown) => {
                if (isWireFrame(raw)) listener(raw);
            }),
        close: () => port.close(),
    };
}

function processChannel(): ParentChannel | undefined {
    if (!process.send) {
        return undefined;
    }
    return {
        send: (frame, transferList) => {
            const body = transferList.length > 0 ? structuredClone(frame.body, { transfer: transferList }) : frame.body;
            process.send?.({ envelope: frame.envelope, body }, undefined, {}, error => {
                if (error) {
                    console.error(`CRITICAL: Failed to send to pool: ${error.message}`);
                }
            });
        },
        onMessage: listener =>
            process.on("message", (raw: unknown) => {
                if (isWireFrame(raw)) listener(raw);
            }),
        close: () => process.disconnect(),
    };
}

function resolveWorkerId(): string | undefined {
    const data: unknown = workerData;
    if (typeof data === "object" && data !== null && "workerId" in data && typeof data.workerId === "string") {
        return data.workerId;
    }
    return process.env[WORKER_ID_ENV];
}

/**
 * Base class for worker scripts. Every public method of a subclass is a
 * registered function: it receives the task payload and its return value
 * (or resolved value) becomes the task result.
 *
 *     class MathWorker extends TaskWorker {
 *         fib(n: number): number { ... }
 *     }
 *     new MathWorker().run();
 *
 * Methods starting with `_` are not exposed. Async methods run
 * concurrently; synchronous ones block heartbeats until they return.
 */
export abstract class TaskWorker {
    readonly workerId?: string = resolveWorkerId();
    private channel?: ParentChannel;
    private registry: Set<string> = new Set();

    /** Names of the functions this worker exposes. */
    listFunctions(): string[] {
        const excluded = new Set(Object.getOwnPropertyNames(TaskWorker.prototype));
        const names = new Set<string>();

        let proto: unknown = Object.getPrototypeOf(this);
        while (proto instanceof Object && proto !== TaskWorker.prototype) {
            for (const name of Object.getOwnPropertyNames(proto)) {
                if (!name.startsWith("_") && !excluded.has(name) && typeof Reflect.get(this, name) === "function") {
                    names.add(name);
                }
            }
            proto = Object.getPrototypeOf(proto);
        }
        return [...names].sort();
    }

    /** Connect to the pool and serve tasks until told to shut down. */
    run(): void {
        const channel = threadChannel() ?? processChannel();
        if (!channel) {
            throw new Error("TaskWorker must run inside a worker thread or a forked process");
        }
        this.channel = channel;
        this.registry = new Set(this.listFunctions());

        channel.onMessage(frame => this.handleFrame(frame));
        channel.send(TaskMessage.createReady([...this.registry], this.workerId).toFrame(), []);
    }

    private handleFrame(frame: WireFrame): void {
        let message: TaskMessage;
        try {
            message = TaskMessage.unpack(frame.envelope);
        } catch (error) {
            console.error(`WARNING: ${error}`);
            return;
        }

        switch (message.type) {
            case MessageType.TASK:
                this.handleTask(message, frame.body).catch(error => {
                    console.error(`CRITICAL: Failed to answer task ${message.id}: ${error}`);
                });
                break;
            case MessageType.PING:
                this.send(TaskMessage.createPong(message));
                break;
            case MessageType.SHUTDOWN:
                this.channel?.close();
                this.channel = undefined;
                break;
            default:
                console.error(`WARNING: Ignoring unexpected ${message.type} message`);
        }
    }

    private async handleTask(message: TaskMessage, body: unknown): Promise<void> {
        const transfer = message.transfer === true;
        let response: TaskMessage;
        let result: unknown;

        try {
            const name = message.function;
            if (!name) {
                throw new Error("Task message has no function");
            }
            const fn: unknown = Reflect.get(this, name);
            if (!this.registry.has(name) || typeof fn !== "function") {
                throw new Error(`Function '${name}' is not registered on this worker`);
            }

            result = await Reflect.apply(fn, this, [body]);
            response = TaskMessage.createResult(message.id, transfer);
        } catch (error) {
            response = TaskMessage.createError(error, message.id);
        }

        try {
            this.send(response, result);
        } catch (error) {
            // The result could not be cloned
            this.send(TaskMessage.createError(error, message.id));
        }
    }

    private send(message: TaskMessage, body?: unknown): void {
        if (!this.channel) {
            return;
        }
        const transferList = message.transfer ? collectTransferables(body) : [];
        this.channel.send(message.toFrame(body), transferList);
    }
}
