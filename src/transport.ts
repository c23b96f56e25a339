import { fork } from "node:child_process";
import type { ChildProcess } from "node:child_process";
import { fileURLToPath, pathToFileURL } from "node:url";
import { Worker } from "node:worker_threads";
import { errorMessage } from "./errors.js";
import { isWireFrame } from "./message.js";
import type { WireFrame } from "./message.js";

export type TransportKind = "thread" | "process";

const KILL_TIMEOUT_MS = 2000;

/** Env variable carrying the worker id into forked processes. */
export const WORKER_ID_ENV = "COREPOOL_WORKER_ID";

export interface TransportOptions {
    script: string | URL;
    workerId: string;
    execArgv?: string[];
}

/**
 * One isolated execution context. Implementations deliver only well-formed
 * frames to the message listener.
 */
export interface WorkerTransport {
    readonly kind: TransportKind;
    /** Thread id or process id. */
    readonly nativeId: number;
    send(frame: WireFrame, transferList: ArrayBuffer[]): void;
    onMessage(listener: (frame: WireFrame) => void): void;
    onExit(listener: (exitCode: number) => void): void;
    onError(listener: (error: Error) => void): void;
    /** Force the context down. Resolves with its exit code. */
    terminate(): Promise<number>;
}

export type TransportFactory = (kind: TransportKind, options: TransportOptions) => WorkerTransport;

function scriptPath(script: string | URL): string {
    return script instanceof URL ? fileURLToPath(script) : script;
}

const TYPESCRIPT_EXTENSION = /\.[cm]?tsx?$/;

/**
 * Entry module for TypeScript scripts. Threads on Node.js 20 ignore
 * `--import` in their execArgv, so tsx is registered inside the thread
 * before the script itself is imported.
 */
const TSX_BOOTSTRAP = new URL(
    "data:text/javascript," +
        encodeURIComponent(
            [
                'import { workerData } from "node:worker_threads";',
                "const { register } = await import(workerData.tsxLoader);",
                "register();",
                "await import(workerData.script);",
            ].join("\n"),
        ),
);

export interface ThreadWorkerData {
    workerId: string;
    /** Set when the thread starts through the tsx bootstrap. */
    script?: string;
    tsxLoader?: string;
}

/** What a thread is started with: the script itself, or the tsx bootstrap for TypeScript. */
export function threadEntry(
    options: TransportOptions,
    resolveLoader: () => string = () => import.meta.resolve("tsx/esm/api"),
): { filename: string | URL; workerData: ThreadWorkerData } {
    const path = scriptPath(options.script);
    if (!TYPESCRIPT_EXTENSION.test(path)) {
        return { filename: options.script, workerData: { workerId: options.workerId } };
    }

    let tsxLoader: string;
    try {
        tsxLoader = resolveLoader();
    } catch (error) {
        throw new Error(`Cannot run ${path} in a thread without tsx: ${errorMessage(error)}`);
    }
    return {
        filename: TSX_BOOTSTRAP,
        workerData: { workerId: options.workerId, script: pathToFileURL(path).href, tsxLoader },
    };
}

export class ThreadTransport implements WorkerTransport {
    readonly kind = "thread";
    private readonly worker: Worker;

    constructor(options: TransportOptions) {
        const entry = threadEntry(options);
        this.worker = new Worker(entry.filename, {
            workerData: entry.workerData,
            execArgv: options.execArgv,
        });
    }

    get nativeId(): number {
        return this.worker.threadId;
    }

    send(frame: WireFrame, transferList: ArrayBuffer[]): void {
        this.worker.postMessage(frame, transferList);
    }

    onMessage(listener: (frame: WireFrame) => void): void {
        this.worker.on("message", (raw: unknown) => {
            if (isWireFrame(raw)) {
                listener(raw);
            }
        });
    }

    onExit(listener: (exitCode: number) => void): void {
        this.worker.on("exit", listener);
    }

    onError(listener: (error: Error) => void): void {
        this.worker.on("error", listener);
    }

    terminate(): Promise<number> {
        return this.worker.terminate();
    }
}

/**
 * Forked Node.js process. IPC cannot move memory between processes, so
 * transfer lists are honoured by structured-cloning with `transfer`: the
 * sender's buffers are detached exactly as they would be for a thread.
 */
export class ProcessTransport implements WorkerTransport {
    readonly kind = "process";
    private readonly child: ChildProcess;

    constructor(options: TransportOptions) {
        this.child = fork(scriptPath(options.script), [], {
            serialization: "advanced",
            execArgv: options.execArgv,
            env: { ...process.env, [WORKER_ID_ENV]: options.workerId },
        });
    }

    get nativeId(): number {
        return this.child.pid ?? -1;
    }

    private get exited(): boolean {
        return this.child.exitCode !== null || this.child.signalCode !== null;
    }

    send(frame: WireFrame, transferList: ArrayBuffer[]): void {
        const body = transferList.length > 0 ? structuredClone(frame.body, { transfer: transferList }) : frame.body;
        const sent = this.child.send({ envelope: frame.envelope, body });
        if (!sent) {
            throw new Error(`Failed to send to process ${this.nativeId}: IPC channel closed`);
        }
    }

    onMessage(listener: (frame: WireFrame) => void): void {
        this.child.on("message", (raw: unknown) => {
            if (isWireFrame(raw)) {
                listener(raw);
            }
        });
    }

    onExit(listener: (exitCode: number) => void): void {
        this.child.on("exit", code => listener(code ?? 1));
    }

    onError(listener: (error: Error) => void): void {
        this.child.on("error", listener);
    }

    async terminate(): Promise<number> {
        if (this.exited) {
            return this.child.exitCode ?? 1;
        }

        return new Promise<number>(resolve => {
            const timeout = setTimeout(() => {
                this.child.kill("SIGKILL");
            }, KILL_TIMEOUT_MS);

            this.child.once("exit", code => {
                clearTimeout(timeout);
                resolve(code ?? 1);
            });

            this.child.kill("SIGTERM");
        });
    }
}

export const defaultTransportFactory: TransportFactory = (kind, options) =>
    kind === "thread" ? new ThreadTransport(options) : new ProcessTransport(options);
