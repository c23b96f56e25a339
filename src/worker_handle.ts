import { MessageType, TaskMessage, collectTransferables } from "./message.js";
import type { WireFrame } from "./message.js";
import { LogEvent } from "./logging.js";
import type { StructuredLogger } from "./logging.js";
import type { Task } from "./task.js";
import type { TransportFactory, TransportKind, TransportOptions, WorkerTransport } from "./transport.js";

export enum WorkerState {
    STARTING = "starting",
    IDLE = "idle",
    BUSY = "busy",
    RESTARTING = "restarting",
    TERMINATED = "terminated",
}

const TRANSITIONS: Record<WorkerState, readonly WorkerState[]> = {
    [WorkerState.STARTING]: [WorkerState.IDLE, WorkerState.TERMINATED],
    [WorkerState.IDLE]: [WorkerState.BUSY, WorkerState.RESTARTING, WorkerState.TERMINATED],
    [WorkerState.BUSY]: [WorkerState.IDLE, WorkerState.RESTARTING, WorkerState.TERMINATED],
    [WorkerState.RESTARTING]: [WorkerState.IDLE, WorkerState.TERMINATED],
    [WorkerState.TERMINATED]: [],
};

/** Callbacks a handle reports to its owner. */
export interface WorkerHandleListener {
    /** A `result` or `error` message arrived for `message.id`. */
    onSettle(handle: WorkerHandle, message: TaskMessage, body: unknown): void;
    /** The execution context went away while idle or busy, without being asked to. */
    onCrash(handle: WorkerHandle, exitCode: number): void;
}

export interface WorkerSnapshot {
    workerId: string;
    state: WorkerState;
    currentTaskId?: string;
    generation: number;
    nativeId?: number;
    missedHeartbeats: number;
    lastHeartbeatRttMs?: number;
}

interface PendingPing {
    sentAt: number;
    resolve: (rttMs: number | undefined) => void;
    timer: NodeJS.Timeout;
}

interface ReadyWaiter {
    resolve: () => void;
    reject: (error: Error) => void;
}

/**
 * Wraps one isolated execution context and tracks what it is doing.
 *
 * A handle is a slot: when its context crashes the same handle goes to
 * RESTARTING and {@link respawn} puts a fresh context behind it. Messages are
 * routed through a listener registered on each context, and messages from a
 * context that has been replaced are ignored.
 */
export class WorkerHandle {
    readonly workerId: string;
    private _state: WorkerState = WorkerState.STARTING;
    private _currentTaskId?: string;
    private _generation: number = 0;
    private transport?: WorkerTransport;
    private stopping: boolean = false;
    private ready?: ReadyWaiter;
    private readonly pendingPings: Map<string, PendingPing> = new Map();
    private _missedHeartbeats: number = 0;
    private _lastHeartbeatRttMs?: number;
    private _functions: string[] = [];

    constructor(
        readonly slot: number,
        private readonly kind: TransportKind,
        private readonly transportOptions: Omit<TransportOptions, "workerId">,
        private readonly createTransport: TransportFactory,
        private readonly listener: WorkerHandleListener,
        private readonly logger: StructuredLogger,
    ) {
        this.workerId = `worker-${slot}`;
    }

    get state(): WorkerState {
        return this._state;
    }

    get currentTaskId(): string | undefined {
        return this._currentTaskId;
    }

    /** Incremented every time a new execution context is put behind this handle. */
    get generation(): number {
        return this._generation;
    }

    get missedHeartbeats(): number {
        return this._missedHeartbeats;
    }

    /** Functions the current context reported when it became ready. */
    get functions(): readonly string[] {
        return this._functions;
    }

    get isLive(): boolean {
        return this._state === WorkerState.IDLE || this._state === WorkerState.BUSY;
    }

    snapshot(): WorkerSnapshot {
        return {
            workerId: this.workerId,
            state: this._state,
            currentTaskId: this._currentTaskId,
            generation: this._generation,
            nativeId: this.transport?.nativeId,
            missedHeartbeats: this._missedHeartbeats,
            lastHeartbeatRttMs: this._lastHeartbeatRttMs,
        };
    }

    private transition(next: WorkerState): void {
        if (!TRANSITIONS[this._state].includes(next)) {
            throw new Error(`${this.workerId}: illegal transition ${this._state} -> ${next}`);
        }
        this._state = next;
    }

    /** Spawn the first execution context and wait until it reports ready. */
    start(timeoutMs: number): Promise<void> {
        if (this._state !== WorkerState.STARTING) {
            return Promise.reject(new Error(`${this.workerId}: start() called in state ${this._state}`));
        }
        return this.launch(timeoutMs);
    }

    /** Replace a crashed context. The handle must be RESTARTING. */
    respawn(timeoutMs: number): Promise<void> {
        if (this._state !== WorkerState.RESTARTING) {
            return Promise.reject(new Error(`${this.workerId}: respawn() called in state ${this._state}`));
        }
        return this.launch(timeoutMs);
    }

    private launch(timeoutMs: number): Promise<void> {
        this._generation++;
        this._missedHeartbeats = 0;
        this.clearPings();

        let transport: WorkerTransport;
        try {
            transport = this.createTransport(this.kind, { ...this.transportOptions, workerId: this.workerId });
        } catch (error) {
            return Promise.reject(error);
        }
        this.transport = transport;

        transport.onMessage(frame => {
            if (this.transport === transport) {
                this.handleFrame(frame);
            }
        });
        transport.onError(error => {
            if (this.transport === transport) {
                this.logger.warn(LogEvent.WORKER_ERROR, `Worker error: ${error.message}`, {
                    workerId: this.workerId,
                    error: error.message,
                    errorType: error.name,
                });
            }
        });
        transport.onExit(exitCode => {
            if (this.transport === transport) {
                this.handleExit(exitCode);
            }
        });

        return new Promise<void>((resolve, reject) => {
            const timer = setTimeout(() => {
                this.ready = undefined;
                reject(new Error(`${this.workerId} did not report ready within ${timeoutMs}ms`));
                // A context that never came up must not linger
                this.discardTransport(transport);
            }, timeoutMs);

            this.ready = {
                resolve: () => {
                    clearTimeout(timer);
                    this.ready = undefined;
                    resolve();
                },
                reject: (error: Error) => {
                    clearTimeout(timer);
                    this.ready = undefined;
                    reject(error);
                },
            };
        });
    }

    private discardTransport(transport: WorkerTransport): void {
        if (this.transport === transport) {
            this.transport = undefined;
        }
        transport.terminate().catch(error => {
            this.logger.warn(LogEvent.WORKER_ERROR, `Failed to terminate worker: ${error}`, { workerId: this.workerId });
        });
    }

    private handleFrame(frame: WireFrame): void {
        let message: TaskMessage;
        try {
            message = TaskMessage.unpack(frame.envelope);
        } catch (error) {
            this.logger.warn(LogEvent.WORKER_ERROR, `Dropping malformed frame: ${error}`, { workerId: this.workerId });
            return;
        }

        switch (message.type) {
            case MessageType.READY:
                this._functions = message.functions ?? [];
                if (this.ready && (this._state === WorkerState.STARTING || this._state === WorkerState.RESTARTING)) {
                    this.transition(WorkerState.IDLE);
                    this.ready.resolve();
                }
                break;
            case MessageType.RESULT:
            case MessageType.ERROR:
                this.listener.onSettle(this, message, frame.body);
                break;
            case MessageType.PONG:
                this.handlePong(message);
                break;
            default:
                this.logger.debug(LogEvent.WORKER_ERROR, `Ignoring unexpected ${message.type} message`, {
                    workerId: this.workerId,
                });
        }
    }

    private handleExit(exitCode: number): void {
        this.transport = undefined;
        this.clearPings();

        if (this.ready) {
            this.ready.reject(new Error(`${this.workerId} exited with code ${exitCode} before becoming ready`));
            return;
        }
        if (this.stopping || this._state === WorkerState.TERMINATED) {
            return;
        }
        if (this.isLive) {
            this.listener.onCrash(this, exitCode);
        }
    }

    /**
     * Send a task to this worker. IDLE -> BUSY.
     * Returns true when the payload's buffers were transferred away.
     */
    assign(task: Task, attempt: number): boolean {
        if (this._state !== WorkerState.IDLE || !this.transport) {
            throw new Error(`${this.workerId}: cannot assign task in state ${this._state}`);
        }

        const message = TaskMessage.createTask(task.id, task.functionId, {
            attempt,
            transfer: task.transferable,
        });
        const frame = message.toFrame(task.payload);
        const transferList = task.transferable ? collectTransferables(task.payload) : [];

        this.transition(WorkerState.BUSY);
        this._currentTaskId = task.id;
        try {
            this.transport.send(frame, transferList);
        } catch (error) {
            this.transition(WorkerState.IDLE);
            this._currentTaskId = undefined;
            throw error;
        }
        return transferList.length > 0;
    }

    /** BUSY -> IDLE once the current task's answer arrived. False if `taskId` is not the current task. */
    release(taskId: string): boolean {
        if (this._state !== WorkerState.BUSY || this._currentTaskId !== taskId) {
            return false;
        }
        this._currentTaskId = undefined;
        // An answer is as good as a pong
        this._missedHeartbeats = 0;
        this.transition(WorkerState.IDLE);
        return true;
    }

    /**
     * Mark the context as lost. IDLE|BUSY -> RESTARTING.
     * Returns the id of the task that was running, if any.
     */
    markRestarting(): string | undefined {
        const taskId = this._currentTaskId;
        this._currentTaskId = undefined;
        this.transition(WorkerState.RESTARTING);
        return taskId;
    }

    /** Retire the handle for good. */
    markTerminated(): void {
        if (this._state !== WorkerState.TERMINATED) {
            this._currentTaskId = undefined;
            this.transition(WorkerState.TERMINATED);
        }
    }

    /**
     * Send a heartbeat. Resolves with the round-trip time, or undefined when
     * no pong arrived within `timeoutMs` (counted as a miss).
     */
    ping(timeoutMs: number): Promise<number | undefined> {
        const transport = this.transport;
        if (!transport || !this.isLive) {
            return Promise.resolve(undefined);
        }

        const message = TaskMessage.createPing();
        return new Promise<number | undefined>(resolve => {
            const timer = setTimeout(() => {
                if (this.pendingPings.delete(message.id)) {
                    this._missedHeartbeats++;
                    resolve(undefined);
                }
            }, timeoutMs);

            this.pendingPings.set(message.id, { sentAt: Date.now(), resolve, timer });
            try {
                transport.send(message.toFrame(), []);
            } catch (error) {
                this.logger.debug(LogEvent.WORKER_ERROR, `Heartbeat send failed: ${error}`, { workerId: this.workerId });
            }
        });
    }

    private handlePong(message: TaskMessage): void {
        const pending = this.pendingPings.get(message.id);
        if (!pending) {
            return;
        }
        this.pendingPings.delete(message.id);
        clearTimeout(pending.timer);

        const rttMs = Date.now() - pending.sentAt;
        this._lastHeartbeatRttMs = rttMs;
        this._missedHeartbeats = 0;
        pending.resolve(rttMs);
    }

    private clearPings(): void {
        for (const pending of this.pendingPings.values()) {
            clearTimeout(pending.timer);
            pending.resolve(undefined);
        }
        this.pendingPings.clear();
    }

    /** Force-terminate the context. Its exit is reported as a crash. */
    async kill(): Promise<void> {
        const transport = this.transport;
        if (transport) {
            await transport.terminate();
        }
    }

    /**
     * Deliberate shutdown: ask the context to close, give it `graceMs` to
     * exit, then terminate it. Ends in TERMINATED.
     */
    async stop(graceMs: number): Promise<void> {
        this.stopping = true;
        this.clearPings();
        this.ready?.reject(new Error(`${this.workerId} stopped before becoming ready`));
        const transport = this.transport;
        this.markTerminated();
        if (!transport) {
            return;
        }

        const exited = new Promise<void>(resolve => transport.onExit(() => resolve()));
        try {
            transport.send(TaskMessage.createShutdown().toFrame(), []);
        } catch (error) {
            this.logger.debug(LogEvent.WORKER_ERROR, `Shutdown send failed, terminating: ${error}`, {
                workerId: this.workerId,
            });
        }

        let timer: NodeJS.Timeout | undefined;
        const graceExpired = new Promise<boolean>(resolve => {
            timer = setTimeout(() => resolve(true), graceMs);
        });
        const timedOut = await Promise.race([exited.then(() => false), graceExpired]);
        clearTimeout(timer);

        if (timedOut) {
            await transport.terminate();
        }
        this.transport = undefined;
    }
}
