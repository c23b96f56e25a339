import { randomUUID } from "node:crypto";
import { resolvePoolConfig } from "./config.js";
import type { PoolConfig, PoolOptions } from "./config.js";
import {
    CancelledError,
    InvalidPayloadError,
    PoolClosedError,
    PoolSaturatedError,
    TaskError,
    WorkerCrashedError,
    errorMessage,
} from "./errors.js";
import type { PoolError, PoolFatalError } from "./errors.js";
import { LogEvent, StructuredLogger } from "./logging.js";
import { MessageType } from "./message.js";
import type { TaskMessage } from "./message.js";
import { Metrics } from "./metrics.js";
import { failure, unwrap } from "./outcome.js";
import type { Outcome } from "./outcome.js";
import { ResultChannel } from "./result_channel.js";
import { PoolSupervisor } from "./supervisor.js";
import type { SupervisedPool } from "./supervisor.js";
import { createTask } from "./task.js";
import type { TaskEntry } from "./task.js";
import { defaultTransportFactory } from "./transport.js";
import type { TransportFactory } from "./transport.js";
import type { WorkerHandle, WorkerSnapshot } from "./worker_handle.js";

export type PoolState = "idle" | "starting" | "running" | "draining" | "stopped";

export interface SubmitOptions {
    /** Move the payload's ArrayBuffers to the worker instead of copying them. */
    transferable?: boolean;
    /** Aborting cancels the task (see {@link WorkerPool.cancel}). */
    signal?: AbortSignal;
}

export interface SubmittedTask {
    readonly id: string;
    readonly outcome: Promise<Outcome>;
    cancel(): boolean;
}

/** Overrides accepted by {@link WorkerPool.start}. */
export type StartOptions = Partial<Pick<PoolConfig, "workerCount" | "maxQueueDepth" | "retryLimit">>;

export type RemoteCall = Record<string, (payload?: unknown, options?: SubmitOptions) => Promise<unknown>>;

/**
 * Bounded pool of isolated workers running registered functions.
 *
 * Usage:
 *     const pool = WorkerPool.spawn(new URL("./math_worker.ts", import.meta.url), { workerCount: 4 });
 *     await pool.start();
 *
 *     const outcome = await pool.submit("fib", 30);
 *     if (outcome.ok) console.log(outcome.value);
 *
 *     const value = await pool.call.fib(25);   // throws on failure
 *     await pool.drain();
 */
export class WorkerPool implements SupervisedPool {
    readonly poolId: string = randomUUID();
    private readonly script: string | URL;
    private _config: PoolConfig;
    private readonly logger: StructuredLogger;
    private readonly _metrics: Metrics;
    private readonly onFatalCallback?: (error: PoolFatalError) => void;
    private readonly createTransport: TransportFactory;

    private _state: PoolState = "idle";
    private supervisor?: PoolSupervisor;
    private readonly channel = new ResultChannel();
    private readonly queue: TaskEntry[] = [];
    private readonly inFlight: Map<string, TaskEntry> = new Map();
    private idleWaiters: Array<() => void> = [];
    private drainPromise?: Promise<void>;
    private _fatalError?: PoolFatalError;

    public readonly call: RemoteCall;

    private constructor(script: string | URL, options: PoolOptions) {
        const { logger, metrics, onFatal, createTransport, ...config } = options;
        this.script = script;
        this._config = resolvePoolConfig(config);
        this.logger = logger ?? new StructuredLogger();
        this.logger.setPoolId(this.poolId);
        this._metrics = metrics ?? new Metrics();
        this.onFatalCallback = onFatal;
        this.createTransport = createTransport ?? defaultTransportFactory;
        this.call = this.createCallProxy();
    }

    /**
     * Create a pool whose workers run `script`, a module that starts a
     * {@link TaskWorker} subclass. Workers are spawned by {@link start}.
     */
    static spawn(script: string | URL, options: PoolOptions = {}): WorkerPool {
        return new WorkerPool(script, options);
    }

    get state(): PoolState {
        return this._state;
    }

    get config(): Readonly<PoolConfig> {
        return this._config;
    }

    get metrics(): Metrics {
        return this._metrics;
    }

    /** Set when the supervisor gave up and shut the pool down. */
    get fatalError(): PoolFatalError | undefined {
        return this._fatalError;
    }

    get queueDepth(): number {
        return this.queue.length;
    }

    get inFlightCount(): number {
        return this.inFlight.size;
    }

    /** Running, and every worker is idle or busy. */
    get isHealthy(): boolean {
        return this._state === "running" && (this.supervisor?.workers ?? []).every(handle => handle.isLive);
    }

    get acceptsReplacements(): boolean {
        return this._state === "starting" || this._state === "running" || this._state === "draining";
    }

    workers(): WorkerSnapshot[] {
        return (this.supervisor?.workers ?? []).map(handle => handle.snapshot());
    }

    async start(overrides?: StartOptions): Promise<void> {
        if (this._state !== "idle") {
            throw new Error(`Pool cannot start from state '${this._state}'`);
        }
        if (overrides) {
            this._config = resolvePoolConfig({ ...this._config, ...overrides });
        }

        this._state = "starting";
        this.supervisor = new PoolSupervisor(
            this,
            this._config,
            this.script,
            this.createTransport,
            this.logger,
            this._metrics,
        );

        try {
            await this.supervisor.startWorkers();
        } catch (error) {
            this._state = "stopped";
            throw error;
        }
        if (this._state !== "starting") {
            // shutdownNow() won the race
            return;
        }

        this._state = "running";
        this.logger.info(LogEvent.POOL_START, `Pool started with ${this._config.workerCount} ${this._config.transport} workers`, {
            metadata: {
                workerCount: this._config.workerCount,
                maxQueueDepth: this._config.maxQueueDepth,
                retryLimit: this._config.retryLimit,
            },
        });
    }

    /** Submit a task and wait for its outcome. Never rejects. */
    submit(functionId: string, payload?: unknown, options: SubmitOptions = {}): Promise<Outcome> {
        return this.dispatch(functionId, payload, options).outcome;
    }

    /** Submit a task and return the value, throwing the failure's error otherwise. */
    async exec(functionId: string, payload?: unknown, options: SubmitOptions = {}): Promise<unknown> {
        return unwrap(await this.submit(functionId, payload, options));
    }

    /** Like {@link submit}, but hands back the task id and a cancel function too. */
    dispatch(functionId: string, payload?: unknown, options: SubmitOptions = {}): SubmittedTask {
        const task = createTask(functionId, payload, options.transferable ?? false);
        const entry: TaskEntry = { task, attempts: 0, transferred: false };
        const submitted: SubmittedTask = {
            id: task.id,
            outcome: this.channel.open(task),
            cancel: () => this.cancel(task.id),
        };

        this._metrics.recordSubmitted();
        this.logger.debug(LogEvent.TASK_SUBMIT, `Submitted ${functionId}`, { taskId: task.id, func: functionId });

        if (this._state !== "running") {
            this.settleFailure(entry, new PoolClosedError(`Pool is ${this._state}, not accepting tasks`));
            return submitted;
        }

        const signal = options.signal;
        if (signal?.aborted) {
            this.settleFailure(entry, new CancelledError("Aborted before submission"));
            return submitted;
        }

        const idle = this.supervisor?.idleWorker();
        if (idle) {
            this.assign(idle, entry);
        } else if (this.queue.length >= this._config.maxQueueDepth) {
            this.logger.queueOverflow(this.queue.length, task.id, functionId);
            this.settleFailure(entry, new PoolSaturatedError(`Queue is full (${this._config.maxQueueDepth} tasks waiting)`));
            return submitted;
        } else {
            this.queue.push(entry);
            this._metrics.recordQueueDepth(this.queue.length);
        }

        if (signal && this.channel.has(task.id)) {
            const onAbort = (): void => {
                this.cancel(task.id);
            };
            signal.addEventListener("abort", onAbort, { once: true });
            this.channel.onSettle(task.id, () => signal.removeEventListener("abort", onAbort));
        }

        return submitted;
    }

    /**
     * Cancel a task. A queued task is removed and never runs. A running task
     * settles as Cancelled now; the worker keeps going and its result is
     * dropped. Returns false if the task is unknown or already settled.
     */
    cancel(taskId: string): boolean {
        const index = this.queue.findIndex(entry => entry.task.id === taskId);
        if (index >= 0) {
            const [entry] = this.queue.splice(index, 1);
            this._metrics.recordQueueDepth(this.queue.length);
            this.settleFailure(entry, new CancelledError("Cancelled before dispatch"));
            this.checkIdle();
            return true;
        }

        const entry = this.inFlight.get(taskId);
        if (entry && this.channel.has(taskId)) {
            return this.settleFailure(
                entry,
                new CancelledError("Cancelled while running; its result will be discarded"),
                entry.workerId,
            );
        }
        return false;
    }

    /**
     * Stop accepting tasks, let every accepted task (queued or running)
     * settle, then send each worker the shutdown message.
     */
    drain(): Promise<void> {
        switch (this._state) {
            case "idle":
                this._state = "stopped";
                return Promise.resolve();
            case "starting":
                return Promise.reject(new Error("Pool is still starting"));
            case "stopped":
                return this._fatalError ? Promise.reject(this._fatalError) : Promise.resolve();
            case "draining":
                return this.drainPromise ?? Promise.resolve();
            case "running":
                this._state = "draining";
                this.logger.info(LogEvent.POOL_DRAIN, "Draining pool", {
                    metadata: { queued: this.queue.length, inFlight: this.inFlight.size },
                });
                this.drainPromise = this.finishDrain();
                return this.drainPromise;
        }
    }

    private async finishDrain(): Promise<void> {
        await this.whenIdle();
        if (this._fatalError) {
            throw this._fatalError;
        }
        this._state = "stopped";
        await this.supervisor?.stopWorkers(this._config.shutdownTimeout);
        this.logger.info(LogEvent.POOL_STOP, "Pool drained and stopped");
    }

    /** Settle everything outstanding as PoolClosed and terminate the workers now. */
    async shutdownNow(): Promise<void> {
        if (this._state === "stopped" && !this.supervisor) {
            return;
        }
        this._state = "stopped";
        this.closeOutstanding("Pool was shut down");

        const supervisor = this.supervisor;
        this.supervisor = undefined;
        await supervisor?.stopWorkers(0);
        this.logger.info(LogEvent.POOL_STOP, "Pool shut down");
    }

    // ------------------------------------------------------------------
    // Supervisor callbacks
    // ------------------------------------------------------------------

    onSettle(handle: WorkerHandle, message: TaskMessage, body: unknown): void {
        if (!handle.release(message.id)) {
            this.logger.debug(LogEvent.TASK_DISCARDED, "Dropping answer for a task this worker is not running", {
                workerId: handle.workerId,
                taskId: message.id,
            });
            return;
        }

        const entry = this.inFlight.get(message.id);
        this.inFlight.delete(message.id);

        if (entry) {
            const settled =
                message.type === MessageType.RESULT
                    ? this.settleSuccess(entry, body, handle.workerId)
                    : this.settleFailure(
                          entry,
                          new TaskError(message.error ?? "Unknown error", message.errorName, message.stack),
                          handle.workerId,
                      );
            if (!settled) {
                this.logger.debug(LogEvent.TASK_DISCARDED, "Dropping result of a cancelled task", {
                    workerId: handle.workerId,
                    taskId: message.id,
                    func: entry.task.functionId,
                });
            }
        }

        this.pump();
    }

    onTaskLost(taskId: string, handle: WorkerHandle): void {
        const entry = this.inFlight.get(taskId);
        this.inFlight.delete(taskId);
        if (!entry || !this.channel.has(taskId)) {
            this.checkIdle();
            return;
        }

        entry.attempts++;
        const functionId = entry.task.functionId;
        const retryLimit = this._config.retryLimit;

        if (entry.transferred) {
            this.settleFailure(
                entry,
                new WorkerCrashedError(`${handle.workerId} crashed running ${functionId}; its payload was transferred and cannot be resent`),
                handle.workerId,
            );
        } else if (entry.attempts > retryLimit) {
            this.settleFailure(
                entry,
                new WorkerCrashedError(`${functionId} crashed its worker ${entry.attempts} time(s); retry limit is ${retryLimit}`),
                handle.workerId,
            );
        } else {
            this._metrics.recordRetry();
            this.logger.taskRetry({ taskId, func: functionId, attempt: entry.attempts, retryLimit });
            this.queue.unshift(entry);
        }
        this.pump();
    }

    onWorkerAvailable(_handle: WorkerHandle): void {
        this.pump();
    }

    onFatal(error: PoolFatalError): void {
        if (this._fatalError) {
            return;
        }
        this._fatalError = error;
        this._state = "stopped";
        this.logger.error(LogEvent.POOL_FATAL, error.message, {
            error: error.cause === undefined ? undefined : errorMessage(error.cause),
            errorType: error.name,
        });

        this.closeOutstanding(`Pool shut down after a fatal error: ${error.message}`);
        this.supervisor?.stopWorkers(0).catch(stopError => {
            this.logger.error(LogEvent.POOL_FATAL, `Failed to stop workers: ${errorMessage(stopError)}`);
        });

        try {
            this.onFatalCallback?.(error);
        } catch (callbackError) {
            this.logger.error(LogEvent.POOL_FATAL, `onFatal callback threw: ${errorMessage(callbackError)}`);
        }
    }

    // ------------------------------------------------------------------
    // Dispatch bookkeeping
    // ------------------------------------------------------------------

    private assign(handle: WorkerHandle, entry: TaskEntry): void {
        try {
            entry.transferred = handle.assign(entry.task, entry.attempts) || entry.transferred;
        } catch (error) {
            const detail = `Could not send ${entry.task.functionId} to ${handle.workerId}: ${errorMessage(error)}`;
            this.settleFailure(
                entry,
                isCloneError(error) ? new InvalidPayloadError(detail) : new WorkerCrashedError(detail),
                handle.workerId,
            );
            return;
        }

        entry.workerId = handle.workerId;
        entry.dispatchedAt = Date.now();
        this.inFlight.set(entry.task.id, entry);
        this.logger.taskDispatch({
            taskId: entry.task.id,
            func: entry.task.functionId,
            workerId: handle.workerId,
            attempt: entry.attempts,
        });
    }

    /** Hand queued tasks to idle workers. */
    private pump(): void {
        if (this._state === "running" || this._state === "draining") {
            let idle = this.supervisor?.idleWorker();
            while (idle && this.queue.length > 0) {
                const entry = this.queue.shift();
                if (entry) {
                    this.assign(idle, entry);
                }
                idle = this.supervisor?.idleWorker();
            }
        }
        this._metrics.recordQueueDepth(this.queue.length);
        this.checkIdle();
    }

    private settleSuccess(entry: TaskEntry, value: unknown, workerId: string): boolean {
        const durationMs = Date.now() - (entry.dispatchedAt ?? entry.task.submittedAt);
        const settled = this.channel.settle(entry.task.id, {
            ok: true,
            taskId: entry.task.id,
            value,
            workerId,
            attempts: entry.attempts,
            durationMs,
        });
        if (settled) {
            this._metrics.recordSettled(Date.now() - entry.task.submittedAt);
            this.logger.taskEnd({ taskId: entry.task.id, func: entry.task.functionId, workerId, durationMs });
        }
        return settled;
    }

    private settleFailure(entry: TaskEntry, error: PoolError, workerId?: string): boolean {
        const settled = this.channel.settle(entry.task.id, failure(entry.task.id, error, { workerId, attempts: entry.attempts }));
        if (!settled) {
            return false;
        }

        this._metrics.recordSettled(Date.now() - entry.task.submittedAt, error.kind);
        if (error.kind === "TaskError" || error.kind === "WorkerCrashed" || error.kind === "InvalidPayload") {
            this.logger.taskEnd({
                taskId: entry.task.id,
                func: entry.task.functionId,
                workerId,
                durationMs: Date.now() - (entry.dispatchedAt ?? entry.task.submittedAt),
                success: false,
                error: error.message,
                errorType: error.kind,
            });
        } else if (error.kind === "Cancelled") {
            this.logger.info(LogEvent.TASK_CANCELLED, error.message, { taskId: entry.task.id, func: entry.task.functionId });
        }
        return true;
    }

    private closeOutstanding(detail: string): void {
        const entries = new Map<string, TaskEntry>();
        for (const entry of [...this.queue, ...this.inFlight.values()]) {
            entries.set(entry.task.id, entry);
        }
        this.queue.length = 0;
        this.inFlight.clear();

        this.channel.settleAll(request => {
            this._metrics.recordSettled(Date.now() - request.submittedAt, "PoolClosed");
            const entry = entries.get(request.taskId);
            return failure(request.taskId, new PoolClosedError(detail), {
                workerId: entry?.workerId,
                attempts: entry?.attempts,
            });
        });
        this._metrics.recordQueueDepth(0);
        this.checkIdle();
    }

    private whenIdle(): Promise<void> {
        if (this.queue.length === 0 && this.inFlight.size === 0) {
            return Promise.resolve();
        }
        return new Promise<void>(resolve => this.idleWaiters.push(resolve));
    }

    private checkIdle(): void {
        if (this.queue.length > 0 || this.inFlight.size > 0 || this.idleWaiters.length === 0) {
            return;
        }
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) {
            resolve();
        }
    }

    private createCallProxy(): RemoteCall {
        const target: RemoteCall = {};
        return new Proxy(target, {
            get: (_target, prop) => {
                // Not a thenable, and no symbol-keyed methods
                if (typeof prop !== "string" || prop === "then") {
                    return undefined;
                }
                return (payload?: unknown, options?: SubmitOptions) => this.exec(prop, payload, options);
            },
        });
    }
}

/** Structured clone refused the value, a function for example. */
function isCloneError(error: unknown): boolean {
    return error instanceof Error && error.name === "DataCloneError";
}
