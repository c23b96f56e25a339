import { setTimeout as sleep } from "node:timers/promises";
import { PoolFatalError, errorMessage } from "./errors.js";
import { LogEvent } from "./logging.js";
import type { StructuredLogger } from "./logging.js";
import type { Metrics } from "./metrics.js";
import type { PoolConfig } from "./config.js";
import type { TaskMessage } from "./message.js";
import type { TransportFactory } from "./transport.js";
import { WorkerHandle, WorkerState } from "./worker_handle.js";
import type { WorkerHandleListener } from "./worker_handle.js";

/** What the supervisor needs from the pool it keeps alive. */
export interface SupervisedPool {
    /** True while lost workers should be replaced. */
    readonly acceptsReplacements: boolean;
    onSettle(handle: WorkerHandle, message: TaskMessage, body: unknown): void;
    /** The worker running `taskId` died; requeue or fail it. */
    onTaskLost(taskId: string, handle: WorkerHandle): void;
    onWorkerAvailable(handle: WorkerHandle): void;
    onFatal(error: PoolFatalError): void;
}

/**
 * Keeps `workerCount` workers alive.
 *
 * Crashed workers are replaced in place (up to `maxRestartAttempts` spawns);
 * the task they were running goes back to the pool. Heartbeats go to every
 * idle or busy worker. One that misses `heartbeatMaxMisses` in a row while
 * idle, or `heartbeatMaxMissesBusy` while running a task, is terminated and
 * handled as a crash.
 */
export class PoolSupervisor implements WorkerHandleListener {
    private handles: WorkerHandle[] = [];
    private heartbeatAbort?: AbortController;
    private heartbeatLoopPromise?: Promise<void>;
    private stopped = false;

    constructor(
        private readonly pool: SupervisedPool,
        private readonly config: PoolConfig,
        private readonly script: string | URL,
        private readonly createTransport: TransportFactory,
        private readonly logger: StructuredLogger,
        private readonly metrics: Metrics,
    ) {}

    get workers(): readonly WorkerHandle[] {
        return this.handles;
    }

    /** Spawn every worker and wait for all of them to report ready. */
    async startWorkers(): Promise<void> {
        this.handles = Array.from(
            { length: this.config.workerCount },
            (_, slot) =>
                new WorkerHandle(
                    slot,
                    this.config.transport,
                    { script: this.script, execArgv: this.config.execArgv },
                    this.createTransport,
                    this,
                    this.logger,
                ),
        );

        const results = await Promise.allSettled(this.handles.map(handle => handle.start(this.config.startTimeout)));
        if (this.stopped) {
            // stopWorkers() ran while the workers were coming up
            return;
        }
        const failed = results.find((result): result is PromiseRejectedResult => result.status === "rejected");
        if (failed) {
            await this.stopWorkers(0);
            throw new PoolFatalError(`Failed to start workers: ${errorMessage(failed.reason)}`, { cause: failed.reason });
        }

        for (const handle of this.handles) {
            this.logger.workerStart(handle.workerId, this.config.transport);
        }
        this.startHeartbeat();
    }

    idleWorker(): WorkerHandle | undefined {
        return this.handles.find(handle => handle.state === WorkerState.IDLE);
    }

    onSettle(handle: WorkerHandle, message: TaskMessage, body: unknown): void {
        this.pool.onSettle(handle, message, body);
    }

    onCrash(handle: WorkerHandle, exitCode: number): void {
        this.recover(handle, exitCode).catch(error => {
            this.pool.onFatal(new PoolFatalError(`Supervisor failed while recovering ${handle.workerId}`, { cause: error }));
        });
    }

    private async recover(handle: WorkerHandle, exitCode: number): Promise<void> {
        const taskId = handle.markRestarting();
        this.metrics.recordWorkerCrash();
        this.logger.workerCrash(handle.workerId, exitCode, taskId);

        if (taskId !== undefined) {
            this.pool.onTaskLost(taskId, handle);
        }

        let lastError: unknown;
        for (let attempt = 1; attempt <= this.config.maxRestartAttempts; attempt++) {
            if (this.config.restartDelay > 0) {
                await sleep(this.config.restartDelay);
            }
            if (!this.pool.acceptsReplacements || handle.state !== WorkerState.RESTARTING) {
                handle.markTerminated();
                return;
            }

            try {
                await handle.respawn(this.config.startTimeout);
                this.metrics.recordWorkerRestart();
                this.logger.workerRestart(handle.workerId, attempt, this.config.maxRestartAttempts);
                this.pool.onWorkerAvailable(handle);
                return;
            } catch (error) {
                lastError = error;
                this.logger.warn(LogEvent.WORKER_RESTART_FAILED, `Replacement failed: ${errorMessage(error)}`, {
                    workerId: handle.workerId,
                    attempt,
                    error: errorMessage(error),
                });
            }
        }

        handle.markTerminated();
        if (!this.pool.acceptsReplacements) {
            return;
        }
        this.pool.onFatal(
            new PoolFatalError(
                `Could not replace ${handle.workerId} after ${this.config.maxRestartAttempts} attempts`,
                { cause: lastError },
            ),
        );
    }

    private startHeartbeat(): void {
        if (this.stopped || this.config.heartbeatInterval <= 0) {
            return;
        }
        const controller = new AbortController();
        this.heartbeatAbort = controller;
        this.heartbeatLoopPromise = this.heartbeatLoop(controller.signal).catch(error => {
            this.logger.error(LogEvent.HEARTBEAT_TIMEOUT, `Heartbeat loop stopped: ${errorMessage(error)}`);
        });
    }

    private async heartbeatLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            try {
                await sleep(this.config.heartbeatInterval, undefined, { signal });
            } catch (error) {
                if (signal.aborted) {
                    return;
                }
                throw error;
            }
            await Promise.all(this.handles.filter(handle => handle.isLive).map(handle => this.probe(handle)));
        }
    }

    private async probe(handle: WorkerHandle): Promise<void> {
        const generation = handle.generation;
        const rttMs = await handle.ping(this.config.heartbeatTimeout);
        if (handle.generation !== generation || !handle.isLive) {
            return;
        }

        if (rttMs !== undefined) {
            this.metrics.recordHeartbeatRtt(rttMs);
            this.logger.heartbeatReceived(handle.workerId, rttMs);
            return;
        }

        this.metrics.recordHeartbeatMiss();
        const maxMisses =
            handle.state === WorkerState.BUSY ? this.config.heartbeatMaxMissesBusy : this.config.heartbeatMaxMisses;
        this.logger.heartbeatMissed(handle.workerId, handle.missedHeartbeats, maxMisses);
        if (handle.missedHeartbeats >= maxMisses) {
            this.logger.heartbeatTimeout(handle.workerId, handle.missedHeartbeats);
            await handle.kill();
        }
    }

    /** Stop every worker, giving each `graceMs` to exit on its own. */
    async stopWorkers(graceMs: number): Promise<void> {
        this.stopped = true;
        this.heartbeatAbort?.abort();
        this.heartbeatAbort = undefined;

        await Promise.all(
            this.handles.map(async handle => {
                await handle.stop(graceMs);
                this.logger.workerStop(handle.workerId);
            }),
        );

        // Stopping the handles settled any pings the loop was waiting on
        await this.heartbeatLoopPromise;
        this.heartbeatLoopPromise = undefined;
    }
}
