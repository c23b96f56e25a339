/**
 * Metrics collection for observability.
 *
 * Tracks task latency, outcome counts, queue depth, worker crashes and
 * heartbeat health.
 */

import type { FailureKind } from "./errors.js";

/** Point-in-time snapshot of all metrics. */
export interface MetricsSnapshot {
    // Counters
    tasksSubmitted: number;
    tasksSucceeded: number;
    tasksFailed: number;
    tasksCancelled: number;
    tasksRejected: number;
    taskRetries: number;

    // Latency from submission to settlement (milliseconds)
    latencyAvgMs: number;
    latencyP50Ms: number;
    latencyP95Ms: number;
    latencyP99Ms: number;
    latencyMinMs: number;
    latencyMaxMs: number;

    // Queue
    queueDepth: number;
    queueMaxDepth: number;

    // Workers
    workerCrashes: number;
    workerRestarts: number;

    // Heartbeat
    heartbeatRttAvgMs: number;
    heartbeatRttLastMs: number;
    heartbeatMisses: number;

    timestamp: number;
}

/** Metrics dictionary for JSON serialization. */
export interface MetricsDict {
    tasks: {
        submitted: number;
        succeeded: number;
        failed: number;
        cancelled: number;
        rejected: number;
        retries: number;
        errorRate: number;
    };
    latencyMs: {
        avg: number;
        p50: number;
        p95: number;
        p99: number;
        min: number;
        max: number;
    };
    queue: {
        depth: number;
        maxDepth: number;
    };
    workers: {
        crashes: number;
        restarts: number;
    };
    heartbeat: {
        rttAvgMs: number;
        rttLastMs: number;
        misses: number;
    };
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

/**
 * Metrics collector for a WorkerPool.
 *
 * Usage:
 *     const metrics = new Metrics();
 *     metrics.recordSubmitted();
 *     metrics.recordSettled(performance.now() - start);
 *     console.log(`p95: ${metrics.snapshot().latencyP95Ms}ms`);
 */
export class Metrics {
    private readonly maxLatencySamples: number;

    private _tasksSubmitted: number = 0;
    private _tasksSucceeded: number = 0;
    private _tasksFailed: number = 0;
    private _tasksCancelled: number = 0;
    private _tasksRejected: number = 0;
    private _taskRetries: number = 0;

    private _queueDepth: number = 0;
    private _queueMaxDepth: number = 0;

    private _workerCrashes: number = 0;
    private _workerRestarts: number = 0;

    // Latency samples (circular buffer via array shift)
    private _latencies: number[] = [];

    private _heartbeatRtts: number[] = [];
    private _heartbeatMisses: number = 0;

    constructor(options?: { maxLatencySamples?: number }) {
        this.maxLatencySamples = options?.maxLatencySamples ?? 1000;
    }

    recordSubmitted(): void {
        this._tasksSubmitted++;
    }

    /**
     * Record a settled task. `failureKind` is undefined for successes.
     * Rejections (saturated, closed) carry no latency sample.
     */
    recordSettled(latencyMs: number, failureKind?: FailureKind): void {
        switch (failureKind) {
            case undefined:
                this._tasksSucceeded++;
                break;
            case "TaskError":
            case "WorkerCrashed":
                this._tasksFailed++;
                break;
            case "Cancelled":
                this._tasksCancelled++;
                return;
            case "PoolSaturated":
            case "PoolClosed":
            case "InvalidPayload":
                this._tasksRejected++;
                return;
        }

        this._latencies.push(latencyMs);
        if (this._latencies.length > this.maxLatencySamples) {
            this._latencies.shift();
        }
    }

    recordRetry(): void {
        this._taskRetries++;
    }

    recordQueueDepth(depth: number): void {
        this._queueDepth = depth;
        this._queueMaxDepth = Math.max(this._queueMaxDepth, depth);
    }

    recordWorkerCrash(): void {
        this._workerCrashes++;
    }

    recordWorkerRestart(): void {
        this._workerRestarts++;
    }

    recordHeartbeatRtt(rttMs: number): void {
        this._heartbeatRtts.push(rttMs);
        if (this._heartbeatRtts.length > 100) {
            this._heartbeatRtts.shift();
        }
    }

    recordHeartbeatMiss(): void {
        this._heartbeatMisses++;
    }

    snapshot(): MetricsSnapshot {
        let latencyAvg = 0;
        let latencyP50 = 0;
        let latencyP95 = 0;
        let latencyP99 = 0;
        let latencyMin = 0;
        let latencyMax = 0;

        const n = this._latencies.length;
        if (n > 0) {
            const sorted = [...this._latencies].sort((a, b) => a - b);
            latencyAvg = sorted.reduce((a, b) => a + b, 0) / n;
            latencyP50 = sorted[Math.min(Math.floor(n * 0.5), n - 1)];
            latencyP95 = sorted[Math.min(Math.floor(n * 0.95), n - 1)];
            latencyP99 = sorted[Math.min(Math.floor(n * 0.99), n - 1)];
            latencyMin = sorted[0];
            latencyMax = sorted[n - 1];
        }

        let heartbeatRttAvg = 0;
        let heartbeatRttLast = 0;
        if (this._heartbeatRtts.length > 0) {
            heartbeatRttAvg = this._heartbeatRtts.reduce((a, b) => a + b, 0) / this._heartbeatRtts.length;
            heartbeatRttLast = this._heartbeatRtts[this._heartbeatRtts.length - 1];
        }

        return {
            tasksSubmitted: this._tasksSubmitted,
            tasksSucceeded: this._tasksSucceeded,
            tasksFailed: this._tasksFailed,
            tasksCancelled: this._tasksCancelled,
            tasksRejected: this._tasksRejected,
            taskRetries: this._taskRetries,
            latencyAvgMs: latencyAvg,
            latencyP50Ms: latencyP50,
            latencyP95Ms: latencyP95,
            latencyP99Ms: latencyP99,
            latencyMinMs: latencyMin,
            latencyMaxMs: latencyMax,
            queueDepth: this._queueDepth,
            queueMaxDepth: this._queueMaxDepth,
            workerCrashes: this._workerCrashes,
            workerRestarts: this._workerRestarts,
            heartbeatRttAvgMs: heartbeatRttAvg,
            heartbeatRttLastMs: heartbeatRttLast,
            heartbeatMisses: this._heartbeatMisses,
            timestamp: Date.now(),
        };
    }

    reset(): void {
        this._tasksSubmitted = 0;
        this._tasksSucceeded = 0;
        this._tasksFailed = 0;
        this._tasksCancelled = 0;
        this._tasksRejected = 0;
        this._taskRetries = 0;
        this._queueDepth = 0;
        this._queueMaxDepth = 0;
        this._workerCrashes = 0;
        this._workerRestarts = 0;
        this._latencies = [];
        this._heartbeatRtts = [];
        this._heartbeatMisses = 0;
    }

    /** Get metrics as a dictionary (for logging/serialization). */
    toDict(): MetricsDict {
        const snapshot = this.snapshot();
        const finished = snapshot.tasksSucceeded + snapshot.tasksFailed;
        return {
            tasks: {
                submitted: snapshot.tasksSubmitted,
                succeeded: snapshot.tasksSucceeded,
                failed: snapshot.tasksFailed,
                cancelled: snapshot.tasksCancelled,
                rejected: snapshot.tasksRejected,
                retries: snapshot.taskRetries,
                errorRate: finished > 0 ? snapshot.tasksFailed / finished : 0.0,
            },
            latencyMs: {
                avg: round2(snapshot.latencyAvgMs),
                p50: round2(snapshot.latencyP50Ms),
                p95: round2(snapshot.latencyP95Ms),
                p99: round2(snapshot.latencyP99Ms),
                min: round2(snapshot.latencyMinMs),
                max: round2(snapshot.latencyMaxMs),
            },
            queue: {
                depth: snapshot.queueDepth,
                maxDepth: snapshot.queueMaxDepth,
            },
            workers: {
                crashes: snapshot.workerCrashes,
                restarts: snapshot.workerRestarts,
            },
            heartbeat: {
                rttAvgMs: round2(snapshot.heartbeatRttAvgMs),
                rttLastMs: round2(snapshot.heartbeatRttLastMs),
                misses: snapshot.heartbeatMisses,
            },
        };
    }
}
