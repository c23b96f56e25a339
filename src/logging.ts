/**
 * Structured logging for the pool, its workers and their tasks.
 *
 * Entries are plain objects handed to a pluggable handler; without a handler
 * the logger is silent.
 */

/** Log levels for structured logging. */
export enum LogLevel {
    DEBUG = "debug",
    INFO = "info",
    WARN = "warn",
    ERROR = "error",
}

/** Standard log events emitted by the pool. */
export enum LogEvent {
    // Pool lifecycle
    POOL_START = "pool_start",
    POOL_DRAIN = "pool_drain",
    POOL_STOP = "pool_stop",
    POOL_FATAL = "pool_fatal",

    // Workers
    WORKER_START = "worker_start",
    WORKER_STOP = "worker_stop",
    WORKER_ERROR = "worker_error",
    WORKER_CRASH = "worker_crash",
    WORKER_RESTART = "worker_restart",
    WORKER_RESTART_FAILED = "worker_restart_failed",

    // Tasks
    TASK_SUBMIT = "task_submit",
    TASK_DISPATCH = "task_dispatch",
    TASK_END = "task_end",
    TASK_ERROR = "task_error",
    TASK_RETRY = "task_retry",
    TASK_CANCELLED = "task_cancelled",
    TASK_DISCARDED = "task_discarded",

    // Queue
    QUEUE_OVERFLOW = "queue_overflow",

    // Heartbeat
    HEARTBEAT_RECEIVED = "heartbeat_received",
    HEARTBEAT_MISSED = "heartbeat_missed",
    HEARTBEAT_TIMEOUT = "heartbeat_timeout",
}

/** Structured log entry with all context. */
export interface LogEntry {
    // Required
    event: string;
    level: string;
    message: string;
    timestamp: number;

    // Context
    poolId?: string;
    workerId?: string;
    taskId?: string;
    func?: string;

    // Timing
    durationMs?: number;
    attempt?: number;

    // Status
    success?: boolean;
    error?: string;
    errorType?: string;

    // Custom metadata
    metadata?: Record<string, unknown>;
}

/** Type alias for log handler function. */
export type LogHandler = (entry: LogEntry) => void;

export interface LogOptions {
    level?: LogLevel;
    workerId?: string;
    taskId?: string;
    func?: string;
    durationMs?: number;
    attempt?: number;
    success?: boolean;
    error?: string;
    errorType?: string;
    metadata?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARN]: 2,
    [LogLevel.ERROR]: 3,
};

export function parseLogLevel(value: string): LogLevel | undefined {
    const normalized = value.trim().toLowerCase();
    return Object.values(LogLevel).find(level => level === normalized);
}

/**
 * Structured logger with pluggable handlers.
 *
 * Usage:
 *     const logger = new StructuredLogger({
 *         handler: (entry) => console.log(JSON.stringify(entry)),
 *         level: LogLevel.DEBUG,
 *     });
 *
 *     logger.info(LogEvent.WORKER_START, "Worker ready", { workerId: "worker-0" });
 *     logger.taskEnd({ taskId: "abc", func: "fib", workerId: "worker-0", durationMs: 12.5 });
 */
export class StructuredLogger {
    private handler?: LogHandler;
    private level: LogLevel;
    private poolId?: string;

    constructor(options?: { handler?: LogHandler; level?: LogLevel; poolId?: string }) {
        this.handler = options?.handler;
        this.level = options?.level ?? LogLevel.INFO;
        this.poolId = options?.poolId;
    }

    /** Set or update the log handler. */
    setHandler(handler: LogHandler): void {
        this.handler = handler;
    }

    /** Set the pool id stamped on every entry. */
    setPoolId(poolId: string): void {
        this.poolId = poolId;
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
    }

    log(event: LogEvent, message: string, options?: LogOptions): void {
        const level = options?.level ?? LogLevel.INFO;
        if (!this.handler || !this.shouldLog(level)) {
            return;
        }

        const entry: LogEntry = {
            event,
            level,
            message,
            timestamp: Date.now(),
            poolId: this.poolId,
            workerId: options?.workerId,
            taskId: options?.taskId,
            func: options?.func,
            durationMs: options?.durationMs,
            attempt: options?.attempt,
            success: options?.success,
            error: options?.error,
            errorType: options?.errorType,
            metadata: options?.metadata,
        };

        try {
            this.handler(entry);
        } catch (e) {
            // Don't let logging errors break the pool
            console.error(`Log handler error: ${e}`);
        }
    }

    debug(event: LogEvent, message: string, options?: Omit<LogOptions, "level">): void {
        this.log(event, message, { ...options, level: LogLevel.DEBUG });
    }

    info(event: LogEvent, message: string, options?: Omit<LogOptions, "level">): void {
        this.log(event, message, { ...options, level: LogLevel.INFO });
    }

    warn(event: LogEvent, message: string, options?: Omit<LogOptions, "level">): void {
        this.log(event, message, { ...options, level: LogLevel.WARN });
    }

    error(event: LogEvent, message: string, options?: Omit<LogOptions, "level">): void {
        this.log(event, message, { ...options, level: LogLevel.ERROR });
    }

    // Convenience methods for common events

    taskDispatch(options: { taskId: string; func: string; workerId: string; attempt: number }): void {
        this.debug(LogEvent.TASK_DISPATCH, `Dispatching ${options.func} to ${options.workerId}`, options);
    }

    /** Log task completion, successful or not. */
    taskEnd(options: {
        taskId: string;
        func: string;
        workerId?: string;
        durationMs: number;
        success?: boolean;
        error?: string;
        errorType?: string;
    }): void {
        const ok = options.success !== false;
        this.log(ok ? LogEvent.TASK_END : LogEvent.TASK_ERROR, ok ? `Completed ${options.func}` : `Failed ${options.func}`, {
            level: ok ? LogLevel.DEBUG : LogLevel.WARN,
            taskId: options.taskId,
            func: options.func,
            workerId: options.workerId,
            durationMs: Math.round(options.durationMs * 100) / 100,
            success: ok,
            error: options.error,
            errorType: options.errorType,
        });
    }

    taskRetry(options: { taskId: string; func: string; attempt: number; retryLimit: number }): void {
        this.warn(LogEvent.TASK_RETRY, `Requeueing ${options.func} after worker crash (${options.attempt}/${options.retryLimit})`, {
            taskId: options.taskId,
            func: options.func,
            attempt: options.attempt,
        });
    }

    queueOverflow(depth: number, taskId: string, func: string): void {
        this.warn(LogEvent.QUEUE_OVERFLOW, `Queue full at depth ${depth}, rejecting ${func}`, {
            taskId,
            func,
            metadata: { depth },
        });
    }

    workerStart(workerId: string, kind: string): void {
        this.info(LogEvent.WORKER_START, `Worker ready (${kind})`, { workerId });
    }

    workerStop(workerId: string, reason: string = "shutdown"): void {
        this.info(LogEvent.WORKER_STOP, `Worker stopped: ${reason}`, { workerId });
    }

    workerCrash(workerId: string, exitCode: number, taskId?: string): void {
        this.warn(LogEvent.WORKER_CRASH, `Worker exited unexpectedly with code ${exitCode}`, {
            workerId,
            taskId,
            metadata: { exitCode },
        });
    }

    workerRestart(workerId: string, attempt: number, maxAttempts: number): void {
        this.info(LogEvent.WORKER_RESTART, `Worker replaced (attempt ${attempt}/${maxAttempts})`, { workerId });
    }

    heartbeatReceived(workerId: string, rttMs: number): void {
        this.debug(LogEvent.HEARTBEAT_RECEIVED, `Heartbeat received (RTT: ${rttMs.toFixed(1)}ms)`, {
            workerId,
            durationMs: rttMs,
        });
    }

    heartbeatMissed(workerId: string, consecutive: number, maxAllowed: number): void {
        this.warn(LogEvent.HEARTBEAT_MISSED, `Heartbeat missed (${consecutive}/${maxAllowed})`, {
            workerId,
            metadata: { consecutiveMisses: consecutive, maxAllowed },
        });
    }

    heartbeatTimeout(workerId: string, misses: number): void {
        this.error(LogEvent.HEARTBEAT_TIMEOUT, `Heartbeat timeout after ${misses} consecutive misses, terminating worker`, {
            workerId,
            metadata: { totalMisses: misses },
        });
    }
}

/** Default handler that prints JSON to stdout. */
export function defaultJsonHandler(entry: LogEntry): void {
    console.log(JSON.stringify(entry));
}

/** Default handler that prints human-readable output. */
export function defaultPrettyHandler(entry: LogEntry): void {
    console.log(formatPretty(entry));
}

export function formatPretty(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toLocaleTimeString("en-US", { hour12: false });
    const level = entry.level.toUpperCase().padEnd(5);
    const parts: string[] = [`[${timestamp}] [${level}]`, entry.event, entry.message];

    if (entry.workerId) {
        parts.push(`worker=${entry.workerId}`);
    }
    if (entry.taskId) {
        parts.push(`task=${entry.taskId.slice(0, 8)}`);
    }
    if (entry.func) {
        parts.push(`fn=${entry.func}`);
    }
    if (entry.durationMs !== undefined) {
        parts.push(`${entry.durationMs.toFixed(1)}ms`);
    }
    if (entry.error) {
        parts.push(`error=${entry.error}`);
    }

    return parts.join(" ");
}
