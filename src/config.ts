import { availableParallelism } from "node:os";
import { ConfigError } from "./errors.js";
import {
    StructuredLogger,
    defaultJsonHandler,
    defaultPrettyHandler,
    parseLogLevel,
} from "./logging.js";
import type { Metrics } from "./metrics.js";
import type { TransportFactory, TransportKind } from "./transport.js";
import type { PoolFatalError } from "./errors.js";

/** Tunables of a pool. All durations are in milliseconds. */
export interface PoolConfig {
    workerCount: number;
    /** Tasks allowed to wait for a worker; beyond this submit yields PoolSaturated. */
    maxQueueDepth: number;
    /** Times a task is re-run after the worker running it crashed. */
    retryLimit: number;
    transport: TransportKind;
    /** 0 disables heartbeats. */
    heartbeatInterval: number;
    heartbeatTimeout: number;
    /** Misses in a row before an idle worker is treated as hung. */
    heartbeatMaxMisses: number;
    /**
     * The same for a busy worker. A synchronous function blocks pongs until it
     * returns, so this times the interval bounds how long one task may run.
     */
    heartbeatMaxMissesBusy: number;
    startTimeout: number;
    shutdownTimeout: number;
    maxRestartAttempts: number;
    restartDelay: number;
    /** Node options for each worker; inherited from this process when unset. */
    execArgv?: string[];
}

export interface PoolOptions extends Partial<PoolConfig> {
    logger?: StructuredLogger;
    metrics?: Metrics;
    /** Called once if the supervisor gives up on the pool. */
    onFatal?: (error: PoolFatalError) => void;
    /** Replaces the built-in thread/process transports. */
    createTransport?: TransportFactory;
}

export function defaultWorkerCount(): number {
    return Math.min(Math.max(availableParallelism() - 1, 1), 8);
}

export const DEFAULT_POOL_CONFIG: Readonly<Omit<PoolConfig, "workerCount" | "execArgv">> = {
    maxQueueDepth: 1000,
    retryLimit: 2,
    transport: "thread",
    heartbeatInterval: 5000,
    heartbeatTimeout: 3000,
    heartbeatMaxMisses: 3,
    heartbeatMaxMissesBusy: 60,
    startTimeout: 10000,
    shutdownTimeout: 2000,
    maxRestartAttempts: 5,
    restartDelay: 100,
};

function requireInteger(name: string, value: number, min: number): void {
    if (!Number.isInteger(value) || value < min) {
        throw new ConfigError(`${name} must be an integer >= ${min}, got ${value}`);
    }
}

/** Merge options over the defaults and validate the result. */
export function resolvePoolConfig(options: Partial<PoolConfig> = {}): PoolConfig {
    const config: PoolConfig = {
        workerCount: options.workerCount ?? defaultWorkerCount(),
        maxQueueDepth: options.maxQueueDepth ?? DEFAULT_POOL_CONFIG.maxQueueDepth,
        retryLimit: options.retryLimit ?? DEFAULT_POOL_CONFIG.retryLimit,
        transport: options.transport ?? DEFAULT_POOL_CONFIG.transport,
        heartbeatInterval: options.heartbeatInterval ?? DEFAULT_POOL_CONFIG.heartbeatInterval,
        heartbeatTimeout: options.heartbeatTimeout ?? DEFAULT_POOL_CONFIG.heartbeatTimeout,
        heartbeatMaxMisses: options.heartbeatMaxMisses ?? DEFAULT_POOL_CONFIG.heartbeatMaxMisses,
        heartbeatMaxMissesBusy: options.heartbeatMaxMissesBusy ?? DEFAULT_POOL_CONFIG.heartbeatMaxMissesBusy,
        startTimeout: options.startTimeout ?? DEFAULT_POOL_CONFIG.startTimeout,
        shutdownTimeout: options.shutdownTimeout ?? DEFAULT_POOL_CONFIG.shutdownTimeout,
        maxRestartAttempts: options.maxRestartAttempts ?? DEFAULT_POOL_CONFIG.maxRestartAttempts,
        restartDelay: options.restartDelay ?? DEFAULT_POOL_CONFIG.restartDelay,
        execArgv: options.execArgv,
    };

    requireInteger("workerCount", config.workerCount, 1);
    requireInteger("maxQueueDepth", config.maxQueueDepth, 0);
    requireInteger("retryLimit", config.retryLimit, 0);
    requireInteger("heartbeatInterval", config.heartbeatInterval, 0);
    requireInteger("heartbeatTimeout", config.heartbeatTimeout, 1);
    requireInteger("heartbeatMaxMisses", config.heartbeatMaxMisses, 1);
    requireInteger("heartbeatMaxMissesBusy", config.heartbeatMaxMissesBusy, 1);
    requireInteger("startTimeout", config.startTimeout, 1);
    requireInteger("shutdownTimeout", config.shutdownTimeout, 0);
    requireInteger("maxRestartAttempts", config.maxRestartAttempts, 1);
    requireInteger("restartDelay", config.restartDelay, 0);

    if (config.transport !== "thread" && config.transport !== "process") {
        throw new ConfigError(`transport must be "thread" or "process", got "${config.transport}"`);
    }

    return config;
}

function readInteger(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (raw === undefined || raw.trim() === "") {
        return undefined;
    }
    const value = Number(raw);
    if (!Number.isInteger(value)) {
        throw new ConfigError(`${name} must be an integer, got '${raw}'`);
    }
    return value;
}

/**
 * Read pool options from COREPOOL_* environment variables.
 * Only variables that are set end up in the result.
 */
export function poolOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): PoolOptions {
    const options: PoolOptions = {};

    const workerCount = readInteger(env, "COREPOOL_WORKERS");
    if (workerCount !== undefined) options.workerCount = workerCount;

    const maxQueueDepth = readInteger(env, "COREPOOL_MAX_QUEUE_DEPTH");
    if (maxQueueDepth !== undefined) options.maxQueueDepth = maxQueueDepth;

    const retryLimit = readInteger(env, "COREPOOL_RETRY_LIMIT");
    if (retryLimit !== undefined) options.retryLimit = retryLimit;

    const heartbeatInterval = readInteger(env, "COREPOOL_HEARTBEAT_INTERVAL_MS");
    if (heartbeatInterval !== undefined) options.heartbeatInterval = heartbeatInterval;

    const heartbeatTimeout = readInteger(env, "COREPOOL_HEARTBEAT_TIMEOUT_MS");
    if (heartbeatTimeout !== undefined) options.heartbeatTimeout = heartbeatTimeout;

    const heartbeatMaxMissesBusy = readInteger(env, "COREPOOL_HEARTBEAT_MAX_MISSES_BUSY");
    if (heartbeatMaxMissesBusy !== undefined) options.heartbeatMaxMissesBusy = heartbeatMaxMissesBusy;

    const transport = env.COREPOOL_TRANSPORT;
    if (transport !== undefined) {
        if (transport !== "thread" && transport !== "process") {
            throw new ConfigError(`COREPOOL_TRANSPORT must be "thread" or "process", got '${transport}'`);
        }
        options.transport = transport;
    }

    const logLevel = env.COREPOOL_LOG_LEVEL;
    if (logLevel !== undefined) {
        const level = parseLogLevel(logLevel);
        if (level === undefined) {
            throw new ConfigError(`COREPOOL_LOG_LEVEL must be one of debug, info, warn, error, got '${logLevel}'`);
        }
        const handler = env.COREPOOL_LOG_FORMAT === "json" ? defaultJsonHandler : defaultPrettyHandler;
        options.logger = new StructuredLogger({ handler, level });
    }

    return options;
}
