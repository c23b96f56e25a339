import { WorkerPool } from "./pool.js";
import type { PoolState, RemoteCall, StartOptions, SubmitOptions, SubmittedTask } from "./pool.js";
import { TaskWorker } from "./task_worker.js";
import { PoolSupervisor } from "./supervisor.js";
import type { SupervisedPool } from "./supervisor.js";
import { WorkerHandle, WorkerState } from "./worker_handle.js";
import type { WorkerHandleListener, WorkerSnapshot } from "./worker_handle.js";
import { ResultChannel } from "./result_channel.js";
import type { PendingRequest } from "./result_channel.js";
import { createTask } from "./task.js";
import type { Task, TaskEntry } from "./task.js";
import { failure, unwrap } from "./outcome.js";
import type { Failure, Outcome, Success } from "./outcome.js";
import { TaskMessage, MessageType, PROTOCOL, collectTransferables } from "./message.js";
import type { TaskMessageData, WireFrame } from "./message.js";
import { ThreadTransport, ProcessTransport, defaultTransportFactory, threadEntry } from "./transport.js";
import type { ThreadWorkerData, TransportFactory, TransportKind, TransportOptions, WorkerTransport } from "./transport.js";
import {
    PoolError,
    TaskError,
    WorkerCrashedError,
    PoolSaturatedError,
    CancelledError,
    PoolClosedError,
    InvalidPayloadError,
    PoolFatalError,
    ConfigError,
} from "./errors.js";
import type { FailureKind } from "./errors.js";
import { DEFAULT_POOL_CONFIG, resolvePoolConfig, poolOptionsFromEnv } from "./config.js";
import type { PoolConfig, PoolOptions } from "./config.js";
import { Metrics } from "./metrics.js";
import type { MetricsSnapshot, MetricsDict } from "./metrics.js";
import {
    StructuredLogger,
    LogLevel,
    LogEvent,
    defaultJsonHandler,
    defaultPrettyHandler,
} from "./logging.js";
import type { LogEntry, LogHandler } from "./logging.js";

export default {
    WorkerPool,
    TaskWorker,
    TaskMessage,
    MessageType,
    TaskError,
    WorkerCrashedError,
    PoolSaturatedError,
    CancelledError,
    PoolClosedError,
    InvalidPayloadError,
    PoolFatalError,
    Metrics,
    StructuredLogger,
    LogLevel,
    LogEvent,
    defaultJsonHandler,
    defaultPrettyHandler,
};

export {
    WorkerPool,
    TaskWorker,
    PoolSupervisor,
    WorkerHandle,
    WorkerState,
    ResultChannel,
    createTask,
    failure,
    unwrap,
    // Wire
    TaskMessage,
    MessageType,
    PROTOCOL,
    collectTransferables,
    ThreadTransport,
    ProcessTransport,
    defaultTransportFactory,
    threadEntry,
    // Errors
    PoolError,
    TaskError,
    WorkerCrashedError,
    PoolSaturatedError,
    CancelledError,
    PoolClosedError,
    InvalidPayloadError,
    PoolFatalError,
    ConfigError,
    // Config
    DEFAULT_POOL_CONFIG,
    resolvePoolConfig,
    poolOptionsFromEnv,
    // Metrics
    Metrics,
    // Logging
    StructuredLogger,
    LogLevel,
    LogEvent,
    defaultJsonHandler,
    defaultPrettyHandler,
};

// Type-only exports
export type {
    PoolState,
    RemoteCall,
    StartOptions,
    SubmitOptions,
    SubmittedTask,
    SupervisedPool,
    WorkerHandleListener,
    WorkerSnapshot,
    PendingRequest,
    Task,
    TaskEntry,
    Failure,
    Outcome,
    Success,
    TaskMessageData,
    WireFrame,
    ThreadWorkerData,
    TransportFactory,
    TransportKind,
    TransportOptions,
    WorkerTransport,
    FailureKind,
    PoolConfig,
    PoolOptions,
    MetricsSnapshot,
    MetricsDict,
    LogEntry,
    LogHandler,
};
