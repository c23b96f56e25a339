/**
 * Unit tests for StructuredLogger.
 *
 * Run with: node --import tsx --test tests/logging.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { LogEvent, LogLevel, StructuredLogger, formatPretty, parseLogLevel } from "../src/logging.js";
import type { LogEntry } from "../src/logging.js";

function capture(level: LogLevel = LogLevel.DEBUG): { logger: StructuredLogger; entries: LogEntry[] } {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({ handler: entry => entries.push(entry), level, poolId: "pool-a" });
    return { logger, entries };
}

// ============================================================================
// Levels and handlers
// ============================================================================

describe("StructuredLogger: levels", () => {
    it("is silent without a handler", () => {
        const logger = new StructuredLogger();
        assert.doesNotThrow(() => logger.error(LogEvent.POOL_FATAL, "nobody listens"));
    });

    it("drops entries below the configured level", () => {
        const { logger, entries } = capture(LogLevel.WARN);

        logger.debug(LogEvent.TASK_SUBMIT, "debug");
        logger.info(LogEvent.POOL_START, "info");
        logger.warn(LogEvent.QUEUE_OVERFLOW, "warn");
        logger.error(LogEvent.POOL_FATAL, "error");

        assert.deepEqual(
            entries.map(entry => entry.level),
            ["warn", "error"],
        );
    });

    it("stamps the pool id on every entry", () => {
        const { logger, entries } = capture();
        logger.setPoolId("pool-b");
        logger.info(LogEvent.POOL_START, "started");

        assert.equal(entries[0].poolId, "pool-b");
        assert.equal(entries[0].event, "pool_start");
        assert.equal(entries[0].message, "started");
    });

    it("survives a throwing handler", t => {
        const consoleError = t.mock.method(console, "error", () => {});
        const logger = new StructuredLogger({
            handler: () => {
                throw new Error("sink down");
            },
        });

        logger.info(LogEvent.POOL_START, "started");

        assert.equal(consoleError.mock.callCount(), 1);
        assert.deepEqual(consoleError.mock.calls[0].arguments, ["Log handler error: Error: sink down"]);
    });

    it("parses level names", () => {
        assert.equal(parseLogLevel(" Warn "), LogLevel.WARN);
        assert.equal(parseLogLevel("debug"), LogLevel.DEBUG);
        assert.equal(parseLogLevel("verbose"), undefined);
    });
});

// ============================================================================
// Convenience methods
// ============================================================================

describe("StructuredLogger: task events", () => {
    it("logs a completed task at debug with a rounded duration", () => {
        const { logger, entries } = capture();
        logger.taskEnd({ taskId: "t-1", func: "fib", workerId: "worker-2", durationMs: 12.3456 });

        assert.equal(entries.length, 1);
        assert.equal(entries[0].event, "task_end");
        assert.equal(entries[0].level, "debug");
        assert.equal(entries[0].message, "Completed fib");
        assert.equal(entries[0].durationMs, 12.35);
        assert.equal(entries[0].success, true);
        assert.equal(entries[0].workerId, "worker-2");
    });

    it("logs a failed task at warn with its error", () => {
        const { logger, entries } = capture();
        logger.taskEnd({
            taskId: "t-2",
            func: "fib",
            durationMs: 4,
            success: false,
            error: "boom",
            errorType: "TaskError",
        });

        assert.equal(entries[0].event, "task_error");
        assert.equal(entries[0].level, "warn");
        assert.equal(entries[0].message, "Failed fib");
        assert.equal(entries[0].success, false);
        assert.equal(entries[0].error, "boom");
        assert.equal(entries[0].errorType, "TaskError");
    });

    it("logs queue overflow with the depth", () => {
        const { logger, entries } = capture();
        logger.queueOverflow(3, "t-3", "fib");

        assert.equal(entries[0].event, "queue_overflow");
        assert.equal(entries[0].level, "warn");
        assert.equal(entries[0].message, "Queue full at depth 3, rejecting fib");
        assert.deepEqual(entries[0].metadata, { depth: 3 });
    });

    it("logs retries with the attempt number", () => {
        const { logger, entries } = capture();
        logger.taskRetry({ taskId: "t-4", func: "crashy", attempt: 1, retryLimit: 2 });

        assert.equal(entries[0].event, "task_retry");
        assert.equal(entries[0].message, "Requeueing crashy after worker crash (1/2)");
        assert.equal(entries[0].attempt, 1);
    });

    it("logs crashes with the exit code", () => {
        const { logger, entries } = capture();
        logger.workerCrash("worker-1", 3, "t-5");

        assert.equal(entries[0].event, "worker_crash");
        assert.equal(entries[0].message, "Worker exited unexpectedly with code 3");
        assert.equal(entries[0].taskId, "t-5");
        assert.deepEqual(entries[0].metadata, { exitCode: 3 });
    });
});

// ============================================================================
// Pretty format
// ============================================================================

describe("formatPretty", () => {
    it("puts context after the message", () => {
        const line = formatPretty({
            event: "task_error",
            level: "warn",
            message: "Failed fib",
            timestamp: Date.now(),
            workerId: "worker-1",
            taskId: "abcdef1234567890",
            func: "fib",
            durationMs: 12.5,
            error: "boom",
        });

        assert.match(
            line,
            /^\[\d{2}:\d{2}:\d{2}\] \[WARN \] task_error Failed fib worker=worker-1 task=abcdef12 fn=fib 12\.5ms error=boom$/,
        );
    });

    it("leaves out context that is not set", () => {
        const line = formatPretty({ event: "pool_start", level: "info", message: "up", timestamp: Date.now() });
        assert.match(line, /^\[\d{2}:\d{2}:\d{2}\] \[INFO \] pool_start up$/);
    });
});
