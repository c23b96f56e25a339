/**
 * Ten fib(30) tasks on a pool of four worker threads.
 *
 * npx tsx examples/fib_pool.ts
 */

import { LogLevel, StructuredLogger, WorkerPool, defaultPrettyHandler } from "../src/index.js";

async function main() {
    const pool = WorkerPool.spawn(new URL("./workers/math_worker.ts", import.meta.url), {
        workerCount: 4,
        maxQueueDepth: 100,
        logger: new StructuredLogger({ handler: defaultPrettyHandler, level: LogLevel.INFO }),
    });
    await pool.start();

    const outcomes = await Promise.all(Array.from({ length: 10 }, () => pool.submit("fib", 30)));
    for (const outcome of outcomes) {
        if (outcome.ok) {
            console.log(`fib(30) = ${outcome.value} on ${outcome.workerId} in ${outcome.durationMs}ms`);
        } else {
            console.log(`failed: ${outcome.kind} ${outcome.detail}`);
        }
    }

    // Throws instead of returning a failure
    console.log("factorial(11) =>", await pool.call.factorial(11));

    console.log(JSON.stringify(pool.metrics.toDict(), null, 2));
    await pool.drain();
}
main().catch(console.error);
