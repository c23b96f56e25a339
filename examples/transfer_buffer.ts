/**
 * Move a buffer to a worker instead of copying it.
 *
 * npx tsx examples/transfer_buffer.ts
 */

import { WorkerPool } from "../src/index.js";

async function main() {
    const pool = WorkerPool.spawn(new URL("./workers/math_worker.ts", import.meta.url), { workerCount: 1 });
    await pool.start();

    const samples = Float32Array.from({ length: 32 }, (_, i) => Math.sin(i / 4) * 3);
    const pending = pool.submit("normalize", samples, { transferable: true });

    // The buffer now belongs to the worker
    console.log("byteLength after submit:", samples.byteLength);

    const outcome = await pending;
    if (outcome.ok && outcome.value instanceof Float32Array) {
        console.log("normalized:", Array.from(outcome.value.slice(0, 8), value => value.toFixed(3)).join(", "));
    }

    await pool.drain();
}
main().catch(console.error);
