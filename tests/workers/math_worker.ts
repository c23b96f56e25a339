/**
 * Worker used by the integration tests. Runs as a worker thread or a forked
 * process depending on the pool's transport.
 */

import { existsSync, writeFileSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";
import { TaskWorker } from "../../src/task_worker.js";

class MathWorker extends TaskWorker {
    fib(n: number): number {
        return n < 2 ? n : this.fib(n - 1) + this.fib(n - 2);
    }

    echo(value: unknown): unknown {
        return value;
    }

    /** Reports what arrived, so tests can see the worker got real Maps, Sets and BigInts. */
    describe(value: { map: unknown; set: unknown; big: unknown }): string {
        const map = value.map instanceof Map ? `Map(${value.map.size})` : "no map";
        const set = value.set instanceof Set ? `Set(${value.set.size})` : "no set";
        return `${map} ${set} ${typeof value.big}`;
    }

    async sleep(ms: number): Promise<number> {
        await sleep(ms);
        return ms;
    }

    fail(message: string): never {
        throw new Error(message);
    }

    crash(): never {
        process.exit(3);
    }

    /** Crash the first time, succeed once `marker` exists. */
    crashOnce(marker: string): string {
        if (existsSync(marker)) {
            return "recovered";
        }
        writeFileSync(marker, "crashed");
        process.exit(1);
    }

    hang(): never {
        for (;;) {
            // busy
        }
    }

    touch(path: string): boolean {
        writeFileSync(path, "ran");
        return true;
    }

    /** Doubles a Float32Array in place; copies and doubles a number list. */
    scale(values: Float32Array | number[]): Float32Array | number[] {
        if (values instanceof Float32Array) {
            for (let i = 0; i < values.length; i++) values[i] *= 2;
            return values;
        }
        return values.map(value => value * 2);
    }

    whoami(): string | undefined {
        return this.workerId;
    }

    _internal(): string {
        return "hidden";
    }
}

new MathWorker().run();
