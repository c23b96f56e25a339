/**
 * Worker script for the examples.
 *
 * Started by the pool, never directly.
 */

import { TaskWorker } from "../../src/index.js";

class MathWorker extends TaskWorker {
    fib(n: number): number {
        return n < 2 ? n : this.fib(n - 1) + this.fib(n - 2);
    }

    factorial(n: number): number {
        if (n < 0) {
            throw new Error("Factorial not defined for negative numbers");
        }
        let result = 1;
        for (let i = 2; i <= n; i++) {
            result *= i;
        }
        return result;
    }

    normalize(samples: Float32Array): Float32Array {
        let peak = 0;
        for (const sample of samples) {
            peak = Math.max(peak, Math.abs(sample));
        }
        if (peak > 0) {
            for (let i = 0; i < samples.length; i++) samples[i] /= peak;
        }
        return samples;
    }
}

new MathWorker().run();
