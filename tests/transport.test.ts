/**
 * Unit tests for choosing how a worker thread is started.
 *
 * Run with: node --import tsx --test tests/transport.test.ts
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { threadEntry } from "../src/transport.js";

const BOOTSTRAP_PREFIX = "data:text/javascript,";

describe("threadEntry", () => {
    it("starts JavaScript scripts directly", () => {
        const entry = threadEntry({ script: "/srv/jobs/worker.js", workerId: "worker-0" });

        assert.equal(entry.filename, "/srv/jobs/worker.js");
        assert.deepEqual(entry.workerData, { workerId: "worker-0" });
    });

    it("starts TypeScript scripts through the tsx bootstrap", () => {
        const entry = threadEntry(
            { script: new URL("file:///srv/jobs/worker.ts"), workerId: "worker-1" },
            () => "file:///deps/tsx/esm/api.mjs",
        );

        assert.ok(entry.filename instanceof URL);
        assert.equal(entry.filename.protocol, "data:");
        assert.deepEqual(entry.workerData, {
            workerId: "worker-1",
            script: "file:///srv/jobs/worker.ts",
            tsxLoader: "file:///deps/tsx/esm/api.mjs",
        });

        const source = decodeURIComponent(entry.filename.href.slice(BOOTSTRAP_PREFIX.length));
        assert.equal(
            source,
            [
                'import { workerData } from "node:worker_threads";',
                "const { register } = await import(workerData.tsxLoader);",
                "register();",
                "await import(workerData.script);",
            ].join("\n"),
        );
    });

    it("treats .mts paths as TypeScript", () => {
        const entry = threadEntry({ script: "/srv/jobs/worker.mts", workerId: "worker-2" }, () => "file:///loader.mjs");

        assert.equal(entry.workerData.script, "file:///srv/jobs/worker.mts");
    });

    it("finds the installed tsx loader", () => {
        const entry = threadEntry({ script: "/srv/jobs/worker.ts", workerId: "worker-3" });

        assert.equal(typeof entry.workerData.tsxLoader, "string");
        assert.ok(entry.workerData.tsxLoader?.startsWith("file://"));
        assert.ok(entry.workerData.tsxLoader?.includes("/tsx/"));
    });

    it("explains a missing tsx", () => {
        assert.throws(
            () =>
                threadEntry({ script: "/srv/jobs/worker.ts", workerId: "worker-4" }, () => {
                    throw new Error("not found");
                }),
            { message: "Cannot run /srv/jobs/worker.ts in a thread without tsx: not found" },
        );
    });
});
