/**
 * Process Sandbox Tests — Real child processes against the current Node.js.
 *
 * Covers every terminated reason, output capping, directory cleanup and
 * the conversion of harness failures into verdicts.
 */
import { describe, it, expect } from "vitest";
import { spawnSync } from "child_process";
import { mkdtemp, readdir, rm } from "fs/promises";
import os from "os";
import path from "path";
import { ProcessSandbox, INTERRUPTED_DIAGNOSTIC } from "../sandbox.js";
import { RUNTIMES } from "../runtimes.js";
import { TRUNCATION_MARKER } from "../output.js";
import { Analyst } from "../../agents/analyst.js";
import type { ResourceLimits } from "../../schemas/config.js";
import { Hypothesis } from "../../schemas/hypothesis.js";

// --- Helpers ---

const HAS_PYTHON = spawnSync("python3", ["--version"]).status === 0;

function makeHypothesis(code: string, overrides: Record<string, unknown> = {}): Hypothesis {
    return Hypothesis.parse({
        id: "hyp-1",
        objective: "sort an array",
        title: "test experiment",
        rationale: "",
        expected_outcome: "",
        language: "javascript",
        code,
        evaluation: { type: "exit_status" },
        source: "llm",
        batch_index: 0,
        code_hash: "hash-1",
        created_at: "2026-01-01T00:00:00.000Z",
        kind: "code_experiment",
        ...overrides,
    });
}

function makeLimits(overrides: Partial<ResourceLimits> = {}): ResourceLimits {
    return {
        max_wall_seconds: 10,
        max_memory_mb: 512,
        network_allowed: false,
        max_output_bytes: 10000,
        ...overrides,
    };
}

async function withRoot<T>(fn: (root: string) => Promise<T>): Promise<T> {
    const root = await mkdtemp(path.join(os.tmpdir(), "sandbox-test-"));
    try {
        return await fn(root);
    } finally {
        await rm(root, { recursive: true, force: true });
    }
}

// --- Tests ---

describe("ProcessSandbox.run()", () => {
    it("reports a completed run with its output", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`console.log(JSON.stringify({ metrics: { speed: 3 } }));`),
            makeLimits(),
        );

        expect(verdict.terminated_reason).toBe("completed");
        expect(verdict.exit_code).toBe(0);
        expect(verdict.stdout).toBe('{"metrics":{"speed":3}}\n');
        expect(verdict.sandbox_fault).toBe(false);
        expect(verdict.diagnostic).toBeNull();
        expect(verdict.hypothesis_id).toBe("hyp-1");
    });

    it("kills an infinite loop at the wall-clock limit", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(makeHypothesis("while (true) {}"), makeLimits({ max_wall_seconds: 1 }));

        expect(verdict.terminated_reason).toBe("timeout");
        expect(verdict.signal).toBe("SIGKILL");
        expect(verdict.wall_time_ms).toBeGreaterThanOrEqual(1000);
        expect(verdict.wall_time_ms).toBeLessThan(1000 + 5000);
    });

    it("reports a non-zero exit as crashed with the exit code", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`console.error("boom"); process.exit(3);`),
            makeLimits(),
        );

        expect(verdict.terminated_reason).toBe("crashed");
        expect(verdict.exit_code).toBe(3);
        expect(verdict.stderr).toBe("boom\n");
        expect(verdict.diagnostic).toBe("exited with code 3");
        expect(verdict.sandbox_fault).toBe(false);
    });

    it("flags a swallowed network attempt as blocked_network_access", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`
import net from "node:net";
try {
    net.connect(80, "127.0.0.1");
} catch (err) {
    console.log("caught " + err.code);
}
`),
            makeLimits(),
        );

        expect(verdict.terminated_reason).toBe("blocked_network_access");
        expect(verdict.exit_code).toBe(0);
        expect(verdict.stdout).toBe("caught ERR_SANDBOX_NETWORK\n");
    });

    it("blocks fetch before any request leaves the process", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`await fetch("http://127.0.0.1:9/");`),
            makeLimits(),
        );

        expect(verdict.terminated_reason).toBe("blocked_network_access");
        expect(verdict.exit_code).not.toBe(0);
    });

    it("caps stdout and marks where output was omitted", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`process.stdout.write("x".repeat(5000));`),
            makeLimits({ max_output_bytes: 100 }),
        );

        expect(verdict.terminated_reason).toBe("completed");
        expect(verdict.stdout_truncated).toBe(true);
        expect(verdict.stdout).toBe(`${"x".repeat(50)}\n${TRUNCATION_MARKER} 4900 bytes omitted]\n${"x".repeat(50)}`);
    });

    it("keeps the result record of a verbose run scorable", async () => {
        const sandbox = new ProcessSandbox();
        const hypothesis = makeHypothesis(
            `
for (let i = 0; i < 200; i++) console.log("progress step " + i + " of the experiment");
console.log(JSON.stringify({ metrics: { score: 0.9 } }));
`,
            { evaluation: { type: "metric", metric: "score", goal: "maximize" } },
        );
        const verdict = await sandbox.run(hypothesis, makeLimits({ max_output_bytes: 1000 }));

        expect(verdict.terminated_reason).toBe("completed");
        expect(verdict.stdout_truncated).toBe(true);
        expect(verdict.stdout.endsWith('\n{"metrics":{"score":0.9}}\n')).toBe(true);

        const outcome = new Analyst().score(hypothesis, verdict, "sort an array", {
            objective: "sort an array",
            clock: 0,
            best_quality: null,
            entries: [],
        });
        expect(outcome.classification).toBe("success");
        expect(outcome.quality).toBe(0.9);
    });

    it("runs in a disposable directory that is removed afterwards", async () => {
        await withRoot(async (root) => {
            const sandbox = new ProcessSandbox({ rootDir: root });
            const verdict = await sandbox.run(
                makeHypothesis(`
import { realpathSync, writeFileSync } from "node:fs";
writeFileSync("scratch.txt", "data");
console.log(process.cwd() === realpathSync(process.env.HOME));
`),
                makeLimits(),
            );

            expect(verdict.terminated_reason).toBe("completed");
            expect(verdict.stdout).toBe("true\n");
            expect(await readdir(root)).toEqual([]);
        });
    });

    it("removes the directory after a forced kill", async () => {
        await withRoot(async (root) => {
            const sandbox = new ProcessSandbox({ rootDir: root });
            const verdict = await sandbox.run(
                makeHypothesis(`
import { writeFileSync } from "node:fs";
writeFileSync("partial.txt", "data");
while (true) {}
`),
                makeLimits({ max_wall_seconds: 1 }),
            );

            expect(verdict.terminated_reason).toBe("timeout");
            expect(await readdir(root)).toEqual([]);
        });
    });

    it("hides host secrets from the experiment", async () => {
        process.env.RESEARCH_TEST_SECRET = "test-secret";
        try {
            const sandbox = new ProcessSandbox();
            const verdict = await sandbox.run(
                makeHypothesis(`console.log(String(process.env.RESEARCH_TEST_SECRET));`),
                makeLimits(),
            );
            expect(verdict.stdout).toBe("undefined\n");
        } finally {
            delete process.env.RESEARCH_TEST_SECRET;
        }
    });

    it("materialises a parameter sweep with its values", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`console.log(SWEEP_PARAMETER + ":" + SWEEP_VALUES.join(","));`, {
                kind: "parameter_sweep",
                parameter: "size",
                values: [10, 100, "big"],
            }),
            makeLimits(),
        );

        expect(verdict.terminated_reason).toBe("completed");
        expect(verdict.stdout).toBe("size:10,100,big\n");
    });

    it("reports an interrupted run as crashed", async () => {
        const sandbox = new ProcessSandbox();
        const controller = new AbortController();
        setTimeout(() => controller.abort(), 300);

        const verdict = await sandbox.run(makeHypothesis("while (true) {}"), makeLimits(), {
            signal: controller.signal,
        });

        expect(verdict.terminated_reason).toBe("crashed");
        expect(verdict.diagnostic).toBe(INTERRUPTED_DIAGNOSTIC);
        expect(verdict.wall_time_ms).toBeLessThan(5000);
    });

    it("does not start a run whose signal is already aborted", async () => {
        const sandbox = new ProcessSandbox();
        const controller = new AbortController();
        controller.abort();

        const verdict = await sandbox.run(makeHypothesis("console.log(1)"), makeLimits(), {
            signal: controller.signal,
        });

        expect(verdict.terminated_reason).toBe("crashed");
        expect(verdict.diagnostic).toBe(INTERRUPTED_DIAGNOSTIC);
        expect(verdict.stdout).toBe("");
    });

    it("turns a spawn failure into a sandbox_fault verdict", async () => {
        const sandbox = new ProcessSandbox({
            runtimes: {
                javascript: {
                    ...RUNTIMES.javascript,
                    launch: () => ({ command: "/nonexistent/runtime-binary", args: [], env: {} }),
                },
            },
        });

        const verdict = await sandbox.run(makeHypothesis("console.log(1)"), makeLimits());

        expect(verdict.terminated_reason).toBe("crashed");
        expect(verdict.sandbox_fault).toBe(true);
        expect(verdict.diagnostic).toContain("could not start javascript runtime");
    });

    it.runIf(process.platform === "linux")("kills a run that exceeds the memory ceiling", async () => {
        const sandbox = new ProcessSandbox({ pollIntervalMs: 50 });
        const verdict = await sandbox.run(
            makeHypothesis(`
const blocks = [];
while (true) {
    blocks.push(Buffer.alloc(16 * 1024 * 1024, 1));
    await new Promise((resolve) => setTimeout(resolve, 5));
}
`),
            makeLimits({ max_memory_mb: 128, max_wall_seconds: 15 }),
        );

        expect(verdict.terminated_reason).toBe("memory_exceeded");
        expect(verdict.peak_memory_mb).not.toBeNull();
    });

    it.runIf(HAS_PYTHON)("flags a swallowed python network attempt as blocked_network_access", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(
                `
import urllib.request
try:
    urllib.request.urlopen("http://127.0.0.1:9/", timeout=2)
except Exception as err:
    print("caught", type(err).__name__)
`,
                { language: "python" },
            ),
            makeLimits(),
        );

        expect(verdict.terminated_reason).toBe("blocked_network_access");
        expect(verdict.exit_code).toBe(0);
        expect(verdict.stdout).toBe("caught URLError\n");
    });

    it.runIf(HAS_PYTHON && process.platform === "linux")("stops a python allocation above the memory ceiling", async () => {
        const sandbox = new ProcessSandbox();
        const verdict = await sandbox.run(
            makeHypothesis(`data = bytearray(1024 * 1024 * 1024)\nprint(len(data))\n`, { language: "python" }),
            makeLimits({ max_memory_mb: 256 }),
        );

        expect(verdict.terminated_reason).toBe("memory_exceeded");
        expect(verdict.exit_code).not.toBe(0);
        expect(verdict.stdout).toBe("");
    });
});
