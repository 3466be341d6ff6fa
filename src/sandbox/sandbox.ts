/**
 * Execution Sandbox — Runs one generated program under wall-clock, memory
 * and network limits and reports what happened as an `ExecutionVerdict`.
 *
 * Each run gets a fresh temporary directory (cwd, HOME and TMPDIR), an
 * allow-listed environment and its own process group, so the whole tree
 * can be killed at once. The directory is removed on every exit path.
 *
 * `run()` never rejects: harness malfunctions come back as `crashed`
 * verdicts with `sandbox_fault: true`.
 */
import { spawn } from "child_process";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { performance } from "perf_hooks";
import { SandboxFaultError } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import type { ResourceLimits } from "../schemas/config.js";
import type { ExperimentLanguage, Hypothesis } from "../schemas/hypothesis.js";
import type { ExecutionVerdict, TerminatedReason } from "../schemas/verdict.js";
import { readProcessTreeRssMb } from "./memory.js";
import { BoundedOutput, SentinelScanner } from "./output.js";
import {
    NETWORK_SENTINEL,
    OUT_OF_MEMORY_SENTINELS,
    RUNTIMES,
    materializeProgram,
    type RuntimeSpec,
} from "./runtimes.js";

export interface SandboxRunOptions {
    /** Kills the run promptly; the verdict is `crashed` with diagnostic "interrupted". */
    signal?: AbortSignal;
}

/** The capability the orchestrator depends on. */
export interface Sandbox {
    run(hypothesis: Hypothesis, limits: ResourceLimits, options?: SandboxRunOptions): Promise<ExecutionVerdict>;
}

export interface ProcessSandboxOptions {
    /** Parent of the per-run directories. Defaults to the OS temp dir. */
    rootDir?: string;
    /** How often the process tree's resident memory is sampled. */
    pollIntervalMs?: number;
    /** How long to wait for the streams to close after a kill or exit. */
    closeGraceMs?: number;
    logger?: Logger;
    runtimes?: Partial<Record<ExperimentLanguage, RuntimeSpec>>;
}

/** Host variables an experiment may see. Everything else (API keys included) is dropped. */
const ENV_ALLOW_LIST = ["PATH", "LANG", "LC_ALL", "LC_CTYPE", "TZ", "SYSTEMROOT"];

export const INTERRUPTED_DIAGNOSTIC = "interrupted";

type KillCause = "timeout" | "memory" | "interrupted";

interface ProcessResult {
    exitCode: number | null;
    signal: string | null;
    stdout: BoundedOutput;
    stderr: BoundedOutput;
    sentinels: SentinelScanner;
    peakMemoryMb: number | null;
    killCause: KillCause | null;
    spawnError: Error | null;
}

function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

function roundMb(value: number | null): number | null {
    return value === null ? null : Math.round(value * 10) / 10;
}

export class ProcessSandbox implements Sandbox {
    private readonly rootDir: string;
    private readonly pollIntervalMs: number;
    private readonly closeGraceMs: number;
    private readonly logger: Logger;
    private readonly runtimes: Record<ExperimentLanguage, RuntimeSpec>;

    constructor(options: ProcessSandboxOptions = {}) {
        this.rootDir = options.rootDir ?? os.tmpdir();
        this.pollIntervalMs = options.pollIntervalMs ?? 100;
        this.closeGraceMs = options.closeGraceMs ?? 2000;
        this.logger = (options.logger ?? createSilentLogger()).child({ component: "sandbox" });
        this.runtimes = { ...RUNTIMES, ...options.runtimes };
    }

    async run(hypothesis: Hypothesis, limits: ResourceLimits, options: SandboxRunOptions = {}): Promise<ExecutionVerdict> {
        const startedAt = new Date().toISOString();
        const started = performance.now();
        let runDir: string | null = null;

        try {
            if (options.signal?.aborted) {
                return this.verdict(hypothesis, startedAt, started, {
                    terminated_reason: "crashed",
                    diagnostic: INTERRUPTED_DIAGNOSTIC,
                });
            }

            await mkdir(this.rootDir, { recursive: true });
            runDir = await mkdtemp(path.join(this.rootDir, "experiment-"));
            const runtime = this.runtimes[hypothesis.language];
            await this.prepare(runtime, hypothesis, limits, runDir);

            const result = await this.execute(runtime, hypothesis, limits, runDir, options.signal);
            if (result.spawnError) {
                throw new SandboxFaultError(hypothesis.id, `could not start ${hypothesis.language} runtime: ${result.spawnError.message}`, {
                    cause: result.spawnError,
                });
            }
            return this.classify(hypothesis, limits, startedAt, started, result);
        } catch (err) {
            const fault = err instanceof SandboxFaultError
                ? err
                : new SandboxFaultError(hypothesis.id, describeError(err), { cause: err });
            this.logger.error({ err: fault, hypothesisId: hypothesis.id }, "sandbox fault");
            return this.verdict(hypothesis, startedAt, started, {
                terminated_reason: "crashed",
                sandbox_fault: true,
                diagnostic: fault.message,
            });
        } finally {
            if (runDir) {
                await rm(runDir, { recursive: true, force: true }).catch((err: unknown) => {
                    this.logger.warn({ err, runDir }, "failed to remove experiment directory");
                });
            }
        }
    }

    private async prepare(runtime: RuntimeSpec, hypothesis: Hypothesis, limits: ResourceLimits, runDir: string): Promise<void> {
        await writeFile(path.join(runDir, runtime.programFile), materializeProgram(hypothesis), "utf8");
        for (const [relative, content] of Object.entries(runtime.supportFiles(limits.network_allowed))) {
            const target = path.join(runDir, relative);
            await mkdir(path.dirname(target), { recursive: true });
            await writeFile(target, content, "utf8");
        }
    }

    private buildEnv(runDir: string, extra: Record<string, string>): Record<string, string> {
        const env: Record<string, string> = {};
        for (const key of ENV_ALLOW_LIST) {
            const value = process.env[key];
            if (value !== undefined) env[key] = value;
        }
        return { ...env, HOME: runDir, TMPDIR: runDir, TMP: runDir, TEMP: runDir, ...extra };
    }

    private execute(
        runtime: RuntimeSpec,
        hypothesis: Hypothesis,
        limits: ResourceLimits,
        runDir: string,
        signal: AbortSignal | undefined,
    ): Promise<ProcessResult> {
        const launch = runtime.launch(runDir, {
            maxMemoryMb: limits.max_memory_mb,
            networkAllowed: limits.network_allowed,
        });
        const log = this.logger.child({ hypothesisId: hypothesis.id });

        return new Promise<ProcessResult>((resolve) => {
            const result: ProcessResult = {
                exitCode: null,
                signal: null,
                stdout: new BoundedOutput(limits.max_output_bytes),
                stderr: new BoundedOutput(limits.max_output_bytes),
                sentinels: new SentinelScanner([NETWORK_SENTINEL, ...OUT_OF_MEMORY_SENTINELS]),
                peakMemoryMb: null,
                killCause: null,
                spawnError: null,
            };

            const child = spawn(launch.command, launch.args, {
                cwd: runDir,
                env: this.buildEnv(runDir, launch.env),
                detached: true,
                stdio: ["ignore", "pipe", "pipe"],
            });

            let settled = false;
            let wallTimer: NodeJS.Timeout | undefined;
            let pollTimer: NodeJS.Timeout | undefined;
            let graceTimer: NodeJS.Timeout | undefined;

            const killTree = (): void => {
                if (child.pid === undefined) return;
                try {
                    process.kill(-child.pid, "SIGKILL");
                } catch (err) {
                    log.debug({ err, pid: child.pid }, "process group already gone");
                }
            };

            const stop = (cause: KillCause): void => {
                if (result.killCause === null) result.killCause = cause;
                killTree();
                armGrace();
            };

            const onAbort = (): void => stop("interrupted");

            const settle = (): void => {
                if (settled) return;
                settled = true;
                clearTimeout(wallTimer);
                clearTimeout(pollTimer);
                clearTimeout(graceTimer);
                signal?.removeEventListener("abort", onAbort);
                resolve(result);
            };

            const armGrace = (): void => {
                if (graceTimer === undefined) {
                    graceTimer = setTimeout(settle, this.closeGraceMs);
                }
            };

            const poll = async (): Promise<void> => {
                if (settled || child.pid === undefined) return;
                try {
                    const rss = await readProcessTreeRssMb(child.pid);
                    if (rss !== null) {
                        result.peakMemoryMb = Math.max(result.peakMemoryMb ?? 0, rss);
                        if (rss > limits.max_memory_mb && result.killCause === null) {
                            log.info({ rssMb: roundMb(rss), limitMb: limits.max_memory_mb }, "memory ceiling exceeded");
                            stop("memory");
                            return;
                        }
                    }
                } catch (err) {
                    log.debug({ err }, "memory sample failed");
                }
                if (!settled && result.killCause === null) {
                    pollTimer = setTimeout(() => void poll(), this.pollIntervalMs);
                }
            };

            child.stdout?.on("data", (chunk: Buffer) => result.stdout.append(chunk));
            child.stderr?.on("data", (chunk: Buffer) => {
                result.sentinels.scan(chunk);
                result.stderr.append(chunk);
            });

            child.once("error", (err) => {
                if (child.pid === undefined) {
                    result.spawnError = err;
                    settle();
                    return;
                }
                log.warn({ err }, "child process error");
            });

            child.once("spawn", () => {
                wallTimer = setTimeout(() => {
                    log.info({ limitSeconds: limits.max_wall_seconds }, "wall-clock limit exceeded");
                    stop("timeout");
                }, limits.max_wall_seconds * 1000);
                void poll();
                if (signal) {
                    if (signal.aborted) onAbort();
                    else signal.addEventListener("abort", onAbort, { once: true });
                }
            });

            child.once("exit", (code, exitSignal) => {
                result.exitCode = code;
                result.signal = exitSignal;
                clearTimeout(wallTimer);
                // Descendants left behind by the program go with it.
                killTree();
                armGrace();
            });

            child.once("close", settle);
        });
    }

    private classify(
        hypothesis: Hypothesis,
        limits: ResourceLimits,
        startedAt: string,
        started: number,
        result: ProcessResult,
    ): ExecutionVerdict {
        let reason: TerminatedReason;
        let diagnostic: string | null;

        const networkAttempted = !limits.network_allowed && result.sentinels.has(NETWORK_SENTINEL);
        const outOfMemory = result.exitCode !== 0 && result.sentinels.hasAny(OUT_OF_MEMORY_SENTINELS);

        if (result.killCause === "timeout") {
            reason = "timeout";
            diagnostic = `exceeded the wall-clock limit of ${limits.max_wall_seconds}s`;
        } else if (result.killCause === "memory") {
            reason = "memory_exceeded";
            diagnostic = `resident memory exceeded the ceiling of ${limits.max_memory_mb} MB`;
        } else if (result.killCause === "interrupted") {
            reason = "crashed";
            diagnostic = INTERRUPTED_DIAGNOSTIC;
        } else if (networkAttempted) {
            reason = "blocked_network_access";
            diagnostic = "outbound network access was attempted and blocked";
        } else if (outOfMemory) {
            reason = "memory_exceeded";
            diagnostic = "runtime reported out of memory";
        } else if (result.exitCode === 0) {
            reason = "completed";
            diagnostic = null;
        } else {
            reason = "crashed";
            diagnostic = result.exitCode !== null
                ? `exited with code ${result.exitCode}`
                : `terminated by signal ${result.signal ?? "unknown"}`;
        }

        return this.verdict(hypothesis, startedAt, started, {
            exit_code: result.exitCode,
            signal: result.signal,
            stdout: result.stdout.toString(),
            stderr: result.stderr.toString(),
            stdout_truncated: result.stdout.truncated,
            stderr_truncated: result.stderr.truncated,
            peak_memory_mb: roundMb(result.peakMemoryMb),
            terminated_reason: reason,
            diagnostic,
        });
    }

    private verdict(
        hypothesis: Hypothesis,
        startedAt: string,
        started: number,
        fields: Partial<ExecutionVerdict> & Pick<ExecutionVerdict, "terminated_reason">,
    ): ExecutionVerdict {
        return {
            hypothesis_id: hypothesis.id,
            exit_code: null,
            signal: null,
            stdout: "",
            stderr: "",
            stdout_truncated: false,
            stderr_truncated: false,
            peak_memory_mb: null,
            sandbox_fault: false,
            diagnostic: null,
            started_at: startedAt,
            ...fields,
            wall_time_ms: Math.round(performance.now() - started),
        };
    }
}
