/**
 * Orchestrator — The research loop state machine.
 *
 *   Idle → Generating → Executing → Scoring → UpdatingKnowledge → Checkpointing
 *        → (Generating | Terminated)
 *
 * One control flow drives the states. Only the experiments of a batch run
 * concurrently (a p-limit pool); their verdicts are scored and merged in
 * hypothesis creation order, so the knowledge store ends up the same
 * whatever order the runs finish in. The checkpoint is the only loop state
 * that outlives an iteration, and it is written after every batch and on
 * termination.
 */
import { EventEmitter } from "events";
import os from "os";
import pLimit from "p-limit";
import type { Logger } from "./logging/logger.js";
import { createSilentLogger } from "./logging/logger.js";
import { CorruptStateError, GenerationUnavailableError, ObjectiveMismatchError, PersistenceFailureError } from "./errors/index.js";
import { summarizeIteration, type Analyst } from "./agents/analyst.js";
import type { ProposeOptions } from "./agents/researcher.js";
import type { CognitionBase, MergeResult } from "./memory/cognition.js";
import type { Sandbox } from "./sandbox/sandbox.js";
import { INTERRUPTED_DIAGNOSTIC } from "./sandbox/sandbox.js";
import { CheckpointStore, initialCheckpoint, planNextStep } from "./core/checkpoint.js";
import { TOP_DISCOVERIES, renderReport, writeReport } from "./core/report.js";
import { sleep, withRetry } from "./core/retry.js";
import { limitsFromConfig, type ResearchConfig } from "./schemas/config.js";
import type { CheckpointBody, TerminationReason } from "./schemas/checkpoint.js";
import type { Hypothesis } from "./schemas/hypothesis.js";
import type { KnowledgeSnapshot } from "./schemas/knowledge.js";
import type { ScoredOutcome } from "./schemas/outcome.js";
import type { ExecutionVerdict } from "./schemas/verdict.js";

export type LoopState =
    | "idle"
    | "generating"
    | "executing"
    | "scoring"
    | "updating_knowledge"
    | "checkpointing"
    | "terminated";

/** Anything that can draft hypotheses; the Researcher in production. */
export interface HypothesisSource {
    propose(
        objective: string,
        snapshot: KnowledgeSnapshot,
        recentOutcomes: readonly ScoredOutcome[],
        count: number,
        options?: ProposeOptions,
    ): Promise<Hypothesis[]>;
}

export interface TerminationReport {
    objective: string;
    reason: TerminationReason;
    fatal: boolean;
    detail: string | null;
    /** Completed iterations, across resumptions. */
    iterations: number;
    total_experiments: number;
    elapsed_research_ms: number;
    last_outcome_id: string | null;
    /** Null when no report was written. */
    report_path: string | null;
}

/** Supported events emitted by the ResearchOrchestrator. */
export interface OrchestratorEvents {
    "run:start": [{ objective: string; resumedFrom: number | null }];
    "state:change": [{ from: LoopState; to: LoopState; iteration: number }];
    "generation:retry": [{ iteration: number; attempt: number; delayMs: number; error: string }];
    "hypotheses:proposed": [{ iteration: number; hypotheses: Hypothesis[] }];
    "experiment:complete": [{ iteration: number; hypothesis: Hypothesis; verdict: ExecutionVerdict }];
    "outcome:scored": [{ iteration: number; outcome: ScoredOutcome; merge: MergeResult | undefined }];
    "iteration:complete": [{ iteration: number; outcomes: ScoredOutcome[]; summary: string }];
    "terminated": [TerminationReport];
}

export interface ResearchOrchestratorOptions {
    objective: string;
    config: ResearchConfig;
    researcher: HypothesisSource;
    analyst: Analyst;
    sandbox: Sandbox;
    knowledge: CognitionBase;
    /** Defaults to `checkpoint.json` in the workspace. */
    checkpoints?: CheckpointStore;
    /** Where the checkpoint and the research report live. Defaults to `config.workspace_dir`. */
    workspaceDir?: string;
    /** User interrupt. */
    signal?: AbortSignal;
    logger?: Logger;
    /** Write `research_report.md` on termination. Default: true */
    writeReport?: boolean;
    /** Millisecond clock used for the research time budget. */
    clock?: () => number;
}


type IterationResult = "completed" | "interrupted";

export class ResearchOrchestrator extends EventEmitter<OrchestratorEvents> {
    public readonly objective: string;
    public state: LoopState = "idle";

    private readonly config: ResearchConfig;
    private readonly researcher: HypothesisSource;
    private readonly analyst: Analyst;
    private readonly sandbox: Sandbox;
    private readonly knowledge: CognitionBase;
    private readonly checkpoints: CheckpointStore;
    private readonly workspaceDir: string;
    private readonly signal: AbortSignal | undefined;
    private readonly logger: Logger;
    private readonly shouldWriteReport: boolean;
    private readonly clock: () => number;

    private checkpoint: CheckpointBody | null = null;
    /** Research time accumulated before this session, and when this session started. */
    private elapsedBefore = 0;
    private sessionStart = 0;
    private currentIteration = 0;

    constructor(options: ResearchOrchestratorOptions) {
        super();
        this.objective = options.objective;
        this.config = options.config;
        this.researcher = options.researcher;
        this.analyst = options.analyst;
        this.sandbox = options.sandbox;
        this.knowledge = options.knowledge;
        this.workspaceDir = options.workspaceDir ?? options.config.workspace_dir;
        this.checkpoints = options.checkpoints ?? CheckpointStore.inWorkspace(this.workspaceDir);
        this.signal = options.signal;
        this.logger = (options.logger ?? createSilentLogger()).child({ component: "orchestrator" });
        this.shouldWriteReport = options.writeReport ?? true;
        this.clock = options.clock ?? Date.now;
    }

    /**
     * Run (or resume) the loop until a budget is spent, the user interrupts,
     * or a fatal error occurs. Resolves exactly once with the termination report.
     *
     * Throws ObjectiveMismatchError when the workspace belongs to another objective.
     */
    async run(): Promise<TerminationReport> {
        if (this.state !== "idle") throw new Error(`Orchestrator already ran (state: ${this.state})`);
        this.sessionStart = this.clock();

        let checkpoint: CheckpointBody;
        try {
            checkpoint = await this.resume();
        } catch (err) {
            if (err instanceof CorruptStateError) {
                this.logger.error({ err }, "refusing to resume from a corrupt checkpoint");
                return this.finish({ reason: "corrupt_state", fatal: true, detail: err.message }, false);
            }
            if (err instanceof PersistenceFailureError) {
                this.logger.error({ err }, "could not read research state");
                return this.finish({ reason: "persistence_failure", fatal: true, detail: err.message }, false);
            }
            throw err;
        }
        this.checkpoint = checkpoint;
        this.currentIteration = checkpoint.iteration;

        try {
            let first = true;
            for (;;) {
                const step = planNextStep(
                    { iteration: checkpoint.iteration, elapsed_research_ms: this.elapsed() },
                    this.config,
                );
                if (step.action === "terminate") {
                    return await this.finish({ reason: step.reason, fatal: false, detail: null });
                }

                if (!first && this.config.iteration_delay_seconds > 0) {
                    await sleep(this.config.iteration_delay_seconds * 1000, this.signal);
                }
                first = false;
                if (this.signal?.aborted) {
                    return await this.finish({ reason: "interrupted", fatal: false, detail: null });
                }

                const result = await this.iterate(step.iteration);
                checkpoint = this.requireCheckpoint();
                if (result === "interrupted") {
                    return await this.finish({ reason: "interrupted", fatal: false, detail: null });
                }
            }
        } catch (err) {
            if (err instanceof GenerationUnavailableError) {
                this.logger.error({ err }, "hypothesis generation unavailable; giving up");
                return await this.finish({ reason: "generation_unavailable", fatal: true, detail: err.message });
            }
            if (err instanceof PersistenceFailureError) {
                this.logger.error({ err }, "research state could not be persisted");
                return await this.finish({ reason: "persistence_failure", fatal: true, detail: err.message });
            }
            throw err;
        }
    }

    // --- Lifecycle ---

    private async resume(): Promise<CheckpointBody> {
        const existing = await this.checkpoints.load(this.knowledge);
        if (existing) {
            if (existing.objective !== this.objective) {
                throw new ObjectiveMismatchError(existing.objective, this.objective);
            }
            const { checksum: _checksum, ...body } = existing;
            this.elapsedBefore = body.elapsed_research_ms;
            this.logger.info(
                { iteration: body.iteration, experiments: body.total_experiments, previous: body.termination?.reason ?? null },
                "resuming research from checkpoint",
            );
            this.emit("run:start", { objective: this.objective, resumedFrom: body.iteration });
            return { ...body, status: "running", termination: null };
        }

        const fresh = initialCheckpoint(
            this.objective,
            { path: this.knowledge.path, clock: this.knowledge.clock },
            new Date(),
        );
        await this.checkpoints.save(fresh);
        this.logger.info({ objective: this.objective }, "starting new research");
        this.emit("run:start", { objective: this.objective, resumedFrom: null });
        return fresh;
    }

    /**
     * One pass through Generating → Executing → Scoring → UpdatingKnowledge
     * → Checkpointing. An interrupt keeps the outcomes that finished and
     * discards the runs it cut short.
     */
    private async iterate(iteration: number): Promise<IterationResult> {
        this.currentIteration = iteration;
        const log = this.logger.child({ iteration });

        // --- Generating ---
        this.transition("generating");
        const snapshot = this.knowledge.snapshot(this.objective, this.config.retrieval_top_k);
        const recent = this.knowledge.recentOutcomes(this.objective, this.config.history_window);

        let hypotheses: Hypothesis[];
        try {
            hypotheses = await withRetry(
                () => this.researcher.propose(this.objective, snapshot, recent, this.config.experiments_per_iteration, {
                    signal: this.signal,
                }),
                {
                    attempts: this.config.max_generation_attempts,
                    baseDelayMs: this.config.generation_backoff_ms,
                    signal: this.signal,
                    shouldRetry: (err) => err instanceof GenerationUnavailableError,
                    onRetry: (err, attempt, delayMs) => {
                        const error = err instanceof Error ? err.message : String(err);
                        log.warn({ attempt, delayMs, error }, "hypothesis generation failed; backing off");
                        this.emit("generation:retry", { iteration, attempt, delayMs, error });
                    },
                },
            );
        } catch (err) {
            if (this.signal?.aborted) {
                await this.commit(iteration, [], [], snapshot, false);
                return "interrupted";
            }
            throw err;
        }

        for (const h of hypotheses) {
            log.info({ hypothesisId: h.id, kind: h.kind, language: h.language, title: h.title }, "hypothesis proposed");
        }
        this.emit("hypotheses:proposed", { iteration, hypotheses });

        // --- Executing ---
        this.transition("executing");
        const verdicts = await this.execute(iteration, hypotheses, log);

        // --- Scoring ---
        this.transition("scoring");
        const ordered = [...hypotheses].sort(
            (a, b) => a.created_at.localeCompare(b.created_at) || a.batch_index - b.batch_index,
        );
        const scored: Hypothesis[] = [];
        const outcomes: ScoredOutcome[] = [];
        for (const hypothesis of ordered) {
            const verdict = verdicts.get(hypothesis.id);
            if (!verdict || isInterrupted(verdict)) continue;
            scored.push(hypothesis);
            outcomes.push(this.analyst.score(hypothesis, verdict, this.objective, snapshot));
        }
        const interrupted = outcomes.length < hypotheses.length;
        if (interrupted) {
            log.warn({ kept: outcomes.length, discarded: hypotheses.length - outcomes.length }, "batch interrupted");
        }

        await this.commit(iteration, scored, outcomes, snapshot, !interrupted);
        return interrupted ? "interrupted" : "completed";
    }

    private async execute(
        iteration: number,
        hypotheses: readonly Hypothesis[],
        log: Logger,
    ): Promise<Map<string, ExecutionVerdict>> {
        const limits = limitsFromConfig(this.config);
        const limit = pLimit(this.config.max_parallel_experiments ?? os.availableParallelism());
        const verdicts = new Map<string, ExecutionVerdict>();

        await Promise.all(
            hypotheses.map((hypothesis) =>
                limit(async () => {
                    if (this.signal?.aborted) return;
                    const verdict = await this.sandbox.run(hypothesis, limits, { signal: this.signal });
                    verdicts.set(hypothesis.id, verdict);
                    log.info(
                        {
                            hypothesisId: hypothesis.id,
                            terminatedReason: verdict.terminated_reason,
                            exitCode: verdict.exit_code,
                            wallTimeMs: verdict.wall_time_ms,
                            peakMemoryMb: verdict.peak_memory_mb,
                            sandboxFault: verdict.sandbox_fault,
                        },
                        "experiment finished",
                    );
                    this.emit("experiment:complete", { iteration, hypothesis, verdict });
                }),
            ),
        );
        return verdicts;
    }

    /** UpdatingKnowledge then Checkpointing. */
    private async commit(
        iteration: number,
        hypotheses: readonly Hypothesis[],
        outcomes: readonly ScoredOutcome[],
        snapshot: KnowledgeSnapshot,
        completed: boolean,
    ): Promise<void> {
        const log = this.logger.child({ iteration });

        this.transition("updating_knowledge");
        const merges = this.knowledge.commitBatch(hypotheses, outcomes);
        this.knowledge.recordUsage(snapshot.entries.map((e) => e.id));
        outcomes.forEach((outcome, i) => {
            const merge = merges[i];
            log.info(
                {
                    hypothesisId: outcome.hypothesis_id,
                    classification: outcome.classification,
                    quality: outcome.quality,
                    disposition: merge?.disposition,
                },
                outcome.insight,
            );
            this.emit("outcome:scored", { iteration, outcome, merge });
        });

        this.transition("checkpointing");
        const previous = this.requireCheckpoint();
        const next: CheckpointBody = {
            ...previous,
            iteration: completed ? iteration : previous.iteration,
            total_experiments: previous.total_experiments + outcomes.length,
            elapsed_research_ms: this.elapsed(),
            knowledge_store_reference: { path: this.knowledge.path, clock: this.knowledge.clock },
            last_outcome_id: outcomes.at(-1)?.id ?? previous.last_outcome_id,
            updated_at: new Date().toISOString(),
        };
        await this.checkpoints.save(next);
        this.checkpoint = next;

        if (completed) {
            const summary = summarizeIteration(outcomes);
            log.info({ experiments: next.total_experiments }, `iteration ${iteration}: ${summary}`);
            this.emit("iteration:complete", { iteration, outcomes: [...outcomes], summary });
        }
    }

    /**
     * Enter Terminated: persist the final checkpoint and the report.
     * `persist` is false when the stored state must be left untouched.
     */
    private async finish(
        termination: { reason: TerminationReason; fatal: boolean; detail: string | null },
        persist = true,
    ): Promise<TerminationReport> {
        this.transition("terminated");
        let reportPath: string | null = null;
        const checkpoint = this.checkpoint;

        if (persist && checkpoint) {
            const final: CheckpointBody = {
                ...checkpoint,
                elapsed_research_ms: this.elapsed(),
                status: "terminated",
                termination,
                updated_at: new Date().toISOString(),
            };
            try {
                await this.checkpoints.save(final);
                this.checkpoint = final;
                if (this.shouldWriteReport) {
                    const content = renderReport({
                        checkpoint: final,
                        discoveries: this.knowledge.bestOutcomes(this.objective, TOP_DISCOVERIES),
                        knowledge: this.knowledge.summarize(this.objective),
                    });
                    reportPath = await writeReport(this.workspaceDir, content);
                }
            } catch (err) {
                if (!(err instanceof PersistenceFailureError)) throw err;
                // Already terminating; the report below carries the original reason.
                this.logger.error({ err }, "could not persist final research state");
            }
        }

        const final = this.checkpoint;
        const report: TerminationReport = {
            objective: this.objective,
            ...termination,
            iterations: final?.iteration ?? 0,
            total_experiments: final?.total_experiments ?? 0,
            elapsed_research_ms: final?.elapsed_research_ms ?? 0,
            last_outcome_id: final?.last_outcome_id ?? null,
            report_path: reportPath,
        };
        const level = termination.fatal ? "error" : "info";
        this.logger[level](
            { reason: termination.reason, iterations: report.iterations, experiments: report.total_experiments },
            "research terminated",
        );
        this.emit("terminated", report);
        return report;
    }

    // --- Helpers ---

    private transition(to: LoopState): void {
        const from = this.state;
        this.state = to;
        this.emit("state:change", { from, to, iteration: this.currentIteration });
    }

    private elapsed(): number {
        return this.elapsedBefore + Math.max(0, this.clock() - this.sessionStart);
    }

    private requireCheckpoint(): CheckpointBody {
        if (!this.checkpoint) throw new Error("Orchestrator has no checkpoint loaded");
        return this.checkpoint;
    }
}

function isInterrupted(verdict: ExecutionVerdict): boolean {
    return verdict.terminated_reason === "crashed" && verdict.diagnostic === INTERRUPTED_DIAGNOSTIC;
}
