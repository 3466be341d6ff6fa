/**
 * Analyst — The deterministic experiment scorer.
 *
 * Turns a hypothesis and its verdict into a ScoredOutcome. Anything other
 * than a completed run is a `failure`; completed runs are judged by the
 * hypothesis's own evaluation procedure, and output that procedure cannot
 * read is `inconclusive`.
 *
 * No clock, no randomness: the outcome id derives from the hypothesis id
 * and the timestamp from the verdict, so identical inputs score identically.
 */
import type { Hypothesis } from "../schemas/hypothesis.js";
import type { ExecutionVerdict } from "../schemas/verdict.js";
import type { KnowledgeSnapshot } from "../schemas/knowledge.js";
import { isPositive, type Classification, type ScoredOutcome } from "../schemas/outcome.js";
import { NEGATIVE_QUALITY, evaluate, formatNumber } from "./evaluation.js";
import { mean, percent, relativeGain } from "../core/statistics.js";

export interface AnalystOptions {
    /** Relative gain over the best known quality that counts as an improvement. */
    improvementThreshold?: number;
}

const MAX_SIGNATURE_LENGTH = 160;

/** Outcome ids are derived, so re-scoring a hypothesis yields the same id. */
export function outcomeIdFor(hypothesisId: string): string {
    return `outcome-${hypothesisId}`;
}

/**
 * First meaningful line of a diagnostic, with paths and numbers masked so
 * the same failure in two runs produces the same text.
 */
export function normalizeDiagnosticLine(text: string): string {
    return diagnosticLine(text)
        .replace(/(file:\/\/)?\/[^\s:'"()]+/g, "<path>")
        .toLowerCase()
        .replace(/\d+/g, "N")
        .replace(/\s+/g, " ")
        .slice(0, MAX_SIGNATURE_LENGTH);
}

/** The line naming the error (e.g. `TypeError: ...`), else the first non-empty line. */
function diagnosticLine(text: string): string {
    const lines = text.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
    return lines.find((l) => /^[\w.]*(Error|Exception)\b/.test(l)) ?? lines[0] ?? "";
}

export class Analyst {
    private readonly improvementThreshold: number;

    constructor(options: AnalystOptions = {}) {
        this.improvementThreshold = options.improvementThreshold ?? 0.05;
    }

    score(
        hypothesis: Hypothesis,
        verdict: ExecutionVerdict,
        objective: string,
        snapshot: KnowledgeSnapshot,
    ): ScoredOutcome {
        const base = {
            id: outcomeIdFor(hypothesis.id),
            hypothesis_id: hypothesis.id,
            objective,
            verdict,
            code_hash: hypothesis.code_hash,
            title: hypothesis.title,
            created_at: new Date(Date.parse(verdict.started_at) + verdict.wall_time_ms).toISOString(),
        };

        if (verdict.terminated_reason !== "completed") {
            return {
                ...base,
                classification: "failure",
                quality: NEGATIVE_QUALITY,
                insight: this.explainFailure(hypothesis, verdict),
                failure_signature: this.failureSignature(verdict),
            };
        }

        const result = evaluate(hypothesis.evaluation, verdict.stdout);
        if (result.status === "unparseable") {
            return {
                ...base,
                classification: "inconclusive",
                quality: NEGATIVE_QUALITY,
                insight: `"${hypothesis.title}" completed but its output could not be evaluated: ${result.reason}.`,
                failure_signature: `inconclusive:${normalizeDiagnosticLine(result.reason)}`,
            };
        }

        const verb = result.classification === "success" ? "succeeded" : "partially succeeded";
        const insight = `"${hypothesis.title}" ${verb}: ${result.observation}.`
            + (result.classification === "success" ? this.compareWithBest(result.quality, objective, snapshot) : "");

        return {
            ...base,
            classification: result.classification,
            quality: result.quality,
            insight,
            failure_signature: null,
        };
    }

    /** Merge key for negative outcomes: the terminated reason plus the first diagnostic line. */
    failureSignature(verdict: ExecutionVerdict): string {
        switch (verdict.terminated_reason) {
            case "crashed":
                return `crashed:${normalizeDiagnosticLine(verdict.stderr || verdict.diagnostic || "")}`;
            default:
                return `${verdict.terminated_reason}:${normalizeDiagnosticLine(verdict.diagnostic ?? "")}`;
        }
    }

    private explainFailure(hypothesis: Hypothesis, verdict: ExecutionVerdict): string {
        const title = `"${hypothesis.title}"`;
        switch (verdict.terminated_reason) {
            case "timeout":
                return `${title} timed out (${verdict.diagnostic ?? "wall-clock limit"}); the approach is too slow at this input size, so try smaller inputs or a lower-complexity algorithm.`;
            case "memory_exceeded":
                return `${title} exceeded the memory ceiling; reduce the data size or process it incrementally.`;
            case "blocked_network_access":
                return `${title} tried to reach the network, which experiments cannot do; embed or synthesise the data inline.`;
            case "crashed": {
                if (verdict.sandbox_fault) {
                    return `${title} could not be run by the sandbox: ${verdict.diagnostic ?? "unknown fault"}.`;
                }
                const detail = diagnosticLine(verdict.stderr) || verdict.diagnostic || "no diagnostic output";
                return `${title} crashed: ${detail}.`;
            }
            case "completed":
                return `${title} completed.`;
        }
    }

    private compareWithBest(quality: number, objective: string, snapshot: KnowledgeSnapshot): string {
        const best = snapshot.objective === objective ? snapshot.best_quality : null;
        if (best === null) return " First positive result for this objective.";

        const gain = relativeGain(quality, best);
        if (gain > this.improvementThreshold) {
            return ` Improves on the best known quality ${formatNumber(best)} by ${percent(gain)}.`;
        }
        return ` Does not improve on the best known quality ${formatNumber(best)}.`;
    }
}

/**
 * Deterministic one-line summary of a scored batch.
 */
export function summarizeIteration(outcomes: readonly ScoredOutcome[]): string {
    if (outcomes.length === 0) return "0 experiments scored";

    const counts: Record<Classification, number> = { success: 0, partial: 0, failure: 0, inconclusive: 0 };
    for (const outcome of outcomes) counts[outcome.classification]++;

    const positive = outcomes.filter((o) => isPositive(o.classification));
    const parts = [
        `${outcomes.length} experiments: ${counts.success} success, ${counts.partial} partial, ${counts.failure} failure, ${counts.inconclusive} inconclusive`,
        `success rate ${percent(counts.success / outcomes.length)}`,
    ];
    if (positive.length > 0) {
        const best = positive.reduce((a, b) => (b.quality > a.quality ? b : a));
        parts.push(`best "${best.title}" (quality ${formatNumber(best.quality)})`);
        parts.push(`mean quality ${formatNumber(mean(positive.map((o) => o.quality)))}`);
    }
    return parts.join("; ");
}
