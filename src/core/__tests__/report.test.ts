/**
 * Report Tests — Markdown rendering of the research summary.
 */
import { describe, it, expect } from "vitest";
import { renderReport } from "../report.js";
import { initialCheckpoint } from "../checkpoint.js";
import { ScoredOutcome } from "../../schemas/outcome.js";
import type { KnowledgeSummary } from "../../memory/cognition.js";

// --- Helpers ---

const OBJECTIVE = "sort an array";

const checkpoint = {
    ...initialCheckpoint(OBJECTIVE, { path: "knowledge.db", clock: 3 }, new Date("2026-03-01T00:00:00.000Z")),
    iteration: 1,
    total_experiments: 3,
    elapsed_research_ms: 12_340,
    status: "terminated" as const,
    termination: { reason: "iteration_budget" as const, fatal: false, detail: null },
};

function emptySummary(): KnowledgeSummary {
    return {
        objective: OBJECTIVE,
        clock: 3,
        outcomes: { total: 3, byClassification: { success: 1, partial: 0, failure: 2, inconclusive: 0 } },
        entries: { active: 2, consolidated: 0 },
        dispositions: { created: 2, strengthened: 0, discarded: 1 },
        mostUsed: [],
    };
}

function quicksort(): ScoredOutcome {
    return ScoredOutcome.parse({
        id: "outcome-h1",
        hypothesis_id: "h1",
        objective: OBJECTIVE,
        verdict: {
            hypothesis_id: "h1",
            exit_code: 0,
            signal: null,
            stdout: "",
            stderr: "",
            stdout_truncated: false,
            stderr_truncated: false,
            peak_memory_mb: null,
            wall_time_ms: 10,
            terminated_reason: "completed",
            sandbox_fault: false,
            diagnostic: null,
            started_at: "2026-03-01T00:00:00.000Z",
        },
        classification: "success",
        quality: 0.9,
        insight: '"Quicksort" succeeded: ops = 0.9 (maximize).',
        failure_signature: null,
        code_hash: "hash-1",
        title: "Quicksort",
        created_at: "2026-03-01T00:00:00.010Z",
    });
}

// --- Tests ---

describe("renderReport()", () => {
    it("renders the header, discoveries and knowledge summary", () => {
        const report = renderReport({ checkpoint, discoveries: [quicksort()], knowledge: emptySummary() });

        expect(report.split("\n")).toEqual([
            "# Research report: sort an array",
            "",
            "- Status: terminated (iteration_budget)",
            "- Iterations completed: 1",
            "- Experiments run: 3",
            "- Research time: 12.3s",
            "- Outcomes: 1 success, 0 partial, 2 failure, 0 inconclusive",
            "",
            "## Top discoveries",
            "",
            '1. **Quicksort** (success, quality 0.9): "Quicksort" succeeded: ops = 0.9 (maximize).',
            "",
            "## Knowledge",
            "",
            "- Active entries: 2 (0 consolidated)",
            "- Merges: 2 created, 0 strengthened, 1 discarded",
            "",
        ]);
    });

    it("says so when nothing has succeeded yet", () => {
        const report = renderReport({ checkpoint, discoveries: [], knowledge: emptySummary() });
        expect(report).toContain("## Top discoveries\n\n_No positive results yet._\n");
    });
});
