/**
 * Research Report — Markdown summary written when the loop terminates.
 */
import fs from "fs/promises";
import path from "path";
import { PersistenceFailureError } from "../errors/index.js";
import { formatNumber } from "../agents/evaluation.js";
import type { Checkpoint, CheckpointBody } from "../schemas/checkpoint.js";
import type { ScoredOutcome } from "../schemas/outcome.js";
import type { KnowledgeSummary } from "../memory/cognition.js";

export const REPORT_FILE = "research_report.md";
/** Best outcomes listed under "Top discoveries". */
export const TOP_DISCOVERIES = 5;

export interface ReportInput {
    checkpoint: Checkpoint | CheckpointBody;
    /** Best outcomes first. */
    discoveries: readonly ScoredOutcome[];
    knowledge: KnowledgeSummary;
}

export function renderReport({ checkpoint, discoveries, knowledge }: ReportInput): string {
    const counts = knowledge.outcomes.byClassification;
    const status = checkpoint.termination
        ? `${checkpoint.status} (${checkpoint.termination.reason}${checkpoint.termination.detail ? `: ${checkpoint.termination.detail}` : ""})`
        : checkpoint.status;

    const lines = [
        `# Research report: ${checkpoint.objective}`,
        "",
        `- Status: ${status}`,
        `- Iterations completed: ${checkpoint.iteration}`,
        `- Experiments run: ${checkpoint.total_experiments}`,
        `- Research time: ${formatNumber(Math.round(checkpoint.elapsed_research_ms / 100) / 10)}s`,
        `- Outcomes: ${counts.success} success, ${counts.partial} partial, ${counts.failure} failure, ${counts.inconclusive} inconclusive`,
        "",
        "## Top discoveries",
        "",
    ];

    if (discoveries.length === 0) {
        lines.push("_No positive results yet._");
    } else {
        discoveries.forEach((outcome, i) => {
            lines.push(
                `${i + 1}. **${outcome.title}** (${outcome.classification}, quality ${formatNumber(outcome.quality)}): ${outcome.insight}`,
            );
        });
    }

    const { created, strengthened, discarded } = knowledge.dispositions;
    lines.push(
        "",
        "## Knowledge",
        "",
        `- Active entries: ${knowledge.entries.active} (${knowledge.entries.consolidated} consolidated)`,
        `- Merges: ${created} created, ${strengthened} strengthened, ${discarded} discarded`,
    );

    if (knowledge.mostUsed.length > 0) {
        lines.push("", "### Most used insights", "");
        for (const entry of knowledge.mostUsed) {
            lines.push(`- ${entry.insight} (used ${entry.usage_count}x, support ${entry.support_count})`);
        }
    }

    return lines.join("\n") + "\n";
}

/** Write the report into the workspace and return its path. */
export async function writeReport(workspaceDir: string, content: string): Promise<string> {
    const target = path.join(workspaceDir, REPORT_FILE);
    try {
        await fs.writeFile(target, content, "utf-8");
    } catch (err) {
        throw new PersistenceFailureError("write report", target, { cause: err });
    }
    return target;
}
