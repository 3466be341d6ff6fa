/**
 * Scored Outcome — A verdict paired with the Analyst's judgement.
 */
import { z } from "zod/v4";
import { ExecutionVerdict } from "./verdict.js";

export const Classification = z.enum(["success", "partial", "failure", "inconclusive"]);
export type Classification = z.infer<typeof Classification>;

export const ScoredOutcome = z.object({
    id: z.string().min(1),
    hypothesis_id: z.string().min(1),
    objective: z.string().min(1),
    verdict: ExecutionVerdict,
    classification: Classification,
    /** Higher is better; comparable only within one objective. */
    quality: z.number(),
    insight: z.string(),
    /** Merge key for negative outcomes: terminated reason plus first diagnostic line. */
    failure_signature: z.string().nullable(),
    /** Mirrors the hypothesis so repeats can be detected without joining. */
    code_hash: z.string().min(1),
    title: z.string(),
    created_at: z.string(),
});
export type ScoredOutcome = z.infer<typeof ScoredOutcome>;

export function isPositive(classification: Classification): boolean {
    return classification === "success" || classification === "partial";
}
