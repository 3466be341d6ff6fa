/**
 * Knowledge Entry — A durable, generalised insight derived from outcomes.
 */
import { z } from "zod/v4";
import { Classification } from "./outcome.js";

export const KnowledgeEntry = z.object({
    id: z.string().min(1),
    objective: z.string().min(1),
    /** `finding` entries come from outcomes; `summary` entries from consolidation. */
    kind: z.enum(["finding", "summary"]),
    polarity: z.enum(["positive", "negative"]),
    classification: Classification,
    insight: z.string(),
    failure_signature: z.string().nullable(),
    /** Supporting outcome ids; every id exists in the outcome history. */
    evidence: z.array(z.string()),
    support_count: z.number().int().nonnegative(),
    best_quality: z.number(),
    usage_count: z.number().int().nonnegative(),
    /** Recomputed ranking weight, as of the last retrieval or merge. */
    relevance: z.number(),
    status: z.enum(["active", "consolidated"]),
    consolidated_into: z.string().nullable(),
    /** Insertion order; breaks ranking ties (earliest first). */
    seq: z.number().int().nonnegative(),
    /** Logical clock value at the last strengthening; drives recency decay. */
    updated_clock: z.number().int().nonnegative(),
    created_at: z.string(),
    updated_at: z.string(),
});
export type KnowledgeEntry = z.infer<typeof KnowledgeEntry>;

/** Read-only view of the store handed to the Researcher and Analyst. */
export interface KnowledgeSnapshot {
    objective: string;
    /** Logical clock of the store when the snapshot was taken. */
    clock: number;
    /** Highest quality of any positive outcome for the objective, null before the first one. */
    best_quality: number | null;
    /** Top-ranked entries, most relevant first. */
    entries: KnowledgeEntry[];
}
