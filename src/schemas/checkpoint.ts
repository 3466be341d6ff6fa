/**
 * Checkpoint — The orchestrator's resumable state, persisted as JSON.
 */
import { z } from "zod/v4";

export const CHECKPOINT_VERSION = 1;

export const TerminationReason = z.enum([
    "iteration_budget",
    "time_budget",
    "interrupted",
    "generation_unavailable",
    "persistence_failure",
    "corrupt_state",
]);
export type TerminationReason = z.infer<typeof TerminationReason>;

export const Termination = z.object({
    reason: TerminationReason,
    fatal: z.boolean(),
    detail: z.string().nullable(),
});
export type Termination = z.infer<typeof Termination>;

export const KnowledgeStoreReference = z.object({
    path: z.string().min(1),
    /** Store clock after the last committed batch. */
    clock: z.number().int().nonnegative(),
});
export type KnowledgeStoreReference = z.infer<typeof KnowledgeStoreReference>;

export const CheckpointBody = z.object({
    version: z.literal(CHECKPOINT_VERSION),
    objective: z.string().min(1),
    /** Number of fully completed iterations. */
    iteration: z.number().int().nonnegative(),
    total_experiments: z.number().int().nonnegative(),
    elapsed_research_ms: z.number().nonnegative(),
    knowledge_store_reference: KnowledgeStoreReference,
    last_outcome_id: z.string().nullable(),
    status: z.enum(["running", "terminated"]),
    termination: Termination.nullable(),
    updated_at: z.string(),
});
export type CheckpointBody = z.infer<typeof CheckpointBody>;

export const Checkpoint = CheckpointBody.extend({
    /** sha256 over the canonical JSON of every other field. */
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
});
export type Checkpoint = z.infer<typeof Checkpoint>;
