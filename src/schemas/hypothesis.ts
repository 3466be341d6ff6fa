/**
 * Hypothesis Schemas — Executable experiment candidates.
 *
 * A hypothesis is a tagged variant on `kind`; every kind shares one
 * execution contract (the sandbox materialises it into a single program).
 */
import { z } from "zod/v4";

export const ExperimentLanguage = z.enum(["javascript", "python"]);
export type ExperimentLanguage = z.infer<typeof ExperimentLanguage>;

/**
 * How the Analyst turns a completed run into a classification.
 * All procedures read the program's result record: the last stdout line
 * that parses as a JSON object.
 */
export const EvaluationProcedure = z.discriminatedUnion("type", [
    z.object({
        type: z.literal("metric"),
        /** Looked up under `metrics.<name>` first, then at the top level. */
        metric: z.string().min(1),
        goal: z.enum(["maximize", "minimize"]),
        /** Value the metric must reach for `success`; otherwise `partial`. */
        threshold: z.number().optional(),
    }),
    z.object({
        type: z.literal("property"),
        key: z.string().min(1),
        equals: z.unknown(),
    }),
    z.object({
        type: z.literal("exit_status"),
    }),
]);
export type EvaluationProcedure = z.infer<typeof EvaluationProcedure>;

export const SweepValue = z.union([z.number(), z.string()]);
export type SweepValue = z.infer<typeof SweepValue>;

const HypothesisBase = z.object({
    id: z.string().min(1),
    objective: z.string().min(1),
    title: z.string().min(1),
    rationale: z.string().default(""),
    expected_outcome: z.string().default(""),
    language: ExperimentLanguage,
    code: z.string().min(1),
    evaluation: EvaluationProcedure,
    source: z.enum(["llm", "mutation"]).default("llm"),
    /** Position within the batch; with created_at it fixes the processing order. */
    batch_index: z.number().int().nonnegative(),
    /** sha256 over the normalised code (and sweep values). */
    code_hash: z.string().min(1),
    created_at: z.string(),
});

export const CodeExperiment = HypothesisBase.extend({
    kind: z.literal("code_experiment"),
});
export type CodeExperiment = z.infer<typeof CodeExperiment>;

export const ParameterSweep = HypothesisBase.extend({
    kind: z.literal("parameter_sweep"),
    parameter: z.string().min(1),
    values: z.array(SweepValue).min(1),
});
export type ParameterSweep = z.infer<typeof ParameterSweep>;

export const Hypothesis = z.discriminatedUnion("kind", [CodeExperiment, ParameterSweep]);
export type Hypothesis = z.infer<typeof Hypothesis>;

/**
 * What the reasoning backend is asked to produce for each hypothesis.
 * Identity, hashing and timestamps are added by the Researcher.
 */
export const HypothesisDraft = z.object({
    kind: z.enum(["code_experiment", "parameter_sweep"]).default("code_experiment"),
    title: z.string().min(1),
    rationale: z.string().default(""),
    expected_outcome: z.string().default(""),
    language: ExperimentLanguage.default("javascript"),
    code: z.string().min(1),
    evaluation: EvaluationProcedure,
    parameter: z.string().min(1).optional(),
    values: z.array(SweepValue).min(1).optional(),
    /** Title of the successful experiment this draft varies. */
    variation_of: z.string().min(1).optional(),
}).refine(
    (draft) => draft.kind !== "parameter_sweep" || (draft.parameter !== undefined && draft.values !== undefined),
    { message: "parameter_sweep drafts need both `parameter` and `values`" },
);
export type HypothesisDraft = z.infer<typeof HypothesisDraft>;

export const HypothesisDraftBatch = z.object({
    hypotheses: z.array(HypothesisDraft).min(1),
});
export type HypothesisDraftBatch = z.infer<typeof HypothesisDraftBatch>;
