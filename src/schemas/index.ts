/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Configuration
export { ResearchConfig, LLMSettings, LLMProviderName, limitsFromConfig } from "./config.js";
export type { ResourceLimits } from "./config.js";

// Hypotheses
export {
    ExperimentLanguage,
    EvaluationProcedure,
    SweepValue,
    CodeExperiment,
    ParameterSweep,
    Hypothesis,
    HypothesisDraft,
    HypothesisDraftBatch,
} from "./hypothesis.js";

// Execution
export { TerminatedReason, ExecutionVerdict } from "./verdict.js";
export { Classification, ScoredOutcome, isPositive } from "./outcome.js";

// Knowledge
export { KnowledgeEntry } from "./knowledge.js";
export type { KnowledgeSnapshot } from "./knowledge.js";

// Checkpoint
export {
    CHECKPOINT_VERSION,
    TerminationReason,
    Termination,
    KnowledgeStoreReference,
    CheckpointBody,
    Checkpoint,
} from "./checkpoint.js";
