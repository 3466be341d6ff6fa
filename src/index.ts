/**
 * Research Loop — Public API
 *
 * An autonomous research loop: a reasoning backend drafts hypotheses, a
 * sandbox runs them as experiments, an analyst scores the results and a
 * knowledge store folds them into what the next iteration is told.
 */

// Orchestration
export { ResearchOrchestrator } from "./orchestrator.js";
export type {
    HypothesisSource,
    LoopState,
    OrchestratorEvents,
    ResearchOrchestratorOptions,
    TerminationReport,
} from "./orchestrator.js";

// Core
export {
    CHECKPOINT_FILE,
    CheckpointStore,
    initialCheckpoint,
    planNextStep,
    REPORT_FILE,
    TOP_DISCOVERIES,
    renderReport,
    writeReport,
    withRetry,
    backoffDelay,
} from "./core/index.js";
export type { KnowledgeVerifier, LoopBudgets, NextStep, ReportInput, RetryOptions } from "./core/index.js";

// Agents
export { Researcher, Analyst, evaluate, formatNumber, summarizeIteration } from "./agents/index.js";
export type { AnalystOptions, ProposeOptions, ResearcherOptions, EvaluationResult } from "./agents/index.js";

// Sandbox
export { ProcessSandbox, INTERRUPTED_DIAGNOSTIC, RUNTIMES } from "./sandbox/index.js";
export type { Sandbox, SandboxRunOptions, ProcessSandboxOptions } from "./sandbox/index.js";

// Memory
export { CognitionBase, ResearchDatabase } from "./memory/index.js";
export type { CognitionBaseOptions, KnowledgeSummary, MergeResult } from "./memory/index.js";

// Schemas
export {
    // Configuration
    ResearchConfig,
    LLMSettings,
    limitsFromConfig,
    // Hypotheses
    Hypothesis,
    HypothesisDraft,
    CodeExperiment,
    ParameterSweep,
    EvaluationProcedure,
    // Execution
    ExecutionVerdict,
    ScoredOutcome,
    Classification,
    // Knowledge
    KnowledgeEntry,
    // Checkpoint
    Checkpoint,
    CheckpointBody,
    TerminationReason,
} from "./schemas/index.js";
export type { KnowledgeSnapshot, ResourceLimits } from "./schemas/index.js";

// LLM
export { LLMClient, resolveLanguageModel, hasCredentials } from "./llm/index.js";
export type { CompleteOptions, ReasoningBackend } from "./llm/index.js";

// Logging
export { createResearchLogger, createSilentLogger, flushLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

// Errors
export {
    GenerationUnavailableError,
    SandboxFaultError,
    PersistenceFailureError,
    CorruptStateError,
    ObjectiveMismatchError,
    InvalidConfigError,
} from "./errors/index.js";
