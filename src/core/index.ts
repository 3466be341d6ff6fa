export {
    CHECKPOINT_FILE,
    CheckpointStore,
    canonicalJson,
    checksumOf,
    initialCheckpoint,
    planNextStep,
    sealCheckpoint,
} from "./checkpoint.js";
export type { KnowledgeVerifier, LoopBudgets, NextStep } from "./checkpoint.js";
export { REPORT_FILE, TOP_DISCOVERIES, renderReport, writeReport } from "./report.js";
export type { ReportInput } from "./report.js";
export { backoffDelay, sleep, withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";
export { mean, normalize, percent, relativeGain } from "./statistics.js";
