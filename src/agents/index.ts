/**
 * Agents barrel export.
 */
export { Researcher, RESEARCHER_INSTRUCTIONS, codeHash, parseDrafts, referencesNetwork, variationBase } from "./researcher.js";
export type { ProposeOptions, ResearcherOptions } from "./researcher.js";

export { Analyst, normalizeDiagnosticLine, outcomeIdFor, summarizeIteration } from "./analyst.js";
export type { AnalystOptions } from "./analyst.js";

export { evaluate, formatNumber, lookupPath, parseResultRecord } from "./evaluation.js";
export type { EvaluationResult, ResultRecord } from "./evaluation.js";
