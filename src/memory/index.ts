export { CognitionBase, RECENCY_DECAY } from "./cognition.js";
export type { CognitionBaseOptions, KnowledgeSummary, MergeResult } from "./cognition.js";
export { ResearchDatabase } from "./sqlite.js";
export type { LedgerRecord, MergeDisposition, Migration, OutcomeCounts } from "./sqlite.js";
export { findingStatement, jaccard, objectiveRelevance, textSimilarity, tokenize } from "./similarity.js";
