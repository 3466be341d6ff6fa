/**
 * Cognition Base — The knowledge store that conditions new hypotheses.
 *
 * Scored outcomes are merged into knowledge entries: a new finding is
 * created, an existing positive finding is strengthened by a corroborating
 * outcome, or a repeat of a known failure mode is discarded. Once an
 * objective holds more active entries than its capacity, the lowest-ranked
 * findings are folded into one summary entry per polarity. Entries are
 * marked consolidated, never deleted.
 *
 * All mutations go through SQLite transactions; `retrieve()` is read-only.
 */
import type { Logger } from "../logging/logger.js";
import { createSilentLogger } from "../logging/logger.js";
import { PersistenceFailureError } from "../errors/index.js";
import { normalize } from "../core/statistics.js";
import { NEGATIVE_QUALITY, formatNumber } from "../agents/evaluation.js";
import type { ResearchConfig } from "../schemas/config.js";
import type { Hypothesis } from "../schemas/hypothesis.js";
import type { KnowledgeEntry, KnowledgeSnapshot } from "../schemas/knowledge.js";
import { isPositive, type Classification, type ScoredOutcome } from "../schemas/outcome.js";
import { ResearchDatabase, type MergeDisposition, type OutcomeCounts } from "./sqlite.js";
import { findingStatement, objectiveRelevance, textSimilarity } from "./similarity.js";

/** Per-tick multiplier applied to an entry's weight since it was last strengthened. */
export const RECENCY_DECAY = 0.97;
const USAGE_WEIGHT = 0.05;
const USAGE_CAP = 10;
const SUMMARY_VALUE = 0.3;
const NEGATIVE_VALUE = 0.25;
/** Consolidation brings the active set down to this share of capacity. */
const CONSOLIDATION_TARGET = 0.75;
const SUMMARY_EXAMPLES = 3;

export interface CognitionBaseOptions {
    /** SQLite file; defaults to an in-memory database. */
    path?: string;
    /** Active entries per objective before consolidation. */
    capacity?: number;
    similarityThreshold?: number;
    minObjectiveRelevance?: number;
    maxEvidencePerEntry?: number;
    logger?: Logger;
}

export interface MergeResult {
    outcomeId: string;
    disposition: MergeDisposition;
    /** The created or strengthened entry; null when the outcome was discarded. */
    entry: KnowledgeEntry | null;
    /** True when the outcome had already been merged and nothing changed. */
    replayed: boolean;
}

export interface KnowledgeSummary {
    objective: string;
    clock: number;
    outcomes: OutcomeCounts;
    entries: { active: number; consolidated: number };
    dispositions: Record<MergeDisposition, number>;
    mostUsed: KnowledgeEntry[];
}

type Polarity = KnowledgeEntry["polarity"];

interface QualityRange {
    min: number;
    max: number;
}

export class CognitionBase {
    public readonly path: string;

    private readonly db: ResearchDatabase;
    private readonly capacity: number;
    private readonly similarityThreshold: number;
    private readonly minObjectiveRelevance: number;
    private readonly maxEvidencePerEntry: number;
    private readonly logger: Logger;

    constructor(options: CognitionBaseOptions = {}) {
        this.path = options.path ?? ":memory:";
        this.capacity = options.capacity ?? 500;
        this.similarityThreshold = options.similarityThreshold ?? 0.8;
        this.minObjectiveRelevance = options.minObjectiveRelevance ?? 0.2;
        this.maxEvidencePerEntry = options.maxEvidencePerEntry ?? 20;
        this.logger = (options.logger ?? createSilentLogger()).child({ component: "cognition" });
        try {
            this.db = new ResearchDatabase(this.path);
        } catch (err) {
            throw new PersistenceFailureError("open", this.path, { cause: err });
        }
    }

    static fromConfig(config: ResearchConfig, path: string, logger?: Logger): CognitionBase {
        return new CognitionBase({
            path,
            capacity: config.knowledge_capacity,
            similarityThreshold: config.similarity_threshold,
            minObjectiveRelevance: config.min_objective_relevance,
            maxEvidencePerEntry: config.max_evidence_per_entry,
            logger,
        });
    }

    get clock(): number {
        return this.guard("read clock", () => this.db.clock);
    }

    // --- Retrieval ---

    /**
     * Top `k` active entries for the objective, best first. Ties go to the
     * earlier entry. Pure: calling it twice without a merge in between
     * returns the same sequence.
     */
    retrieve(objective: string, k: number): KnowledgeEntry[] {
        if (k <= 0) return [];
        return this.guard("retrieve", () => {
            const entries = this.db.activeEntries();
            const clock = this.db.clock;
            const ranges = qualityRanges(entries);

            const ranked: KnowledgeEntry[] = [];
            for (const entry of entries) {
                const relevance = this.relevanceOf(entry, objective, clock, ranges);
                if (relevance !== null) ranked.push({ ...entry, relevance });
            }
            ranked.sort((a, b) => b.relevance - a.relevance || a.seq - b.seq);
            return ranked.slice(0, k);
        });
    }

    /** Read-only view handed to the Researcher and Analyst. */
    snapshot(objective: string, k: number): KnowledgeSnapshot {
        const entries = this.retrieve(objective, k);
        return this.guard("snapshot", () => ({
            objective,
            clock: this.db.clock,
            best_quality: this.db.bestQuality(objective),
            entries,
        }));
    }

    // --- Merging ---

    /**
     * Fold one scored outcome into the store. Merging an outcome that was
     * already merged is a no-op that returns the original disposition.
     */
    merge(outcome: ScoredOutcome): KnowledgeEntry | null {
        return this.guard("merge", () => this.db.transaction(() => this.mergeOne(outcome))).entry;
    }

    /**
     * Record a scored batch and merge it, in the given order, as one transaction.
     */
    commitBatch(hypotheses: readonly Hypothesis[], outcomes: readonly ScoredOutcome[]): MergeResult[] {
        return this.guard("commit batch", () =>
            this.db.transaction(() => {
                for (const hypothesis of hypotheses) this.db.insertHypothesis(hypothesis);
                return outcomes.map((outcome) => this.mergeOne(outcome));
            }),
        );
    }

    /** Count a retrieval of these entries towards their usage weight. */
    recordUsage(ids: readonly string[]): void {
        if (ids.length === 0) return;
        this.guard("record usage", () => this.db.transaction(() => this.db.incrementUsage(ids)));
    }

    private mergeOne(outcome: ScoredOutcome): MergeResult {
        const previous = this.db.getLedger(outcome.id);
        if (previous) {
            const entry = previous.disposition === "discarded" || previous.entry_id === null
                ? null
                : this.db.getEntry(previous.entry_id) ?? null;
            return { outcomeId: outcome.id, disposition: previous.disposition, entry, replayed: true };
        }

        this.db.insertOutcome(outcome);
        const clock = this.db.tick();
        const active = this.db.activeEntries(outcome.objective);
        const polarity: Polarity = isPositive(outcome.classification) ? "positive" : "negative";

        let result: MergeResult;
        if (polarity === "negative") {
            const known = active.find(
                (e) => e.kind === "finding" && e.polarity === "negative" && e.failure_signature === outcome.failure_signature,
            );
            if (known) {
                this.db.recordLedger({ outcome_id: outcome.id, entry_id: known.id, disposition: "discarded", clock });
                this.logger.debug({ outcomeId: outcome.id, entryId: known.id }, "discarded repeat of a known failure mode");
                return { outcomeId: outcome.id, disposition: "discarded", entry: null, replayed: false };
            }
            result = this.create(outcome, polarity, clock);
        } else {
            const corroborated = this.findCorroborated(active, outcome);
            result = corroborated ? this.strengthen(corroborated, outcome, clock) : this.create(outcome, polarity, clock);
        }

        this.consolidate(outcome.objective, clock, outcome.created_at);
        const entry = result.entry ? this.db.getEntry(result.entry.id) ?? null : null;
        return { ...result, entry };
    }

    private findCorroborated(active: readonly KnowledgeEntry[], outcome: ScoredOutcome): KnowledgeEntry | undefined {
        const statement = findingStatement(outcome.insight);
        let best: { entry: KnowledgeEntry; similarity: number } | undefined;
        for (const entry of active) {
            if (entry.kind !== "finding" || entry.polarity !== "positive") continue;
            const similarity = textSimilarity(statement, findingStatement(entry.insight));
            if (similarity >= this.similarityThreshold && (!best || similarity > best.similarity)) {
                best = { entry, similarity };
            }
        }
        return best?.entry;
    }

    private create(outcome: ScoredOutcome, polarity: Polarity, clock: number): MergeResult {
        const entry = this.db.insertEntry({
            id: `k-${outcome.id}`,
            objective: outcome.objective,
            kind: "finding",
            polarity,
            classification: outcome.classification,
            insight: outcome.insight,
            failure_signature: polarity === "negative" ? outcome.failure_signature : null,
            evidence: [outcome.id],
            support_count: 1,
            best_quality: polarity === "positive" ? outcome.quality : NEGATIVE_QUALITY,
            usage_count: 0,
            relevance: 0,
            status: "active",
            consolidated_into: null,
            updated_clock: clock,
            created_at: outcome.created_at,
            updated_at: outcome.created_at,
        });
        this.refreshRelevance(entry, clock);
        this.db.recordLedger({ outcome_id: outcome.id, entry_id: entry.id, disposition: "created", clock });
        this.logger.debug({ outcomeId: outcome.id, entryId: entry.id, polarity }, "created knowledge entry");
        return { outcomeId: outcome.id, disposition: "created", entry, replayed: false };
    }

    private strengthen(entry: KnowledgeEntry, outcome: ScoredOutcome, clock: number): MergeResult {
        const classification: Classification =
            entry.classification === "success" || outcome.classification === "success" ? "success" : "partial";
        const updated: KnowledgeEntry = {
            ...entry,
            classification,
            evidence: [...entry.evidence, outcome.id].slice(-this.maxEvidencePerEntry),
            support_count: entry.support_count + 1,
            best_quality: Math.max(entry.best_quality, outcome.quality),
            updated_clock: clock,
            updated_at: outcome.created_at,
        };
        this.db.updateEntry(updated);
        this.refreshRelevance(updated, clock);
        this.db.recordLedger({ outcome_id: outcome.id, entry_id: entry.id, disposition: "strengthened", clock });
        this.logger.debug({ outcomeId: outcome.id, entryId: entry.id }, "strengthened knowledge entry");
        return { outcomeId: outcome.id, disposition: "strengthened", entry: updated, replayed: false };
    }

    private refreshRelevance(entry: KnowledgeEntry, clock: number): void {
        const ranges = qualityRanges(this.db.activeEntries(entry.objective));
        const relevance = this.relevanceOf(entry, entry.objective, clock, ranges) ?? 0;
        this.db.updateEntry({ ...entry, relevance });
    }

    // --- Consolidation ---

    /**
     * Fold the lowest-ranked findings of an over-capacity objective into one
     * summary per polarity until at most 75% of capacity stays active.
     */
    private consolidate(objective: string, clock: number, timestamp: string): void {
        const active = this.db.activeEntries(objective);
        if (active.length <= this.capacity) return;

        const target = Math.floor(this.capacity * CONSOLIDATION_TARGET);
        const ranges = qualityRanges(active);
        const summaries = new Map<Polarity, KnowledgeEntry>();
        for (const entry of active) {
            if (entry.kind === "summary") summaries.set(entry.polarity, entry);
        }

        const candidates = active
            .filter((e) => e.kind === "finding")
            .map((entry) => ({ entry, score: this.relevanceOf(entry, objective, clock, ranges) ?? 0 }))
            .sort((a, b) => a.score - b.score || a.entry.seq - b.entry.seq);

        const folded = new Map<Polarity, KnowledgeEntry[]>();
        let remaining = active.length;
        for (const { entry } of candidates) {
            if (remaining <= target) break;
            const group = folded.get(entry.polarity) ?? [];
            if (!summaries.has(entry.polarity) && group.length === 0) remaining += 1;
            group.push(entry);
            folded.set(entry.polarity, group);
            remaining -= 1;
        }

        for (const [polarity, members] of folded) {
            const existing = summaries.get(polarity);
            const summary = existing ?? this.db.insertEntry({
                id: `summary-${polarity}-${clock}`,
                objective,
                kind: "summary",
                polarity,
                classification: polarity === "positive" ? "partial" : "failure",
                insight: "",
                failure_signature: null,
                evidence: [],
                support_count: 0,
                best_quality: 0,
                usage_count: 0,
                relevance: 0,
                status: "active",
                consolidated_into: null,
                updated_clock: clock,
                created_at: timestamp,
                updated_at: timestamp,
            });

            for (const member of members) {
                this.db.updateEntry({ ...member, status: "consolidated", consolidated_into: summary.id, updated_at: timestamp });
            }
            this.rebuildSummary(summary, clock, timestamp);
            this.logger.info({ objective, polarity, folded: members.length, summaryId: summary.id }, "consolidated knowledge entries");
        }
    }

    private rebuildSummary(summary: KnowledgeEntry, clock: number, timestamp: string): void {
        const members = this.db.entriesConsolidatedInto(summary.id);
        const positive = summary.polarity === "positive";
        const examples = [...members]
            .sort((a, b) => b.best_quality - a.best_quality || a.seq - b.seq)
            .slice(0, SUMMARY_EXAMPLES)
            .map((m) => findingStatement(m.insight));
        const bestQuality = positive ? Math.max(...members.map((m) => m.best_quality)) : NEGATIVE_QUALITY;
        const insight = positive
            ? `Consolidated ${members.length} lower-ranked positive findings (best quality ${formatNumber(bestQuality)}). Examples: ${examples.join(" | ")}`
            : `Consolidated ${members.length} known failure modes. Examples: ${examples.join(" | ")}`;
        const evidence = members.flatMap((m) => m.evidence).slice(-this.maxEvidencePerEntry);

        this.db.updateEntry({
            ...summary,
            classification: positive ? (members.some((m) => m.classification === "success") ? "success" : "partial") : "failure",
            insight,
            evidence,
            support_count: members.reduce((sum, m) => sum + m.support_count, 0),
            best_quality: bestQuality,
            relevance: SUMMARY_VALUE,
            updated_clock: clock,
            updated_at: timestamp,
        });
    }

    // --- Ranking ---

    /** Ranking weight of an entry for a query objective, or null when unrelated. */
    private relevanceOf(
        entry: KnowledgeEntry,
        objective: string,
        clock: number,
        ranges: ReadonlyMap<string, QualityRange>,
    ): number | null {
        const objectiveWeight = objectiveRelevance(objective, entry.objective);
        if (objectiveWeight < this.minObjectiveRelevance) return null;

        const recency = RECENCY_DECAY ** Math.max(0, clock - entry.updated_clock);
        const usage = 1 + USAGE_WEIGHT * Math.min(entry.usage_count, USAGE_CAP);
        return objectiveWeight * classificationValue(entry, ranges.get(entry.objective)) * recency * usage;
    }

    // --- History ---

    /** Most recent first. */
    recentOutcomes(objective: string, limit: number): ScoredOutcome[] {
        return this.guard("read outcomes", () => this.db.recentOutcomes(objective, limit));
    }

    bestOutcomes(objective: string, limit: number): ScoredOutcome[] {
        return this.guard("read outcomes", () => this.db.bestOutcomes(objective, limit));
    }

    outcomeExists(id: string): boolean {
        return this.guard("read outcomes", () => this.db.outcomeExists(id));
    }

    summarize(objective: string, mostUsed: number = 3): KnowledgeSummary {
        return this.guard("summarize", () => ({
            objective,
            clock: this.db.clock,
            outcomes: this.db.countOutcomes(objective),
            entries: this.db.countEntries(objective),
            dispositions: this.db.countDispositions(objective),
            mostUsed: this.db
                .activeEntries(objective)
                .sort((a, b) => b.usage_count - a.usage_count || a.seq - b.seq)
                .slice(0, mostUsed),
        }));
    }

    close(): void {
        this.db.close();
    }

    private guard<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (err) {
            if (err instanceof PersistenceFailureError) throw err;
            throw new PersistenceFailureError(operation, this.path, { cause: err });
        }
    }
}

/** Quality range of the positive findings of each objective. */
function qualityRanges(entries: readonly KnowledgeEntry[]): Map<string, QualityRange> {
    const ranges = new Map<string, QualityRange>();
    for (const entry of entries) {
        if (entry.kind !== "finding" || entry.polarity !== "positive") continue;
        const range = ranges.get(entry.objective);
        if (range) {
            range.min = Math.min(range.min, entry.best_quality);
            range.max = Math.max(range.max, entry.best_quality);
        } else {
            ranges.set(entry.objective, { min: entry.best_quality, max: entry.best_quality });
        }
    }
    return ranges;
}

function classificationValue(entry: KnowledgeEntry, range: QualityRange | undefined): number {
    if (entry.kind === "summary") return SUMMARY_VALUE;
    const qNorm = range ? normalize(entry.best_quality, range.min, range.max) : 1;
    switch (entry.classification) {
        case "success":
            return 1 + qNorm;
        case "partial":
            return 0.5 + 0.5 * qNorm;
        case "failure":
        case "inconclusive":
            return NEGATIVE_VALUE;
    }
}
