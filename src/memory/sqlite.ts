/**
 * SQLite Database — Durable history and knowledge for the research loop.
 *
 * Uses better-sqlite3 for zero-config, embedded, synchronous SQLite.
 * Manages schema migrations, the hypothesis/outcome history, knowledge
 * entries with their evidence, the merge ledger and the logical clock.
 * Every row is validated against its zod schema when read back.
 */
import Database from "better-sqlite3";
import { Hypothesis } from "../schemas/hypothesis.js";
import { Classification, ScoredOutcome } from "../schemas/outcome.js";
import { KnowledgeEntry } from "../schemas/knowledge.js";

/** Schema migration definition. */
export interface Migration {
    version: number;
    description: string;
    up: string;
}

const INITIAL_SCHEMA = `
-- Every admitted hypothesis, as generated
CREATE TABLE IF NOT EXISTS hypotheses (
  id TEXT PRIMARY KEY,
  objective TEXT NOT NULL,
  kind TEXT NOT NULL,
  code_hash TEXT NOT NULL,
  batch_index INTEGER NOT NULL,
  payload TEXT NOT NULL,
  created_at TEXT NOT NULL
);

-- Outcome history: one scored outcome per hypothesis, append-only
CREATE TABLE IF NOT EXISTS outcomes (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  hypothesis_id TEXT NOT NULL UNIQUE,
  objective TEXT NOT NULL,
  classification TEXT NOT NULL,
  quality REAL NOT NULL,
  terminated_reason TEXT NOT NULL,
  code_hash TEXT NOT NULL,
  payload TEXT NOT NULL,
  created_at TEXT NOT NULL
);

-- Generalised insights derived from outcomes
CREATE TABLE IF NOT EXISTS knowledge_entries (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  objective TEXT NOT NULL,
  kind TEXT NOT NULL,
  polarity TEXT NOT NULL,
  classification TEXT NOT NULL,
  insight TEXT NOT NULL,
  failure_signature TEXT,
  support_count INTEGER NOT NULL,
  best_quality REAL NOT NULL,
  usage_count INTEGER NOT NULL DEFAULT 0,
  relevance REAL NOT NULL DEFAULT 0,
  status TEXT NOT NULL DEFAULT 'active',
  consolidated_into TEXT,
  updated_clock INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  FOREIGN KEY (consolidated_into) REFERENCES knowledge_entries(id)
);

-- Supporting outcomes per entry; the foreign key keeps evidence referential
CREATE TABLE IF NOT EXISTS entry_evidence (
  entry_id TEXT NOT NULL,
  outcome_id TEXT NOT NULL,
  position INTEGER NOT NULL,
  PRIMARY KEY (entry_id, outcome_id),
  FOREIGN KEY (entry_id) REFERENCES knowledge_entries(id),
  FOREIGN KEY (outcome_id) REFERENCES outcomes(id)
);

-- One row per merged outcome; makes merging idempotent
CREATE TABLE IF NOT EXISTS merge_ledger (
  outcome_id TEXT PRIMARY KEY,
  entry_id TEXT,
  disposition TEXT NOT NULL,
  clock INTEGER NOT NULL,
  FOREIGN KEY (outcome_id) REFERENCES outcomes(id),
  FOREIGN KEY (entry_id) REFERENCES knowledge_entries(id)
);

CREATE TABLE IF NOT EXISTS meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_outcomes_objective ON outcomes(objective, seq);
CREATE INDEX IF NOT EXISTS idx_entries_objective_status ON knowledge_entries(objective, status);
CREATE INDEX IF NOT EXISTS idx_entries_signature ON knowledge_entries(objective, failure_signature);
CREATE INDEX IF NOT EXISTS idx_evidence_outcome ON entry_evidence(outcome_id);
`;

/**
 * Forward-only migrations.
 */
const MIGRATIONS: Migration[] = [
    { version: 1, description: "Initial schema", up: INITIAL_SCHEMA },
];

export type MergeDisposition = "created" | "strengthened" | "discarded";

export interface LedgerRecord {
    outcome_id: string;
    entry_id: string | null;
    disposition: MergeDisposition;
    clock: number;
}

interface PayloadRow {
    payload: string;
}

interface EntryRow {
    seq: number;
    id: string;
    objective: string;
    kind: string;
    polarity: string;
    classification: string;
    insight: string;
    failure_signature: string | null;
    support_count: number;
    best_quality: number;
    usage_count: number;
    relevance: number;
    status: string;
    consolidated_into: string | null;
    updated_clock: number;
    created_at: string;
    updated_at: string;
}

export interface OutcomeCounts {
    total: number;
    byClassification: Record<Classification, number>;
}

export class ResearchDatabase {
    private db: Database.Database;

    constructor(dbPath: string = ":memory:") {
        this.db = new Database(dbPath);
        this.db.pragma("journal_mode = WAL");
        this.db.pragma("foreign_keys = ON");
        this.runMigrations();
    }

    /**
     * Run pending migrations.
     * Forward-only, with version tracking.
     */
    private runMigrations(): void {
        this.db.exec(`
      CREATE TABLE IF NOT EXISTS schema_versions (
        version INTEGER PRIMARY KEY,
        applied_at TEXT NOT NULL DEFAULT (datetime('now')),
        description TEXT NOT NULL
      );
    `);

        const current = this.db
            .prepare<[], { v: number | null }>("SELECT MAX(version) as v FROM schema_versions")
            .get();
        const version = current?.v ?? 0;

        for (const migration of MIGRATIONS) {
            if (migration.version > version) {
                this.transaction(() => {
                    this.db.exec(migration.up);
                    this.db
                        .prepare("INSERT INTO schema_versions (version, description) VALUES (?, ?)")
                        .run(migration.version, migration.description);
                });
            }
        }
    }

    /** Run `fn` atomically. Nested calls join the outer transaction. */
    transaction<T>(fn: () => T): T {
        return this.db.transaction(fn)();
    }

    // --- Logical clock ---

    get clock(): number {
        const row = this.db.prepare<[], { value: string }>("SELECT value FROM meta WHERE key = 'clock'").get();
        return row ? Number(row.value) : 0;
    }

    tick(): number {
        const next = this.clock + 1;
        this.db
            .prepare("INSERT INTO meta (key, value) VALUES ('clock', ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value")
            .run(String(next));
        return next;
    }

    // --- History ---

    insertHypothesis(hypothesis: Hypothesis): void {
        this.db
            .prepare(
                `INSERT OR IGNORE INTO hypotheses (id, objective, kind, code_hash, batch_index, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                hypothesis.id,
                hypothesis.objective,
                hypothesis.kind,
                hypothesis.code_hash,
                hypothesis.batch_index,
                JSON.stringify(hypothesis),
                hypothesis.created_at,
            );
    }

    getHypothesis(id: string): Hypothesis | undefined {
        const row = this.db.prepare<[string], PayloadRow>("SELECT payload FROM hypotheses WHERE id = ?").get(id);
        return row ? Hypothesis.parse(JSON.parse(row.payload)) : undefined;
    }

    insertOutcome(outcome: ScoredOutcome): void {
        this.db
            .prepare(
                `INSERT OR IGNORE INTO outcomes (id, hypothesis_id, objective, classification, quality, terminated_reason, code_hash, payload, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                outcome.id,
                outcome.hypothesis_id,
                outcome.objective,
                outcome.classification,
                outcome.quality,
                outcome.verdict.terminated_reason,
                outcome.code_hash,
                JSON.stringify(outcome),
                outcome.created_at,
            );
    }

    outcomeExists(id: string): boolean {
        return this.db.prepare<[string], { one: number }>("SELECT 1 as one FROM outcomes WHERE id = ?").get(id) !== undefined;
    }

    getOutcome(id: string): ScoredOutcome | undefined {
        const row = this.db.prepare<[string], PayloadRow>("SELECT payload FROM outcomes WHERE id = ?").get(id);
        return row ? ScoredOutcome.parse(JSON.parse(row.payload)) : undefined;
    }

    /** Most recent first. */
    recentOutcomes(objective: string, limit: number): ScoredOutcome[] {
        return this.db
            .prepare<[string, number], PayloadRow>("SELECT payload FROM outcomes WHERE objective = ? ORDER BY seq DESC LIMIT ?")
            .all(objective, limit)
            .map((row) => ScoredOutcome.parse(JSON.parse(row.payload)));
    }

    /** Positive outcomes by descending quality; earlier outcomes win ties. */
    bestOutcomes(objective: string, limit: number): ScoredOutcome[] {
        return this.db
            .prepare<[string, number], PayloadRow>(
                `SELECT payload FROM outcomes
         WHERE objective = ? AND classification IN ('success', 'partial')
         ORDER BY quality DESC, seq ASC LIMIT ?`,
            )
            .all(objective, limit)
            .map((row) => ScoredOutcome.parse(JSON.parse(row.payload)));
    }

    bestQuality(objective: string): number | null {
        const row = this.db
            .prepare<[string], { q: number | null }>(
                "SELECT MAX(quality) as q FROM outcomes WHERE objective = ? AND classification IN ('success', 'partial')",
            )
            .get(objective);
        return row?.q ?? null;
    }

    countOutcomes(objective: string): OutcomeCounts {
        const byClassification: Record<Classification, number> = { success: 0, partial: 0, failure: 0, inconclusive: 0 };
        const rows = this.db
            .prepare<[string], { classification: string; n: number }>(
                "SELECT classification, COUNT(*) as n FROM outcomes WHERE objective = ? GROUP BY classification",
            )
            .all(objective);
        let total = 0;
        for (const row of rows) {
            const key = Classification.parse(row.classification);
            byClassification[key] = row.n;
            total += row.n;
        }
        return { total, byClassification };
    }

    // --- Knowledge entries ---

    insertEntry(entry: Omit<KnowledgeEntry, "seq">): KnowledgeEntry {
        this.db
            .prepare(
                `INSERT INTO knowledge_entries (id, objective, kind, polarity, classification, insight, failure_signature,
           support_count, best_quality, usage_count, relevance, status, consolidated_into, updated_clock, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            )
            .run(
                entry.id,
                entry.objective,
                entry.kind,
                entry.polarity,
                entry.classification,
                entry.insight,
                entry.failure_signature,
                entry.support_count,
                entry.best_quality,
                entry.usage_count,
                entry.relevance,
                entry.status,
                entry.consolidated_into,
                entry.updated_clock,
                entry.created_at,
                entry.updated_at,
            );
        this.replaceEvidence(entry.id, entry.evidence);
        return this.requireEntry(entry.id);
    }

    /** Persist every mutable field of an existing entry. */
    updateEntry(entry: KnowledgeEntry): void {
        this.db
            .prepare(
                `UPDATE knowledge_entries SET classification = ?, insight = ?, support_count = ?, best_quality = ?,
           usage_count = ?, relevance = ?, status = ?, consolidated_into = ?, updated_clock = ?, updated_at = ?
         WHERE id = ?`,
            )
            .run(
                entry.classification,
                entry.insight,
                entry.support_count,
                entry.best_quality,
                entry.usage_count,
                entry.relevance,
                entry.status,
                entry.consolidated_into,
                entry.updated_clock,
                entry.updated_at,
                entry.id,
            );
        this.replaceEvidence(entry.id, entry.evidence);
    }

    incrementUsage(ids: readonly string[]): void {
        const stmt = this.db.prepare("UPDATE knowledge_entries SET usage_count = usage_count + 1 WHERE id = ?");
        for (const id of ids) stmt.run(id);
    }

    getEntry(id: string): KnowledgeEntry | undefined {
        const row = this.db.prepare<[string], EntryRow>("SELECT * FROM knowledge_entries WHERE id = ?").get(id);
        return row ? this.toEntry(row) : undefined;
    }

    requireEntry(id: string): KnowledgeEntry {
        const entry = this.getEntry(id);
        if (!entry) throw new Error(`Knowledge entry "${id}" not found`);
        return entry;
    }

    /** Active entries, all objectives when none is given, in insertion order. */
    activeEntries(objective?: string): KnowledgeEntry[] {
        const rows = objective === undefined
            ? this.db.prepare<[], EntryRow>("SELECT * FROM knowledge_entries WHERE status = 'active' ORDER BY seq").all()
            : this.db
                .prepare<[string], EntryRow>("SELECT * FROM knowledge_entries WHERE status = 'active' AND objective = ? ORDER BY seq")
                .all(objective);
        return rows.map((row) => this.toEntry(row));
    }

    /** Entries folded into a summary, in insertion order. */
    entriesConsolidatedInto(summaryId: string): KnowledgeEntry[] {
        return this.db
            .prepare<[string], EntryRow>("SELECT * FROM knowledge_entries WHERE consolidated_into = ? ORDER BY seq")
            .all(summaryId)
            .map((row) => this.toEntry(row));
    }

    countEntries(objective: string): { active: number; consolidated: number } {
        const rows = this.db
            .prepare<[string], { status: string; n: number }>(
                "SELECT status, COUNT(*) as n FROM knowledge_entries WHERE objective = ? GROUP BY status",
            )
            .all(objective);
        return {
            active: rows.find((r) => r.status === "active")?.n ?? 0,
            consolidated: rows.find((r) => r.status === "consolidated")?.n ?? 0,
        };
    }

    private replaceEvidence(entryId: string, evidence: readonly string[]): void {
        this.db.prepare("DELETE FROM entry_evidence WHERE entry_id = ?").run(entryId);
        const insert = this.db.prepare("INSERT INTO entry_evidence (entry_id, outcome_id, position) VALUES (?, ?, ?)");
        evidence.forEach((outcomeId, position) => insert.run(entryId, outcomeId, position));
    }

    private toEntry(row: EntryRow): KnowledgeEntry {
        const evidence = this.db
            .prepare<[string], { outcome_id: string }>("SELECT outcome_id FROM entry_evidence WHERE entry_id = ? ORDER BY position")
            .all(row.id)
            .map((r) => r.outcome_id);
        return KnowledgeEntry.parse({ ...row, evidence });
    }

    // --- Merge ledger ---

    getLedger(outcomeId: string): LedgerRecord | undefined {
        const row = this.db
            .prepare<[string], { outcome_id: string; entry_id: string | null; disposition: string; clock: number }>(
                "SELECT outcome_id, entry_id, disposition, clock FROM merge_ledger WHERE outcome_id = ?",
            )
            .get(outcomeId);
        if (!row) return undefined;
        const disposition = row.disposition === "created" || row.disposition === "strengthened" ? row.disposition : "discarded";
        return { ...row, disposition };
    }

    recordLedger(record: LedgerRecord): void {
        this.db
            .prepare("INSERT INTO merge_ledger (outcome_id, entry_id, disposition, clock) VALUES (?, ?, ?, ?)")
            .run(record.outcome_id, record.entry_id, record.disposition, record.clock);
    }

    countDispositions(objective: string): Record<MergeDisposition, number> {
        const counts: Record<MergeDisposition, number> = { created: 0, strengthened: 0, discarded: 0 };
        const rows = this.db
            .prepare<[string], { disposition: string; n: number }>(
                `SELECT l.disposition as disposition, COUNT(*) as n FROM merge_ledger l
         JOIN outcomes o ON o.id = l.outcome_id WHERE o.objective = ? GROUP BY l.disposition`,
            )
            .all(objective);
        for (const row of rows) {
            if (row.disposition === "created" || row.disposition === "strengthened" || row.disposition === "discarded") {
                counts[row.disposition] = row.n;
            }
        }
        return counts;
    }

    /** Close the database connection. */
    close(): void {
        this.db.close();
    }

    /** Expose raw db for advanced queries in tests. */
    get raw(): Database.Database {
        return this.db;
    }
}
