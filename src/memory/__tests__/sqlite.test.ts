/**
 * SQLite Memory Tests — Migrations, history queries, entries and the merge ledger.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ResearchDatabase } from "../sqlite.js";
import { Hypothesis } from "../../schemas/hypothesis.js";
import { ScoredOutcome } from "../../schemas/outcome.js";

// --- Helpers ---

const OBJECTIVE = "sort an array";

let db: ResearchDatabase;

beforeEach(() => {
    db = new ResearchDatabase(":memory:");
});

afterEach(() => {
    db.close();
});

function makeOutcome(id: string, overrides: Record<string, unknown> = {}): ScoredOutcome {
    return ScoredOutcome.parse({
        id: `outcome-${id}`,
        hypothesis_id: id,
        objective: OBJECTIVE,
        verdict: {
            hypothesis_id: id,
            exit_code: 0,
            signal: null,
            stdout: "",
            stderr: "",
            stdout_truncated: false,
            stderr_truncated: false,
            peak_memory_mb: null,
            wall_time_ms: 10,
            terminated_reason: "completed",
            sandbox_fault: false,
            diagnostic: null,
            started_at: "2026-01-01T00:00:00.000Z",
        },
        classification: "success",
        quality: 1,
        insight: `"${id}" succeeded.`,
        failure_signature: null,
        code_hash: `hash-${id}`,
        title: id,
        created_at: "2026-01-01T00:00:00.010Z",
        ...overrides,
    });
}

function makeEntry(id: string, evidence: string[]) {
    return {
        id,
        objective: OBJECTIVE,
        kind: "finding" as const,
        polarity: "positive" as const,
        classification: "success" as const,
        insight: "Quicksort is fast.",
        failure_signature: null,
        evidence,
        support_count: evidence.length,
        best_quality: 1,
        usage_count: 0,
        relevance: 0,
        status: "active" as const,
        consolidated_into: null,
        updated_clock: 1,
        created_at: "2026-01-01T00:00:00.000Z",
        updated_at: "2026-01-01T00:00:00.000Z",
    };
}

// --- Tests ---

describe("Schema Migrations", () => {
    it("creates all tables on init", () => {
        const tables = db.raw
            .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
            .all()
            .map((t) => t.name);

        expect(tables).toEqual(expect.arrayContaining([
            "hypotheses", "outcomes", "knowledge_entries", "entry_evidence", "merge_ledger", "meta", "schema_versions",
        ]));
    });

    it("tracks schema version", () => {
        const version = db.raw.prepare<[], { v: number }>("SELECT MAX(version) as v FROM schema_versions").get();
        expect(version?.v).toBe(1);
    });
});

describe("Logical clock", () => {
    it("starts at zero and ticks by one", () => {
        expect(db.clock).toBe(0);
        expect(db.tick()).toBe(1);
        expect(db.tick()).toBe(2);
        expect(db.clock).toBe(2);
    });
});

describe("History", () => {
    it("round-trips a hypothesis", () => {
        const hypothesis = Hypothesis.parse({
            id: "h1",
            objective: OBJECTIVE,
            kind: "parameter_sweep",
            title: "Sweep sizes",
            language: "python",
            code: "print(SWEEP_VALUES)",
            evaluation: { type: "exit_status" },
            batch_index: 0,
            code_hash: "hash-h1",
            created_at: "2026-01-01T00:00:00.000Z",
            parameter: "n",
            values: [1, 2],
        });
        db.insertHypothesis(hypothesis);
        expect(db.getHypothesis("h1")).toEqual(hypothesis);
        expect(db.getHypothesis("missing")).toBeUndefined();
    });

    it("ignores a second insert of the same outcome", () => {
        db.insertOutcome(makeOutcome("a"));
        db.insertOutcome(makeOutcome("a", { quality: 99 }));
        expect(db.getOutcome("outcome-a")?.quality).toBe(1);
        expect(db.countOutcomes(OBJECTIVE).total).toBe(1);
    });

    it("lists recent outcomes newest first", () => {
        for (const id of ["a", "b", "c"]) db.insertOutcome(makeOutcome(id));
        expect(db.recentOutcomes(OBJECTIVE, 2).map((o) => o.id)).toEqual(["outcome-c", "outcome-b"]);
    });

    it("ranks best outcomes by quality, positives only, earlier first on ties", () => {
        db.insertOutcome(makeOutcome("a", { quality: 2 }));
        db.insertOutcome(makeOutcome("b", { quality: 5 }));
        db.insertOutcome(makeOutcome("c", { quality: 2 }));
        db.insertOutcome(makeOutcome("d", { classification: "failure", quality: 0, failure_signature: "timeout:" }));

        expect(db.bestOutcomes(OBJECTIVE, 10).map((o) => o.id)).toEqual(["outcome-b", "outcome-a", "outcome-c"]);
        expect(db.bestQuality(OBJECTIVE)).toBe(5);
        expect(db.bestQuality("another objective")).toBeNull();
    });

    it("counts outcomes by classification", () => {
        db.insertOutcome(makeOutcome("a"));
        db.insertOutcome(makeOutcome("b", { classification: "inconclusive", quality: 0 }));
        expect(db.countOutcomes(OBJECTIVE)).toEqual({
            total: 2,
            byClassification: { success: 1, partial: 0, failure: 0, inconclusive: 1 },
        });
    });
});

describe("Knowledge entries", () => {
    it("stores evidence in order and assigns insertion sequence", () => {
        db.insertOutcome(makeOutcome("a"));
        db.insertOutcome(makeOutcome("b"));
        const first = db.insertEntry(makeEntry("k1", ["outcome-b", "outcome-a"]));
        const second = db.insertEntry(makeEntry("k2", ["outcome-a"]));

        expect(first.evidence).toEqual(["outcome-b", "outcome-a"]);
        expect(second.seq).toBeGreaterThan(first.seq);
    });

    it("rejects evidence that is not in the outcome history", () => {
        expect(() => db.insertEntry(makeEntry("k1", ["outcome-ghost"]))).toThrow();
    });

    it("updates mutable fields and evidence", () => {
        db.insertOutcome(makeOutcome("a"));
        db.insertOutcome(makeOutcome("b"));
        const entry = db.insertEntry(makeEntry("k1", ["outcome-a"]));
        db.updateEntry({ ...entry, support_count: 2, evidence: ["outcome-a", "outcome-b"], best_quality: 3 });

        expect(db.requireEntry("k1")).toMatchObject({ support_count: 2, evidence: ["outcome-a", "outcome-b"], best_quality: 3 });
    });

    it("increments usage counts", () => {
        db.insertOutcome(makeOutcome("a"));
        db.insertEntry(makeEntry("k1", ["outcome-a"]));
        db.incrementUsage(["k1", "k1"]);
        expect(db.requireEntry("k1").usage_count).toBe(2);
    });

    it("separates active from consolidated entries", () => {
        db.insertOutcome(makeOutcome("a"));
        const summary = db.insertEntry({ ...makeEntry("s1", ["outcome-a"]), kind: "summary" });
        const member = db.insertEntry(makeEntry("k1", ["outcome-a"]));
        db.updateEntry({ ...member, status: "consolidated", consolidated_into: summary.id });

        expect(db.activeEntries(OBJECTIVE).map((e) => e.id)).toEqual(["s1"]);
        expect(db.entriesConsolidatedInto("s1").map((e) => e.id)).toEqual(["k1"]);
        expect(db.countEntries(OBJECTIVE)).toEqual({ active: 1, consolidated: 1 });
    });
});

describe("Merge ledger", () => {
    it("records and counts dispositions per objective", () => {
        db.insertOutcome(makeOutcome("a"));
        db.insertOutcome(makeOutcome("b"));
        db.insertEntry(makeEntry("k1", ["outcome-a"]));
        db.recordLedger({ outcome_id: "outcome-a", entry_id: "k1", disposition: "created", clock: 1 });
        db.recordLedger({ outcome_id: "outcome-b", entry_id: "k1", disposition: "strengthened", clock: 2 });

        expect(db.getLedger("outcome-b")).toEqual({ outcome_id: "outcome-b", entry_id: "k1", disposition: "strengthened", clock: 2 });
        expect(db.countDispositions(OBJECTIVE)).toEqual({ created: 1, strengthened: 1, discarded: 0 });
    });
});

describe("Transactions", () => {
    it("rolls back every write when the callback throws", () => {
        expect(() =>
            db.transaction(() => {
                db.insertOutcome(makeOutcome("a"));
                db.tick();
                throw new Error("boom");
            }),
        ).toThrow("boom");
        expect(db.outcomeExists("outcome-a")).toBe(false);
        expect(db.clock).toBe(0);
    });
});
