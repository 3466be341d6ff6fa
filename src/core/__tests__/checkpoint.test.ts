/**
 * Checkpoint Tests — Atomic round-trip, integrity validation and resumption planning.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import {
    CheckpointStore,
    canonicalJson,
    checksumOf,
    initialCheckpoint,
    planNextStep,
    type KnowledgeVerifier,
} from "../checkpoint.js";
import { CorruptStateError } from "../../errors/index.js";
import type { CheckpointBody } from "../../schemas/checkpoint.js";

// --- Helpers ---

let dir: string;
let store: CheckpointStore;

beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "checkpoint-"));
    store = CheckpointStore.inWorkspace(dir);
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

function makeBody(overrides: Partial<CheckpointBody> = {}): CheckpointBody {
    return {
        ...initialCheckpoint("sort an array", { path: "knowledge.db", clock: 4 }, new Date("2026-03-01T12:00:00.000Z")),
        iteration: 2,
        total_experiments: 6,
        elapsed_research_ms: 1500,
        last_outcome_id: "outcome-h6",
        ...overrides,
    };
}

function knowledge(clock: number, outcomes: string[] = ["outcome-h6"]): KnowledgeVerifier {
    return { clock, outcomeExists: (id) => outcomes.includes(id) };
}

// --- Tests ---

describe("canonicalJson()", () => {
    it("sorts keys at every level", () => {
        expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: null } })).toBe(
            '{"a":{"c":null,"d":[2,{"y":0,"z":1}]},"b":1}',
        );
    });
});

describe("CheckpointStore", () => {
    it("returns null when no checkpoint exists", async () => {
        expect(await store.exists()).toBe(false);
        expect(await store.load()).toBeNull();
    });

    it("round-trips a checkpoint and leaves no temp file behind", async () => {
        const saved = await store.save(makeBody());

        expect(await store.load(knowledge(4))).toEqual(saved);
        expect(saved.checksum).toBe(checksumOf(makeBody()));
        expect(await readdir(dir)).toEqual(["checkpoint.json"]);
    });

    it("writes human-readable JSON", async () => {
        await store.save(makeBody());
        const text = await readFile(store.path, "utf-8");
        expect(text).toContain('\n  "objective": "sort an array",\n');
    });

    it("rejects a hand-edited checkpoint", async () => {
        const saved = await store.save(makeBody());
        await writeFile(store.path, JSON.stringify({ ...saved, iteration: 9 }), "utf-8");

        await expect(store.load()).rejects.toThrow(new CorruptStateError(store.path, "checksum mismatch"));
    });

    it("rejects unparseable and malformed files", async () => {
        await writeFile(store.path, "{ not json", "utf-8");
        await expect(store.load()).rejects.toBeInstanceOf(CorruptStateError);

        await writeFile(store.path, JSON.stringify({ objective: "x" }), "utf-8");
        await expect(store.load()).rejects.toThrow(/schema violation/);
    });

    it("rejects a knowledge store that is behind the checkpoint", async () => {
        await store.save(makeBody());
        await expect(store.load(knowledge(3))).rejects.toThrow(
            "knowledge store clock 3 is behind the checkpoint's 4",
        );
    });

    it("rejects a last outcome the knowledge store does not know", async () => {
        await store.save(makeBody());
        await expect(store.load(knowledge(4, []))).rejects.toThrow('last outcome "outcome-h6" is missing');
    });

    it("accepts a knowledge store that moved ahead of the checkpoint", async () => {
        await store.save(makeBody());
        expect((await store.load(knowledge(7)))?.iteration).toBe(2);
    });

    it("removes the checkpoint", async () => {
        await store.save(makeBody());
        await store.remove();
        expect(await store.exists()).toBe(false);
    });
});

describe("planNextStep()", () => {
    it("continues with the next iteration while budgets remain", () => {
        expect(planNextStep(makeBody(), { max_iterations: 5 })).toEqual({ action: "generate", iteration: 3 });
    });

    it("terminates once the iteration budget is spent", () => {
        expect(planNextStep(makeBody(), { max_iterations: 2 })).toEqual({ action: "terminate", reason: "iteration_budget" });
    });

    it("terminates once the research time budget is spent", () => {
        expect(planNextStep(makeBody(), { max_iterations: 5, max_research_seconds: 1.5 })).toEqual({
            action: "terminate",
            reason: "time_budget",
        });
    });

    it("agrees before and after a save/load round-trip", async () => {
        const body = makeBody();
        const loaded = await store.save(body).then(() => store.load());
        expect(loaded).not.toBeNull();
        if (loaded) expect(planNextStep(loaded, { max_iterations: 5 })).toEqual(planNextStep(body, { max_iterations: 5 }));
    });
});
