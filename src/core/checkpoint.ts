/**
 * Checkpoint Store — Atomic persistence and integrity checks for the
 * orchestrator's resumable state.
 *
 * The checkpoint is pretty-printed JSON so operators can read it while the
 * loop is stopped. A sha256 checksum over the canonical JSON of the body
 * detects hand edits and torn writes.
 */
import { createHash } from "crypto";
import fs from "fs/promises";
import path from "path";
import { CorruptStateError, PersistenceFailureError } from "../errors/index.js";
import { CHECKPOINT_VERSION, Checkpoint, CheckpointBody, type KnowledgeStoreReference } from "../schemas/checkpoint.js";

export const CHECKPOINT_FILE = "checkpoint.json";

/** What a checkpoint is validated against when it is loaded. */
export interface KnowledgeVerifier {
    readonly clock: number;
    outcomeExists(id: string): boolean;
}

/** JSON with object keys sorted at every level. */
export function canonicalJson(value: unknown): string {
    return JSON.stringify(value, (_key, v: unknown) => {
        if (v === null || typeof v !== "object" || Array.isArray(v)) return v;
        return Object.fromEntries(Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
    });
}

export function checksumOf(body: CheckpointBody): string {
    return createHash("sha256").update(canonicalJson(body)).digest("hex");
}

export function sealCheckpoint(body: CheckpointBody): Checkpoint {
    return { ...body, checksum: checksumOf(body) };
}

/** The state of a workspace that has not run yet. */
export function initialCheckpoint(objective: string, store: KnowledgeStoreReference, now: Date): CheckpointBody {
    return {
        version: CHECKPOINT_VERSION,
        objective,
        iteration: 0,
        total_experiments: 0,
        elapsed_research_ms: 0,
        knowledge_store_reference: store,
        last_outcome_id: null,
        status: "running",
        termination: null,
        updated_at: now.toISOString(),
    };
}

export class CheckpointStore {
    public readonly path: string;

    constructor(filePath: string) {
        this.path = filePath;
    }

    static inWorkspace(workspaceDir: string): CheckpointStore {
        return new CheckpointStore(path.join(workspaceDir, CHECKPOINT_FILE));
    }

    async exists(): Promise<boolean> {
        try {
            await fs.access(this.path);
            return true;
        } catch {
            return false;
        }
    }

    /**
     * Seal and write the checkpoint. The temp file is renamed over the old
     * checkpoint, so readers see either the previous or the new version.
     */
    async save(body: CheckpointBody): Promise<Checkpoint> {
        const checkpoint = sealCheckpoint(body);
        const tmp = `${this.path}.${process.pid}.tmp`;
        try {
            await fs.mkdir(path.dirname(this.path), { recursive: true });
            await fs.writeFile(tmp, JSON.stringify(checkpoint, null, 2) + "\n", "utf-8");
            await fs.rename(tmp, this.path);
        } catch (err) {
            await fs.rm(tmp, { force: true }).catch(() => undefined);
            throw new PersistenceFailureError("write checkpoint", this.path, { cause: err });
        }
        return checkpoint;
    }

    /**
     * Read and validate the checkpoint. Returns null when none exists.
     * Pass the knowledge store to also check that it is at least as far
     * along as the checkpoint claims.
     */
    async load(knowledge?: KnowledgeVerifier): Promise<Checkpoint | null> {
        let raw: string;
        try {
            raw = await fs.readFile(this.path, "utf-8");
        } catch (err) {
            if (isNotFound(err)) return null;
            throw new PersistenceFailureError("read checkpoint", this.path, { cause: err });
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch {
            throw new CorruptStateError(this.path, "not valid JSON");
        }

        const parsed = Checkpoint.safeParse(json);
        if (!parsed.success) {
            const issue = parsed.error.issues[0];
            const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
            throw new CorruptStateError(this.path, `schema violation${where}: ${issue?.message ?? "unknown"}`);
        }

        const { checksum, ...body } = parsed.data;
        if (checksumOf(body) !== checksum) {
            throw new CorruptStateError(this.path, "checksum mismatch");
        }

        if (knowledge) this.verify(parsed.data, knowledge);
        return parsed.data;
    }

    /** Cross-check the checkpoint against the knowledge store it references. */
    verify(checkpoint: Checkpoint, knowledge: KnowledgeVerifier): void {
        const expected = checkpoint.knowledge_store_reference.clock;
        if (knowledge.clock < expected) {
            throw new CorruptStateError(
                this.path,
                `knowledge store clock ${knowledge.clock} is behind the checkpoint's ${expected}`,
            );
        }
        if (checkpoint.last_outcome_id !== null && !knowledge.outcomeExists(checkpoint.last_outcome_id)) {
            throw new CorruptStateError(
                this.path,
                `last outcome "${checkpoint.last_outcome_id}" is missing from the knowledge store`,
            );
        }
    }

    async remove(): Promise<void> {
        try {
            await fs.rm(this.path, { force: true });
        } catch (err) {
            throw new PersistenceFailureError("delete checkpoint", this.path, { cause: err });
        }
    }
}

function isNotFound(err: unknown): boolean {
    return err instanceof Error && "code" in err && err.code === "ENOENT";
}

// --- Resumption ---

export interface LoopBudgets {
    max_iterations: number;
    max_research_seconds?: number;
}

export type NextStep =
    | { action: "generate"; iteration: number }
    | { action: "terminate"; reason: "iteration_budget" | "time_budget" };

/**
 * Decide what the loop does next from persisted state alone, so a resumed
 * run and an uninterrupted one take the same step.
 */
export function planNextStep(
    checkpoint: Pick<CheckpointBody, "iteration" | "elapsed_research_ms">,
    budgets: LoopBudgets,
): NextStep {
    if (checkpoint.iteration >= budgets.max_iterations) {
        return { action: "terminate", reason: "iteration_budget" };
    }
    if (budgets.max_research_seconds !== undefined && checkpoint.elapsed_research_ms >= budgets.max_research_seconds * 1000) {
        return { action: "terminate", reason: "time_budget" };
    }
    return { action: "generate", iteration: checkpoint.iteration + 1 };
}
