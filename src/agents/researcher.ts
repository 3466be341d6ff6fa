/**
 * Researcher — The hypothesis generator.
 *
 * Asks the reasoning backend for a batch of experiment drafts, validates
 * them against `HypothesisDraftBatch`, and admits only self-contained,
 * offline programs that are not a verbatim repeat of a recent failure.
 * When a recent experiment succeeded, one slot of the batch is offered
 * to a variation of the best of them; that draft is tagged "mutation".
 * Unusable output is re-prompted with the validation error; when nothing
 * usable comes back the call fails with `GenerationUnavailableError`.
 */
import { createHash } from "crypto";
import { v4 as uuidv4 } from "uuid";
import type { ReasoningBackend } from "../llm/client.js";
import { GenerationUnavailableError } from "../errors/index.js";
import { createSilentLogger, type Logger } from "../logging/logger.js";
import { HypothesisDraftBatch, type ExperimentLanguage, type Hypothesis, type HypothesisDraft } from "../schemas/hypothesis.js";
import type { KnowledgeSnapshot } from "../schemas/knowledge.js";
import type { ScoredOutcome } from "../schemas/outcome.js";

export interface ResearcherOptions {
    backend: ReasoningBackend;
    temperature?: number;
    /** Caller-side timeout for each backend call. */
    timeoutMs?: number;
    /** Re-prompts with the validation error before giving up. */
    maxValidationRetries?: number;
    logger?: Logger;
    now?: () => Date;
    idFactory?: () => string;
}

export interface ProposeOptions {
    signal?: AbortSignal;
}

export const RESEARCHER_INSTRUCTIONS = `You are an experimental research scientist. Design small, decisive code experiments that move the research objective forward.

Rules for every experiment:
- It is one complete program in JavaScript (an ES module run by Node.js) or Python 3, using only the standard library.
- It must not use the network. Generate any data it needs inline or synthetically (use a fixed seed).
- It must finish well within the time limit; prefer small inputs first.
- Its LAST line on stdout must be a single JSON object, the result record, e.g. {"metrics": {"ops_per_sec": 1234.5}}.
- Declare how to judge it in "evaluation": {"type": "metric", "metric": "<name in metrics>", "goal": "maximize" | "minimize", "threshold"?: number}, {"type": "property", "key": "<field>", "equals": <expected JSON value>} or {"type": "exit_status"}.
- A "parameter_sweep" experiment also gives "parameter" and "values"; the program receives them as the constants SWEEP_PARAMETER and SWEEP_VALUES and must iterate over SWEEP_VALUES itself.
- Build on what is known, and do not repeat experiments that already failed.
- When "vary_this_success" is given, make exactly one experiment a variation of it (change a parameter or extend it) and set its "variation_of" to that title.

Reply with JSON only: {"hypotheses": [{"kind", "title", "rationale", "expected_outcome", "language", "code", "evaluation", "parameter"?, "values"?, "variation_of"?}]}`;

const NETWORK_PATTERNS: Record<ExperimentLanguage, RegExp[]> = {
    javascript: [
        /\b(?:require|import)\s*\(\s*["'](?:node:)?(?:http|https|http2|net|tls|dgram|dns)["']\s*\)/,
        /\bfrom\s+["'](?:node:)?(?:http|https|http2|net|tls|dgram|dns)["']/,
        /\bfetch\s*\(/,
        /\bnew\s+(?:WebSocket|XMLHttpRequest)\b/,
    ],
    python: [
        /^\s*(?:import|from)\s+(?:requests|urllib|urllib3|httpx|aiohttp|http|socket|ftplib|smtplib)\b/m,
    ],
};

/** Whether the code visibly reaches for the network. */
export function referencesNetwork(language: ExperimentLanguage, code: string): boolean {
    return NETWORK_PATTERNS[language].some((pattern) => pattern.test(code));
}

function normalizeCode(code: string): string {
    return code
        .replace(/\r\n/g, "\n")
        .split("\n")
        .map((line) => line.trimEnd())
        .join("\n")
        .trim();
}

/** sha256 over the normalised code, plus the sweep binding for sweeps. */
export function codeHash(draft: Pick<HypothesisDraft, "language" | "code" | "parameter" | "values">): string {
    const hash = createHash("sha256");
    hash.update(draft.language);
    hash.update("\0");
    hash.update(normalizeCode(draft.code));
    if (draft.parameter !== undefined && draft.values !== undefined) {
        hash.update("\0");
        hash.update(JSON.stringify([draft.parameter, draft.values]));
    }
    return hash.digest("hex");
}

/**
 * The best success among recent outcomes for the objective; the earliest
 * wins a tie.
 */
export function variationBase(objective: string, recentOutcomes: readonly ScoredOutcome[]): ScoredOutcome | null {
    let best: ScoredOutcome | null = null;
    for (const outcome of recentOutcomes) {
        if (outcome.objective !== objective || outcome.classification !== "success") continue;
        if (best === null || outcome.quality > best.quality) best = outcome;
    }
    return best;
}

type ParsedDrafts = { ok: true; drafts: HypothesisDraft[] } | { ok: false; error: string };

/**
 * Pull the draft batch out of a free-form completion: a fenced JSON block,
 * or the outermost braces, or a bare array of drafts.
 */
export function parseDrafts(text: string): ParsedDrafts {
    const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
    let candidate = fenced?.[1]?.trim() ?? text.trim();
    if (!candidate.startsWith("{") && !candidate.startsWith("[")) {
        const start = candidate.indexOf("{");
        const end = candidate.lastIndexOf("}");
        if (start === -1 || end <= start) return { ok: false, error: "response contains no JSON object" };
        candidate = candidate.slice(start, end + 1);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(candidate);
    } catch (err) {
        return { ok: false, error: `response is not valid JSON (${err instanceof Error ? err.message : String(err)})` };
    }

    const result = HypothesisDraftBatch.safeParse(Array.isArray(raw) ? { hypotheses: raw } : raw);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
        return { ok: false, error: issues.join("; ") };
    }
    return { ok: true, drafts: result.data.hypotheses };
}

export class Researcher {
    private readonly backend: ReasoningBackend;
    private readonly temperature: number;
    private readonly timeoutMs: number | undefined;
    private readonly maxValidationRetries: number;
    private readonly logger: Logger;
    private readonly now: () => Date;
    private readonly idFactory: () => string;

    constructor(options: ResearcherOptions) {
        this.backend = options.backend;
        this.temperature = options.temperature ?? 0.7;
        this.timeoutMs = options.timeoutMs;
        this.maxValidationRetries = options.maxValidationRetries ?? 2;
        this.logger = (options.logger ?? createSilentLogger()).child({ component: "researcher" });
        this.now = options.now ?? (() => new Date());
        this.idFactory = options.idFactory ?? (() => uuidv4());
    }

    /**
     * Produce up to `count` new hypotheses for the objective, in batch order.
     */
    async propose(
        objective: string,
        snapshot: KnowledgeSnapshot,
        recentOutcomes: readonly ScoredOutcome[],
        count: number,
        options: ProposeOptions = {},
    ): Promise<Hypothesis[]> {
        if (!Number.isInteger(count) || count < 1) {
            throw new RangeError(`count must be a positive integer, got ${count}`);
        }

        const failedHashes = new Set(
            recentOutcomes
                .filter((o) => o.objective === objective && o.classification === "failure")
                .map((o) => o.code_hash),
        );
        const base = variationBase(objective, recentOutcomes);
        const prompt = this.buildPrompt(objective, snapshot, recentOutcomes, count, base);
        let feedback: string | null = null;

        for (let attempt = 0; attempt <= this.maxValidationRetries; attempt++) {
            const text = await this.ask(feedback ? `${prompt}\n\n[VALIDATION ERROR] ${feedback}. Correct and try again.` : prompt, options.signal);

            const parsed = parseDrafts(text);
            if (!parsed.ok) {
                feedback = parsed.error;
                this.logger.warn({ attempt, error: parsed.error }, "unusable hypothesis batch");
                continue;
            }

            const hypotheses = this.admit(objective, parsed.drafts, failedHashes, count, base);
            if (hypotheses.length > 0) {
                this.logger.debug({ proposed: parsed.drafts.length, admitted: hypotheses.length }, "hypotheses admitted");
                return hypotheses;
            }
            feedback = "every proposed experiment was rejected (network use, or a repeat of a failed experiment)";
            this.logger.warn({ attempt }, feedback);
        }

        throw new GenerationUnavailableError(
            `no usable hypotheses after ${this.maxValidationRetries + 1} attempts: ${feedback ?? "unknown error"}`,
        );
    }

    private async ask(prompt: string, signal: AbortSignal | undefined): Promise<string> {
        try {
            return await this.backend.complete(prompt, {
                temperature: this.temperature,
                signal,
                timeoutMs: this.timeoutMs,
            });
        } catch (err) {
            // An interrupt is not a backend outage.
            if (signal?.aborted) throw err;
            const reason = err instanceof Error ? err.message : String(err);
            throw new GenerationUnavailableError(`reasoning backend failed: ${reason}`, { cause: err });
        }
    }

    private admit(
        objective: string,
        drafts: readonly HypothesisDraft[],
        failedHashes: ReadonlySet<string>,
        count: number,
        base: ScoredOutcome | null,
    ): Hypothesis[] {
        const createdAt = this.now().toISOString();
        const seen = new Set<string>();
        const admitted: Hypothesis[] = [];
        let mutated = false;

        for (const draft of drafts) {
            if (admitted.length >= count) break;
            if (referencesNetwork(draft.language, draft.code)) {
                this.logger.info({ title: draft.title }, "dropped draft that uses the network");
                continue;
            }
            const hash = codeHash(draft);
            if (failedHashes.has(hash)) {
                this.logger.info({ title: draft.title }, "dropped repeat of a failed experiment");
                continue;
            }
            if (seen.has(hash)) continue;
            seen.add(hash);

            // A verbatim copy of the base is not a variation of it.
            const isMutation =
                !mutated && base !== null && draft.variation_of === base.title && hash !== base.code_hash;
            if (isMutation) mutated = true;

            const common = {
                id: this.idFactory(),
                objective,
                title: draft.title,
                rationale: draft.rationale,
                expected_outcome: draft.expected_outcome,
                language: draft.language,
                code: draft.code,
                evaluation: draft.evaluation,
                source: isMutation ? ("mutation" as const) : ("llm" as const),
                batch_index: admitted.length,
                code_hash: hash,
                created_at: createdAt,
            };
            if (draft.kind === "parameter_sweep" && draft.parameter !== undefined && draft.values !== undefined) {
                admitted.push({ ...common, kind: "parameter_sweep", parameter: draft.parameter, values: draft.values });
            } else {
                admitted.push({ ...common, kind: "code_experiment" });
            }
        }
        return admitted;
    }

    private buildPrompt(
        objective: string,
        snapshot: KnowledgeSnapshot,
        recentOutcomes: readonly ScoredOutcome[],
        count: number,
        base: ScoredOutcome | null,
    ): string {
        const context = {
            objective,
            task: `Propose ${count} new experiment${count === 1 ? "" : "s"} for this objective.`,
            best_quality_so_far: snapshot.best_quality,
            known_insights: snapshot.entries.map((entry) => ({
                insight: entry.insight,
                classification: entry.classification,
                supporting_experiments: entry.support_count,
            })),
            recent_experiments: recentOutcomes.map((outcome) => ({
                title: outcome.title,
                classification: outcome.classification,
                quality: outcome.quality,
                insight: outcome.insight,
            })),
            vary_this_success: base ? { title: base.title, quality: base.quality, insight: base.insight } : undefined,
        };
        return `${RESEARCHER_INSTRUCTIONS}\n\n${JSON.stringify(context, null, 2)}`;
    }
}
