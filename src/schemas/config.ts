/**
 * Research Configuration — All tunable loop parameters in one place.
 *
 * The defaults match a laptop-sized run: a handful of experiments per
 * iteration, thirty-second experiments and a one-gigabyte memory ceiling.
 */
import { z } from "zod/v4";

export const LLMProviderName = z.enum(["openai", "anthropic", "google", "ollama"]);
export type LLMProviderName = z.infer<typeof LLMProviderName>;

/** Reasoning backend selection. Missing fields fall back to provider defaults. */
export const LLMSettings = z.object({
    provider: LLMProviderName.default("openai"),
    model: z.string().min(1).optional(),
    /** Endpoint override, e.g. a local OpenAI-compatible server. */
    base_url: z.string().url().optional(),
});
export type LLMSettings = z.infer<typeof LLMSettings>;

/**
 * The single configuration object passed to the orchestrator and its collaborators.
 */
export const ResearchConfig = z.object({
    // --- Workspace ---
    workspace_dir: z.string().min(1).default("research_workspace"),

    // --- Sandbox Limits ---
    /** Per-experiment wall-clock timeout. */
    max_wall_seconds: z.number().positive().default(30),
    /** Per-experiment memory ceiling for the whole process tree. */
    max_memory_mb: z.number().int().positive().default(1024),
    /** Outbound network for experiments. Off unless explicitly enabled. */
    network_allowed: z.boolean().default(false),
    /** Cap applied separately to stdout and stderr. */
    max_output_bytes: z.number().int().positive().default(10000),
    /** Worker pool width within one batch. Defaults to the available CPU cores. */
    max_parallel_experiments: z.number().int().positive().optional(),

    // --- Loop Budgets ---
    /** Batch width. */
    experiments_per_iteration: z.number().int().positive().default(3),
    max_iterations: z.number().int().nonnegative().default(100),
    /** Cumulative research wall-clock budget across resumptions. Unlimited when absent. */
    max_research_seconds: z.number().positive().optional(),
    iteration_delay_seconds: z.number().nonnegative().default(2),

    // --- Generation ---
    hypothesis_temperature: z.number().min(0).max(2).default(0.7),
    /** Attempts before GenerationUnavailable becomes fatal. */
    max_generation_attempts: z.number().int().positive().default(3),
    /** First backoff delay; doubled on every further attempt. */
    generation_backoff_ms: z.number().int().nonnegative().default(5000),
    generation_timeout_seconds: z.number().positive().default(120),
    /** Re-prompts with the validation error before a draft batch is declared unusable. */
    max_validation_retries: z.number().int().nonnegative().default(2),
    /** Number of recent outcomes shown to the Researcher. */
    history_window: z.number().int().positive().default(10),

    // --- Knowledge ---
    /** Active entries per objective before consolidation kicks in. */
    knowledge_capacity: z.number().int().min(4).default(500),
    similarity_threshold: z.number().min(0).max(1).default(0.8),
    retrieval_top_k: z.number().int().positive().default(5),
    min_objective_relevance: z.number().min(0).max(1).default(0.2),
    max_evidence_per_entry: z.number().int().positive().default(20),

    // --- Scoring ---
    /** Relative gain over the best known quality that counts as an improvement. */
    improvement_threshold: z.number().nonnegative().default(0.05),

    // --- Reasoning Backend ---
    llm: LLMSettings.default({ provider: "openai" }),

    // --- Logging ---
    log_level: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("info"),
});
export type ResearchConfig = z.infer<typeof ResearchConfig>;

/** The sandbox limit triple, as handed to `Sandbox.run()`. */
export interface ResourceLimits {
    max_wall_seconds: number;
    max_memory_mb: number;
    network_allowed: boolean;
    max_output_bytes: number;
}

export function limitsFromConfig(config: ResearchConfig): ResourceLimits {
    return {
        max_wall_seconds: config.max_wall_seconds,
        max_memory_mb: config.max_memory_mb,
        network_allowed: config.network_allowed,
        max_output_bytes: config.max_output_bytes,
    };
}
