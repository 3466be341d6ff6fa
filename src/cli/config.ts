/**
 * Config Loader — Layers the research configuration.
 *
 * Later layers win: schema defaults, then `research.config.json` (or the
 * `--config` file), then environment variables, then command-line flags.
 */
import fs from "fs/promises";
import path from "path";
import { InvalidConfigError } from "../errors/index.js";
import { ResearchConfig } from "../schemas/config.js";

export const CONFIG_FILE = "research.config.json";

/** Command-line overrides, as commander hands them over (strings). */
export interface ConfigFlags {
    workspace?: string;
    maxIterations?: string;
    experiments?: string;
    timeout?: string;
    memory?: string;
    provider?: string;
    model?: string;
    baseUrl?: string;
}

export interface ConfigSources {
    cwd: string;
    /** Explicit config file; must exist when given. */
    configPath?: string;
    env?: Record<string, string | undefined>;
    flags?: ConfigFlags;
}

type Layer = Record<string, unknown>;

function isRecord(value: unknown): value is Layer {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Deep-merge plain objects; arrays and scalars are replaced. Undefined values are skipped. */
export function mergeLayers(...layers: Layer[]): Layer {
    const result: Layer = {};
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value === undefined) continue;
            const current = result[key];
            result[key] = isRecord(value) ? mergeLayers(isRecord(current) ? current : {}, value) : value;
        }
    }
    return result;
}

async function readFileLayer(cwd: string, configPath: string | undefined): Promise<Layer> {
    const explicit = configPath !== undefined;
    const file = path.resolve(cwd, configPath ?? CONFIG_FILE);

    let text: string;
    try {
        text = await fs.readFile(file, "utf-8");
    } catch (err) {
        if (!explicit) return {};
        const reason = err instanceof Error ? err.message : String(err);
        throw new InvalidConfigError([`cannot read ${file}: ${reason}`]);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new InvalidConfigError([`${file} is not valid JSON: ${reason}`]);
    }
    if (!isRecord(parsed)) throw new InvalidConfigError([`${file} must contain a JSON object`]);
    return parsed;
}

function envLayer(env: Record<string, string | undefined>): Layer {
    return {
        llm: {
            provider: env.RESEARCH_PROVIDER || undefined,
            model: env.RESEARCH_MODEL || undefined,
            base_url: env.RESEARCH_BASE_URL || undefined,
        },
        log_level: env.RESEARCH_LOG_LEVEL || undefined,
    };
}

function toNumber(value: string | undefined): number | undefined {
    return value === undefined ? undefined : Number(value);
}

function flagLayer(flags: ConfigFlags): Layer {
    return {
        workspace_dir: flags.workspace,
        max_iterations: toNumber(flags.maxIterations),
        experiments_per_iteration: toNumber(flags.experiments),
        max_wall_seconds: toNumber(flags.timeout),
        max_memory_mb: toNumber(flags.memory),
        llm: {
            provider: flags.provider,
            model: flags.model,
            base_url: flags.baseUrl,
        },
    };
}

/**
 * Build the validated configuration. `workspace_dir` comes back absolute.
 * Throws InvalidConfigError listing every problem found.
 */
export async function loadResearchConfig(sources: ConfigSources): Promise<ResearchConfig> {
    const merged = mergeLayers(
        await readFileLayer(sources.cwd, sources.configPath),
        envLayer(sources.env ?? {}),
        flagLayer(sources.flags ?? {}),
    );

    const parsed = ResearchConfig.safeParse(merged);
    if (!parsed.success) {
        throw new InvalidConfigError(
            parsed.error.issues.map((issue) =>
                issue.path.length > 0 ? `${issue.path.map(String).join(".")}: ${issue.message}` : issue.message,
            ),
        );
    }
    return { ...parsed.data, workspace_dir: path.resolve(sources.cwd, parsed.data.workspace_dir) };
}
