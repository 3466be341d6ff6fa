/**
 * Config Loader Tests — Layer precedence and validation errors.
 */
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { CONFIG_FILE, loadResearchConfig, mergeLayers } from "../config.js";
import { InvalidConfigError } from "../../errors/index.js";

// --- Helpers ---

let cwd: string;

beforeEach(async () => {
    cwd = await mkdtemp(path.join(os.tmpdir(), "config-"));
});

afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
});

async function writeConfig(content: unknown, name = CONFIG_FILE): Promise<void> {
    await writeFile(path.join(cwd, name), typeof content === "string" ? content : JSON.stringify(content), "utf-8");
}

// --- Tests ---

describe("mergeLayers()", () => {
    it("merges nested objects and skips undefined values", () => {
        expect(mergeLayers({ a: 1, llm: { provider: "openai", model: "m1" } }, { a: undefined, llm: { model: "m2" } })).toEqual({
            a: 1,
            llm: { provider: "openai", model: "m2" },
        });
    });
});

describe("loadResearchConfig()", () => {
    it("uses schema defaults when nothing is configured", async () => {
        const config = await loadResearchConfig({ cwd });

        expect(config.max_wall_seconds).toBe(30);
        expect(config.experiments_per_iteration).toBe(3);
        expect(config.network_allowed).toBe(false);
        expect(config.llm).toEqual({ provider: "openai" });
        expect(config.workspace_dir).toBe(path.join(cwd, "research_workspace"));
    });

    it("reads research.config.json from the working directory", async () => {
        await writeConfig({ max_iterations: 7, llm: { provider: "anthropic" } });
        const config = await loadResearchConfig({ cwd });

        expect(config.max_iterations).toBe(7);
        expect(config.llm.provider).toBe("anthropic");
    });

    it("lets the environment override the file and flags override both", async () => {
        await writeConfig({ max_iterations: 7, llm: { provider: "anthropic", model: "file-model" } });
        const config = await loadResearchConfig({
            cwd,
            env: { RESEARCH_MODEL: "env-model", RESEARCH_LOG_LEVEL: "debug" },
            flags: { maxIterations: "3", provider: "ollama", timeout: "5" },
        });

        expect(config.max_iterations).toBe(3);
        expect(config.max_wall_seconds).toBe(5);
        expect(config.log_level).toBe("debug");
        expect(config.llm).toEqual({ provider: "ollama", model: "env-model" });
    });

    it("reads an explicit config file and resolves the workspace against cwd", async () => {
        await writeConfig({ workspace_dir: "runs/a" }, "custom.json");
        const config = await loadResearchConfig({ cwd, configPath: "custom.json" });
        expect(config.workspace_dir).toBe(path.join(cwd, "runs", "a"));
    });

    it("fails when an explicit config file is missing", async () => {
        await expect(loadResearchConfig({ cwd, configPath: "missing.json" })).rejects.toBeInstanceOf(InvalidConfigError);
    });

    it("rejects malformed JSON", async () => {
        await writeConfig("{ nope");
        await expect(loadResearchConfig({ cwd })).rejects.toThrow(/is not valid JSON/);
    });

    it("lists every invalid field", async () => {
        await writeConfig({ max_memory_mb: -1, llm: { provider: "nobody" } });
        const error = await loadResearchConfig({ cwd, flags: { experiments: "many" } }).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(InvalidConfigError);
        if (error instanceof InvalidConfigError) {
            expect(error.issues.map((issue) => issue.split(":")[0]).sort()).toEqual([
                "experiments_per_iteration",
                "llm.provider",
                "max_memory_mb",
            ]);
        }
    });
});
