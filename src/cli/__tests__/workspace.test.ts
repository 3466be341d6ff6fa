/**
 * Workspace Layout Tests — File locations inside a research workspace.
 */
import { describe, it, expect } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { knowledgeFiles, pathExists, workspacePaths } from "../workspace.js";

describe("workspacePaths()", () => {
    it("places every file inside the workspace directory", () => {
        const paths = workspacePaths({ workspace_dir: "/data/run-1" });
        expect(paths).toEqual({
            dir: "/data/run-1",
            checkpoint: path.join("/data/run-1", "checkpoint.json"),
            knowledge: path.join("/data/run-1", "knowledge.db"),
            log: path.join("/data/run-1", "research_log.txt"),
            report: path.join("/data/run-1", "research_report.md"),
        });
    });

    it("lists the SQLite side files with the database", () => {
        const paths = workspacePaths({ workspace_dir: "/data/run-1" });
        expect(knowledgeFiles(paths)).toEqual([
            path.join("/data/run-1", "knowledge.db"),
            path.join("/data/run-1", "knowledge.db-wal"),
            path.join("/data/run-1", "knowledge.db-shm"),
        ]);
    });
});

describe("pathExists()", () => {
    it("reports whether a file is present", async () => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), "workspace-test-"));
        try {
            const file = path.join(dir, "checkpoint.json");
            expect(await pathExists(file)).toBe(false);
            await fs.writeFile(file, "{}");
            expect(await pathExists(file)).toBe(true);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
        }
    });
});
