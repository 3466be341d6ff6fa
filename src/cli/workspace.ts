/**
 * Workspace Layout — Where a research run keeps its files.
 */
import fs from "fs/promises";
import path from "path";
import type { ResearchConfig } from "../schemas/config.js";
import { CHECKPOINT_FILE } from "../core/checkpoint.js";
import { REPORT_FILE } from "../core/report.js";

export const KNOWLEDGE_FILE = "knowledge.db";
export const LOG_FILE = "research_log.txt";

export interface WorkspacePaths {
    dir: string;
    checkpoint: string;
    knowledge: string;
    log: string;
    report: string;
}

export function workspacePaths(config: Pick<ResearchConfig, "workspace_dir">): WorkspacePaths {
    const dir = config.workspace_dir;
    return {
        dir,
        checkpoint: path.join(dir, CHECKPOINT_FILE),
        knowledge: path.join(dir, KNOWLEDGE_FILE),
        log: path.join(dir, LOG_FILE),
        report: path.join(dir, REPORT_FILE),
    };
}

/** The database plus the WAL side files SQLite leaves next to it. */
export function knowledgeFiles(paths: WorkspacePaths): string[] {
    return [paths.knowledge, `${paths.knowledge}-wal`, `${paths.knowledge}-shm`];
}

export async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.access(target);
        return true;
    } catch {
        return false;
    }
}
