import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import { CheckpointStore } from "../../index.js";
import { loadResearchConfig } from "../config.js";
import { knowledgeFiles, workspacePaths } from "../workspace.js";
import type { WorkspaceCommandOptions } from "./status.js";

export interface ResetOptions extends WorkspaceCommandOptions {
    all?: boolean;
    yes?: boolean;
}

export async function resetCommand(options: ResetOptions) {
    p.intro(chalk.bgMagenta.black(" Research Reset "));

    try {
        const config = await loadResearchConfig({
            cwd: process.cwd(),
            configPath: options.config,
            env: process.env,
            flags: { workspace: options.workspace },
        });
        const paths = workspacePaths(config);
        const checkpoints = new CheckpointStore(paths.checkpoint);
        if (!options.all && !(await checkpoints.exists())) {
            p.outro(`No checkpoint in ${chalk.cyan(paths.dir)}; nothing to reset.`);
            return;
        }
        const scope = options.all ? "the checkpoint, the knowledge store and the report" : "the checkpoint";

        if (!options.yes) {
            const confirmed = await p.confirm({
                message: `Delete ${scope} in ${chalk.cyan(paths.dir)}?`,
                initialValue: false,
            });
            if (p.isCancel(confirmed) || !confirmed) {
                p.outro("Reset cancelled.");
                return;
            }
        }

        await checkpoints.remove();
        if (options.all) {
            for (const file of [...knowledgeFiles(paths), paths.report]) {
                await fs.rm(file, { force: true });
            }
        }

        p.log.success(`Deleted ${scope}.`);
        p.outro(options.all ? "The next run starts from scratch." : "The next run starts a new checkpoint; knowledge is kept.");
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}
