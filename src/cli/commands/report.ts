import * as p from "@clack/prompts";
import chalk from "chalk";
import { CheckpointStore, CognitionBase, TOP_DISCOVERIES, renderReport, writeReport } from "../../index.js";
import { loadResearchConfig } from "../config.js";
import { pathExists, workspacePaths } from "../workspace.js";
import type { WorkspaceCommandOptions } from "./status.js";

export async function reportCommand(options: WorkspaceCommandOptions) {
    p.intro(chalk.bgMagenta.black(" Research Report "));

    try {
        const config = await loadResearchConfig({
            cwd: process.cwd(),
            configPath: options.config,
            env: process.env,
            flags: { workspace: options.workspace },
        });
        const paths = workspacePaths(config);

        if (!(await pathExists(paths.knowledge))) {
            p.log.warn(`No knowledge store in ${chalk.cyan(paths.dir)}. Nothing to report yet.`);
            p.outro("No report written.");
            return;
        }

        const knowledge = CognitionBase.fromConfig(config, paths.knowledge);
        try {
            const checkpoint = await new CheckpointStore(paths.checkpoint).load(knowledge);
            if (!checkpoint) {
                p.log.warn("No checkpoint found; run the research loop first.");
                p.outro("No report written.");
                return;
            }

            const content = renderReport({
                checkpoint,
                discoveries: knowledge.bestOutcomes(checkpoint.objective, TOP_DISCOVERIES),
                knowledge: knowledge.summarize(checkpoint.objective),
            });
            const target = await writeReport(paths.dir, content);
            p.log.success(`Report written to ${chalk.cyan(target)}`);
        } finally {
            knowledge.close();
        }
        p.outro("Done.");
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}
