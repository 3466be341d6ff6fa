import * as p from "@clack/prompts";
import chalk from "chalk";
import { CheckpointStore, CognitionBase, CorruptStateError, formatNumber, type Checkpoint } from "../../index.js";
import { loadResearchConfig, type ConfigFlags } from "../config.js";
import { pathExists, workspacePaths } from "../workspace.js";

export interface WorkspaceCommandOptions extends Pick<ConfigFlags, "workspace"> {
    config?: string;
}

export async function statusCommand(options: WorkspaceCommandOptions) {
    p.intro(chalk.bgMagenta.black(" Research Status "));

    try {
        const config = await loadResearchConfig({
            cwd: process.cwd(),
            configPath: options.config,
            env: process.env,
            flags: { workspace: options.workspace },
        });
        const paths = workspacePaths(config);

        let checkpoint: Checkpoint | null;
        try {
            checkpoint = await new CheckpointStore(paths.checkpoint).load();
        } catch (err) {
            if (!(err instanceof CorruptStateError)) throw err;
            p.log.error(chalk.red(err.message));
            process.exitCode = 1;
            return;
        }

        if (!checkpoint) {
            p.log.warn(`No research found in ${chalk.cyan(paths.dir)}. Start one with ${chalk.cyan("research-loop run")}.`);
            p.outro("Nothing to show.");
            return;
        }

        const termination = checkpoint.termination
            ? ` (${checkpoint.termination.reason}${checkpoint.termination.fatal ? ", fatal" : ""})`
            : "";
        p.log.info(chalk.bold(`Objective: ${checkpoint.objective}`));
        p.log.message(
            [
                `Status:      ${checkpoint.status}${termination}`,
                `Iterations:  ${checkpoint.iteration} / ${config.max_iterations}`,
                `Experiments: ${checkpoint.total_experiments}`,
                `Research:    ${formatNumber(Math.round(checkpoint.elapsed_research_ms / 100) / 10)}s`,
                `Updated:     ${checkpoint.updated_at}`,
            ].join("\n"),
        );
        if (checkpoint.termination?.detail) p.log.warn(checkpoint.termination.detail);

        if (await pathExists(paths.knowledge)) {
            const knowledge = CognitionBase.fromConfig(config, paths.knowledge);
            try {
                const summary = knowledge.summarize(checkpoint.objective);
                const counts = summary.outcomes.byClassification;
                p.log.message(
                    [
                        `Outcomes:    ${chalk.green(`${counts.success} success`)}, ${chalk.yellow(`${counts.partial} partial`)}, ${chalk.red(`${counts.failure} failure`)}, ${counts.inconclusive} inconclusive`,
                        `Knowledge:   ${summary.entries.active} active, ${summary.entries.consolidated} consolidated`,
                    ].join("\n"),
                );
                const best = knowledge.bestOutcomes(checkpoint.objective, 1)[0];
                if (best) p.log.success(`Best so far: ${chalk.bold(best.title)} (quality ${formatNumber(best.quality)})`);
            } finally {
                knowledge.close();
            }
        }

        p.outro(checkpoint.status === "running" ? "Run again to resume." : "Research finished.");
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}
