import * as p from "@clack/prompts";
import chalk from "chalk";
import ora from "ora";
import fs from "fs/promises";
import {
    Analyst,
    CheckpointStore,
    CognitionBase,
    LLMClient,
    ProcessSandbox,
    Researcher,
    ResearchOrchestrator,
    createResearchLogger,
    flushLogger,
    hasCredentials,
    resolveLanguageModel,
    type TerminationReport,
} from "../../index.js";
import { loadResearchConfig, type ConfigFlags } from "../config.js";
import { workspacePaths } from "../workspace.js";

export interface RunOptions extends ConfigFlags {
    config?: string;
    yes?: boolean;
}

const EXAMPLE_OBJECTIVES = [
    "Find the fastest way to sort one million random integers",
    "Estimate pi to six decimal places with the fewest random samples",
    "Find a hash function with the fewest collisions on short ASCII keys",
    "Compare string-building strategies for concatenating 100k short strings",
];

const CLASSIFICATION_COLORS = {
    success: chalk.green,
    partial: chalk.yellow,
    failure: chalk.red,
    inconclusive: chalk.gray,
};

/**
 * The objective to research: from the command line, from the checkpoint
 * (resume), or picked interactively. Null when the user cancels.
 */
async function resolveObjective(given: string, checkpoints: CheckpointStore, yes: boolean): Promise<string | null> {
    if (given.length > 0) return given;

    const existing = await checkpoints.load();
    if (existing) {
        if (yes) return existing.objective;
        const resume = await p.confirm({
            message: `Resume research on ${chalk.cyan(`"${existing.objective}"`)} (${existing.iteration} iterations done)?`,
            initialValue: true,
        });
        if (p.isCancel(resume)) return null;
        if (resume) return existing.objective;
    }

    const selection = await p.select({
        message: "What should be researched?",
        options: [
            ...EXAMPLE_OBJECTIVES.map((objective) => ({ value: objective, label: objective })),
            { value: "", label: chalk.green("+ Enter my own objective") },
        ],
    });
    if (p.isCancel(selection)) return null;
    if (selection !== "") return selection;

    const custom = await p.text({
        message: "Research objective:",
        placeholder: "Find the fastest way to ...",
        validate: (v) => (!v || v.trim().length < 5 ? "Describe the objective in a few words." : undefined),
    });
    if (p.isCancel(custom)) return null;
    return custom.trim();
}

function describeTermination(report: TerminationReport): string {
    const summary = `${report.iterations} iterations, ${report.total_experiments} experiments`;
    switch (report.reason) {
        case "iteration_budget":
            return `Iteration budget reached (${summary}).`;
        case "time_budget":
            return `Research time budget reached (${summary}).`;
        case "interrupted":
            return `Interrupted; progress saved (${summary}). Run again to resume.`;
        default:
            return `${report.detail ?? report.reason} (${summary})`;
    }
}

export async function runCommand(objectiveWords: string[], options: RunOptions) {
    p.intro(chalk.bgMagenta.black(" Research Loop "));

    try {
        const config = await loadResearchConfig({
            cwd: process.cwd(),
            configPath: options.config,
            env: process.env,
            flags: options,
        });
        const paths = workspacePaths(config);
        await fs.mkdir(paths.dir, { recursive: true });

        const checkpoints = new CheckpointStore(paths.checkpoint);
        const objective = await resolveObjective(objectiveWords.join(" ").trim(), checkpoints, options.yes ?? false);
        if (!objective) {
            p.outro("Research cancelled.");
            return;
        }

        if (!hasCredentials(config.llm.provider)) {
            throw new Error(
                `No API key for provider "${config.llm.provider}". Set it in .env, or use --provider ollama for a local model.`,
            );
        }

        p.log.info(chalk.bold(`Objective: ${objective}`));
        p.log.info(chalk.dim(`Workspace: ${paths.dir}`));

        const logger = createResearchLogger({ logFile: paths.log, level: config.log_level });
        const knowledge = CognitionBase.fromConfig(config, paths.knowledge, logger);
        const timeoutMs = config.generation_timeout_seconds * 1000;
        const client = new LLMClient(resolveLanguageModel(config.llm.provider, config.llm.model, config.llm.base_url), {
            timeoutMs,
        });
        const researcher = new Researcher({
            backend: client,
            temperature: config.hypothesis_temperature,
            timeoutMs,
            maxValidationRetries: config.max_validation_retries,
            logger,
        });

        const controller = new AbortController();
        const spinner = ora("Starting research...").start();
        const onInterrupt = () => {
            if (controller.signal.aborted) {
                spinner.fail(chalk.red("Forced exit."));
                process.exit(130);
            }
            spinner.text = "Interrupt received: stopping experiments and saving a checkpoint (Ctrl+C again to force)";
            controller.abort();
        };
        process.on("SIGINT", onInterrupt);

        const orchestrator = new ResearchOrchestrator({
            objective,
            config,
            researcher,
            analyst: new Analyst({ improvementThreshold: config.improvement_threshold }),
            sandbox: new ProcessSandbox({ logger }),
            knowledge,
            checkpoints,
            workspaceDir: paths.dir,
            signal: controller.signal,
            logger,
        });

        orchestrator.on("run:start", ({ resumedFrom }) => {
            if (resumedFrom !== null) spinner.info(`Resuming after iteration ${resumedFrom}.`).start();
        });
        orchestrator.on("state:change", ({ to, iteration }) => {
            if (to === "generating") spinner.text = `Iteration ${iteration}: drafting hypotheses...`;
            if (to === "executing") spinner.text = `Iteration ${iteration}: running experiments...`;
        });
        orchestrator.on("generation:retry", ({ attempt, delayMs, error }) => {
            spinner.warn(chalk.yellow(`Generation attempt ${attempt} failed (${error}); retrying in ${delayMs / 1000}s.`)).start();
        });
        orchestrator.on("outcome:scored", ({ outcome }) => {
            const color = CLASSIFICATION_COLORS[outcome.classification];
            spinner.stopAndPersist({ symbol: color("●"), text: `${color(outcome.classification.padEnd(12))} ${outcome.insight}` });
            spinner.start();
        });
        orchestrator.on("iteration:complete", ({ iteration, summary }) => {
            spinner.succeed(chalk.bold(`Iteration ${iteration}: ${summary}`)).start();
        });

        let report: TerminationReport;
        try {
            report = await orchestrator.run();
        } finally {
            process.off("SIGINT", onInterrupt);
            spinner.stop();
            knowledge.close();
            await flushLogger(logger);
        }
        p.log.info(chalk.dim(`Tokens used: ${client.tokensUsed}`));

        if (report.fatal) {
            p.log.error(chalk.red(describeTermination(report)));
            p.outro(chalk.red("Research stopped on an unrecoverable error."));
            process.exitCode = 1;
            return;
        }

        p.log.success(describeTermination(report));
        if (report.report_path) p.log.info(`Report: ${chalk.cyan(report.report_path)}`);
        p.outro("Research finished.");
    } catch (err) {
        p.log.error(chalk.red(err instanceof Error ? err.message : String(err)));
        process.exitCode = 1;
    }
}
