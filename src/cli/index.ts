#!/usr/bin/env node

import dotenv from "dotenv";

dotenv.config({ quiet: true });

import { Command } from "commander";
import { reportCommand, resetCommand, runCommand, statusCommand } from "./commands/index.js";

const program = new Command();

program
    .name("research-loop")
    .description("Autonomous research loop: hypothesize, experiment, learn, repeat")
    .version("1.0.0");

program
    .command("run")
    .description("Start or resume research on an objective")
    .argument("[objective...]", "Research objective (omit to resume or pick one interactively)")
    .option("-c, --config <path>", "Path to a research.config.json file")
    .option("-w, --workspace <dir>", "Workspace directory for checkpoint, knowledge and logs")
    .option("--max-iterations <number>", "Stop after this many completed iterations")
    .option("--experiments <number>", "Hypotheses generated per iteration")
    .option("--timeout <seconds>", "Wall-clock limit per experiment")
    .option("--memory <mb>", "Memory limit per experiment")
    .option("--provider <provider>", "LLM provider override (openai|google|anthropic|ollama)")
    .option("--model <model>", "LLM model override")
    .option("--base-url <url>", "Base URL for an OpenAI-compatible or Ollama endpoint")
    .option("-y, --yes", "Resume without asking for confirmation")
    .action(runCommand);

program
    .command("status")
    .description("Show the checkpoint and knowledge summary of a workspace")
    .option("-c, --config <path>", "Path to a research.config.json file")
    .option("-w, --workspace <dir>", "Workspace directory")
    .action(statusCommand);

program
    .command("report")
    .description("Regenerate research_report.md from the workspace")
    .option("-c, --config <path>", "Path to a research.config.json file")
    .option("-w, --workspace <dir>", "Workspace directory")
    .action(reportCommand);

program
    .command("reset")
    .description("Delete the checkpoint so research starts over")
    .option("-c, --config <path>", "Path to a research.config.json file")
    .option("-w, --workspace <dir>", "Workspace directory")
    .option("--all", "Also delete the knowledge store and the report")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(resetCommand);

await program.parseAsync(process.argv);
