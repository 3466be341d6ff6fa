export { runCommand } from "./run.js";
export type { RunOptions } from "./run.js";
export { statusCommand } from "./status.js";
export type { WorkspaceCommandOptions } from "./status.js";
export { reportCommand } from "./report.js";
export { resetCommand } from "./reset.js";
export type { ResetOptions } from "./reset.js";
