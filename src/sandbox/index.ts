export { ProcessSandbox, INTERRUPTED_DIAGNOSTIC } from "./sandbox.js";
export type { Sandbox, SandboxRunOptions, ProcessSandboxOptions } from "./sandbox.js";
export { BoundedOutput, SentinelScanner, TRUNCATION_MARKER } from "./output.js";
export { RUNTIMES, NETWORK_SENTINEL, OUT_OF_MEMORY_SENTINELS, materializeProgram } from "./runtimes.js";
export type { RuntimeSpec, RuntimeLaunch } from "./runtimes.js";
export { readProcessTreeRssMb } from "./memory.js";
