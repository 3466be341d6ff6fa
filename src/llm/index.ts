export { LLMClient, withTimeoutSignal } from "./client.js";
export type { CompleteOptions, LLMClientOptions, ReasoningBackend } from "./client.js";
export { resolveLanguageModel, hasCredentials } from "./resolve.js";
