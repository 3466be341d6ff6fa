import { createOpenAI, openai } from "@ai-sdk/openai";
import { google } from "@ai-sdk/google";
import { anthropic } from "@ai-sdk/anthropic";
import type { LanguageModel } from "ai";

const OLLAMA_BASE_URL = "http://localhost:11434/v1";

/**
 * Resolves a LanguageModel based on provider and model names.
 * Falls back to RESEARCH_PROVIDER, RESEARCH_MODEL and RESEARCH_BASE_URL.
 * Defaults to OpenAI gpt-4o-mini if nothing is specified.
 *
 * `ollama` talks to a local server through its OpenAI-compatible endpoint,
 * so a free local model works without any API key.
 */
export function resolveLanguageModel(
    providerName?: string,
    modelId?: string,
    baseUrl?: string,
): LanguageModel {
    const provider = providerName || process.env.RESEARCH_PROVIDER || "openai";
    const model = modelId || process.env.RESEARCH_MODEL;
    const endpoint = baseUrl || process.env.RESEARCH_BASE_URL;

    switch (provider.toLowerCase()) {
        case "openai":
            return endpoint
                ? createOpenAI({ baseURL: endpoint }).chat(model || "gpt-4o-mini")
                : openai(model || "gpt-4o-mini");
        case "google":
            return google(model || "gemini-1.5-pro");
        case "anthropic":
            return anthropic(model || "claude-3-5-sonnet-latest");
        case "ollama":
            return createOpenAI({ baseURL: endpoint || OLLAMA_BASE_URL, apiKey: "ollama" }).chat(model || "mistral");
        default:
            throw new Error(`Unsupported LLM provider: ${provider}`);
    }
}

/**
 * Whether the selected provider can authenticate. Local models need no key.
 */
export function hasCredentials(providerName: string): boolean {
    switch (providerName.toLowerCase()) {
        case "openai":
            return Boolean(process.env.OPENAI_API_KEY);
        case "google":
            return Boolean(process.env.GOOGLE_GENERATIVE_AI_API_KEY);
        case "anthropic":
            return Boolean(process.env.ANTHROPIC_API_KEY);
        default:
            return true;
    }
}
