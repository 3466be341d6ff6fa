/**
 * LLM Client Tests — Request shaping, token accounting and provider
 * resolution, with the AI SDK mocked out.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

const { generateText } = vi.hoisted(() => ({ generateText: vi.fn() }));
vi.mock("ai", () => ({ generateText }));

import { LLMClient, withTimeoutSignal } from "../client.js";
import { hasCredentials, resolveLanguageModel } from "../resolve.js";

// --- Helpers ---

function reply(text: string, totalTokens: number | undefined) {
    return { text, usage: { inputTokens: 1, outputTokens: 1, totalTokens } };
}

// --- Tests ---

describe("LLMClient.complete()", () => {
    beforeEach(() => {
        generateText.mockReset();
    });

    it("returns the generated text and counts tokens across calls", async () => {
        generateText.mockResolvedValueOnce(reply("first", 120)).mockResolvedValueOnce(reply("second", 30));
        const client = new LLMClient("test-model", { system: "be brief" });

        expect(await client.complete("hello")).toBe("first");
        expect(await client.complete("again")).toBe("second");
        expect(client.tokensUsed).toBe(150);
    });

    it("sends the prompt with SDK retries disabled and the default temperature", async () => {
        generateText.mockResolvedValueOnce(reply("ok", 5));
        const client = new LLMClient("test-model", { system: "be brief" });

        await client.complete("prompt text");

        const request = generateText.mock.calls[0]?.[0];
        expect(request).toMatchObject({
            model: "test-model",
            system: "be brief",
            prompt: "prompt text",
            temperature: 0.7,
            maxRetries: 0,
        });
        expect(request.abortSignal).toBeInstanceOf(AbortSignal);
    });

    it("passes an explicit temperature through", async () => {
        generateText.mockResolvedValueOnce(reply("ok", 5));
        await new LLMClient("test-model").complete("p", { temperature: 0.2 });
        expect(generateText.mock.calls[0]?.[0].temperature).toBe(0.2);
    });

    it("treats missing usage as zero tokens", async () => {
        generateText.mockResolvedValueOnce(reply("ok", undefined));
        const client = new LLMClient("test-model");
        await client.complete("p");
        expect(client.tokensUsed).toBe(0);
    });

    it("propagates backend errors", async () => {
        generateText.mockRejectedValueOnce(new Error("connection refused"));
        await expect(new LLMClient("test-model").complete("p")).rejects.toThrow("connection refused");
    });
});

describe("withTimeoutSignal()", () => {
    it("aborts when the caller's signal aborts", () => {
        const controller = new AbortController();
        const signal = withTimeoutSignal(60_000, controller.signal);
        expect(signal.aborted).toBe(false);
        controller.abort();
        expect(signal.aborted).toBe(true);
    });

    it("aborts on its own once the timeout passes", async () => {
        const signal = withTimeoutSignal(10);
        await new Promise((resolve) => setTimeout(resolve, 50));
        expect(signal.aborted).toBe(true);
    });
});

describe("provider resolution", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("rejects unknown providers", () => {
        expect(() => resolveLanguageModel("carrier-pigeon")).toThrow("Unsupported LLM provider: carrier-pigeon");
    });

    it("checks the provider's API key variable", () => {
        vi.stubEnv("ANTHROPIC_API_KEY", "");
        expect(hasCredentials("anthropic")).toBe(false);
        vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");
        expect(hasCredentials("anthropic")).toBe(true);
    });

    it("needs no key for a local model", () => {
        expect(hasCredentials("ollama")).toBe(true);
    });
});
