/**
 * LLM Client — Thin wrapper around the Vercel AI SDK.
 *
 * The research loop only needs `complete(prompt, temperature) -> text`, so
 * that is the `ReasoningBackend` seam every agent depends on. `LLMClient`
 * is the AI SDK implementation; tests and alternative backends implement
 * the interface directly.
 *
 * Every call is bounded by a caller-side timeout so a hung backend cannot
 * stall the loop. SDK-level retries are off: the orchestrator owns backoff.
 */
import type { LanguageModel } from "ai";
import { generateText } from "ai";

/** Options for a single completion request. */
export interface CompleteOptions {
    temperature?: number;
    /** Aborts the request (e.g. on user interrupt). */
    signal?: AbortSignal;
    /** Overrides the client's default timeout. */
    timeoutMs?: number;
}

/** The swappable reasoning backend used for drafting hypotheses. */
export interface ReasoningBackend {
    complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export interface LLMClientOptions {
    /** System prompt sent with every request. */
    system?: string;
    /** Default caller-side timeout. */
    timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 120_000;

/**
 * Combine the caller's abort signal with a timeout signal.
 */
export function withTimeoutSignal(timeoutMs: number, signal?: AbortSignal): AbortSignal {
    const timeout = AbortSignal.timeout(timeoutMs);
    return signal ? AbortSignal.any([signal, timeout]) : timeout;
}

export class LLMClient implements ReasoningBackend {
    public readonly model: LanguageModel;
    /** Tokens consumed across all calls made through this client. */
    public tokensUsed = 0;

    private readonly system: string | undefined;
    private readonly timeoutMs: number;

    constructor(model: LanguageModel, options: LLMClientOptions = {}) {
        this.model = model;
        this.system = options.system;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    }

    /**
     * Generate a free-form text completion.
     */
    async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
        const result = await generateText({
            model: this.model,
            system: this.system,
            prompt,
            temperature: options.temperature ?? 0.7,
            maxRetries: 0,
            abortSignal: withTimeoutSignal(options.timeoutMs ?? this.timeoutMs, options.signal),
        });

        this.tokensUsed += result.usage.totalTokens ?? 0;
        return result.text;
    }
}
