/**
 * Interface for judgment service adapters (OpenAI-compatible, Ollama).
 *
 * Implementations throw `HttpError` on transport failures; a 429 status is how
 * the relevance assessor recognizes rate limiting.
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /** Default model */
    readonly model: string;

    /** Whether this provider supports structured JSON output */
    readonly supportsStructuredOutput: boolean;

    /**
     * Send a completion request to the LLM.
     * @param prompt - The prompt to send
     * @param params - Additional parameters (temperature, max_tokens, etc.)
     */
    complete(prompt: string, params?: LlmCompletionParams): Promise<LlmCompletionResult>;

    /**
     * Check if the provider is available (e.g., Ollama server is running).
     */
    isAvailable(): Promise<boolean>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model to use (overrides default) */
    model?: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
    /** System prompt */
    systemPrompt?: string;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * LLM provider initialization options.
 */
export interface LlmProviderOptions {
    /** API key (for cloud providers) */
    apiKey?: string;
    /** Base URL (for Ollama or custom endpoints) */
    baseUrl?: string;
    /** Default model */
    model: string;
    /** Request timeout (ms) */
    timeoutMs?: number;
}
