import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import type { HttpClient } from '../../utils/http-client.js';
import { getLogger } from '../../utils/logger.js';
import { LlmResponseError } from '../relevance-assessor.js';

const DEFAULT_BASE_URL = 'http://localhost:11434';

const OllamaChatSchema = z.object({
    model: z.string().optional(),
    message: z.object({
        content: z.string(),
    }),
    prompt_eval_count: z.number().optional(),
    eval_count: z.number().optional(),
});

/**
 * Local Ollama server (`/api/chat`, non-streaming).
 */
export class OllamaProvider implements LlmProvider {
    readonly name = 'ollama';
    readonly supportsStructuredOutput = true;
    readonly model: string;

    private readonly baseUrl: string;
    private readonly timeoutMs?: number;

    constructor(
        private readonly http: HttpClient,
        options: LlmProviderOptions
    ) {
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.model;
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) messages.push({ role: 'system', content: params.systemPrompt });
        messages.push({ role: 'user', content: prompt });

        const response = await this.http.post(
            `${this.baseUrl}/api/chat`,
            {
                model,
                messages,
                stream: false,
                format: params.jsonMode ? 'json' : undefined,
                options: {
                    temperature: params.temperature,
                    num_predict: params.maxTokens,
                },
            },
            { source: 'ollama', timeout: this.timeoutMs }
        );

        const parsed = OllamaChatSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new LlmResponseError('Unexpected Ollama chat payload', response.data);
        }

        const promptTokens = parsed.data.prompt_eval_count ?? 0;
        const completionTokens = parsed.data.eval_count ?? 0;
        return {
            text: parsed.data.message.content.trim(),
            usage: { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens },
            model: parsed.data.model ?? model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.http.get(`${this.baseUrl}/api/tags`, { source: 'ollama', timeout: 3000 });
            return response.ok;
        } catch (error) {
            getLogger().debug({ error, baseUrl: this.baseUrl }, 'Ollama server not reachable');
            return false;
        }
    }
}
