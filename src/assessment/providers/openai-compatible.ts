import { z } from 'zod';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider, LlmProviderOptions } from '../../types/index.js';
import type { HttpClient } from '../../utils/http-client.js';
import { LlmResponseError } from '../relevance-assessor.js';

const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

const ChatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable(),
                }),
            })
        )
        .min(1),
    usage: z
        .object({
            prompt_tokens: z.number(),
            completion_tokens: z.number(),
            total_tokens: z.number(),
        })
        .optional(),
});

/**
 * Chat-completions provider for OpenAI and any server speaking the same
 * protocol (Azure deployments, vLLM, LiteLLM proxies, …).
 */
export class OpenAiCompatibleProvider implements LlmProvider {
    readonly name = 'openai';
    readonly supportsStructuredOutput = true;
    readonly model: string;

    private readonly baseUrl: string;
    private readonly apiKey?: string;
    private readonly timeoutMs?: number;

    constructor(
        private readonly http: HttpClient,
        options: LlmProviderOptions
    ) {
        this.model = options.model;
        this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
        this.apiKey = options.apiKey;
        this.timeoutMs = options.timeoutMs;
    }

    async complete(prompt: string, params: LlmCompletionParams = {}): Promise<LlmCompletionResult> {
        const model = params.model ?? this.model;
        const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
        if (params.systemPrompt) messages.push({ role: 'system', content: params.systemPrompt });
        messages.push({ role: 'user', content: prompt });

        const response = await this.http.post(
            `${this.baseUrl}/chat/completions`,
            {
                model,
                messages,
                temperature: params.temperature,
                max_tokens: params.maxTokens,
                response_format: params.jsonMode ? { type: 'json_object' } : undefined,
                stream: false,
            },
            {
                source: 'openai',
                timeout: this.timeoutMs,
                headers: this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {},
            }
        );

        const parsed = ChatCompletionSchema.safeParse(response.data);
        if (!parsed.success) {
            throw new LlmResponseError('Unexpected chat completion payload', response.data);
        }

        const { choices, usage } = parsed.data;
        return {
            text: (choices[0]?.message.content ?? '').trim(),
            usage: {
                promptTokens: usage?.prompt_tokens ?? 0,
                completionTokens: usage?.completion_tokens ?? 0,
                totalTokens: usage?.total_tokens ?? 0,
            },
            model: parsed.data.model ?? model,
            provider: this.name,
        };
    }

    async isAvailable(): Promise<boolean> {
        return Boolean(this.apiKey) || this.baseUrl !== DEFAULT_BASE_URL;
    }
}
