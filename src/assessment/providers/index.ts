import type { LlmConfig, LlmProvider } from '../../types/index.js';
import { getApiKey } from '../../utils/config.js';
import type { HttpClient } from '../../utils/http-client.js';
import { DemoProvider } from './demo.js';
import { OllamaProvider } from './ollama.js';
import { OpenAiCompatibleProvider } from './openai-compatible.js';

export { DemoProvider } from './demo.js';
export { OllamaProvider } from './ollama.js';
export { OpenAiCompatibleProvider } from './openai-compatible.js';

/**
 * Resolve the judgment provider based on config.
 */
export function createProvider(config: LlmConfig, http: HttpClient): LlmProvider {
    const options = {
        model: config.model,
        baseUrl: config.baseUrl,
        timeoutMs: config.timeoutMs,
    };

    switch (config.provider) {
        case 'demo':
            return new DemoProvider();
        case 'ollama':
            return new OllamaProvider(http, options);
        case 'openai':
        default:
            return new OpenAiCompatibleProvider(http, { ...options, apiKey: getApiKey(config.apiKeyEnv) });
    }
}
