import { z } from 'zod';
import type {
    Assessment,
    CandidateGrant,
    ConfidenceLevel,
    LlmProvider,
    Publication,
    Verdict,
} from '../types/index.js';
import { CONFIDENCE_LEVELS } from '../types/index.js';
import type { ResponseCache } from '../cache/response-cache.js';
import { HttpError } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { buildRelevancePrompt, SYSTEM_PROMPT } from './prompt.js';

/**
 * The service answered, but not in the expected envelope.
 */
export class LlmResponseError extends Error {
    constructor(message: string, public readonly response?: unknown) {
        super(message);
        this.name = 'LlmResponseError';
    }
}

export const UNPARSEABLE_REASONING = 'Relevance assessment response could not be parsed';

const VerdictSchema = z.object({
    confidence: z.string().transform((value, ctx) => {
        const level = parseConfidence(value);
        if (!level) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown confidence level: ${value}` });
            return z.NEVER;
        }
        return level;
    }),
    reasoning: z.string().trim().min(1),
});

/**
 * Map a free-form confidence label onto the enum ("very high", "VeryHigh", …).
 */
export function parseConfidence(value: string): ConfidenceLevel | null {
    const squashed = value.toLowerCase().replace(/[^a-z]/g, '');
    return CONFIDENCE_LEVELS.find((level) => level.toLowerCase().replace(/ /g, '') === squashed) ?? null;
}

/**
 * Parse a judgment response. Returns null when no well-formed verdict is found.
 */
export function parseVerdict(text: string): Verdict | null {
    const jsonMatch = /\{[\s\S]*\}/.exec(text);
    if (!jsonMatch) return null;

    let raw: unknown;
    try {
        raw = JSON.parse(jsonMatch[0]);
    } catch {
        return null;
    }

    const result = VerdictSchema.safeParse(raw);
    return result.success ? result.data : null;
}

/**
 * Low verdict substituted for a malformed response.
 */
export function fallbackVerdict(): Verdict {
    return { confidence: 'Low', reasoning: UNPARSEABLE_REASONING };
}

/**
 * Low verdict recorded when the judgment service could not be reached.
 */
export function transientVerdict(reason: string): Verdict {
    return { confidence: 'Low', reasoning: `Assessment unavailable: ${reason}` };
}

export interface RelevanceAssessorOptions {
    temperature?: number;
    maxTokens?: number;
    cache?: ResponseCache;
}

/**
 * Asks the judgment service whether a pre-filtered grant plausibly funded a
 * publication. Every outcome is returned as an `Assessment`; nothing throws.
 */
export class RelevanceAssessor {
    constructor(
        private readonly provider: LlmProvider,
        private readonly options: RelevanceAssessorOptions = {}
    ) {}

    async assess(publication: Publication, candidate: CandidateGrant): Promise<Assessment> {
        const logger = getLogger();
        const prompt = buildRelevancePrompt(publication, candidate);
        const cacheKey = `${this.provider.name}:${this.provider.model}:${prompt}`;

        const cached = this.readCache(cacheKey);
        if (cached) {
            return { kind: 'verdict', verdict: cached, fallback: false, cached: true };
        }

        let text: string;
        try {
            const completion = await this.provider.complete(prompt, {
                systemPrompt: SYSTEM_PROMPT,
                temperature: this.options.temperature,
                maxTokens: this.options.maxTokens,
                jsonMode: this.provider.supportsStructuredOutput,
            });
            text = completion.text;
        } catch (error) {
            if (error instanceof LlmResponseError) {
                logger.warn({ publication: publication.key, error: error.message }, 'Malformed completion envelope, using fallback verdict');
                return { kind: 'verdict', verdict: fallbackVerdict(), fallback: true, cached: false };
            }
            return classifyFailure(error);
        }

        const verdict = parseVerdict(text);
        if (!verdict) {
            logger.warn(
                { publication: publication.key, grant: candidate.grant.projectCode, response: text.slice(0, 200) },
                'Malformed relevance response, using fallback verdict'
            );
            return { kind: 'verdict', verdict: fallbackVerdict(), fallback: true, cached: false };
        }

        this.options.cache?.set(cacheKey, verdict);
        return { kind: 'verdict', verdict, fallback: false, cached: false };
    }

    private readCache(key: string): Verdict | null {
        const entry = this.options.cache?.get(key);
        if (entry == null) return null;
        const parsed = VerdictSchema.safeParse(entry);
        return parsed.success ? parsed.data : null;
    }
}

/**
 * Sort a provider failure into rate-limit vs transient.
 */
export function classifyFailure(error: unknown): Assessment {
    if (error instanceof HttpError) {
        if (error.isRateLimit) {
            return { kind: 'rate-limit', message: error.message, retryAfterMs: error.retryAfterMs };
        }
        return { kind: 'transient', reason: error.message };
    }

    return {
        kind: 'transient',
        reason: error instanceof Error ? error.message : String(error),
    };
}
