import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import {
    CONFIDENCE_LEVELS,
    DEFAULT_CONFIG,
    type GrantMapConfig,
} from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Partial configuration as accepted from CLI flags, env vars and the config file.
 * Nested sections may be partial as well.
 */
export type ConfigOverrides = Partial<Omit<GrantMapConfig, 'selection' | 'batch' | 'llm' | 'cache' | 'columns'>> & {
    selection?: Partial<GrantMapConfig['selection']>;
    batch?: Partial<GrantMapConfig['batch']>;
    llm?: Partial<GrantMapConfig['llm']>;
    cache?: Partial<GrantMapConfig['cache']>;
    columns?: {
        grants?: Partial<GrantMapConfig['columns']['grants']>;
        publications?: Partial<GrantMapConfig['columns']['publications']>;
    };
};

/**
 * Raised when the merged configuration fails validation.
 */
export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
        this.name = 'ConfigError';
    }
}

const nonEmpty = z.string().trim().min(1);

const ConfigSchema = z.object({
    grants: nonEmpty,
    publications: nonEmpty,
    out: nonEmpty,
    outputFormat: z.enum(['csv', 'json']),
    workDir: nonEmpty,
    logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
    jsonLogs: z.boolean(),
    selection: z.object({
        maxCandidates: z.number().int().min(1),
        graceYears: z.number().int().min(0),
        temporalFloor: z.number().gt(0).max(1),
        minOverlapRatio: z.number().gt(0).max(1),
        mode: z.enum(['any-signal', 'all-signals']),
    }),
    batch: z.object({
        batchSize: z.number().int().min(1),
        interCallDelayMs: z.number().int().min(0),
        retryDelayMs: z.number().int().min(0),
        autoResume: z.boolean(),
        maxResumes: z.number().int().min(0),
        limit: z.number().int().min(1).optional(),
        minConfidence: z.enum(CONFIDENCE_LEVELS),
    }),
    llm: z.object({
        provider: z.enum(['openai', 'ollama', 'demo']),
        model: nonEmpty,
        baseUrl: z.string().url().optional(),
        apiKeyEnv: nonEmpty,
        temperature: z.number().min(0).max(2),
        maxTokens: z.number().int().min(1),
        timeoutMs: z.number().int().min(1),
        maxRetries: z.number().int().min(0),
    }),
    cache: z.object({
        enabled: z.boolean(),
        ttlHours: z.number().positive(),
    }),
    columns: z.object({
        grants: z.object({
            title: nonEmpty,
            primaryInvestigator: nonEmpty,
            otherInvestigators: nonEmpty,
            startDate: nonEmpty,
            endDate: nonEmpty,
            projectCode: nonEmpty,
            description: nonEmpty,
        }),
        publications: z.object({
            title: nonEmpty,
            year: nonEmpty,
            authors: nonEmpty,
            doi: nonEmpty,
            type: nonEmpty,
            key: nonEmpty,
        }),
    }),
});

/**
 * Load configuration from grantmap.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('grantmap', {
        searchPlaces: ['grantmap.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return result.config as ConfigOverrides;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
    const overrides: ConfigOverrides = {};
    const llm: Partial<GrantMapConfig['llm']> = {};

    // API keys are read where needed (not stored in config)
    if (env['GRANTMAP_LLM_BASE_URL']) llm.baseUrl = env['GRANTMAP_LLM_BASE_URL'];
    if (env['GRANTMAP_LLM_MODEL']) llm.model = env['GRANTMAP_LLM_MODEL'];
    if (Object.keys(llm).length > 0) overrides.llm = llm;

    if (env['GRANTMAP_WORK_DIR']) overrides.workDir = env['GRANTMAP_WORK_DIR'];

    return overrides;
}

/**
 * Merge configuration layers over the defaults.
 * Later layers win; nested sections are merged key by key.
 */
export function mergeConfig(...layers: Array<ConfigOverrides | null | undefined>): ConfigOverrides {
    const present = layers.filter((layer): layer is ConfigOverrides => layer != null);
    const pick = <K extends keyof ConfigOverrides>(key: K) => present.map((layer) => layer[key]);

    return {
        ...DEFAULT_CONFIG,
        ...Object.assign({}, ...present.map(stripUndefined)),
        selection: Object.assign({}, DEFAULT_CONFIG.selection, ...pick('selection').map(stripUndefined)),
        batch: Object.assign({}, DEFAULT_CONFIG.batch, ...pick('batch').map(stripUndefined)),
        llm: Object.assign({}, DEFAULT_CONFIG.llm, ...pick('llm').map(stripUndefined)),
        cache: Object.assign({}, DEFAULT_CONFIG.cache, ...pick('cache').map(stripUndefined)),
        columns: {
            grants: Object.assign(
                {},
                DEFAULT_CONFIG.columns.grants,
                ...pick('columns').map((c) => stripUndefined(c?.grants))
            ),
            publications: Object.assign(
                {},
                DEFAULT_CONFIG.columns.publications,
                ...pick('columns').map((c) => stripUndefined(c?.publications))
            ),
        },
    };
}

/**
 * Validate a merged configuration. Throws ConfigError listing every issue.
 */
export function validateConfig(config: ConfigOverrides): GrantMapConfig {
    const result = ConfigSchema.safeParse(config);
    if (!result.success) {
        const issues = result.error.issues.map((issue) =>
            `${issue.path.join('.') || '(root)'}: ${issue.message}`
        );
        throw new ConfigError('Invalid configuration', issues);
    }
    return result.data;
}

/**
 * Merge configuration from multiple sources and validate it.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<GrantMapConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env);

    return validateConfig(mergeConfig(fileConfig, envConfig, cliFlags));
}

/**
 * Get API key from environment variable.
 * @param name - Environment variable name
 */
export function getApiKey(name: string): string | undefined {
    return process.env[name];
}

/**
 * Drop undefined values so they do not overwrite lower layers.
 */
function stripUndefined<T extends object>(value: T | undefined): Partial<T> {
    if (!value) return {};
    return Object.fromEntries(
        Object.entries(value).filter(([, v]) => v !== undefined)
    ) as Partial<T>;
}
