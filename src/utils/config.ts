import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type BibHarvestConfig, type ProviderConfig } from '../types/index.js';
import { ConfigurationError } from './errors.js';
import { LOG_LEVELS, getLogger } from './logger.js';

/**
 * Partial configuration accepted from each layer.
 */
export type ConfigOverrides = Partial<Omit<BibHarvestConfig, 'scopus'>> & {
    scopus?: Partial<ProviderConfig>;
};

/**
 * One untyped layer (config file or environment); checked by configSchema after merging.
 */
interface ConfigLayer {
    values: Record<string, unknown>;
    scopus: Record<string, unknown>;
}

const providerSchema = z.object({
    apiKey: z.string().min(1).optional(),
    apiUrl: z.string().url(),
    connectTimeoutMs: z.number().int().positive(),
    requestTimeoutMs: z.number().int().positive(),
    maxResultsPerRequest: z.number().int().positive(),
    retryCount: z.number().int().nonnegative(),
    retryBaseDelayMs: z.number().nonnegative(),
    retryBackoff: z.number().positive(),
    maxBackoffMs: z.number().nonnegative(),
    rateLimitPauseMs: z.number().nonnegative(),
    userAgent: z.string().min(1),
});

const configSchema = z.object({
    dbPath: z.string().min(1),
    requestsDir: z.string().min(1),
    maxResults: z.number().int().positive(),
    pageSize: z.number().int().positive(),
    logLevel: z.enum(LOG_LEVELS),
    jsonLogs: z.boolean(),
    scopus: providerSchema,
});

/**
 * Load configuration from bibharvest.config.json using cosmiconfig.
 * Returns null if no config file is found (defaults then apply).
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigLayer | null> {
    const explorer = cosmiconfig('bibharvest', {
        searchPlaces: ['bibharvest.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return asLayer(result.config);
        }
    } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(env: NodeJS.ProcessEnv): ConfigLayer {
    const read = (name: string): string | undefined => {
        const value = env[name]?.trim();
        return value ? value : undefined;
    };
    const readNumber = (name: string): number | undefined => {
        const value = read(name);
        return value === undefined ? undefined : Number(value);
    };

    return {
        values: definedEntries({
            dbPath: read('BIBHARVEST_DB_PATH'),
            requestsDir: read('BIBHARVEST_REQUESTS_DIR'),
            logLevel: read('BIBHARVEST_LOG_LEVEL'),
        }),
        scopus: definedEntries({
            apiKey: read('SCOPUS_API_KEY'),
            apiUrl: read('SCOPUS_API_URL'),
            connectTimeoutMs: readNumber('SCOPUS_CONNECT_TIMEOUT_MS'),
            requestTimeoutMs: readNumber('SCOPUS_REQUEST_TIMEOUT_MS'),
            maxResultsPerRequest: readNumber('SCOPUS_MAX_RESULTS_PER_REQUEST'),
            retryCount: readNumber('SCOPUS_RETRY_COUNT'),
            retryBaseDelayMs: readNumber('SCOPUS_RETRY_BASE_DELAY_MS'),
            retryBackoff: readNumber('SCOPUS_RETRY_BACKOFF'),
            rateLimitPauseMs: readNumber('SCOPUS_RATE_LIMIT_PAUSE_MS'),
            userAgent: read('BIBHARVEST_USER_AGENT'),
        }),
    };
}

/**
 * Merge configuration from multiple sources and validate the result.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { env?: NodeJS.ProcessEnv; searchFrom?: string } = {}
): Promise<BibHarvestConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars(options.env ?? process.env);
    const { scopus: scopusFlags, ...flags } = cliFlags;

    // Deep merge with precedence
    const merged = {
        ...DEFAULT_CONFIG,
        ...fileConfig?.values,
        ...envConfig.values,
        ...definedEntries(flags),
        scopus: {
            ...DEFAULT_CONFIG.scopus,
            ...fileConfig?.scopus,
            ...envConfig.scopus,
            ...definedEntries(scopusFlags ?? {}),
        },
    };

    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }

    return parsed.data;
}

function asLayer(value: unknown): ConfigLayer {
    if (!isRecord(value)) {
        throw new ConfigurationError('Config file must contain a JSON object');
    }
    const { scopus = {}, ...values } = value;
    if (!isRecord(scopus)) {
        throw new ConfigurationError('Config file field "scopus" must be an object');
    }
    return { values, scopus };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function definedEntries(value: object): Record<string, unknown> {
    return Object.fromEntries(Object.entries(value).filter(([, v]) => v !== undefined));
}
