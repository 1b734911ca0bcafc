import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type CiteTrailConfig, type CiteTrailOverrides } from '../types/index.js';
import { InputError } from './errors.js';

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

/**
 * Shape of citetrail.config.json. Every key is optional.
 */
const ConfigFileSchema = z
    .object({
        scholar: z
            .object({
                baseUrl: z.string().url(),
                language: z.string().min(1),
                profilePageSize: positiveInt,
                resultsPerPage: positiveInt,
                maxAttempts: positiveInt,
                timeoutMs: positiveInt,
                pacing: z
                    .object({ minMs: nonNegativeInt, maxMs: nonNegativeInt })
                    .refine((range) => range.minMs <= range.maxMs, 'pacing.minMs must not exceed pacing.maxMs'),
                rateLimitCooldownMs: nonNegativeInt,
            })
            .partial(),
        metadata: z
            .object({
                email: z.string().email(),
                crossrefUrl: z.string().url(),
                openalexUrl: z.string().url(),
                semanticScholarUrl: z.string().url(),
                maxAttempts: positiveInt,
                timeoutMs: positiveInt,
                paperDelayMs: nonNegativeInt,
            })
            .partial(),
        minYear: z.number().int(),
        outDir: z.string().min(1),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial()
    .strict();

export interface ResolvedConfig {
    config: CiteTrailConfig;

    /** Path of the config file that was applied, null when defaults were used */
    filepath: string | null;
}

/**
 * citetrail.config.json from `searchFrom`, validated. Null when there is none.
 */
async function loadConfigFile(
    searchFrom?: string
): Promise<{ overrides: CiteTrailOverrides; filepath: string } | null> {
    const explorer = cosmiconfig('citetrail', {
        searchPlaces: ['citetrail.config.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) {
        return null;
    }

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new InputError(`Invalid config file ${result.filepath}: ${problems.join('; ')}`);
    }

    return { overrides: parsed.data, filepath: result.filepath };
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > config file > defaults
 *
 * Overrides must omit keys they do not set; an explicit undefined would
 * shadow the layer below.
 */
export function mergeConfig(
    fileConfig: CiteTrailOverrides | null,
    cliFlags: CiteTrailOverrides
): CiteTrailConfig {
    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...cliFlags,
        // Deep merge nested objects
        scholar: {
            ...DEFAULT_CONFIG.scholar,
            ...fileConfig?.scholar,
            ...cliFlags.scholar,
        },
        metadata: {
            ...DEFAULT_CONFIG.metadata,
            ...fileConfig?.metadata,
            ...cliFlags.metadata,
        },
    };
}

/**
 * Config file (searched from `searchFrom`, default the working directory)
 * merged under the CLI flags.
 */
export async function resolveConfig(
    cliFlags: CiteTrailOverrides,
    searchFrom?: string
): Promise<ResolvedConfig> {
    const file = await loadConfigFile(searchFrom);
    return {
        config: mergeConfig(file?.overrides ?? null, cliFlags),
        filepath: file?.filepath ?? null,
    };
}
