import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import { createInvalidConfigError } from './types/errors.js';

const ConfigSchema = z.object({
    VOCAB_SPARQL_ENDPOINT: z.string().url().optional(),
    VOCAB_BASE_URI: z.string().url().optional(),
    VOCAB_PREFERRED_LANGUAGES: z.string().optional(),
    VOCAB_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface VocabularyEnvConfig {
    sparqlEndpoint?: string;
    baseUri?: string;
    preferredLanguages: string[];
    fetchTimeoutMs: number;
}

/**
 * Reads configuration from the environment. Unset variables take their defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): VocabularyEnvConfig {
    // Treat empty strings as unset
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );

    const parsed = ConfigSchema.safeParse(present);
    if (!parsed.success) {
        throw createInvalidConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
        );
    }

    const data = parsed.data;
    const languages = data.VOCAB_PREFERRED_LANGUAGES
        ?.split(',')
        .map((lang) => lang.trim().toLowerCase())
        .filter((lang) => lang.length > 0);

    return {
        sparqlEndpoint: data.VOCAB_SPARQL_ENDPOINT,
        baseUri: data.VOCAB_BASE_URI,
        preferredLanguages: languages && languages.length > 0 ? languages : [...DEFAULTS.preferredLanguages],
        fetchTimeoutMs: data.VOCAB_FETCH_TIMEOUT_MS ?? DEFAULTS.fetchTimeoutMs,
    };
}
