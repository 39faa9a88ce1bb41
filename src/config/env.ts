/**
 * Environment configuration
 *
 * The executables load `.env` through dotenv before calling loadConfig.
 */

import { z } from 'zod';
import type { EngineLimits } from '../types/options.js';
import { DEFAULTS } from '../types/options.js';
import { fromZodError } from './schemas.js';

const unset = (value: unknown) => (typeof value === 'string' && value.trim() === '' ? undefined : value);

const positiveInteger = z.preprocess(
    unset,
    z.string().trim().regex(/^[1-9]\d*$/, 'must be a positive integer').transform(Number).optional()
);

const optionalText = z.preprocess(unset, z.string().trim().optional());

export const EnvSchema = z.object({
    RULEBOOK_PATH: optionalText,
    RULEBOOK_MODE: optionalText,
    RULEBOOK_MAX_CLAUSES: positiveInteger,
    RULEBOOK_MAX_RESOLUTIONS: positiveInteger,
});

export interface RulebookConfig {
    /** Rulebook file; the bundled rulebook when absent */
    rulebookPath?: string;
    defaultMode: string;
    limits: EngineLimits;
}

/**
 * Read configuration from environment variables. Throws ConfigurationError
 * naming the offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RulebookConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw fromZodError(result.error, 'environment');
    }

    const vars = result.data;
    return {
        rulebookPath: vars.RULEBOOK_PATH,
        defaultMode: vars.RULEBOOK_MODE ?? DEFAULTS.defaultMode,
        limits: {
            maxClauses: vars.RULEBOOK_MAX_CLAUSES ?? DEFAULTS.maxClauses,
            maxResolutions: vars.RULEBOOK_MAX_RESOLUTIONS ?? DEFAULTS.maxResolutions,
        },
    };
}
