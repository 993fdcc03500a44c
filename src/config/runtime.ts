import { z } from 'zod';
import { roundMoney } from '../economy/currency.js';
import { AppError } from '../util/errors.js';

export const DEFAULT_STAKE = 100;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Runtime = {
    production: boolean;
    verbose: boolean;
    logLevel: LogLevel;
    pretty: boolean;
    stake: number;
    seed?: number;
};

export class ConfigError extends AppError {
    readonly issues: string[];
    constructor(issues: string[]) {
        super('ERR_CONFIG', `Invalid configuration: ${issues.join('; ')}`);
        this.issues = issues;
    }
}

const flag = z
    .enum(['true', 'false', '1', '0'], { errorMap: () => ({ message: 'Expected true or false' }) })
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
    ROULETTE_STAKE: z.coerce
        .number()
        .finite()
        .transform(roundMoney)
        .refine((n) => n > 0, 'Stake must be at least 0.01')
        .default(DEFAULT_STAKE),
    ROULETTE_SEED: z.coerce.number().int().optional(),
    ROULETTE_PRODUCTION: flag.default('false'),
    ROULETTE_VERBOSE: flag.default('false'),
    LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

const KEYS = ['ROULETTE_STAKE', 'ROULETTE_SEED', 'ROULETTE_PRODUCTION', 'ROULETTE_VERBOSE', 'LOG_LEVEL'] as const;

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    // Blank variables count as unset
    const picked: Record<string, string> = {};
    for (const key of KEYS) {
        const v = env[key]?.trim();
        if (v) picked[key] = v.toLowerCase();
    }

    const parsed = envSchema.safeParse(picked);
    if (!parsed.success) {
        throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
    }
    const cfg = parsed.data;

    const production = cfg.ROULETTE_PRODUCTION;
    const verbose = cfg.ROULETTE_VERBOSE && !production;
    const logLevel: LogLevel = cfg.LOG_LEVEL ?? (verbose ? 'debug' : 'info');

    return {
        production,
        verbose,
        logLevel,
        pretty: !production,
        stake: cfg.ROULETTE_STAKE,
        seed: cfg.ROULETTE_SEED,
    };
}
