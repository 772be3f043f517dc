import { z } from 'zod';
import type { ParseMode } from '../lib/num/parse.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type Runtime = {
    production: boolean;
    verbose: boolean;
    logLevel: LogLevel;
    pretty: boolean;
    color: boolean;
    parseMode: ParseMode;
};

const flag = z.enum(['true', 'false']).optional();

const envSchema = z.object({
    DIGITWISE_PRODUCTION: flag,
    DIGITWISE_VERBOSE: flag,
    DIGITWISE_PARSE_MODE: z.enum(['strict', 'lenient']).optional(),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
    NO_COLOR: z.string().optional(),
});

export class ConfigError extends Error {
    constructor(public readonly keys: string[], message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    // An empty assignment in a .env file means "use the default"
    const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const keys = parsed.error.issues.map((i) => i.path.join('.'));
        throw new ConfigError(keys, `Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const vars = parsed.data;

    const production = vars.DIGITWISE_PRODUCTION === 'true';
    const verbose = vars.DIGITWISE_VERBOSE === 'true' && !production;
    const pretty = !production;
    const logLevel: LogLevel = vars.LOG_LEVEL ?? (verbose ? 'trace' : 'info');
    const color = !vars.NO_COLOR && pretty;

    return {
        production,
        verbose,
        logLevel,
        pretty,
        color,
        parseMode: vars.DIGITWISE_PARSE_MODE ?? 'strict',
    };
}
