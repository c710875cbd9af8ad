import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
    CERT_TREE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
    CERT_TREE_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    CERT_TREE_EXPIRING_SOON_DAYS: z.coerce.number().int().nonnegative().default(30),
});

/**
 * Runtime settings, read from the environment
 */
export interface AppConfig {
    logLevel: LogLevel;
    /** Timeout for HTTP and TLS retrieval in milliseconds */
    timeoutMs: number;
    /** Remaining days at or below which a certificate counts as expiring soon */
    expiringSoonDays: number;
}

export class ConfigurationError extends Error {
    constructor(public readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigurationError';
    }
}

export const DEFAULT_CONFIG: AppConfig = {
    logLevel: 'warn',
    timeoutMs: 10_000,
    expiringSoonDays: 30,
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        throw new ConfigurationError(parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`));
    }

    return {
        logLevel: parsed.data.CERT_TREE_LOG_LEVEL,
        timeoutMs: parsed.data.CERT_TREE_TIMEOUT_MS,
        expiringSoonDays: parsed.data.CERT_TREE_EXPIRING_SOON_DAYS,
    };
}
