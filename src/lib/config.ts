/**
 * Process configuration, read from the environment.
 */

import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const AppConfigSchema = z.object({
    port: z.coerce.number().int().min(0).max(65535).default(31415),
    host: z.string().min(1).default('127.0.0.1'),
    clientTimeoutMs: z.coerce.number().int().positive().default(30000),
    drainOnStop: booleanFlag.default('false'),
    environment: z.string().default('development'),
    logLevel: LogLevelSchema.optional()
});

export type AppConfig = Omit<z.infer<typeof AppConfigSchema>, 'logLevel'> & {
    logLevel: LogLevel;
    pretty: boolean;
};

export class ConfigError extends Error {
    constructor(readonly issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

const ENV_NAMES = {
    port: 'COMMAND_PORT',
    host: 'COMMAND_HOST',
    clientTimeoutMs: 'CLIENT_TIMEOUT_MS',
    drainOnStop: 'DRAIN_ON_STOP',
    environment: 'NODE_ENV',
    logLevel: 'LOG_LEVEL'
} as const;

const ENV_BY_FIELD = new Map<string, string>(Object.entries(ENV_NAMES));

// Empty variables count as unset.
function read(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const value = env[name];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = AppConfigSchema.safeParse({
        port: read(env, ENV_NAMES.port),
        host: read(env, ENV_NAMES.host),
        clientTimeoutMs: read(env, ENV_NAMES.clientTimeoutMs),
        drainOnStop: read(env, ENV_NAMES.drainOnStop)?.toLowerCase(),
        environment: read(env, ENV_NAMES.environment),
        logLevel: read(env, ENV_NAMES.logLevel)?.toLowerCase()
    });

    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map((issue) => {
                const name = ENV_BY_FIELD.get(String(issue.path[0])) ?? issue.path.join('.');
                return `${name}: ${issue.message}`;
            })
        );
    }

    const isDev = result.data.environment === 'development';
    return {
        ...result.data,
        logLevel: result.data.logLevel ?? (isDev ? 'debug' : 'info'),
        pretty: isDev
    };
}
