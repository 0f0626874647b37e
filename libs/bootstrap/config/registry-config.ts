import { z } from 'zod';
import { ConfigGuard, Env, GuardRule } from '../config-guard.js';
import { PrincipalSchema } from '../../validation/schema.js';
import { validate } from '../../validation/zod-middleware.js';

export const DEV_AUTH_SECRET = 'dev-secret-change-me';

/**
 * Registry service configuration guards.
 */
export const REGISTRY_CONFIG_GUARDS: GuardRule[] = [
    { type: 'required', name: 'REGISTRY_AUTH_SECRET', sensitive: true },

    {
        type: 'forbidIf',
        name: 'DEV_AUTH_SECRET',
        when: env => env.NODE_ENV === 'production' && env.REGISTRY_AUTH_SECRET === DEV_AUTH_SECRET,
        message: 'Production cannot use the development authorization secret'
    },

    {
        type: 'forbidIf',
        name: 'ADMIN_WITHOUT_MAPPING_REGISTRY',
        when: env => Boolean(env.OWNERSHIP_REGISTRY_ADMIN) && !env.MAPPING_REGISTRY_OWNER,
        message: 'OWNERSHIP_REGISTRY_ADMIN needs MAPPING_REGISTRY_OWNER: the ownership registry references a mapping registry'
    },

    // Current state alone cannot answer history queries; production must persist events.
    {
        type: 'assert',
        check: env => env.NODE_ENV !== 'production' || Boolean(env.DATABASE_URL),
        message: 'DATABASE_URL is required in production'
    }
];

const RegistryConfigSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
    REGISTRY_AUTH_SECRET: z.string().min(16),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    AUTH_PROOF_MAX_AGE_MS: z.coerce.number().int().positive().default(300_000),
    EVENT_RELAY_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
    MAPPING_REGISTRY_OWNER: PrincipalSchema.optional(),
    OWNERSHIP_REGISTRY_ADMIN: PrincipalSchema.optional(),
    DATABASE_URL: z.string().url().optional()
});

export interface RegistryConfig {
    nodeEnv: 'development' | 'test' | 'staging' | 'production';
    authSecret: string;
    logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
    port: number;
    proofMaxAgeMs: number;
    relayIntervalMs: number;
    mappingOwner?: string;
    ownershipAdmin?: string;
    databaseUrl?: string;
}

/**
 * Enforces the guards, then parses typed values. Empty strings count as unset.
 */
export function loadRegistryConfig(env: Env = process.env): RegistryConfig {
    ConfigGuard.enforce(REGISTRY_CONFIG_GUARDS, env);

    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const parsed = validate(RegistryConfigSchema, present, 'RegistryConfig');

    return {
        nodeEnv: parsed.NODE_ENV,
        authSecret: parsed.REGISTRY_AUTH_SECRET,
        logLevel: parsed.LOG_LEVEL,
        port: parsed.PORT,
        proofMaxAgeMs: parsed.AUTH_PROOF_MAX_AGE_MS,
        relayIntervalMs: parsed.EVENT_RELAY_INTERVAL_MS,
        ...(parsed.MAPPING_REGISTRY_OWNER ? { mappingOwner: parsed.MAPPING_REGISTRY_OWNER } : {}),
        ...(parsed.OWNERSHIP_REGISTRY_ADMIN ? { ownershipAdmin: parsed.OWNERSHIP_REGISTRY_ADMIN } : {}),
        ...(parsed.DATABASE_URL ? { databaseUrl: parsed.DATABASE_URL } : {})
    };
}
