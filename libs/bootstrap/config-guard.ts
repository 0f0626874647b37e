import { logger } from '../logging/logger.js';

export type Env = Readonly<Record<string, string | undefined>>;

export type GuardRule =
    | { type: 'required'; name: string; sensitive?: boolean }
    | { type: 'forbidIf'; name: string; when: (env: Env) => boolean; message: string }
    | { type: 'assert'; check: (env: Env) => boolean; message: string };

export class ConfigGuardError extends Error {
    constructor(public readonly violations: readonly string[]) {
        super(`Configuration Guard Violation: ${violations.join('; ')}`);
        this.name = 'ConfigGuardError';
    }
}

/**
 * Fail-closed configuration guard.
 * Collects every violation, logs them once and aborts startup.
 */
export class ConfigGuard {
    static enforce(rules: readonly GuardRule[], env: Env = process.env): void {
        const errors: string[] = [];

        for (const rule of rules) {
            try {
                switch (rule.type) {
                    case 'required': {
                        const value = env[rule.name];
                        if (!value || value.trim() === '') {
                            errors.push(`FATAL CONFIG: Required env var ${rule.name} is missing`);
                        }
                        break;
                    }

                    case 'forbidIf': {
                        if (rule.when(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message} (Rule: ${rule.name})`);
                        }
                        break;
                    }

                    case 'assert': {
                        if (!rule.check(env)) {
                            errors.push(`FATAL CONFIG: ${rule.message}`);
                        }
                        break;
                    }
                }
            } catch (err: unknown) {
                errors.push(`Check failed for rule: ${err instanceof Error ? err.message : String(err)}`);
            }
        }

        if (errors.length > 0) {
            logger.fatal({
                errors,
                remediation: "Check environment variables."
            }, "Configuration Guard Violation");

            throw new ConfigGuardError(errors);
        }

        logger.info("Configuration guard passed.");
    }
}
