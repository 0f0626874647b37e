import { ZodType, ZodTypeDef } from 'zod';
import { logger } from '../logging/logger.js';
import { RegistryError } from '../errors/registryErrors.js';

/**
 * Validates untrusted input and throws a VALIDATION_FAILED abort on failure.
 */
export function validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, data: unknown, context: string): T {
    const result = schema.safeParse(data);

    if (!result.success) {
        const errorDetails = result.error.issues.map(e => ({
            path: e.path.join('.'),
            message: e.message
        }));

        logger.warn({
            context,
            errors: errorDetails
        }, "Input Validation Failure");

        throw new RegistryError(
            'VALIDATION_FAILED',
            `Validation Violation in ${context}: ${JSON.stringify(errorDetails)}`,
            errorDetails
        );
    }

    return result.data;
}

/**
 * Factory for creating bound validators.
 */
export const createValidator = <T>(schema: ZodType<T, ZodTypeDef, unknown>) => {
    return (data: unknown, contextLabel: string) => validate(schema, data, contextLabel);
};
