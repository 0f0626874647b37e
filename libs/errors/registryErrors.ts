/**
 * RegistryError
 * Canonical abort for every registry and host failure, with a machine-readable code.
 * A thrown RegistryError discards the staged writes of the call that raised it.
 */

export type RegistryErrorCode =
    | 'ALREADY_INITIALIZED'
    | 'NOT_INITIALIZED'
    | 'NOT_AUTHORIZED'
    | 'NOT_OWNER'
    | 'NOT_ADMIN'
    | 'TOKEN_ALREADY_EXISTS'
    | 'TOKEN_NOT_FOUND'
    | 'VALIDATION_FAILED'
    | 'REGISTRY_NOT_FOUND'
    | 'UNKNOWN_OPERATION'
    | 'ADDRESS_IN_USE'
    | 'HOST_BUSY'
    | 'NESTED_TRANSACTION';

const STATUS_BY_CODE: Record<RegistryErrorCode, number> = {
    ALREADY_INITIALIZED: 409,
    NOT_INITIALIZED: 409,
    NOT_AUTHORIZED: 401,
    NOT_OWNER: 403,
    NOT_ADMIN: 403,
    TOKEN_ALREADY_EXISTS: 409,
    TOKEN_NOT_FOUND: 404,
    VALIDATION_FAILED: 400,
    REGISTRY_NOT_FOUND: 404,
    UNKNOWN_OPERATION: 404,
    ADDRESS_IN_USE: 409,
    HOST_BUSY: 409,
    NESTED_TRANSACTION: 500
};

export class RegistryError extends Error {
    readonly code: RegistryErrorCode;
    readonly statusCode: number;
    readonly details?: unknown;

    constructor(code: RegistryErrorCode, message?: string, details?: unknown) {
        super(message || `Registry call aborted: ${code}`);
        this.name = 'RegistryError';
        this.code = code;
        this.statusCode = STATUS_BY_CODE[code];
        this.details = details;
        Object.setPrototypeOf(this, RegistryError.prototype);
    }
}

export function isRegistryError(error: unknown, code?: RegistryErrorCode): error is RegistryError {
    return error instanceof RegistryError && (code === undefined || error.code === code);
}
