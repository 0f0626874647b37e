import crypto from 'crypto';
import { logger } from '../logging/logger.js';

/**
 * Boundary error for failures that are not registry aborts (storage driver,
 * relay, programming errors). Callers see only the public message and the
 * incident id; the original error is logged once, here.
 */
export class CidLedgerError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly contextLabel?: string;
    /** Driver error code, e.g. a PostgreSQL SQLSTATE. */
    public readonly errorCode?: string;
    public override cause?: unknown;

    constructor(
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        public readonly category: 'SEC' | 'OPS' = 'OPS',
        options?: { cause?: unknown; contextLabel?: string; errorCode?: string }
    ) {
        super(publicMessage);
        this.name = 'CidLedgerError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.contextLabel = options?.contextLabel;
        this.errorCode = options?.errorCode;
        this.cause = options?.cause;

        logger.error({
            incidentId: this.incidentId,
            category: this.category,
            contextLabel: this.contextLabel,
            errorCode: this.errorCode,
            internalDetails,
            stack: this.stack
        }, publicMessage);
    }
}

interface ThrownDescription {
    message: string;
    stack?: string;
    code?: string;
}

function describeThrown(err: unknown): ThrownDescription {
    if (err instanceof Error) {
        const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
        return { message: err.message, stack: err.stack, code };
    }
    return { message: typeof err === 'string' ? err : String(err) };
}

export const ErrorSanitizer = {
    /**
     * Wraps anything thrown into a CidLedgerError. An existing CidLedgerError
     * passes through so that one incident keeps one id.
     */
    sanitize: (err: unknown, contextLabel: string): CidLedgerError => {
        if (err instanceof CidLedgerError) return err;

        const thrown = describeThrown(err);
        return new CidLedgerError(
            `An internal registry error occurred. Incident context: ${contextLabel}`,
            { originalError: thrown.message, stack: thrown.stack, context: contextLabel },
            'OPS',
            { cause: err, contextLabel, errorCode: thrown.code }
        );
    }
};
