/**
 * Centralized Redaction Configuration
 * Keys that must never reach the logs in clear text.
 */
export const REDACT_KEYS = [
    // Authorization proofs (Root and Nested)
    'proof', '*.proof',
    'signature', '*.signature',
    'nonce', '*.nonce',

    // Secrets (Root and Nested)
    'secret', '*.secret',
    'authSecret', '*.authSecret',
    'password', '*.password',
    'authorization', '*.authorization',

    // Connection strings carry credentials
    'databaseUrl', '*.databaseUrl'
];

export const REDACT_CENSOR = '[REDACTED]';
