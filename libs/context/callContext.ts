/**
 * Call context presented by whoever invokes a registry operation.
 *
 * `caller` only names a principal. Control over that principal is shown by
 * `proof`, which the configured AuthorizationVerifier checks.
 */

import type { z } from 'zod';
import type { AuthorizationProofSchema } from '../validation/schema.js';

export type Principal = string;

export type AuthorizationProof = z.infer<typeof AuthorizationProofSchema>;

export interface InvocationContext {
    readonly caller: Principal;
    readonly proof?: AuthorizationProof;
    readonly requestId?: string;
}

/**
 * What a verifier sees: the operation being authorized and the proof offered for it.
 */
export interface AuthorizationContext {
    readonly registry: string;
    readonly operation: string;
    readonly proof?: AuthorizationProof;
    readonly requestId?: string;
}
