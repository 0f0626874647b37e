import { z } from 'zod';

/**
 * Central schema definitions for registry call arguments.
 * Identifiers and content hashes are opaque: only their bounds are checked.
 */

export const PrincipalSchema = z.string().min(1).max(128);

export const TokenIdSchema = z.string().min(1).max(256);

// An empty cid is a legal value: it reads the same as an unset mapping.
export const CidSchema = z.string().max(512);

export const MappingKeySchema = z.string().min(1).max(256);

export const RegistryAddressSchema = z.string().min(1).max(128);

export const AuthorizationProofSchema = z.object({
    nonce: z.string().min(8).max(128),
    issuedAt: z.string().datetime(),
    signature: z.string().regex(/^[a-f0-9]{64}$/) // HMAC-SHA256 hex
});

export const RpcRequestSchema = z.object({
    args: z.array(z.unknown()).default([]),
    caller: PrincipalSchema.optional(),
    proof: AuthorizationProofSchema.optional(),
    requestId: z.string().min(1).max(128).optional()
});

export type RpcRequest = z.infer<typeof RpcRequestSchema>;
