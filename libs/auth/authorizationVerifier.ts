import crypto from "crypto";
import { LRUCache } from "lru-cache";
import { canonicalJson } from "../crypto/canonicalJson.js";
import { logger } from "../logging/logger.js";
import type { AuthorizationContext, AuthorizationProof, Principal } from "../context/callContext.js";

/**
 * Capability check behind every mutating registry operation.
 * Answers whether the caller has proven control over `principal` for this call.
 * `consume` is called once the call the proof authorized has committed.
 */
export interface AuthorizationVerifier {
    verify(principal: Principal, context: AuthorizationContext): boolean;
    consume?(principal: Principal, context: AuthorizationContext): void;
}

export interface HmacVerifierOptions {
    /** Maximum proof age before re-signing is required. */
    maxAgeMs?: number;
    clockSkewMs?: number;
    replayCacheSize?: number;
    now?: () => number;
}

const DEFAULT_MAX_AGE_MS = 5 * 60 * 1000;
const DEFAULT_CLOCK_SKEW_MS = 30_000;
const DEFAULT_REPLAY_CACHE_SIZE = 10_000;

interface ProofClaims {
    principal: Principal;
    registry: string;
    operation: string;
    nonce: string;
    issuedAt: string;
}

function replayKey(principal: Principal, nonce: string): string {
    return `${principal}:${nonce}`;
}

function computeSignature(secret: string, claims: ProofClaims): string {
    return crypto
        .createHmac("sha256", secret)
        .update(canonicalJson(claims))
        .digest("hex");
}

/**
 * Issues a proof binding `principal` to one operation on one registry.
 */
export function signAuthorizationProof(
    secret: string,
    params: {
        principal: Principal;
        registry: string;
        operation: string;
        nonce?: string;
        issuedAt?: string;
    }
): AuthorizationProof {
    const nonce = params.nonce ?? crypto.randomUUID();
    const issuedAt = params.issuedAt ?? new Date().toISOString();
    const signature = computeSignature(secret, {
        principal: params.principal,
        registry: params.registry,
        operation: params.operation,
        nonce,
        issuedAt
    });
    return { nonce, issuedAt, signature };
}

/**
 * HMAC-SHA256 proof verifier.
 *
 * VALIDATION ORDER:
 * 1. Presence
 * 2. Freshness
 * 3. Replay
 * 4. Signature (timing-safe)
 *
 * A nonce is spent by `consume`, after the call it authorized commits, and is
 * remembered for the length of the freshness window. A call that aborts after
 * verification leaves the proof usable until it expires.
 */
export class HmacAuthorizationVerifier implements AuthorizationVerifier {
    private readonly replayCache: LRUCache<string, boolean>;
    private readonly maxAgeMs: number;
    private readonly clockSkewMs: number;
    private readonly now: () => number;

    constructor(private readonly secret: string, options: HmacVerifierOptions = {}) {
        if (secret.length === 0) {
            throw new Error("HmacAuthorizationVerifier requires a non-empty secret");
        }
        this.maxAgeMs = options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
        this.clockSkewMs = options.clockSkewMs ?? DEFAULT_CLOCK_SKEW_MS;
        this.now = options.now ?? Date.now;
        this.replayCache = new LRUCache<string, boolean>({
            max: options.replayCacheSize ?? DEFAULT_REPLAY_CACHE_SIZE,
            ttl: this.maxAgeMs + this.clockSkewMs
        });
    }

    verify(principal: Principal, context: AuthorizationContext): boolean {
        const { proof } = context;
        if (!proof) {
            return this.deny(principal, context, "proof missing");
        }

        const issuedAtMs = Date.parse(proof.issuedAt);
        if (Number.isNaN(issuedAtMs)) {
            return this.deny(principal, context, "invalid issuedAt");
        }
        const now = this.now();
        if (now - issuedAtMs > this.maxAgeMs + this.clockSkewMs) {
            return this.deny(principal, context, "proof expired");
        }
        if (issuedAtMs > now + this.clockSkewMs) {
            return this.deny(principal, context, "proof issued in the future");
        }

        if (this.replayCache.has(replayKey(principal, proof.nonce))) {
            return this.deny(principal, context, "nonce replayed");
        }

        const expected = Buffer.from(computeSignature(this.secret, {
            principal,
            registry: context.registry,
            operation: context.operation,
            nonce: proof.nonce,
            issuedAt: proof.issuedAt
        }), "hex");
        const presented = Buffer.from(proof.signature, "hex");

        if (presented.length !== expected.length || !crypto.timingSafeEqual(presented, expected)) {
            return this.deny(principal, context, "signature mismatch");
        }

        return true;
    }

    consume(principal: Principal, context: AuthorizationContext): void {
        if (context.proof) {
            this.replayCache.set(replayKey(principal, context.proof.nonce), true);
        }
    }

    private deny(principal: Principal, context: AuthorizationContext, reason: string): false {
        logger.debug({
            principal,
            registry: context.registry,
            operation: context.operation,
            requestId: context.requestId,
            reason
        }, "Authorization proof rejected");
        return false;
    }
}
