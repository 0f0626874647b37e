/**
 * Unit Tests: HMAC Authorization Verifier
 *
 * Tests proof freshness, replay protection and signature binding.
 *
 * @see libs/auth/authorizationVerifier.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { HmacAuthorizationVerifier, signAuthorizationProof } from '../../libs/auth/authorizationVerifier.js';

const SECRET = 'test-secret';
const NOW = Date.parse('2026-01-01T00:00:00.000Z');
const CONTEXT = { registry: 'CMAPPING', operation: 'updateMapping' };

function proofAt(issuedAt: string, nonce = 'nonce-0001') {
    return signAuthorizationProof(SECRET, { principal: 'GOWNER', ...CONTEXT, nonce, issuedAt });
}

describe('HmacAuthorizationVerifier', () => {
    let verifier: HmacAuthorizationVerifier;

    beforeEach(() => {
        verifier = new HmacAuthorizationVerifier(SECRET, { now: () => NOW });
    });

    it('should accept a fresh proof bound to the principal and operation', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
    });

    it('should reject a call without a proof', () => {
        assert.strictEqual(verifier.verify('GOWNER', CONTEXT), false);
    });

    it('should reject a replayed nonce once it is consumed', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
        verifier.consume('GOWNER', { ...CONTEXT, proof });
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), false);
    });

    it('should keep a verified proof usable until it is consumed', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
    });

    it('should scope a consumed nonce to its principal', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        verifier.consume('GALICE', { ...CONTEXT, proof });
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
    });

    it('should ignore consume without a proof', () => {
        verifier.consume('GOWNER', CONTEXT);
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof: proofAt('2026-01-01T00:00:00.000Z') }), true);
    });

    it('should not spend a nonce on a rejected proof', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        assert.strictEqual(verifier.verify('GOWNER', { registry: 'CMAPPING', operation: 'transferOwnership', proof }), false);
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
    });

    it('should reject a proof issued for another principal', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        assert.strictEqual(verifier.verify('GALICE', { ...CONTEXT, proof }), false);
    });

    it('should reject a proof issued for another registry', () => {
        const proof = proofAt('2026-01-01T00:00:00.000Z');
        assert.strictEqual(verifier.verify('GOWNER', { registry: 'COTHER', operation: 'updateMapping', proof }), false);
    });

    it('should reject a proof signed with another secret', () => {
        const proof = signAuthorizationProof('other-secret', {
            principal: 'GOWNER',
            ...CONTEXT,
            issuedAt: '2026-01-01T00:00:00.000Z'
        });
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), false);
    });

    it('should reject a signature of the wrong length', () => {
        const proof = { ...proofAt('2026-01-01T00:00:00.000Z'), signature: 'abcd' };
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), false);
    });

    it('should accept proofs up to max age plus clock skew', () => {
        // 5 min + 30 s before NOW
        const proof = proofAt('2025-12-31T23:54:30.000Z');
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), true);
    });

    it('should reject an expired proof', () => {
        const proof = proofAt('2025-12-31T23:54:29.999Z');
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), false);
    });

    it('should tolerate clock skew but reject proofs from further in the future', () => {
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof: proofAt('2026-01-01T00:00:30.000Z', 'nonce-a') }), true);
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof: proofAt('2026-01-01T00:00:30.001Z', 'nonce-b') }), false);
    });

    it('should reject an unparseable issuedAt', () => {
        const proof = { ...proofAt('2026-01-01T00:00:00.000Z'), issuedAt: 'yesterday' };
        assert.strictEqual(verifier.verify('GOWNER', { ...CONTEXT, proof }), false);
    });

    it('should honour a custom max age', () => {
        const strict = new HmacAuthorizationVerifier(SECRET, { now: () => NOW, maxAgeMs: 1_000, clockSkewMs: 0 });
        assert.strictEqual(strict.verify('GOWNER', { ...CONTEXT, proof: proofAt('2025-12-31T23:59:58.000Z') }), false);
        assert.strictEqual(strict.verify('GOWNER', { ...CONTEXT, proof: proofAt('2025-12-31T23:59:59.500Z') }), true);
    });

    it('should require a secret', () => {
        assert.throws(() => new HmacAuthorizationVerifier(''), /non-empty secret/);
    });
});

describe('signAuthorizationProof', () => {
    it('should generate a nonce and timestamp when none are given', () => {
        const proof = signAuthorizationProof(SECRET, { principal: 'GOWNER', ...CONTEXT });
        assert.ok(proof.nonce.length >= 8);
        assert.ok(!Number.isNaN(Date.parse(proof.issuedAt)));
        assert.match(proof.signature, /^[a-f0-9]{64}$/);
    });

    it('should be deterministic for the same claims', () => {
        assert.strictEqual(
            proofAt('2026-01-01T00:00:00.000Z').signature,
            proofAt('2026-01-01T00:00:00.000Z').signature
        );
    });
});
