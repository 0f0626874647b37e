import { AuthorizationVerifier } from "./authorizationVerifier.js";
import { CAPABILITY_BY_OPERATION, MutatingOperation } from "./capabilities.js";
import type { InvocationContext, Principal } from "../context/callContext.js";
import { RegistryError } from "../errors/registryErrors.js";
import { logger } from "../logging/logger.js";
import type { CommitScope } from "../storage/transaction.js";

export interface PrincipalRequirement {
    /** Principal the operation is reserved for (owner, admin or holder). */
    expected: Principal;
    call: InvocationContext;
    registry: string;
    operation: MutatingOperation;
    /** Abort raised when the caller names someone other than `expected`. */
    mismatch: 'NOT_OWNER' | 'NOT_ADMIN';
    verifier: AuthorizationVerifier;
    /** Call stage; the proof is consumed only if it commits. */
    transaction: CommitScope;
}

/**
 * Single authorization predicate for every mutating registry operation.
 *
 * Identity equality is checked first, then the authorization proof. Both must
 * pass before the caller may stage any write. The proof is spent when the
 * transaction commits.
 */
export function requirePrincipal(requirement: PrincipalRequirement): void {
    const { expected, call, registry, operation, mismatch, verifier, transaction } = requirement;
    const capability = CAPABILITY_BY_OPERATION[operation];

    if (call.caller !== expected) {
        logger.warn({
            requestId: call.requestId,
            registry,
            caller: call.caller,
            capability,
            decision: 'DENY',
            reason: mismatch
        }, "Authorization Failed - Caller is not the required principal");
        throw new RegistryError(mismatch, `Caller ${call.caller} may not exercise ${capability}`);
    }

    const context = {
        registry,
        operation,
        proof: call.proof,
        requestId: call.requestId
    };
    const proven = verifier.verify(call.caller, context);

    if (!proven) {
        logger.warn({
            requestId: call.requestId,
            registry,
            caller: call.caller,
            capability,
            decision: 'DENY',
            reason: 'NOT_AUTHORIZED'
        }, "Authorization Failed - Proof rejected");
        throw new RegistryError('NOT_AUTHORIZED', `Caller ${call.caller} did not prove control for ${capability}`);
    }

    transaction.afterCommit(() => verifier.consume?.(call.caller, context));

    logger.info({
        requestId: call.requestId,
        registry,
        caller: call.caller,
        capability,
        decision: 'ALLOW'
    }, "Authorization Successful");
}
