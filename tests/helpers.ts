import { HmacAuthorizationVerifier, signAuthorizationProof } from '../libs/auth/authorizationVerifier.js';
import type { InvocationContext, Principal } from '../libs/context/callContext.js';
import { EventLog } from '../libs/events/eventLog.js';
import { MappingRegistry } from '../libs/mapping/mappingRegistry.js';
import { OwnershipRegistry } from '../libs/ownership/ownershipRegistry.js';
import { MemoryLedgerStorage } from '../libs/storage/ledgerStorage.js';

export const TEST_SECRET = 'test-secret-placeholder';

export const OWNER = 'GOWNER';
export const ADMIN = 'GADMIN';
export const ALICE = 'GALICE';
export const BOB = 'GBOB';
export const CAROL = 'GCAROL';

export const MAPPING_ADDRESS = 'CMAPPING';
export const OWNERSHIP_ADDRESS = 'COWNERSHIP';

/**
 * A call carrying a fresh proof for `operation` on `registry`.
 */
export function signedCall(principal: Principal, registry: string, operation: string): InvocationContext {
    return {
        caller: principal,
        proof: signAuthorizationProof(TEST_SECRET, { principal, registry, operation })
    };
}

export function createMappingRegistry(eventLog = new EventLog()) {
    const storage = new MemoryLedgerStorage();
    const registry = new MappingRegistry({
        address: MAPPING_ADDRESS,
        storage,
        eventLog,
        verifier: new HmacAuthorizationVerifier(TEST_SECRET)
    });
    return { registry, storage, eventLog };
}

export function createOwnershipRegistry(eventLog = new EventLog()) {
    const storage = new MemoryLedgerStorage();
    const registry = new OwnershipRegistry({
        address: OWNERSHIP_ADDRESS,
        storage,
        eventLog,
        verifier: new HmacAuthorizationVerifier(TEST_SECRET)
    });
    return { registry, storage, eventLog };
}
