/**
 * CID Ledger public exports.
 */

// Registries
export { MappingRegistry } from './mapping/index.js';
export { OwnershipRegistry } from './ownership/index.js';
export type { RegistryKind, RegistryDependencies } from './registry/ledgerRegistry.js';
export type { LifecycleState } from './registry/lifecycle.js';

// Host & RPC
export { RegistryHost, generateRegistryAddress } from './host/registryHost.js';
export type { RegistryHostOptions } from './host/registryHost.js';
export { handleRpc, handleEventQuery, createRegistryRpcHandler, createEventQueryHandler } from './middleware/rpcHandler.js';

// Authorization
export type { AuthorizationVerifier, HmacVerifierOptions } from './auth/authorizationVerifier.js';
export { HmacAuthorizationVerifier, signAuthorizationProof } from './auth/authorizationVerifier.js';
export type { Capability, MutatingOperation } from './auth/capabilities.js';
export type { InvocationContext, AuthorizationContext, AuthorizationProof, Principal } from './context/callContext.js';

// Events
export { EventLog, GENESIS_TAIL } from './events/eventLog.js';
export type { ChainTail } from './events/eventLog.js';
export type { EventRecord, RegistryEvent, RegistryEventTopic } from './events/schema.js';
export { verifyEventChain, verifyEventLogFile, readEventLogFile, writeEventLogFile } from './events/integrity.js';
export { mappingHistory, mappingAtRevision, ownershipHistory } from './events/history.js';
export { PgEventStore } from './events/PgEventStore.js';
export type { EventStore } from './events/PgEventStore.js';
export { EventRelay } from './events/EventRelay.js';

// Storage
export { MemoryLedgerStorage, compositeKey } from './storage/ledgerStorage.js';
export type { LedgerStorage, StorageArea, StoredValue } from './storage/ledgerStorage.js';

// Errors
export { RegistryError, isRegistryError } from './errors/registryErrors.js';
export type { RegistryErrorCode } from './errors/registryErrors.js';
