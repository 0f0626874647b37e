/**
 * Registry Capability Registry
 *
 * Capabilities are verbs, not roles. Each mutating operation exercises exactly
 * one of them; the principal allowed to exercise it is the registry owner
 * (mapping) or the admin / current holder (ownership).
 */

export type Capability =
    | 'mapping:update'
    | 'mapping:transfer-ownership'
    | 'token:mint'
    | 'token:transfer'
    | 'token:burn';

export type MutatingOperation =
    | 'updateMapping'
    | 'transferOwnership'
    | 'mint'
    | 'transfer'
    | 'burn';

export const CAPABILITY_BY_OPERATION: Record<MutatingOperation, Capability> = {
    updateMapping: 'mapping:update',
    transferOwnership: 'mapping:transfer-ownership',
    mint: 'token:mint',
    transfer: 'token:transfer',
    burn: 'token:burn'
};
