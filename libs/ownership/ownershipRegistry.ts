import type { InvocationContext, Principal } from "../context/callContext.js";
import { RegistryError } from "../errors/registryErrors.js";
import { LedgerRegistry, RegistryDependencies } from "../registry/ledgerRegistry.js";
import { compositeKey, readList, readString, StorageView } from "../storage/ledgerStorage.js";
import { StagedTransaction } from "../storage/transaction.js";

const ADMIN_KEY = 'ADMIN';
const MAPPING_REGISTRY_KEY = 'MAPPING_REGISTRY';

const TOKEN_PREFIX = 'token';
const HOLDER_PREFIX = 'holder';
const MAPPING_REF_PREFIX = 'mapref';

/**
 * Ownership Registry
 *
 * Maintains three correlated indexes:
 * - token id -> holder
 * - holder -> ordered token ids (insertion order of still-held tokens)
 * - token id -> mapping key in the associated Mapping Registry
 *
 * INVARIANTS (after every committed call):
 * 1. A token id has a holder iff it has a mapping key.
 * 2. Each holder's sequence is exactly the ids it holds, without duplicates.
 * 3. Token ids are unique among live tokens.
 *
 * The Mapping Registry address is stored for reference only; no call is made to it.
 */
export class OwnershipRegistry extends LedgerRegistry {
    override readonly kind = 'ownership' as const;

    constructor(deps: RegistryDependencies) {
        super(deps, ADMIN_KEY, 'OwnershipRegistry');
    }

    initialize(admin: Principal, mappingRegistryAddress: string): void {
        this.bootstrap(tx => {
            tx.set('instance', ADMIN_KEY, admin);
            tx.set('instance', MAPPING_REGISTRY_KEY, mappingRegistryAddress);
        });
    }

    /**
     * Admin-only. Re-minting a burned id is allowed.
     */
    mint(call: InvocationContext, tokenId: string, holder: Principal, mappingKey: string): void {
        this.execute('mint', tx => {
            this.authorize(tx, this.instanceValue(tx, ADMIN_KEY), call, 'mint', 'NOT_ADMIN');

            const tokenKey = compositeKey(TOKEN_PREFIX, tokenId);
            if (tx.has('persistent', tokenKey)) {
                throw new RegistryError('TOKEN_ALREADY_EXISTS', `Token ${tokenId} already exists`);
            }

            tx.set('persistent', tokenKey, holder);
            appendHeld(tx, holder, tokenId);
            tx.set('persistent', compositeKey(MAPPING_REF_PREFIX, tokenId), mappingKey);

            tx.emit({
                topic: 'token_minted',
                subject: tokenId,
                payload: { tokenId, holder, mappingKey }
            });
        });
    }

    /**
     * Holder-only. The mapping key travels with the token unchanged.
     */
    transfer(call: InvocationContext, tokenId: string, to: Principal): void {
        this.execute('transfer', tx => {
            const from = this.requireHolder(tx, call, tokenId, 'transfer');

            removeHeld(tx, from, tokenId);
            appendHeld(tx, to, tokenId);
            tx.set('persistent', compositeKey(TOKEN_PREFIX, tokenId), to);

            tx.emit({
                topic: 'token_transferred',
                subject: tokenId,
                payload: { tokenId, from, to }
            });
        });
    }

    /**
     * Holder-only. Purges the token from all three indexes.
     */
    burn(call: InvocationContext, tokenId: string): void {
        this.execute('burn', tx => {
            const holder = this.requireHolder(tx, call, tokenId, 'burn');

            removeHeld(tx, holder, tokenId);
            tx.remove('persistent', compositeKey(TOKEN_PREFIX, tokenId));
            tx.remove('persistent', compositeKey(MAPPING_REF_PREFIX, tokenId));

            tx.emit({
                topic: 'token_burned',
                subject: tokenId,
                payload: { tokenId, holder }
            });
        });
    }

    ownerOf(tokenId: string): Principal {
        return this.read(view => holderOf(view, tokenId));
    }

    getMappingKey(tokenId: string): string {
        return this.read(view => {
            const mappingKey = readString(view, 'persistent', compositeKey(MAPPING_REF_PREFIX, tokenId));
            if (mappingKey === undefined) {
                throw new RegistryError('TOKEN_NOT_FOUND', `Token ${tokenId} does not exist`);
            }
            return mappingKey;
        });
    }

    tokensOf(holder: Principal): string[] {
        return this.read(view => [...(readList(view, 'persistent', compositeKey(HOLDER_PREFIX, holder)) ?? [])]);
    }

    admin(): Principal {
        return this.read(view => this.instanceValue(view, ADMIN_KEY));
    }

    mappingRegistry(): string {
        return this.read(view => this.instanceValue(view, MAPPING_REGISTRY_KEY));
    }

    /**
     * Existence, then holder identity, then proof. Returns the current holder.
     */
    private requireHolder(
        tx: StagedTransaction,
        call: InvocationContext,
        tokenId: string,
        operation: 'transfer' | 'burn'
    ): Principal {
        const holder = holderOf(tx, tokenId);
        this.authorize(tx, holder, call, operation, 'NOT_OWNER');
        return holder;
    }

    private instanceValue(view: StorageView, key: string): string {
        const value = readString(view, 'instance', key);
        if (value === undefined) {
            throw new Error(`Storage corruption: initialized ownership registry is missing ${key}`);
        }
        return value;
    }
}

function holderOf(view: StorageView, tokenId: string): Principal {
    const holder = readString(view, 'persistent', compositeKey(TOKEN_PREFIX, tokenId));
    if (holder === undefined) {
        throw new RegistryError('TOKEN_NOT_FOUND', `Token ${tokenId} does not exist`);
    }
    return holder;
}

function appendHeld(tx: StagedTransaction, holder: Principal, tokenId: string): void {
    const key = compositeKey(HOLDER_PREFIX, holder);
    tx.set('persistent', key, [...(readList(tx, 'persistent', key) ?? []), tokenId]);
}

// Linear rebuild; relative order of the remaining ids is preserved.
function removeHeld(tx: StagedTransaction, holder: Principal, tokenId: string): void {
    const key = compositeKey(HOLDER_PREFIX, holder);
    const remaining = (readList(tx, 'persistent', key) ?? []).filter(t => t !== tokenId);
    tx.set('persistent', key, remaining);
}
