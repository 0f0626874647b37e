import type { InvocationContext, Principal } from "../context/callContext.js";
import { LedgerRegistry, RegistryDependencies } from "../registry/ledgerRegistry.js";
import { compositeKey, readString, StorageView } from "../storage/ledgerStorage.js";
import { StagedTransaction } from "../storage/transaction.js";

const OWNER_KEY = 'OWNER';
const CID_PREFIX = 'cid';

/**
 * Mapping Registry
 *
 * Tracks a mutable pointer from token id to content hash. The registry never
 * validates the cid shape. Every update publishes the value it replaces, so
 * the full history of a token id can be replayed from the event log.
 */
export class MappingRegistry extends LedgerRegistry {
    override readonly kind = 'mapping' as const;

    constructor(deps: RegistryDependencies) {
        super(deps, OWNER_KEY, 'MappingRegistry');
    }

    initialize(owner: Principal): void {
        this.bootstrap(tx => {
            tx.set('instance', OWNER_KEY, owner);
        });
    }

    /**
     * Owner-only. Emits `mapping_updated` with the previous value ("" if unset).
     */
    updateMapping(call: InvocationContext, tokenId: string, newCid: string): void {
        this.execute('updateMapping', tx => {
            this.requireOwner(tx, call, 'updateMapping');

            const key = compositeKey(CID_PREFIX, tokenId);
            const oldCid = readString(tx, 'persistent', key) ?? '';
            tx.set('persistent', key, newCid);

            tx.emit({
                topic: 'mapping_updated',
                subject: tokenId,
                payload: { tokenId, oldCid, newCid, caller: call.caller }
            });
        });
    }

    /**
     * Never fails on absence: an unset token id reads as "".
     */
    getMapping(tokenId: string): string {
        return this.read(view => readString(view, 'persistent', compositeKey(CID_PREFIX, tokenId)) ?? '');
    }

    transferOwnership(call: InvocationContext, newOwner: Principal): void {
        this.execute('transferOwnership', tx => {
            const oldOwner = this.requireOwner(tx, call, 'transferOwnership');
            tx.set('instance', OWNER_KEY, newOwner);

            tx.emit({
                topic: 'ownership_transferred',
                subject: this.address,
                payload: { oldOwner, newOwner }
            });
        });
    }

    owner(): Principal {
        return this.read(view => this.currentOwner(view));
    }

    private requireOwner(tx: StagedTransaction, call: InvocationContext, operation: 'updateMapping' | 'transferOwnership'): Principal {
        const owner = this.currentOwner(tx);
        this.authorize(tx, owner, call, operation, 'NOT_OWNER');
        return owner;
    }

    private currentOwner(view: StorageView): Principal {
        const owner = readString(view, 'instance', OWNER_KEY);
        if (owner === undefined) {
            throw new Error('Storage corruption: initialized mapping registry has no owner');
        }
        return owner;
    }
}
