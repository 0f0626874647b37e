import type { Logger } from "pino";
import { AuthorizationVerifier } from "../auth/authorizationVerifier.js";
import { MutatingOperation } from "../auth/capabilities.js";
import { requirePrincipal } from "../auth/requireAuthorization.js";
import type { InvocationContext, Principal } from "../context/callContext.js";
import { EventLog } from "../events/eventLog.js";
import { getRegistryLogger } from "../logging/logger.js";
import { LedgerStorage, StorageView } from "../storage/ledgerStorage.js";
import { runAtomic, StagedTransaction } from "../storage/transaction.js";
import { LifecycleState, RegistryLifecycle } from "./lifecycle.js";

export type RegistryKind = 'mapping' | 'ownership';

export interface RegistryDependencies {
    address: string;
    storage: LedgerStorage;
    eventLog: EventLog;
    verifier: AuthorizationVerifier;
}

/**
 * Shared call discipline for both registries: lifecycle gate, staged
 * all-or-nothing writes, and the single authorization predicate.
 */
export abstract class LedgerRegistry {
    abstract readonly kind: RegistryKind;

    protected readonly logger: Logger;
    private readonly lifecycle: RegistryLifecycle;

    protected constructor(protected readonly deps: RegistryDependencies, presenceKey: string, component: string) {
        this.lifecycle = new RegistryLifecycle(presenceKey);
        this.logger = getRegistryLogger(component, deps.address);
    }

    get address(): string {
        return this.deps.address;
    }

    state(): LifecycleState {
        return this.lifecycle.state(this.deps.storage);
    }

    /**
     * One-time setup. The only call accepted while uninitialized.
     */
    protected bootstrap(write: (tx: StagedTransaction) => void): void {
        runAtomic(this.deps.storage, this.deps.eventLog, this.address, tx => {
            this.lifecycle.assertUninitialized(tx);
            write(tx);
        });
        this.logger.info("Registry initialized");
    }

    protected execute<T>(operation: MutatingOperation, body: (tx: StagedTransaction) => T): T {
        const { result, record } = runAtomic(this.deps.storage, this.deps.eventLog, this.address, tx => {
            this.lifecycle.assertReady(tx);
            return body(tx);
        });
        this.logger.info({
            operation,
            topic: record?.topic,
            subject: record?.subject,
            sequence: record?.sequence
        }, "Registry call committed");
        return result;
    }

    protected read<T>(body: (view: StorageView) => T): T {
        this.lifecycle.assertReady(this.deps.storage);
        return body(this.deps.storage);
    }

    protected authorize(
        tx: StagedTransaction,
        expected: Principal,
        call: InvocationContext,
        operation: MutatingOperation,
        mismatch: 'NOT_OWNER' | 'NOT_ADMIN'
    ): void {
        requirePrincipal({
            expected,
            call,
            registry: this.address,
            operation,
            mismatch,
            verifier: this.deps.verifier,
            transaction: tx
        });
    }
}
