import { EventLog } from "../events/eventLog.js";
import { EventRecord, RegistryEvent } from "../events/schema.js";
import { RegistryError } from "../errors/registryErrors.js";
import { LedgerStorage, StorageArea, StorageView, StorageWrite, StoredValue } from "./ledgerStorage.js";

const activeStorages = new WeakSet<LedgerStorage>();

function stageKey(area: StorageArea, key: string): string {
    return `${area}\u0000${key}`;
}

/**
 * Registers work that must run only once a call has committed.
 */
export interface CommitScope {
    afterCommit(hook: () => void): void;
}

/**
 * Write stage for one registry call.
 *
 * Reads fall through to committed storage unless the key was staged. Nothing
 * reaches storage or the event log until the call body returns.
 */
export class StagedTransaction implements StorageView, CommitScope {
    private readonly writes = new Map<string, StorageWrite>();
    private readonly hooks: Array<() => void> = [];
    private pendingEvent: RegistryEvent | null = null;

    constructor(private readonly storage: LedgerStorage) { }

    get(area: StorageArea, key: string): StoredValue | undefined {
        const staged = this.writes.get(stageKey(area, key));
        if (staged) {
            return staged.value === null ? undefined : staged.value;
        }
        return this.storage.get(area, key);
    }

    has(area: StorageArea, key: string): boolean {
        return this.get(area, key) !== undefined;
    }

    set(area: StorageArea, key: string, value: StoredValue): void {
        this.writes.set(stageKey(area, key), { area, key, value });
    }

    remove(area: StorageArea, key: string): void {
        this.writes.set(stageKey(area, key), { area, key, value: null });
    }

    /**
     * Stages the single event of this call.
     */
    emit(event: RegistryEvent): void {
        if (this.pendingEvent) {
            throw new Error(`Transaction already emitted ${this.pendingEvent.topic}; one event per call`);
        }
        this.pendingEvent = event;
    }

    /**
     * Queues `hook` to run after the writes and the event are committed.
     * Dropped with the stage when the call aborts.
     */
    afterCommit(hook: () => void): void {
        this.hooks.push(hook);
    }

    commitHooks(): readonly (() => void)[] {
        return [...this.hooks];
    }

    stagedWrites(): readonly StorageWrite[] {
        return [...this.writes.values()];
    }

    stagedEvent(): RegistryEvent | null {
        return this.pendingEvent;
    }
}

export interface AtomicResult<T> {
    result: T;
    record: EventRecord | null;
}

/**
 * Runs `body` against a staged view of `storage`, then commits all staged
 * writes and the staged event together, then runs the commit hooks.
 * A throw from `body` discards the stage and its hooks.
 */
export function runAtomic<T>(
    storage: LedgerStorage,
    eventLog: EventLog,
    registry: string,
    body: (tx: StagedTransaction) => T
): AtomicResult<T> {
    if (activeStorages.has(storage)) {
        throw new RegistryError('NESTED_TRANSACTION', 'Nested transaction detected: registry storage is already staged by an active call.');
    }

    activeStorages.add(storage);
    try {
        const tx = new StagedTransaction(storage);
        const result = body(tx);

        storage.applyBatch(tx.stagedWrites());
        const event = tx.stagedEvent();
        const record = event ? eventLog.append(registry, event) : null;

        for (const hook of tx.commitHooks()) {
            hook();
        }
        return { result, record };
    } finally {
        activeStorages.delete(storage);
    }
}
