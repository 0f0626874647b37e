/**
 * Ledger storage areas.
 *
 * `instance` holds the small singleton record of a registry (owner, admin,
 * linked address). `persistent` holds the unbounded per-key entries.
 */

export type StorageArea = 'instance' | 'persistent';

export type StoredValue = string | readonly string[];

export interface StorageView {
    get(area: StorageArea, key: string): StoredValue | undefined;
    has(area: StorageArea, key: string): boolean;
    set(area: StorageArea, key: string, value: StoredValue): void;
    remove(area: StorageArea, key: string): void;
}

export interface StorageWrite {
    readonly area: StorageArea;
    readonly key: string;
    /** `null` deletes the entry. */
    readonly value: StoredValue | null;
}

export interface LedgerStorage extends StorageView {
    /** Applies every write or none. */
    applyBatch(writes: readonly StorageWrite[]): void;
}

/**
 * Composite `(prefix, id)` key. The id is URI-encoded so that no two distinct
 * pairs share an encoding.
 */
export function compositeKey(prefix: string, id: string): string {
    return `${prefix}:${encodeURIComponent(id)}`;
}

export function readString(view: StorageView, area: StorageArea, key: string): string | undefined {
    const value = view.get(area, key);
    if (value === undefined) return undefined;
    if (typeof value !== 'string') {
        throw new Error(`Storage corruption: ${area}/${key} holds a list where a string was expected`);
    }
    return value;
}

export function readList(view: StorageView, area: StorageArea, key: string): readonly string[] | undefined {
    const value = view.get(area, key);
    if (value === undefined) return undefined;
    if (typeof value === 'string') {
        throw new Error(`Storage corruption: ${area}/${key} holds a string where a list was expected`);
    }
    return value;
}

/**
 * In-process storage. Lists are frozen on write so a caller can never mutate
 * committed state through a returned reference.
 */
export class MemoryLedgerStorage implements LedgerStorage {
    private readonly areas: Record<StorageArea, Map<string, StoredValue>> = {
        instance: new Map(),
        persistent: new Map()
    };

    get(area: StorageArea, key: string): StoredValue | undefined {
        return this.areas[area].get(key);
    }

    has(area: StorageArea, key: string): boolean {
        return this.areas[area].has(key);
    }

    set(area: StorageArea, key: string, value: StoredValue): void {
        this.areas[area].set(key, freeze(value));
    }

    remove(area: StorageArea, key: string): void {
        this.areas[area].delete(key);
    }

    applyBatch(writes: readonly StorageWrite[]): void {
        for (const write of writes) {
            if (write.value === null) {
                this.remove(write.area, write.key);
            } else {
                this.set(write.area, write.key, write.value);
            }
        }
    }

    size(area: StorageArea): number {
        return this.areas[area].size;
    }
}

function freeze(value: StoredValue): StoredValue {
    return typeof value === 'string' ? value : Object.freeze([...value]);
}
