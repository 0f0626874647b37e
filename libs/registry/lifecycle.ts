import { RegistryError } from "../errors/registryErrors.js";
import { StorageView } from "../storage/ledgerStorage.js";

export type LifecycleState = 'UNINITIALIZED' | 'READY';

/**
 * Uninitialized -> Ready, keyed on the presence of one instance entry
 * (the owner or admin record written by `initialize`).
 */
export class RegistryLifecycle {
    constructor(private readonly presenceKey: string) { }

    state(view: StorageView): LifecycleState {
        return view.has('instance', this.presenceKey) ? 'READY' : 'UNINITIALIZED';
    }

    assertUninitialized(view: StorageView): void {
        if (this.state(view) !== 'UNINITIALIZED') {
            throw new RegistryError('ALREADY_INITIALIZED', 'Registry already initialized');
        }
    }

    assertReady(view: StorageView): void {
        if (this.state(view) !== 'READY') {
            throw new RegistryError('NOT_INITIALIZED', 'Registry must be initialized before use');
        }
    }
}
