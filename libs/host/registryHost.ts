import crypto from "crypto";
import { AuthorizationVerifier } from "../auth/authorizationVerifier.js";
import type { InvocationContext } from "../context/callContext.js";
import { RegistryError } from "../errors/registryErrors.js";
import { EventLog } from "../events/eventLog.js";
import { logger as rootLogger } from "../logging/logger.js";
import { MappingRegistry } from "../mapping/mappingRegistry.js";
import { OwnershipRegistry } from "../ownership/ownershipRegistry.js";
import { RegistryDependencies, RegistryKind } from "../registry/ledgerRegistry.js";
import { LedgerStorage, MemoryLedgerStorage } from "../storage/ledgerStorage.js";
import { MAPPING_OPERATIONS, OperationHandler, OWNERSHIP_OPERATIONS } from "./operations.js";

const logger = rootLogger.child({ component: 'RegistryHost' });

type DeployedRegistry =
    | { kind: 'mapping'; registry: MappingRegistry }
    | { kind: 'ownership'; registry: OwnershipRegistry };

export interface RegistryHostOptions {
    verifier: AuthorizationVerifier;
    eventLog?: EventLog;
    storageFactory?: (address: string) => LedgerStorage;
    /** Called after every state-changing call commits. */
    onCommit?: (address: string, operation: string) => void;
}

export function generateRegistryAddress(): string {
    return `CR${crypto.randomBytes(16).toString("hex").toUpperCase()}`;
}

/**
 * In-process execution environment for registries.
 *
 * Each registry gets its own storage; all share one event log. Calls run one
 * at a time: a call issued while another is in progress aborts with HOST_BUSY.
 */
export class RegistryHost {
    readonly eventLog: EventLog;
    private readonly registries = new Map<string, DeployedRegistry>();
    private readonly storageFactory: (address: string) => LedgerStorage;
    private callInProgress = false;

    constructor(private readonly options: RegistryHostOptions) {
        this.eventLog = options.eventLog ?? new EventLog();
        this.storageFactory = options.storageFactory ?? (() => new MemoryLedgerStorage());
    }

    deployMappingRegistry(address: string = generateRegistryAddress()): MappingRegistry {
        const registry = new MappingRegistry(this.dependencies(address));
        this.registries.set(address, { kind: 'mapping', registry });
        logger.info({ address, kind: 'mapping' }, "Registry deployed");
        return registry;
    }

    deployOwnershipRegistry(address: string = generateRegistryAddress()): OwnershipRegistry {
        const registry = new OwnershipRegistry(this.dependencies(address));
        this.registries.set(address, { kind: 'ownership', registry });
        logger.info({ address, kind: 'ownership' }, "Registry deployed");
        return registry;
    }

    registryKind(address: string): RegistryKind {
        return this.lookup(address).kind;
    }

    addresses(): string[] {
        return [...this.registries.keys()];
    }

    /**
     * Routes one RPC-style call to a deployed registry.
     * Void operations return null.
     */
    invoke(address: string, operation: string, args: unknown, call?: InvocationContext): unknown {
        if (this.callInProgress) {
            throw new RegistryError('HOST_BUSY', 'Another registry call is in progress');
        }

        const deployed = this.lookup(address);
        const label = `${deployed.kind}:${operation}`;

        this.callInProgress = true;
        try {
            const { result, mutates } = deployed.kind === 'mapping'
                ? dispatch(MAPPING_OPERATIONS, deployed.registry, operation, args, call, label)
                : dispatch(OWNERSHIP_OPERATIONS, deployed.registry, operation, args, call, label);
            if (mutates) {
                this.options.onCommit?.(address, operation);
            }
            return result === undefined ? null : result;
        } catch (error) {
            logger.warn({
                address,
                operation,
                requestId: call?.requestId,
                code: error instanceof RegistryError ? error.code : 'INTERNAL'
            }, "Registry call aborted");
            throw error;
        } finally {
            this.callInProgress = false;
        }
    }

    private dependencies(address: string): RegistryDependencies {
        if (this.registries.has(address)) {
            throw new RegistryError('ADDRESS_IN_USE', `A registry is already deployed at ${address}`);
        }
        return {
            address,
            storage: this.storageFactory(address),
            eventLog: this.eventLog,
            verifier: this.options.verifier
        };
    }

    private lookup(address: string): DeployedRegistry {
        const deployed = this.registries.get(address);
        if (!deployed) {
            throw new RegistryError('REGISTRY_NOT_FOUND', `No registry deployed at ${address}`);
        }
        return deployed;
    }
}

function dispatch<R>(
    table: ReadonlyMap<string, OperationHandler<R>>,
    registry: R,
    operation: string,
    args: unknown,
    call: InvocationContext | undefined,
    label: string
): { result: unknown; mutates: boolean } {
    const handler = table.get(operation);
    if (!handler) {
        throw new RegistryError('UNKNOWN_OPERATION', `Unknown operation ${label}`);
    }
    return { result: handler.run(registry, args, call, label), mutates: handler.mutates };
}
