import { z } from 'zod';
import type { InvocationContext } from '../context/callContext.js';
import { RegistryError } from '../errors/registryErrors.js';
import { MappingRegistry } from '../mapping/mappingRegistry.js';
import { OwnershipRegistry } from '../ownership/ownershipRegistry.js';
import {
    CidSchema,
    MappingKeySchema,
    PrincipalSchema,
    RegistryAddressSchema,
    TokenIdSchema
} from '../validation/schema.js';
import { validate } from '../validation/zod-middleware.js';

/**
 * Positional-argument operation tables.
 * Commands mutate and need a caller; setup runs once without one; queries are pure reads.
 */
export interface OperationHandler<R> {
    readonly mutates: boolean;
    run(registry: R, args: unknown, call: InvocationContext | undefined, label: string): unknown;
}

function query<R, S extends z.ZodTypeAny>(
    schema: S,
    fn: (registry: R, args: z.infer<S>) => unknown
): OperationHandler<R> {
    return {
        mutates: false,
        run: (registry, args, _call, label) => fn(registry, validate(schema, args, label))
    };
}

function setup<R, S extends z.ZodTypeAny>(
    schema: S,
    fn: (registry: R, args: z.infer<S>) => unknown
): OperationHandler<R> {
    return {
        mutates: true,
        run: (registry, args, _call, label) => fn(registry, validate(schema, args, label))
    };
}

function command<R, S extends z.ZodTypeAny>(
    schema: S,
    fn: (registry: R, args: z.infer<S>, call: InvocationContext) => unknown
): OperationHandler<R> {
    return {
        mutates: true,
        run: (registry, args, call, label) => {
            if (!call) {
                throw new RegistryError('VALIDATION_FAILED', `${label} requires a caller`);
            }
            return fn(registry, validate(schema, args, label), call);
        }
    };
}

export const MAPPING_OPERATIONS: ReadonlyMap<string, OperationHandler<MappingRegistry>> = new Map([
    ['initialize', setup(z.tuple([PrincipalSchema]), (r: MappingRegistry, [owner]) => r.initialize(owner))],
    ['updateMapping', command(z.tuple([TokenIdSchema, CidSchema]), (r: MappingRegistry, [tokenId, cid], call) => r.updateMapping(call, tokenId, cid))],
    ['getMapping', query(z.tuple([TokenIdSchema]), (r: MappingRegistry, [tokenId]) => r.getMapping(tokenId))],
    ['transferOwnership', command(z.tuple([PrincipalSchema]), (r: MappingRegistry, [newOwner], call) => r.transferOwnership(call, newOwner))],
    ['owner', query(z.tuple([]), (r: MappingRegistry) => r.owner())]
]);

export const OWNERSHIP_OPERATIONS: ReadonlyMap<string, OperationHandler<OwnershipRegistry>> = new Map([
    ['initialize', setup(z.tuple([PrincipalSchema, RegistryAddressSchema]), (r: OwnershipRegistry, [admin, mappingRegistry]) => r.initialize(admin, mappingRegistry))],
    ['mint', command(z.tuple([TokenIdSchema, PrincipalSchema, MappingKeySchema]), (r: OwnershipRegistry, [tokenId, holder, mappingKey], call) => r.mint(call, tokenId, holder, mappingKey))],
    ['transfer', command(z.tuple([TokenIdSchema, PrincipalSchema]), (r: OwnershipRegistry, [tokenId, to], call) => r.transfer(call, tokenId, to))],
    ['burn', command(z.tuple([TokenIdSchema]), (r: OwnershipRegistry, [tokenId], call) => r.burn(call, tokenId))],
    ['ownerOf', query(z.tuple([TokenIdSchema]), (r: OwnershipRegistry, [tokenId]) => r.ownerOf(tokenId))],
    ['getMappingKey', query(z.tuple([TokenIdSchema]), (r: OwnershipRegistry, [tokenId]) => r.getMappingKey(tokenId))],
    ['tokensOf', query(z.tuple([PrincipalSchema]), (r: OwnershipRegistry, [holder]) => r.tokensOf(holder))],
    ['admin', query(z.tuple([]), (r: OwnershipRegistry) => r.admin())],
    ['mappingRegistry', query(z.tuple([]), (r: OwnershipRegistry) => r.mappingRegistry())]
]);
