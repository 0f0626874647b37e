import { z } from 'zod';

/**
 * Registry event schema
 *
 * Every state-changing operation emits exactly one event: a topic naming the
 * transition, a subject (the token id, or the registry address for an
 * ownership transfer) and a payload with the values before and after.
 */

const HashSchema = z.string().regex(/^[a-f0-9]{64}$/);

export const MappingUpdatedSchema = z.object({
    topic: z.literal('mapping_updated'),
    subject: z.string(),
    payload: z.object({
        tokenId: z.string(),
        oldCid: z.string(),
        newCid: z.string(),
        caller: z.string()
    }).strict()
});

export const OwnershipTransferredSchema = z.object({
    topic: z.literal('ownership_transferred'),
    subject: z.string(),
    payload: z.object({
        oldOwner: z.string(),
        newOwner: z.string()
    }).strict()
});

export const TokenMintedSchema = z.object({
    topic: z.literal('token_minted'),
    subject: z.string(),
    payload: z.object({
        tokenId: z.string(),
        holder: z.string(),
        mappingKey: z.string()
    }).strict()
});

export const TokenTransferredSchema = z.object({
    topic: z.literal('token_transferred'),
    subject: z.string(),
    payload: z.object({
        tokenId: z.string(),
        from: z.string(),
        to: z.string()
    }).strict()
});

export const TokenBurnedSchema = z.object({
    topic: z.literal('token_burned'),
    subject: z.string(),
    payload: z.object({
        tokenId: z.string(),
        holder: z.string()
    }).strict()
});

export const RegistryEventSchema = z.discriminatedUnion('topic', [
    MappingUpdatedSchema,
    OwnershipTransferredSchema,
    TokenMintedSchema,
    TokenTransferredSchema,
    TokenBurnedSchema
]);

export type RegistryEvent = z.infer<typeof RegistryEventSchema>;
export type RegistryEventTopic = RegistryEvent['topic'];

const RecordEnvelope = {
    sequence: z.number().int().positive(),
    eventId: z.string().uuid(),
    registry: z.string().min(1),
    timestamp: z.string().datetime(),
    integrity: z.object({
        prevHash: HashSchema, // Hash of the immediately preceding record
        hash: HashSchema      // SHA-256(canonical(record without integrity) || prevHash)
    }).strict()
};

export const EventRecordSchema = z.discriminatedUnion('topic', [
    MappingUpdatedSchema.extend(RecordEnvelope).strict(),
    OwnershipTransferredSchema.extend(RecordEnvelope).strict(),
    TokenMintedSchema.extend(RecordEnvelope).strict(),
    TokenTransferredSchema.extend(RecordEnvelope).strict(),
    TokenBurnedSchema.extend(RecordEnvelope).strict()
]);

export type EventRecord = z.infer<typeof EventRecordSchema>;

export const GENESIS_HASH = "0".repeat(64);
