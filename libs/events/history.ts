import type { Principal } from "../context/callContext.js";
import { EventRecord } from "./schema.js";

export interface MappingRevision {
    /** 1-based; revision 0 is the unset value "". */
    revision: number;
    sequence: number;
    oldCid: string;
    newCid: string;
    caller: Principal;
    timestamp: string;
}

export interface MappingHistory {
    registry: string;
    tokenId: string;
    /** values[k] is the mapping after revision k; values[0] is "". */
    values: string[];
    revisions: MappingRevision[];
    /** False when some event's oldCid differs from the preceding newCid. */
    consistent: boolean;
}

/**
 * Replays `mapping_updated` events for one token id, in emission order.
 */
export function mappingHistory(records: readonly EventRecord[], registry: string, tokenId: string): MappingHistory {
    const values = [''];
    const revisions: MappingRevision[] = [];
    let consistent = true;

    for (const record of records) {
        if (record.topic !== 'mapping_updated' || record.registry !== registry || record.payload.tokenId !== tokenId) {
            continue;
        }
        const { oldCid, newCid, caller } = record.payload;
        if (oldCid !== values[values.length - 1]) {
            consistent = false;
        }
        values.push(newCid);
        revisions.push({
            revision: revisions.length + 1,
            sequence: record.sequence,
            oldCid,
            newCid,
            caller,
            timestamp: record.timestamp
        });
    }

    return { registry, tokenId, values, revisions, consistent };
}

/**
 * Value of the mapping after revision `k`, or undefined past the last revision.
 */
export function mappingAtRevision(history: MappingHistory, k: number): string | undefined {
    if (!Number.isInteger(k) || k < 0) return undefined;
    return history.values[k];
}

export interface OwnershipTransition {
    sequence: number;
    topic: 'token_minted' | 'token_transferred' | 'token_burned';
    /** Holder after the transition; null once burned. */
    holder: Principal | null;
    timestamp: string;
}

/**
 * Holder transitions of one token id across mints, transfers and burns.
 */
export function ownershipHistory(records: readonly EventRecord[], registry: string, tokenId: string): OwnershipTransition[] {
    const transitions: OwnershipTransition[] = [];

    for (const record of records) {
        if (record.registry !== registry) continue;

        switch (record.topic) {
            case 'token_minted':
                if (record.payload.tokenId === tokenId) {
                    transitions.push({ sequence: record.sequence, topic: record.topic, holder: record.payload.holder, timestamp: record.timestamp });
                }
                break;
            case 'token_transferred':
                if (record.payload.tokenId === tokenId) {
                    transitions.push({ sequence: record.sequence, topic: record.topic, holder: record.payload.to, timestamp: record.timestamp });
                }
                break;
            case 'token_burned':
                if (record.payload.tokenId === tokenId) {
                    transitions.push({ sequence: record.sequence, topic: record.topic, holder: null, timestamp: record.timestamp });
                }
                break;
            default:
                break;
        }
    }

    return transitions;
}
