import crypto from "crypto";
import { canonicalJson } from "../crypto/canonicalJson.js";
import { logger } from "../logging/logger.js";
import { EventRecord, GENESIS_HASH, RegistryEvent, RegistryEventTopic } from "./schema.js";

/**
 * SHA-256 over the canonical record contents chained to the previous hash.
 */
export function computeRecordHash(contents: object, prevHash: string): string {
    return crypto.createHash("sha256")
        .update(canonicalJson(contents) + prevHash)
        .digest("hex");
}

/**
 * Append-only, hash-chained event log shared by every registry of a host.
 *
 * Current registry state answers "what is the value now"; only this log
 * answers "what was the value at revision k".
 */
/**
 * Position a log continues from: the last sequence already persisted and its hash.
 */
export interface ChainTail {
    lastSequence: number;
    headHash: string;
}

export const GENESIS_TAIL: ChainTail = Object.freeze({ lastSequence: 0, headHash: GENESIS_HASH });

/**
 * Freezes a record and the objects nested in it.
 */
function sealRecord(record: EventRecord): EventRecord {
    Object.freeze(record.payload);
    Object.freeze(record.integrity);
    return Object.freeze(record);
}

export class EventLog {
    private readonly records: EventRecord[] = [];
    private readonly base: ChainTail;
    private lastHash: string;

    /**
     * A log seeded with `tail` numbers its first record `tail.lastSequence + 1`
     * and chains it to `tail.headHash`.
     */
    constructor(tail: ChainTail = GENESIS_TAIL) {
        if (!Number.isInteger(tail.lastSequence) || tail.lastSequence < 0) {
            throw new Error(`Invalid event log tail sequence: ${tail.lastSequence}`);
        }
        this.base = Object.freeze({ ...tail });
        this.lastHash = tail.headHash;
    }

    append(registry: string, event: RegistryEvent): EventRecord {
        const prevHash = this.lastHash;
        const contents = {
            sequence: this.base.lastSequence + this.records.length + 1,
            eventId: crypto.randomUUID(),
            registry,
            ...structuredClone(event),
            timestamp: new Date().toISOString()
        };
        const hash = computeRecordHash(contents, prevHash);
        const record = sealRecord({ ...contents, integrity: { prevHash, hash } });

        this.records.push(record);
        this.lastHash = hash;

        logger.debug({
            registry,
            topic: record.topic,
            subject: record.subject,
            sequence: record.sequence,
            integrityHash: hash
        }, "Event appended");

        return record;
    }

    all(): readonly EventRecord[] {
        return [...this.records];
    }

    bySubject(subject: string, registry?: string): EventRecord[] {
        return this.records.filter(r =>
            r.subject === subject && (registry === undefined || r.registry === registry));
    }

    byTopic(topic: RegistryEventTopic, registry?: string): EventRecord[] {
        return this.records.filter(r =>
            r.topic === topic && (registry === undefined || r.registry === registry));
    }

    /**
     * Records with a sequence strictly greater than `sequence`.
     */
    since(sequence: number): EventRecord[] {
        return this.records.slice(Math.max(0, sequence - this.base.lastSequence));
    }

    get lastSequence(): number {
        return this.base.lastSequence + this.records.length;
    }

    /**
     * Where this log's own records start; verify them with `verifyEventChain(log.all(), log.anchor)`.
     */
    get anchor(): ChainTail {
        return this.base;
    }

    get headHash(): string {
        return this.lastHash;
    }
}
