import fs from "fs";
import { ChainTail, computeRecordHash, GENESIS_TAIL } from "./eventLog.js";
import { EventRecord, EventRecordSchema } from "./schema.js";

export interface ChainVerification {
    valid: boolean;
    violationIndex?: number;
    reason?: string;
}

/**
 * Validates the hash chain and sequence numbering of event records.
 * `anchor` is the record just before the first one; the default is the genesis.
 */
export function verifyEventChain(records: readonly EventRecord[], anchor: ChainTail = GENESIS_TAIL): ChainVerification {
    let lastHash = anchor.headHash;

    for (let i = 0; i < records.length; i++) {
        const record = records[i];
        if (!record) continue;

        const expected = anchor.lastSequence + i + 1;
        if (record.sequence !== expected) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Sequence gap at record ${i}: expected ${expected}, found ${record.sequence}`
            };
        }

        if (record.integrity.prevHash !== lastHash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Chain broken at record ${i}: prevHash mismatch. Expected ${lastHash}, found ${record.integrity.prevHash}`
            };
        }

        const { integrity, ...contentsOnly } = record;
        const computedHash = computeRecordHash(contentsOnly, integrity.prevHash);

        if (computedHash !== integrity.hash) {
            return {
                valid: false,
                violationIndex: i,
                reason: `Integrity violation at record ${i}: hash mismatch. Computed ${computedHash}, found ${integrity.hash}`
            };
        }

        lastHash = integrity.hash;
    }

    return { valid: true };
}

/**
 * Exports records as newline-delimited JSON.
 */
export function writeEventLogFile(filePath: string, records: readonly EventRecord[]): void {
    fs.writeFileSync(filePath, records.map(r => JSON.stringify(r)).join("\n") + (records.length > 0 ? "\n" : ""));
}

type ParsedLog =
    | { ok: true; records: EventRecord[] }
    | { ok: false; violationIndex: number; reason: string };

function parseEventLog(filePath: string): ParsedLog {
    if (!fs.existsSync(filePath)) {
        return { ok: true, records: [] };
    }

    const lines = fs.readFileSync(filePath, "utf8").split("\n").filter(line => line.trim() !== "");
    const records: EventRecord[] = [];

    for (let i = 0; i < lines.length; i++) {
        try {
            const parsed = EventRecordSchema.safeParse(JSON.parse(lines[i] ?? ""));
            if (!parsed.success) {
                const first = parsed.error.issues[0];
                return {
                    ok: false,
                    violationIndex: i,
                    reason: `Format error at record ${i}: ${first ? `${first.path.join(".")} ${first.message}` : "schema mismatch"}`
                };
            }
            records.push(parsed.data);
        } catch (e) {
            const errorMessage = e instanceof Error ? e.message : "Parse error";
            return { ok: false, violationIndex: i, reason: `Format error at record ${i}: ${errorMessage}` };
        }
    }

    return { ok: true, records };
}

/**
 * Validates an NDJSON event log file. A missing file is an empty, valid log.
 */
export function verifyEventLogFile(filePath: string): ChainVerification {
    const parsed = parseEventLog(filePath);
    if (!parsed.ok) {
        return { valid: false, violationIndex: parsed.violationIndex, reason: parsed.reason };
    }
    return verifyEventChain(parsed.records);
}

/**
 * Reads an NDJSON event log file, failing on malformed lines.
 */
export function readEventLogFile(filePath: string): EventRecord[] {
    const parsed = parseEventLog(filePath);
    if (!parsed.ok) {
        throw new Error(parsed.reason);
    }
    return parsed.records;
}
