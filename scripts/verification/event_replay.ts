/**
 * Event Log Replay Script
 *
 * Verifies an exported NDJSON event log and reconstructs the mapping history
 * of one token id from it.
 *
 * Usage: tsx scripts/verification/event_replay.ts <log.ndjson> <registryAddress> <tokenId>
 *
 * Constraints:
 * - Read-only
 * - No registry logic invoked; history comes from events alone
 */

import { pino } from 'pino';
import { pathToFileURL } from 'url';
import { mappingHistory, MappingHistory } from '../../libs/events/history.js';
import { readEventLogFile, verifyEventLogFile } from '../../libs/events/integrity.js';

const logger = pino({ name: 'EventReplay' });

export interface ReplayReport {
    readonly file: string;
    readonly recordCount: number;
    readonly headHash: string | null;
    readonly history: MappingHistory;
}

export function replayMappingHistory(filePath: string, registry: string, tokenId: string): ReplayReport {
    const verification = verifyEventLogFile(filePath);
    if (!verification.valid) {
        throw new Error(`Event log failed verification: ${verification.reason ?? 'unknown violation'}`);
    }

    const records = readEventLogFile(filePath);
    const history = mappingHistory(records, registry, tokenId);

    logger.info({
        file: filePath,
        recordCount: records.length,
        revisions: history.revisions.length,
        consistent: history.consistent
    }, 'Mapping history reconstructed');

    return {
        file: filePath,
        recordCount: records.length,
        headHash: records[records.length - 1]?.integrity.hash ?? null,
        history
    };
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
    const [filePath, registry, tokenId] = process.argv.slice(2);
    if (!filePath || !registry || !tokenId) {
        logger.error('Usage: event_replay.ts <log.ndjson> <registryAddress> <tokenId>');
        process.exit(2);
    }
    try {
        const report = replayMappingHistory(filePath, registry, tokenId);
        process.stdout.write(JSON.stringify(report, null, 2) + '\n');
    } catch (error) {
        logger.error({ error }, 'Replay failed');
        process.exit(1);
    }
}
