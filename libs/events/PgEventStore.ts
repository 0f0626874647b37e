/**
 * PostgreSQL append-only event store
 *
 * Persists committed registry events so that history survives the process.
 *
 * Table contract (append-only; UPDATE/DELETE revoked from the writer role):
 *   registry_events (
 *     sequence    BIGINT PRIMARY KEY,
 *     event_id    UUID NOT NULL UNIQUE,
 *     registry    TEXT NOT NULL,
 *     topic       TEXT NOT NULL,
 *     subject     TEXT NOT NULL,
 *     payload     JSONB NOT NULL,
 *     recorded_at TIMESTAMPTZ NOT NULL,
 *     prev_hash   CHAR(64) NOT NULL,
 *     hash        CHAR(64) NOT NULL
 *   )
 */

import type { Pool } from 'pg';
import { logger as rootLogger } from '../logging/logger.js';
import { ErrorSanitizer } from '../errors/sanitizer.js';
import { ChainTail, GENESIS_TAIL } from './eventLog.js';
import { EventRecord, EventRecordSchema } from './schema.js';

const logger = rootLogger.child({ component: 'PgEventStore' });

type EventRow = {
    sequence: string; // BIGINT arrives as string
    event_id: string;
    registry: string;
    topic: string;
    subject: string;
    payload: unknown;
    recorded_at: Date | string;
    prev_hash: string;
    hash: string;
};

export interface EventStore {
    append(records: readonly EventRecord[]): Promise<void>;
    historyOf(registry: string, subject: string): Promise<EventRecord[]>;
    lastSequence(): Promise<number>;
    /** Sequence and hash of the newest stored record; seeds the next process's log. */
    tail(): Promise<ChainTail>;
}

export class PgEventStore implements EventStore {
    constructor(private readonly pool: Pool) { }

    /**
     * Inserts a batch in one transaction. Already-stored sequences are skipped,
     * so re-sending a batch after a lost acknowledgement is harmless.
     */
    async append(records: readonly EventRecord[]): Promise<void> {
        if (records.length === 0) return;

        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            for (const record of records) {
                await client.query(
                    `INSERT INTO registry_events
                        (sequence, event_id, registry, topic, subject, payload, recorded_at, prev_hash, hash)
                     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
                     ON CONFLICT (sequence) DO NOTHING`,
                    [
                        record.sequence,
                        record.eventId,
                        record.registry,
                        record.topic,
                        record.subject,
                        JSON.stringify(record.payload),
                        record.timestamp,
                        record.integrity.prevHash,
                        record.integrity.hash
                    ]
                );
            }
            await client.query('COMMIT');

            logger.info({
                count: records.length,
                lastSequence: records[records.length - 1]?.sequence
            }, "Registry events committed to PostgreSQL append-only store");
        } catch (error) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error({ error: rollbackError }, 'Failed to rollback event batch');
            }
            throw ErrorSanitizer.sanitize(error, 'PgEventStore:append');
        } finally {
            client.release();
        }
    }

    async historyOf(registry: string, subject: string): Promise<EventRecord[]> {
        const result = await this.pool.query<EventRow>(
            `SELECT sequence, event_id, registry, topic, subject, payload, recorded_at, prev_hash, hash
             FROM registry_events
             WHERE registry = $1 AND subject = $2
             ORDER BY sequence ASC`,
            [registry, subject]
        );
        return result.rows.map(mapRowToRecord);
    }

    async lastSequence(): Promise<number> {
        const result = await this.pool.query<{ last: string | null }>(
            'SELECT MAX(sequence) AS last FROM registry_events'
        );
        const last = result.rows[0]?.last;
        return last ? Number(last) : 0;
    }

    async tail(): Promise<ChainTail> {
        const result = await this.pool.query<{ sequence: string; hash: string }>(
            'SELECT sequence, hash FROM registry_events ORDER BY sequence DESC LIMIT 1'
        );
        const row = result.rows[0];
        if (!row) return GENESIS_TAIL;
        return { lastSequence: Number(row.sequence), headHash: row.hash };
    }
}

function mapRowToRecord(row: EventRow): EventRecord {
    return EventRecordSchema.parse({
        sequence: Number(row.sequence),
        eventId: row.event_id,
        registry: row.registry,
        topic: row.topic,
        subject: row.subject,
        payload: row.payload,
        timestamp: new Date(row.recorded_at).toISOString(),
        integrity: { prevHash: row.prev_hash, hash: row.hash }
    });
}
