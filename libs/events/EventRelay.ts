import { logger as rootLogger } from '../logging/logger.js';
import { EventLog } from './eventLog.js';
import { EventStore } from './PgEventStore.js';

const logger = rootLogger.child({ component: 'EventRelay' });

/**
 * Forwards committed events from the in-process log to a durable store.
 * The cursor advances only after the store accepts a batch. The log must be
 * seeded from `store.tail()`; a store that is ahead of the log, or that stops
 * short of the log's first record, fails the flush instead of skipping events.
 */
export class EventRelay {
    private cursor: number | null = null;
    private inFlight: Promise<number> | null = null;
    private timer: NodeJS.Timeout | null = null;

    constructor(
        private readonly eventLog: EventLog,
        private readonly store: EventStore
    ) { }

    /**
     * Sends every record after the cursor. Concurrent callers share one flush.
     * Resolves to the number of records sent.
     */
    flush(): Promise<number> {
        if (!this.inFlight) {
            this.inFlight = this.relay().finally(() => {
                this.inFlight = null;
            });
        }
        return this.inFlight;
    }

    start(intervalMs: number): void {
        if (this.timer) {
            logger.warn('Relay already running');
            return;
        }
        this.timer = setInterval(() => {
            this.flush().catch(error => {
                logger.error({ error }, 'Scheduled relay flush failed');
            });
        }, intervalMs);
        logger.info({ intervalMs }, 'EventRelay started');
    }

    stop(): void {
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
            logger.info('EventRelay stopped');
        }
    }

    get relayedThrough(): number | null {
        return this.cursor;
    }

    private async relay(): Promise<number> {
        if (this.cursor === null) {
            const stored = await this.store.lastSequence();
            const { lastSequence: base } = this.eventLog.anchor;
            if (stored > this.eventLog.lastSequence || stored < base) {
                logger.error({ stored, logBase: base, logHead: this.eventLog.lastSequence }, 'Event store does not line up with the event log');
                throw new Error(
                    `Event store is at sequence ${stored} but the event log holds ${base + 1}..${this.eventLog.lastSequence}; seed the log from the store's tail`
                );
            }
            this.cursor = stored;
        }

        const pending = this.eventLog.since(this.cursor);
        if (pending.length === 0) return 0;

        try {
            await this.store.append(pending);
        } catch (error) {
            logger.error({ error, from: this.cursor + 1, count: pending.length }, 'Event relay batch failed');
            throw error;
        }

        const last = pending[pending.length - 1];
        this.cursor = last ? last.sequence : this.cursor;
        logger.info({ count: pending.length, relayedThrough: this.cursor }, 'Event relay batch committed');
        return pending.length;
    }
}
