/**
 * Unit Tests: Event Relay
 *
 * Tests cursor handling, seeding and retry behaviour against an in-memory store.
 *
 * @see libs/events/EventRelay.ts
 */

import { describe, it, beforeEach } from 'node:test';
import assert from 'node:assert';
import { ChainTail, EventLog, GENESIS_TAIL } from '../../libs/events/eventLog.js';
import { EventRelay } from '../../libs/events/EventRelay.js';
import { EventStore } from '../../libs/events/PgEventStore.js';
import { verifyEventChain } from '../../libs/events/integrity.js';
import { EventRecord } from '../../libs/events/schema.js';

class MemoryEventStore implements EventStore {
    readonly stored: EventRecord[] = [];
    appendCalls = 0;
    failNext = false;

    async append(records: readonly EventRecord[]): Promise<void> {
        this.appendCalls++;
        if (this.failNext) {
            this.failNext = false;
            throw new Error('store unavailable');
        }
        this.stored.push(...records);
    }

    async historyOf(registry: string, subject: string): Promise<EventRecord[]> {
        return this.stored.filter(r => r.registry === registry && r.subject === subject);
    }

    async lastSequence(): Promise<number> {
        return (await this.tail()).lastSequence;
    }

    async tail(): Promise<ChainTail> {
        const last = this.stored[this.stored.length - 1];
        return last ? { lastSequence: last.sequence, headHash: last.integrity.hash } : GENESIS_TAIL;
    }
}

function appendUpdate(eventLog: EventLog, newCid: string): void {
    eventLog.append('CMAP', {
        topic: 'mapping_updated',
        subject: 't1',
        payload: { tokenId: 't1', oldCid: '', newCid, caller: 'GOWNER' }
    });
}

describe('EventRelay', () => {
    let eventLog: EventLog;

    beforeEach(() => {
        eventLog = new EventLog();
    });

    it('should forward pending records and advance the cursor', async () => {
        const store = new MemoryEventStore();
        const relay = new EventRelay(eventLog, store);
        appendUpdate(eventLog, 'cidA');
        appendUpdate(eventLog, 'cidB');

        assert.strictEqual(await relay.flush(), 2);
        assert.strictEqual(relay.relayedThrough, 2);

        appendUpdate(eventLog, 'cidC');
        assert.strictEqual(await relay.flush(), 1);
        assert.deepStrictEqual(store.stored.map(r => r.sequence), [1, 2, 3]);
    });

    it('should not call the store when nothing is pending', async () => {
        const store = new MemoryEventStore();
        const relay = new EventRelay(eventLog, store);

        assert.strictEqual(await relay.flush(), 0);
        assert.strictEqual(store.appendCalls, 0);
        assert.strictEqual(relay.relayedThrough, 0);
    });

    it('should resume a seeded log without losing records', async () => {
        const store = new MemoryEventStore();
        const previous = new EventLog();
        appendUpdate(previous, 'cidA');
        appendUpdate(previous, 'cidB');
        appendUpdate(previous, 'cidC');
        await new EventRelay(previous, store).flush();

        const resumed = new EventLog(await store.tail());
        const relay = new EventRelay(resumed, store);
        appendUpdate(resumed, 'cidD');
        appendUpdate(resumed, 'cidE');

        assert.strictEqual(await relay.flush(), 2);
        assert.strictEqual(relay.relayedThrough, 5);
        assert.deepStrictEqual(store.stored.map(r => r.sequence), [1, 2, 3, 4, 5]);
        assert.deepStrictEqual(verifyEventChain(store.stored), { valid: true });
    });

    it('should fail when the store is ahead of an unseeded log', async () => {
        const store = new MemoryEventStore();
        const previous = new EventLog();
        appendUpdate(previous, 'cidA');
        appendUpdate(previous, 'cidB');
        appendUpdate(previous, 'cidC');
        await new EventRelay(previous, store).flush();

        const relay = new EventRelay(eventLog, store);
        appendUpdate(eventLog, 'cidD');
        appendUpdate(eventLog, 'cidE');

        await assert.rejects(() => relay.flush(), /Event store is at sequence 3 but the event log holds 1\.\.2/);
        assert.strictEqual(store.appendCalls, 1);
        assert.strictEqual(relay.relayedThrough, null);
    });

    it('should fail when the store stops short of a seeded log', async () => {
        const store = new MemoryEventStore();
        const seeded = new EventLog({ lastSequence: 4, headHash: 'b'.repeat(64) });
        appendUpdate(seeded, 'cidA');

        await assert.rejects(() => new EventRelay(seeded, store).flush(), /Event store is at sequence 0 but the event log holds 5\.\.5/);
        assert.strictEqual(store.appendCalls, 0);
    });

    it('should keep the cursor when the store fails and resend on the next flush', async () => {
        const store = new MemoryEventStore();
        const relay = new EventRelay(eventLog, store);
        appendUpdate(eventLog, 'cidA');
        store.failNext = true;

        await assert.rejects(() => relay.flush(), /store unavailable/);
        assert.strictEqual(relay.relayedThrough, 0);

        assert.strictEqual(await relay.flush(), 1);
        assert.deepStrictEqual(store.stored.map(r => r.sequence), [1]);
    });

    it('should share one flush between concurrent callers', async () => {
        const store = new MemoryEventStore();
        const relay = new EventRelay(eventLog, store);
        appendUpdate(eventLog, 'cidA');

        const [first, second] = await Promise.all([relay.flush(), relay.flush()]);

        assert.strictEqual(first, 1);
        assert.strictEqual(second, 1);
        assert.strictEqual(store.appendCalls, 1);
    });

    it('should tolerate repeated start and stop calls', () => {
        const relay = new EventRelay(eventLog, new MemoryEventStore());
        relay.start(60_000);
        relay.start(60_000);
        relay.stop();
        relay.stop();
    });
});
