/**
 * Unit Tests: History Reconstruction
 *
 * Tests that past mapping values and holders are recoverable from events alone.
 *
 * @see libs/events/history.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { EventLog } from '../../libs/events/eventLog.js';
import { mappingAtRevision, mappingHistory, ownershipHistory } from '../../libs/events/history.js';
import {
    ADMIN,
    ALICE,
    BOB,
    createMappingRegistry,
    createOwnershipRegistry,
    MAPPING_ADDRESS,
    OWNER,
    OWNERSHIP_ADDRESS,
    signedCall
} from '../helpers.js';

describe('mappingHistory', () => {
    it('should rebuild every revision of a token id from mapping_updated events', () => {
        const { registry, eventLog } = createMappingRegistry();
        registry.initialize(OWNER);
        registry.updateMapping(signedCall(OWNER, MAPPING_ADDRESS, 'updateMapping'), 't1', 'cidX');
        registry.updateMapping(signedCall(OWNER, MAPPING_ADDRESS, 'updateMapping'), 't2', 'cidZ');
        registry.updateMapping(signedCall(OWNER, MAPPING_ADDRESS, 'updateMapping'), 't1', 'cidY');

        const history = mappingHistory(eventLog.all(), MAPPING_ADDRESS, 't1');

        assert.deepStrictEqual(history.values, ['', 'cidX', 'cidY']);
        assert.strictEqual(history.consistent, true);
        assert.deepStrictEqual(history.revisions.map(r => [r.revision, r.sequence, r.oldCid, r.newCid, r.caller]), [
            [1, 1, '', 'cidX', OWNER],
            [2, 3, 'cidX', 'cidY', OWNER]
        ]);
        assert.strictEqual(registry.getMapping('t1'), history.values[history.values.length - 1]);
    });

    it('should answer the value at a revision', () => {
        const { registry, eventLog } = createMappingRegistry();
        registry.initialize(OWNER);
        registry.updateMapping(signedCall(OWNER, MAPPING_ADDRESS, 'updateMapping'), 't1', 'cidX');
        registry.updateMapping(signedCall(OWNER, MAPPING_ADDRESS, 'updateMapping'), 't1', 'cidY');

        const history = mappingHistory(eventLog.all(), MAPPING_ADDRESS, 't1');

        assert.strictEqual(mappingAtRevision(history, 0), '');
        assert.strictEqual(mappingAtRevision(history, 1), 'cidX');
        assert.strictEqual(mappingAtRevision(history, 2), 'cidY');
        assert.strictEqual(mappingAtRevision(history, 3), undefined);
        assert.strictEqual(mappingAtRevision(history, -1), undefined);
        assert.strictEqual(mappingAtRevision(history, 1.5), undefined);
    });

    it('should ignore events of other registries', () => {
        const eventLog = new EventLog();
        eventLog.append('COTHER', {
            topic: 'mapping_updated',
            subject: 't1',
            payload: { tokenId: 't1', oldCid: '', newCid: 'cidQ', caller: OWNER }
        });

        const history = mappingHistory(eventLog.all(), MAPPING_ADDRESS, 't1');
        assert.deepStrictEqual(history.values, ['']);
        assert.deepStrictEqual(history.revisions, []);
    });

    it('should flag an oldCid that does not match the preceding value', () => {
        const eventLog = new EventLog();
        eventLog.append(MAPPING_ADDRESS, {
            topic: 'mapping_updated',
            subject: 't1',
            payload: { tokenId: 't1', oldCid: '', newCid: 'cidX', caller: OWNER }
        });
        eventLog.append(MAPPING_ADDRESS, {
            topic: 'mapping_updated',
            subject: 't1',
            payload: { tokenId: 't1', oldCid: 'cidW', newCid: 'cidY', caller: OWNER }
        });

        const history = mappingHistory(eventLog.all(), MAPPING_ADDRESS, 't1');
        assert.strictEqual(history.consistent, false);
        assert.deepStrictEqual(history.values, ['', 'cidX', 'cidY']);
    });
});

describe('ownershipHistory', () => {
    it('should list holder transitions through mint, transfer and burn', () => {
        const { registry, eventLog } = createOwnershipRegistry();
        registry.initialize(ADMIN, MAPPING_ADDRESS);
        registry.mint(signedCall(ADMIN, OWNERSHIP_ADDRESS, 'mint'), 't1', ALICE, 'm1');
        registry.mint(signedCall(ADMIN, OWNERSHIP_ADDRESS, 'mint'), 't2', ALICE, 'm2');
        registry.transfer(signedCall(ALICE, OWNERSHIP_ADDRESS, 'transfer'), 't1', BOB);
        registry.burn(signedCall(BOB, OWNERSHIP_ADDRESS, 'burn'), 't1');

        const transitions = ownershipHistory(eventLog.all(), OWNERSHIP_ADDRESS, 't1');

        assert.deepStrictEqual(transitions.map(t => [t.sequence, t.topic, t.holder]), [
            [1, 'token_minted', ALICE],
            [3, 'token_transferred', BOB],
            [4, 'token_burned', null]
        ]);
    });
});
