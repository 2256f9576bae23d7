import { describe, expect, it } from 'vitest';
import type { DecodeError } from '../../src/errors.ts';
import { TOKEN_EVENT_TYPES } from '../../src/parsing/events.ts';
import { aggregateObjects, correlateTokenEvents, transferEventIndex } from '../../src/parsing/objects.ts';
import { OBJECT_RESOURCE_TYPES } from '../../src/parsing/resources.ts';
import { addr, event, txn, writeResource } from '../support/builders.ts';

const TOKEN = addr('70');
const COLLECTION = addr('c0');
const ALICE = addr('a1');
const BOB = addr('b2');

const objectCore = (owner: string, allowUngatedTransfer = true) =>
  writeResource(TOKEN, OBJECT_RESOURCE_TYPES.ObjectCore, {
    allow_ungated_transfer: allowUngatedTransfer,
    owner,
    guid_creation_num: '1125899906842626',
  });

const tokenResource = writeResource(TOKEN, OBJECT_RESOURCE_TYPES.Token, {
  collection: { inner: COLLECTION },
  description: 'first',
  name: 'Token #1',
  uri: 'https://example.test/1.json',
});

function collectErrors(): { errors: DecodeError[]; sink: (e: DecodeError) => void } {
  const errors: DecodeError[] = [];
  return { errors, sink: (e) => errors.push(e) };
}

describe('aggregateObjects', () => {
  it('attaches resources written before the object core', () => {
    const t = txn(10, { changes: [tokenResource, objectCore(ALICE)] });
    const { errors, sink } = collectErrors();
    const objects = aggregateObjects(t, sink);

    expect(errors).toEqual([]);
    expect([...objects.keys()]).toEqual([TOKEN]);
    const obj = objects.get(TOKEN);
    expect(obj?.writeSetChangeIndex).toBe(1);
    expect(obj?.objectCore.owner).toBe(ALICE);
    expect(obj?.token).toMatchObject({ collection: COLLECTION, name: 'Token #1' });
    expect(obj?.untransferable).toBe(false);
  });

  it('ignores resources at addresses without an object core', () => {
    const t = txn(10, { changes: [writeResource(addr('99'), OBJECT_RESOURCE_TYPES.Token, { collection: { inner: COLLECTION }, description: '', name: 'x', uri: '' })] });
    expect(aggregateObjects(t, collectErrors().sink).size).toBe(0);
  });

  it('marks untransferable objects', () => {
    const t = txn(10, {
      changes: [objectCore(ALICE, false), writeResource(TOKEN, OBJECT_RESOURCE_TYPES.Untransferable, { dummy_field: false })],
    });
    expect(aggregateObjects(t, collectErrors().sink).get(TOKEN)?.untransferable).toBe(true);
  });

  it('reports and skips undecodable resources', () => {
    const t = txn(12, {
      changes: [objectCore(ALICE), writeResource(TOKEN, OBJECT_RESOURCE_TYPES.Token, { name: 'no collection' })],
    });
    const { errors, sink } = collectErrors();
    const objects = aggregateObjects(t, sink);

    expect(objects.get(TOKEN)?.token).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatchObject({ typeStr: OBJECT_RESOURCE_TYPES.Token, version: 12 });
  });
});

describe('transferEventIndex', () => {
  it('negates the event index', () => {
    expect(transferEventIndex(2, 3)).toBe(-2);
  });

  it('maps event 0 to minus the event count', () => {
    expect(transferEventIndex(0, 3)).toBe(-3);
  });
});

describe('correlateTokenEvents', () => {
  it('records burns of both shapes', () => {
    const other = addr('71');
    const t = txn(20, {
      events: [
        event(TOKEN_EVENT_TYPES.Burn, { collection: COLLECTION, token: TOKEN, previous_owner: ALICE }),
        event(TOKEN_EVENT_TYPES.BurnEvent, { index: '2', token: other }),
      ],
    });
    const { tokensBurned, events } = correlateTokenEvents(t, new Map(), collectErrors().sink);

    expect(events.map((e) => e.event.kind)).toEqual(['Burn', 'BurnEvent']);
    expect(tokensBurned.get(TOKEN)).toMatchObject({ eventIndex: 0, previousOwner: ALICE });
    expect(tokensBurned.get(other)).toMatchObject({ eventIndex: 1, previousOwner: null });
  });

  it('keeps mints as events without recording a burn', () => {
    const t = txn(20, {
      events: [event(TOKEN_EVENT_TYPES.Mint, { collection: COLLECTION, index: { value: '1' }, token: TOKEN })],
    });
    const { events, tokensBurned } = correlateTokenEvents(t, new Map(), collectErrors().sink);
    expect(events.map((e) => e.event.kind)).toEqual(['Mint']);
    expect(tokensBurned.size).toBe(0);
  });

  it('attaches transfers to the object they move', () => {
    const t = txn(30, {
      changes: [objectCore(BOB)],
      events: [
        event('0x1::coin::WithdrawEvent', { amount: '1' }),
        event(TOKEN_EVENT_TYPES.TransferEvent, { from: ALICE, to: BOB, object: TOKEN }),
      ],
    });
    const objects = aggregateObjects(t, collectErrors().sink);
    const { events } = correlateTokenEvents(t, objects, collectErrors().sink);

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ index: 1, accountAddress: addr('0'), typeStr: TOKEN_EVENT_TYPES.TransferEvent });
    expect(objects.get(TOKEN)?.transferEvents).toEqual([{ index: -1, from: ALICE, to: BOB }]);
  });

  it('reports undecodable events and keeps going', () => {
    const t = txn(31, {
      events: [
        event(TOKEN_EVENT_TYPES.Transfer, { from: ALICE }),
        event(TOKEN_EVENT_TYPES.MintEvent, { index: 3, token: TOKEN }),
      ],
    });
    const { errors, sink } = collectErrors();
    const { events } = correlateTokenEvents(t, new Map(), sink);

    expect(errors.map((e) => e.message)).toEqual(['version 31: failed to parse 0x1::object::Transfer: to: Required']);
    expect(events.map((e) => e.index)).toEqual([1]);
  });
});
