import { describe, expect, it } from 'vitest';
import { ZERO_ADDRESS } from '../../src/parsing/address.ts';
import {
  InMemoryOwnershipLookup,
  PersistentOwnershipLookup,
  resolveBurnedOwner,
  type OwnershipLookup,
} from '../../src/parsing/ownership.ts';
import { addr } from '../support/builders.ts';
import { FakePg } from '../support/fakePg.ts';

const TOKEN = addr('70');

function currentOwnership(owner: string, amount: string, version: number) {
  return {
    token_data_id: TOKEN,
    property_version_v1: '0',
    owner_address: owner,
    storage_id: TOKEN,
    amount,
    last_transaction_version: String(version),
  };
}

describe('InMemoryOwnershipLookup', () => {
  it('keeps the newest owner of a token', async () => {
    const memory = new InMemoryOwnershipLookup();
    memory.remember({ tokenDataId: TOKEN, ownerAddress: addr('b2'), storageId: TOKEN, lastTransactionVersion: 20 });
    memory.remember({ tokenDataId: TOKEN, ownerAddress: addr('a1'), storageId: TOKEN, lastTransactionVersion: 10 });

    expect(memory.size).toBe(1);
    expect((await memory.find(TOKEN))?.ownerAddress).toBe(addr('b2'));
    expect(await memory.find(addr('71'))).toBeNull();
  });
});

describe('PersistentOwnershipLookup', () => {
  it('returns the latest owner holding a non-zero amount', async () => {
    const db = new FakePg();
    db.seed('current_token_ownerships_v2', currentOwnership(addr('a1'), '1', 10));
    db.seed('current_token_ownerships_v2', currentOwnership(addr('b2'), '1', 20));
    db.seed('current_token_ownerships_v2', currentOwnership(addr('c3'), '0', 30));

    expect(await new PersistentOwnershipLookup(db).find(TOKEN)).toEqual({
      tokenDataId: TOKEN,
      ownerAddress: addr('b2'),
      storageId: TOKEN,
      lastTransactionVersion: 20,
    });
  });

  it('returns null for unknown tokens', async () => {
    expect(await new PersistentOwnershipLookup(new FakePg()).find(TOKEN)).toBeNull();
  });
});

describe('resolveBurnedOwner', () => {
  const stored: OwnershipLookup = {
    tier: 'database',
    find: async (id) => ({ tokenDataId: id, ownerAddress: addr('d4'), storageId: id, lastTransactionVersion: 5 }),
  };

  it('prefers the owner named by the burn event', async () => {
    expect(await resolveBurnedOwner(TOKEN, addr('a1'), [stored], 50)).toEqual({ ownerAddress: addr('a1'), source: 'event' });
  });

  it('asks the tiers in order', async () => {
    const memory = new InMemoryOwnershipLookup();
    memory.remember({ tokenDataId: TOKEN, ownerAddress: addr('b2'), storageId: TOKEN, lastTransactionVersion: 40 });

    expect(await resolveBurnedOwner(TOKEN, null, [memory, stored], 50)).toEqual({ ownerAddress: addr('b2'), source: 'memory' });
    expect(await resolveBurnedOwner(TOKEN, null, [new InMemoryOwnershipLookup(), stored], 50)).toEqual({
      ownerAddress: addr('d4'),
      source: 'database',
    });
  });

  it('falls back to the zero address', async () => {
    const db = new FakePg();
    expect(await resolveBurnedOwner(TOKEN, null, [new InMemoryOwnershipLookup(), new PersistentOwnershipLookup(db)], 50)).toEqual({
      ownerAddress: ZERO_ADDRESS,
      source: 'sentinel',
    });
  });
});
