/**
 * Prior-ownership lookup for burned tokens.
 *
 * When a token object is deleted its `ObjectCore` (and with it the owner) is
 * gone from the write set. The owner at burn time is recovered, in order, from
 * the burn event itself, from ownerships seen earlier in the same batch, from
 * the current ownership table, and finally falls back to the zero address.
 */
// src/parsing/ownership.ts
import type { SqlClient } from '../db/pg.ts';
import { toVersion } from '../db/values.ts';
import { getLogger } from '../utils/logger.ts';
import { ZERO_ADDRESS } from './address.ts';

const log = getLogger('parsing/ownership');

export type PriorOwnership = {
  tokenDataId: string;
  ownerAddress: string;
  storageId: string;
  lastTransactionVersion: number;
};

export interface OwnershipLookup {
  readonly tier: 'memory' | 'database';
  find(tokenDataId: string): Promise<PriorOwnership | null>;
}

/**
 * Ownerships observed while processing the current batch. Scoped to one `process` call.
 */
export class InMemoryOwnershipLookup implements OwnershipLookup {
  readonly tier = 'memory';
  private readonly owners = new Map<string, PriorOwnership>();

  /** Records the latest owner of a token; older versions never replace newer ones. */
  remember(o: PriorOwnership): void {
    const prev = this.owners.get(o.tokenDataId);
    if (!prev || prev.lastTransactionVersion <= o.lastTransactionVersion) this.owners.set(o.tokenDataId, o);
  }

  async find(tokenDataId: string): Promise<PriorOwnership | null> {
    return this.owners.get(tokenDataId) ?? null;
  }

  get size(): number {
    return this.owners.size;
  }
}

/**
 * Latest non-zero ownership stored in `current_token_ownerships_v2`.
 */
export class PersistentOwnershipLookup implements OwnershipLookup {
  readonly tier = 'database';

  constructor(private readonly db: SqlClient) {}

  async find(tokenDataId: string): Promise<PriorOwnership | null> {
    const res = await this.db.query(
      `SELECT owner_address, storage_id, last_transaction_version
         FROM current_token_ownerships_v2
        WHERE token_data_id = $1 AND amount > 0
        ORDER BY last_transaction_version DESC
        LIMIT 1`,
      [tokenDataId],
    );
    const row = res.rows[0];
    if (!row) return null;
    return {
      tokenDataId,
      ownerAddress: String(row.owner_address),
      storageId: String(row.storage_id),
      lastTransactionVersion: toVersion(row.last_transaction_version, 'last_transaction_version'),
    };
  }
}

export type BurnedOwner = {
  ownerAddress: string;
  source: 'event' | OwnershipLookup['tier'] | 'sentinel';
};

/**
 * Resolves who owned a burned token: the event's previous owner, else the first tier that knows it,
 * else the zero address. A row is always produced.
 */
export async function resolveBurnedOwner(
  tokenDataId: string,
  previousOwner: string | null,
  tiers: readonly OwnershipLookup[],
  version: number,
): Promise<BurnedOwner> {
  if (previousOwner) return { ownerAddress: previousOwner, source: 'event' };
  for (const tier of tiers) {
    const found = await tier.find(tokenDataId);
    if (found) return { ownerAddress: found.ownerAddress, source: tier.tier };
  }
  log.warn(`[ownership] version ${version}: no prior owner for burned token ${tokenDataId}, using zero address`);
  return { ownerAddress: ZERO_ADDRESS, source: 'sentinel' };
}
