/**
 * Row models of the token v2 tables and their extraction from one transaction.
 */
// src/processor/tokenV2/rows.ts
import { standardizeAddress } from '../../parsing/address.ts';
import type { RowOrder } from '../../parsing/dedup.ts';
import { TOKEN_EVENT_TYPES, eventSubject } from '../../parsing/events.ts';
import {
  aggregateObjects,
  correlateTokenEvents,
  transferEventIndex,
  type DecodeErrorSink,
  type ObjectAggregatedData,
  type ParsedEvent,
} from '../../parsing/objects.ts';
import { resolveBurnedOwner, type InMemoryOwnershipLookup, type OwnershipLookup } from '../../parsing/ownership.ts';
import { OBJECT_RESOURCE_TYPES } from '../../parsing/resources.ts';
import { MAX_LENGTHS, truncateStr } from '../../parsing/truncate.ts';
import type { Transaction } from '../../stream/types.ts';

export const TOKEN_STANDARD_V2 = 'v2';

export type TokenActivityRow = {
  transaction_version: number;
  event_index: number;
  event_account_address: string;
  token_data_id: string;
  property_version_v1: string;
  type: string;
  from_address: string | null;
  to_address: string | null;
  token_amount: string;
  before_value: string | null;
  after_value: string | null;
  entry_function_id_str: string | null;
  token_standard: string;
  is_fungible_v2: boolean | null;
  transaction_timestamp: Date;
};

export type TokenOwnershipRow = {
  transaction_version: number;
  write_set_change_index: number;
  token_data_id: string;
  property_version_v1: string;
  owner_address: string | null;
  storage_id: string;
  amount: string;
  table_type_v1: string | null;
  token_properties_mutated_v1: unknown;
  is_soulbound_v2: boolean | null;
  token_standard: string;
  is_fungible_v2: boolean | null;
  transaction_timestamp: Date;
  non_transferrable_by_owner: boolean | null;
};

export type CurrentTokenOwnershipRow = {
  token_data_id: string;
  property_version_v1: string;
  owner_address: string;
  storage_id: string;
  amount: string;
  table_type_v1: string | null;
  token_properties_mutated_v1: unknown;
  is_soulbound_v2: boolean | null;
  token_standard: string;
  is_fungible_v2: boolean | null;
  last_transaction_version: number;
  last_transaction_timestamp: Date;
  non_transferrable_by_owner: boolean | null;
};

export type CurrentTokenDataRow = {
  token_data_id: string;
  collection_id: string;
  token_name: string;
  maximum: string | null;
  supply: string | null;
  largest_property_version_v1: string | null;
  token_uri: string;
  description: string;
  token_properties: unknown;
  token_standard: string;
  is_fungible_v2: boolean | null;
  last_transaction_version: number;
  last_transaction_timestamp: Date;
  decimals: number;
  is_deleted_v2: boolean | null;
};

/** A current-state row with its position in the stream, used to coalesce duplicates. */
export type Ranked<T> = { row: T; order: RowOrder };

export type TokenV2Rows = {
  activities: TokenActivityRow[];
  ownerships: TokenOwnershipRow[];
  currentOwnerships: Ranked<CurrentTokenOwnershipRow>[];
  currentDatas: Ranked<CurrentTokenDataRow>[];
};

export function emptyTokenV2Rows(): TokenV2Rows {
  return { activities: [], ownerships: [], currentOwnerships: [], currentDatas: [] };
}

export function currentOwnershipKey(r: CurrentTokenOwnershipRow): string {
  return `${r.token_data_id}|${r.property_version_v1}|${r.owner_address}|${r.storage_id}`;
}

function activityOf(
  txn: Transaction,
  ts: Date,
  pe: ParsedEvent,
  objects: Map<string, ObjectAggregatedData>,
): TokenActivityRow | null {
  const { event } = pe;
  const tokenDataId = eventSubject(event) ?? pe.accountAddress;
  const meta = objects.get(tokenDataId);
  const owner = meta ? meta.objectCore.owner : null;

  const base = {
    transaction_version: txn.version,
    event_index: pe.index,
    event_account_address: pe.accountAddress,
    token_data_id: tokenDataId,
    property_version_v1: '0',
    entry_function_id_str: null,
    token_standard: TOKEN_STANDARD_V2,
    is_fungible_v2: null,
    transaction_timestamp: ts,
  };

  switch (event.kind) {
    case 'Mint':
    case 'MintEvent':
      return {
        ...base,
        type: TOKEN_EVENT_TYPES.MintEvent,
        from_address: owner,
        to_address: null,
        token_amount: '1',
        before_value: null,
        after_value: null,
      };
    case 'Burn':
    case 'BurnEvent':
      return {
        ...base,
        type: TOKEN_EVENT_TYPES.BurnEvent,
        from_address: owner ?? (event.kind === 'Burn' ? event.previousOwner : null),
        to_address: null,
        token_amount: '1',
        before_value: null,
        after_value: null,
      };
    case 'TokenMutation':
    case 'TokenMutationEvent':
      return {
        ...base,
        type: TOKEN_EVENT_TYPES.TokenMutationEvent,
        from_address: owner,
        to_address: null,
        token_amount: '0',
        before_value: event.oldValue,
        after_value: event.newValue,
      };
    case 'Transfer':
      if (!meta?.token) return null;
      return {
        ...base,
        type: pe.typeStr,
        from_address: event.from,
        to_address: event.to,
        token_amount: '1',
        before_value: null,
        after_value: null,
      };
  }
}

type OwnershipFact = {
  tokenDataId: string;
  ownerAddress: string;
  amount: string;
  /** Write-set change index, or a negative synthetic index for rows derived from events. */
  index: number;
  isSoulbound: boolean | null;
  untransferable: boolean | null;
};

/** Appends the history row and the current-state row of one ownership fact. */
function pushOwnership(out: TokenV2Rows, txn: Transaction, ts: Date, f: OwnershipFact): void {
  const shared = {
    token_data_id: f.tokenDataId,
    property_version_v1: '0',
    owner_address: f.ownerAddress,
    storage_id: f.tokenDataId,
    amount: f.amount,
    table_type_v1: null,
    token_properties_mutated_v1: null,
    is_soulbound_v2: f.isSoulbound,
    token_standard: TOKEN_STANDARD_V2,
    is_fungible_v2: null,
    non_transferrable_by_owner: f.untransferable,
  };
  out.ownerships.push({
    ...shared,
    transaction_version: txn.version,
    write_set_change_index: f.index,
    transaction_timestamp: ts,
  });
  out.currentOwnerships.push({
    row: { ...shared, last_transaction_version: txn.version, last_transaction_timestamp: ts },
    order: [txn.version, f.index],
  });
}

function deletedObjectCoreIndex(txn: Transaction, address: string): number | null {
  const i = txn.changes.findIndex(
    (c) =>
      c.kind === 'delete_resource' &&
      c.typeStr === OBJECT_RESOURCE_TYPES.ObjectCore &&
      standardizeAddress(c.address) === address,
  );
  return i === -1 ? null : i;
}

/**
 * Appends the token rows of one transaction to `out`.
 *
 * Ownerships seen here are remembered in `memory`; burned tokens whose object was deleted get their
 * previous owner from the burn event or from `tiers`.
 */
export async function extractTokenV2Rows(
  txn: Transaction,
  out: TokenV2Rows,
  memory: InMemoryOwnershipLookup,
  tiers: readonly OwnershipLookup[],
  onDecodeError: DecodeErrorSink,
): Promise<void> {
  const ts = txn.timestamp ?? new Date(0);
  const objects = aggregateObjects(txn, onDecodeError);
  const { events, tokensBurned } = correlateTokenEvents(txn, objects, onDecodeError);

  for (const pe of events) {
    const row = activityOf(txn, ts, pe, objects);
    if (row) out.activities.push(row);
  }

  for (const obj of objects.values()) {
    const token = obj.token;
    if (!token) continue;
    const tokenDataId = obj.address;
    const owner = obj.objectCore.owner;
    const burned = tokensBurned.has(tokenDataId);
    const amount = burned ? '0' : '1';
    const isSoulbound = obj.untransferable || !obj.objectCore.allowUngatedTransfer;

    out.currentDatas.push({
      row: {
        token_data_id: tokenDataId,
        collection_id: token.collection,
        token_name: truncateStr(obj.tokenIdentifiers?.name ?? token.name, MAX_LENGTHS.tokenName),
        maximum: null,
        supply: null,
        largest_property_version_v1: null,
        token_uri: truncateStr(token.uri, MAX_LENGTHS.tokenUri),
        description: token.description,
        token_properties: obj.propertyMap?.inner ?? {},
        token_standard: TOKEN_STANDARD_V2,
        is_fungible_v2: obj.fungibleAssetMetadata ? true : null,
        last_transaction_version: txn.version,
        last_transaction_timestamp: ts,
        decimals: obj.fungibleAssetMetadata?.decimals ?? 0,
        is_deleted_v2: burned,
      },
      order: [txn.version, obj.writeSetChangeIndex],
    });

    pushOwnership(out, txn, ts, {
      tokenDataId,
      ownerAddress: owner,
      amount,
      index: obj.writeSetChangeIndex,
      isSoulbound,
      untransferable: obj.untransferable,
    });
    memory.remember({ tokenDataId, ownerAddress: owner, storageId: tokenDataId, lastTransactionVersion: txn.version });

    // the sender of each transfer no longer holds the token
    for (const t of obj.transferEvents) {
      if (t.from === owner) continue;
      pushOwnership(out, txn, ts, {
        tokenDataId,
        ownerAddress: t.from,
        amount: '0',
        index: t.index,
        isSoulbound,
        untransferable: obj.untransferable,
      });
    }
  }

  for (const [tokenDataId, burn] of tokensBurned) {
    if (objects.has(tokenDataId)) continue;
    const { ownerAddress } = await resolveBurnedOwner(tokenDataId, burn.previousOwner, tiers, txn.version);
    const index = deletedObjectCoreIndex(txn, tokenDataId) ?? transferEventIndex(burn.eventIndex, txn.events.length);

    pushOwnership(out, txn, ts, {
      tokenDataId,
      ownerAddress,
      amount: '0',
      index,
      isSoulbound: null,
      untransferable: null,
    });
  }
}
