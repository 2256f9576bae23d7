// src/processor/tokenV2/flush.ts
import type { SqlClient } from '../../db/pg.ts';
import { execBatchedInsert, latestWinsClause } from '../../db/batch.ts';
import type { CurrentTokenDataRow, CurrentTokenOwnershipRow, TokenActivityRow, TokenOwnershipRow } from './rows.ts';

const ACTIVITY_COLUMNS = [
  'transaction_version',
  'event_index',
  'event_account_address',
  'token_data_id',
  'property_version_v1',
  'type',
  'from_address',
  'to_address',
  'token_amount',
  'before_value',
  'after_value',
  'entry_function_id_str',
  'token_standard',
  'is_fungible_v2',
  'transaction_timestamp',
] as const;

const OWNERSHIP_COLUMNS = [
  'transaction_version',
  'write_set_change_index',
  'token_data_id',
  'property_version_v1',
  'owner_address',
  'storage_id',
  'amount',
  'table_type_v1',
  'token_properties_mutated_v1',
  'is_soulbound_v2',
  'token_standard',
  'is_fungible_v2',
  'transaction_timestamp',
  'non_transferrable_by_owner',
] as const;

const CURRENT_OWNERSHIP_PK = ['token_data_id', 'property_version_v1', 'owner_address', 'storage_id'] as const;
const CURRENT_OWNERSHIP_COLUMNS = [
  ...CURRENT_OWNERSHIP_PK,
  'amount',
  'table_type_v1',
  'token_properties_mutated_v1',
  'is_soulbound_v2',
  'token_standard',
  'is_fungible_v2',
  'last_transaction_version',
  'last_transaction_timestamp',
  'non_transferrable_by_owner',
] as const;

const CURRENT_DATA_COLUMNS = [
  'token_data_id',
  'collection_id',
  'token_name',
  'maximum',
  'supply',
  'largest_property_version_v1',
  'token_uri',
  'description',
  'token_properties',
  'token_standard',
  'is_fungible_v2',
  'last_transaction_version',
  'last_transaction_timestamp',
  'decimals',
  'is_deleted_v2',
] as const;

/** History table keyed by `(transaction_version, event_index)`. */
export async function flushTokenActivities(client: SqlClient, rows: TokenActivityRow[]): Promise<void> {
  if (!rows.length) return;
  await execBatchedInsert(
    client,
    'token_activities_v2',
    ACTIVITY_COLUMNS,
    rows,
    'ON CONFLICT (transaction_version, event_index) DO NOTHING',
  );
}

/** History table keyed by `(transaction_version, write_set_change_index)`. */
export async function flushTokenOwnerships(client: SqlClient, rows: TokenOwnershipRow[]): Promise<void> {
  if (!rows.length) return;
  await execBatchedInsert(
    client,
    'token_ownerships_v2',
    OWNERSHIP_COLUMNS,
    rows,
    'ON CONFLICT (transaction_version, write_set_change_index) DO NOTHING',
    { token_properties_mutated_v1: 'jsonb' },
  );
}

/**
 * Current-state upsert; a stored row with a higher `last_transaction_version` is kept.
 * Rows must be deduplicated by key and sorted.
 */
export async function flushCurrentTokenOwnerships(client: SqlClient, rows: CurrentTokenOwnershipRow[]): Promise<void> {
  if (!rows.length) return;
  const updateCols = CURRENT_OWNERSHIP_COLUMNS.filter((c) => !CURRENT_OWNERSHIP_PK.some((pk) => pk === c));
  await execBatchedInsert(
    client,
    'current_token_ownerships_v2',
    CURRENT_OWNERSHIP_COLUMNS,
    rows,
    latestWinsClause('current_token_ownerships_v2', CURRENT_OWNERSHIP_PK, updateCols),
    { token_properties_mutated_v1: 'jsonb' },
  );
}

/**
 * Current-state upsert of token metadata, gated like {@link flushCurrentTokenOwnerships}.
 */
export async function flushCurrentTokenDatas(client: SqlClient, rows: CurrentTokenDataRow[]): Promise<void> {
  if (!rows.length) return;
  await execBatchedInsert(
    client,
    'current_token_datas_v2',
    CURRENT_DATA_COLUMNS,
    rows,
    latestWinsClause(
      'current_token_datas_v2',
      ['token_data_id'],
      CURRENT_DATA_COLUMNS.filter((c) => c !== 'token_data_id'),
    ),
    { token_properties: 'jsonb' },
  );
}
