/**
 * Per-transaction object aggregation.
 *
 * Object resources of one object are written as separate write-set changes in
 * no guaranteed order. The first pass finds every address carrying an
 * `ObjectCore`; the second attaches the other resources written at those
 * addresses. A third pass over the events collects burns and transfers.
 * The resulting maps are local to one `process` call.
 */
// src/parsing/objects.ts
import { DecodeError } from '../errors.ts';
import type { Transaction } from '../stream/types.ts';
import { standardizeAddress } from './address.ts';
import { parseTokenEvent, type TokenEvent } from './events.ts';
import { parseObjectResource, type ObjectCore, type ObjectResource, type TokenResource } from './resources.ts';

/** Receives data that could not be decoded; the datum itself is skipped. */
export type DecodeErrorSink = (err: DecodeError) => void;

export type TransferRecord = {
  /** Negative synthetic index, disjoint from write-set change indexes. */
  index: number;
  from: string;
  to: string;
};

export type ObjectAggregatedData = {
  address: string;
  objectCore: ObjectCore;
  /** Index of the write-set change carrying the object core. */
  writeSetChangeIndex: number;
  untransferable: boolean;
  fixedSupply: Extract<ObjectResource, { kind: 'FixedSupply' }> | null;
  unlimitedSupply: Extract<ObjectResource, { kind: 'UnlimitedSupply' }> | null;
  concurrentSupply: Extract<ObjectResource, { kind: 'ConcurrentSupply' }> | null;
  collection: Extract<ObjectResource, { kind: 'Collection' }> | null;
  token: TokenResource | null;
  tokenIdentifiers: Extract<ObjectResource, { kind: 'TokenIdentifiers' }> | null;
  propertyMap: Extract<ObjectResource, { kind: 'PropertyMap' }> | null;
  fungibleAssetMetadata: Extract<ObjectResource, { kind: 'FungibleAssetMetadata' }> | null;
  transferEvents: TransferRecord[];
};

export type ParsedResource = { index: number; address: string; resource: ObjectResource };

export type ParsedEvent = { index: number; accountAddress: string; typeStr: string; event: TokenEvent };

export type BurnRecord = {
  eventIndex: number;
  /** Owner named by the event (current burn shape only). */
  previousOwner: string | null;
  event: Extract<TokenEvent, { kind: 'Burn' | 'BurnEvent' }>;
};

export type TokenEventCorrelation = {
  events: ParsedEvent[];
  tokensBurned: Map<string, BurnRecord>;
};

function decodeFailure(e: unknown, typeStr: string, version: number): DecodeError {
  return e instanceof DecodeError ? e : new DecodeError(typeStr, version, String(e), { cause: e });
}

/**
 * Decodes every written object resource of a transaction, skipping (and reporting) undecodable ones.
 */
export function parseWrittenResources(txn: Transaction, onDecodeError: DecodeErrorSink): ParsedResource[] {
  const out: ParsedResource[] = [];
  txn.changes.forEach((change, index) => {
    if (change.kind !== 'write_resource') return;
    try {
      const resource = parseObjectResource(change.typeStr, change.data, txn.version);
      if (resource) out.push({ index, address: standardizeAddress(change.address), resource });
    } catch (e) {
      onDecodeError(decodeFailure(e, change.typeStr, txn.version));
    }
  });
  return out;
}

/**
 * Builds `address → ObjectAggregatedData` for one transaction.
 */
export function aggregateObjects(
  txn: Transaction,
  onDecodeError: DecodeErrorSink,
  resources: ParsedResource[] = parseWrittenResources(txn, onDecodeError),
): Map<string, ObjectAggregatedData> {
  const objects = new Map<string, ObjectAggregatedData>();

  for (const { index, address, resource } of resources) {
    if (resource.kind !== 'ObjectCore') continue;
    objects.set(address, {
      address,
      objectCore: resource,
      writeSetChangeIndex: index,
      untransferable: false,
      fixedSupply: null,
      unlimitedSupply: null,
      concurrentSupply: null,
      collection: null,
      token: null,
      tokenIdentifiers: null,
      propertyMap: null,
      fungibleAssetMetadata: null,
      transferEvents: [],
    });
  }

  for (const { address, resource } of resources) {
    const obj = objects.get(address);
    if (!obj) continue;
    switch (resource.kind) {
      case 'ObjectCore':
        break;
      case 'Untransferable':
        obj.untransferable = true;
        break;
      case 'FixedSupply':
        obj.fixedSupply = resource;
        break;
      case 'UnlimitedSupply':
        obj.unlimitedSupply = resource;
        break;
      case 'ConcurrentSupply':
        obj.concurrentSupply = resource;
        break;
      case 'Collection':
        obj.collection = resource;
        break;
      case 'Token':
        obj.token = resource;
        break;
      case 'TokenIdentifiers':
        obj.tokenIdentifiers = resource;
        break;
      case 'PropertyMap':
        obj.propertyMap = resource;
        break;
      case 'FungibleAssetMetadata':
        obj.fungibleAssetMetadata = resource;
        break;
    }
  }
  return objects;
}

/**
 * Synthetic index of a transfer event: the event index negated, with event 0 mapped to
 * `-events.length` so that it never collides with write-set change index 0.
 */
export function transferEventIndex(eventIndex: number, eventCount: number): number {
  return -(eventIndex !== 0 ? eventIndex : eventCount);
}

/**
 * Walks the events of a transaction: records burned tokens and attaches
 * transfer events to the aggregated object they move.
 */
export function correlateTokenEvents(
  txn: Transaction,
  objects: Map<string, ObjectAggregatedData>,
  onDecodeError: DecodeErrorSink,
): TokenEventCorrelation {
  const events: ParsedEvent[] = [];
  const tokensBurned = new Map<string, BurnRecord>();

  txn.events.forEach((raw, index) => {
    let event: TokenEvent | null;
    try {
      event = parseTokenEvent(raw.typeStr, raw.data, txn.version);
    } catch (e) {
      onDecodeError(decodeFailure(e, raw.typeStr, txn.version));
      return;
    }
    if (!event) return;
    events.push({ index, accountAddress: standardizeAddress(raw.accountAddress), typeStr: raw.typeStr, event });

    switch (event.kind) {
      case 'Burn':
        tokensBurned.set(event.token, { eventIndex: index, previousOwner: event.previousOwner, event });
        break;
      case 'BurnEvent':
        tokensBurned.set(event.token, { eventIndex: index, previousOwner: null, event });
        break;
      case 'Transfer': {
        const obj = objects.get(event.object);
        if (obj) {
          obj.transferEvents.push({
            index: transferEventIndex(index, txn.events.length),
            from: event.from,
            to: event.to,
          });
        }
        break;
      }
      default:
        break;
    }
  });

  return { events, tokensBurned };
}
