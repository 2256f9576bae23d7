import type { StreamFrame, Transaction, TransactionBatch, TransactionEvent, WriteSetChange } from '../../src/stream/types.ts';

export const BASE_TIME_MS = Date.UTC(2024, 0, 1);

export function timestampOf(version: number): Date {
  return new Date(BASE_TIME_MS + version * 1000);
}

export function txn(version: number, overrides: Partial<Transaction> = {}): Transaction {
  return {
    version,
    blockHeight: Math.floor(version / 10),
    epoch: 1,
    timestamp: timestampOf(version),
    type: 'user',
    hash: `0x${version.toString(16).padStart(64, '0')}`,
    success: true,
    vmStatus: 'Executed successfully',
    changes: [],
    events: [],
    sender: '0x1',
    ...overrides,
  };
}

/** Transactions `start..end` inclusive; `special` replaces the generated ones at matching versions. */
export function txns(start: number, end: number, special: Transaction[] = []): Transaction[] {
  const out: Transaction[] = [];
  for (let v = start; v <= end; v++) out.push(special.find((t) => t.version === v) ?? txn(v));
  return out;
}

export function frame(start: number, end: number, chainId: number | null = 1, special: Transaction[] = []): StreamFrame {
  return { chainId, transactions: txns(start, end, special), sizeInBytes: (end - start + 1) * 100 };
}

export function batch(start: number, end: number, chainId = 1, special: Transaction[] = []): TransactionBatch {
  return {
    chainId,
    transactions: txns(start, end, special),
    startVersion: start,
    endVersion: end,
    startTimestamp: timestampOf(start),
    endTimestamp: timestampOf(end),
    sizeInBytes: (end - start + 1) * 100,
  };
}

export function writeResource(address: string, typeStr: string, data: unknown): WriteSetChange {
  return { kind: 'write_resource', address, typeStr, data: JSON.stringify(data) };
}

export function deleteResource(address: string, typeStr: string): WriteSetChange {
  return { kind: 'delete_resource', address, typeStr };
}

export function event(typeStr: string, data: unknown, accountAddress = '0x0'): TransactionEvent {
  return { accountAddress, creationNumber: '0', sequenceNumber: '0', typeStr, data: JSON.stringify(data) };
}

/** `0x` + 64 hex digits ending in `suffix`. */
export function addr(suffix: string): string {
  return `0x${suffix.padStart(64, '0')}`;
}
