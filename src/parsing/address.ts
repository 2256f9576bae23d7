// src/parsing/address.ts

/** Canonical form of the zero address. */
export const ZERO_ADDRESS = `0x${'0'.repeat(64)}`;

/**
 * Canonical account/object address: `0x` followed by 64 lowercase hex digits, left-padded with zeros.
 * Accepts input with or without the `0x` prefix and in any case.
 */
export function standardizeAddress(address: string): string {
  const raw = address.startsWith('0x') || address.startsWith('0X') ? address.slice(2) : address;
  return `0x${raw.toLowerCase().padStart(64, '0')}`;
}

/** Strips type arguments: `0x1::coin::CoinStore<0x1::aptos_coin::AptosCoin>` → `0x1::coin::CoinStore`. */
export function outerType(typeStr: string): string {
  const i = typeStr.indexOf('<');
  return i === -1 ? typeStr : typeStr.slice(0, i);
}
