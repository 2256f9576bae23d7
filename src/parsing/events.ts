/**
 * Token and object events, parsed from their Move type name and JSON payload
 * into a tagged union. Only this module looks at type strings; everything
 * downstream matches on `kind`.
 */
// src/parsing/events.ts
import { z } from 'zod';
import { DecodeError } from '../errors.ts';
import { standardizeAddress } from './address.ts';

export const TOKEN_EVENT_TYPES = {
  Mint: '0x4::collection::Mint',
  MintEvent: '0x4::collection::MintEvent',
  TokenMutation: '0x4::token::Mutation',
  TokenMutationEvent: '0x4::token::MutationEvent',
  Burn: '0x4::collection::Burn',
  BurnEvent: '0x4::collection::BurnEvent',
  TransferEvent: '0x1::object::TransferEvent',
  Transfer: '0x1::object::Transfer',
} as const;

const numeric = z.union([z.string(), z.number()]).transform((v) => String(v));
const address = z.string().transform(standardizeAddress);

export type TokenEvent =
  | { kind: 'Mint'; collection: string; index: string; token: string }
  | { kind: 'MintEvent'; index: string; token: string }
  | { kind: 'TokenMutation'; token: string; mutatedFieldName: string; oldValue: string; newValue: string }
  | { kind: 'TokenMutationEvent'; mutatedFieldName: string; oldValue: string; newValue: string }
  /** Current burn shape, names the owner at burn time (`null` when the field is empty). */
  | { kind: 'Burn'; collection: string; token: string; previousOwner: string | null }
  /** Legacy burn shape without owner. */
  | { kind: 'BurnEvent'; index: string; token: string }
  | { kind: 'Transfer'; from: string; to: string; object: string };

const MintSchema = z
  .object({ collection: address, index: z.object({ value: numeric }), token: address })
  .transform((e): TokenEvent => ({ kind: 'Mint', collection: e.collection, index: e.index.value, token: e.token }));

const MintEventSchema = z
  .object({ index: numeric, token: address })
  .transform((e): TokenEvent => ({ kind: 'MintEvent', index: e.index, token: e.token }));

const TokenMutationSchema = z
  .object({ token_address: address, mutated_field_name: z.string(), old_value: z.string(), new_value: z.string() })
  .transform(
    (e): TokenEvent => ({
      kind: 'TokenMutation',
      token: e.token_address,
      mutatedFieldName: e.mutated_field_name,
      oldValue: e.old_value,
      newValue: e.new_value,
    }),
  );

const TokenMutationEventSchema = z
  .object({ mutated_field_name: z.string(), old_value: z.string(), new_value: z.string() })
  .transform(
    (e): TokenEvent => ({
      kind: 'TokenMutationEvent',
      mutatedFieldName: e.mutated_field_name,
      oldValue: e.old_value,
      newValue: e.new_value,
    }),
  );

const BurnSchema = z
  .object({ collection: address, token: address, previous_owner: z.string() })
  .transform(
    (e): TokenEvent => ({
      kind: 'Burn',
      collection: e.collection,
      token: e.token,
      previousOwner: e.previous_owner === '' ? null : standardizeAddress(e.previous_owner),
    }),
  );

const BurnEventSchema = z
  .object({ index: numeric, token: address })
  .transform((e): TokenEvent => ({ kind: 'BurnEvent', index: e.index, token: e.token }));

const TransferSchema = z
  .object({ from: address, to: address, object: address })
  .transform((e): TokenEvent => ({ kind: 'Transfer', from: e.from, to: e.to, object: e.object }));

const SCHEMAS: Record<string, z.ZodType<TokenEvent, z.ZodTypeDef, unknown>> = {
  [TOKEN_EVENT_TYPES.Mint]: MintSchema,
  [TOKEN_EVENT_TYPES.MintEvent]: MintEventSchema,
  [TOKEN_EVENT_TYPES.TokenMutation]: TokenMutationSchema,
  [TOKEN_EVENT_TYPES.TokenMutationEvent]: TokenMutationEventSchema,
  [TOKEN_EVENT_TYPES.Burn]: BurnSchema,
  [TOKEN_EVENT_TYPES.BurnEvent]: BurnEventSchema,
  [TOKEN_EVENT_TYPES.TransferEvent]: TransferSchema,
  [TOKEN_EVENT_TYPES.Transfer]: TransferSchema,
};

/**
 * Parses a JSON payload, turning a syntax error into a {@link DecodeError}.
 */
export function parseJsonPayload(typeStr: string, data: string, version: number): unknown {
  try {
    return JSON.parse(data);
  } catch (e) {
    throw new DecodeError(typeStr, version, 'payload is not valid JSON', { cause: e });
  }
}

/**
 * Maps an event to its {@link TokenEvent} variant.
 *
 * @returns `null` for event types that are not token or object events.
 * @throws {DecodeError} when a known type carries a payload of the wrong shape.
 */
export function parseTokenEvent(typeStr: string, data: string, version: number): TokenEvent | null {
  const schema = SCHEMAS[typeStr];
  if (!schema) return null;
  const parsed = schema.safeParse(parseJsonPayload(typeStr, data, version));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(typeStr, version, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}

/**
 * Address of the token (or object) an event is about, when the payload names one.
 */
export function eventSubject(e: TokenEvent): string | null {
  switch (e.kind) {
    case 'Mint':
    case 'MintEvent':
    case 'Burn':
    case 'BurnEvent':
    case 'TokenMutation':
      return e.token;
    case 'Transfer':
      return e.object;
    case 'TokenMutationEvent':
      return null;
  }
}
