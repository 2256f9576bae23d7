/**
 * Object resources (object core, supplies, collection, token, property map,
 * fungible asset metadata) parsed from write-set changes into a tagged union.
 */
// src/parsing/resources.ts
import { z } from 'zod';
import { DecodeError } from '../errors.ts';
import { outerType, standardizeAddress } from './address.ts';
import { parseJsonPayload } from './events.ts';

export const OBJECT_RESOURCE_TYPES = {
  ObjectCore: '0x1::object::ObjectCore',
  Untransferable: '0x1::object::Untransferable',
  FixedSupply: '0x4::collection::FixedSupply',
  UnlimitedSupply: '0x4::collection::UnlimitedSupply',
  ConcurrentSupply: '0x4::collection::ConcurrentSupply',
  Collection: '0x4::collection::Collection',
  Token: '0x4::token::Token',
  TokenIdentifiers: '0x4::token::TokenIdentifiers',
  PropertyMap: '0x4::property_map::PropertyMap',
  FungibleAssetMetadata: '0x1::fungible_asset::Metadata',
} as const;

const numeric = z.union([z.string(), z.number()]).transform((v) => String(v));
const address = z.string().transform(standardizeAddress);
const aggregator = z.object({ value: numeric, max_value: numeric });

export type ObjectCore = { kind: 'ObjectCore'; allowUngatedTransfer: boolean; owner: string; guidCreationNum: string };
export type TokenResource = {
  kind: 'Token';
  collection: string;
  description: string;
  name: string;
  uri: string;
  index: string | null;
};

export type ObjectResource =
  | ObjectCore
  | { kind: 'Untransferable' }
  | { kind: 'FixedSupply'; currentSupply: string; maxSupply: string; totalMinted: string }
  | { kind: 'UnlimitedSupply'; currentSupply: string; totalMinted: string }
  | { kind: 'ConcurrentSupply'; currentSupply: string; maxSupply: string; totalMinted: string }
  | { kind: 'Collection'; creator: string; description: string; name: string; uri: string }
  | TokenResource
  | { kind: 'TokenIdentifiers'; name: string }
  | { kind: 'PropertyMap'; inner: unknown }
  | { kind: 'FungibleAssetMetadata'; name: string; symbol: string; decimals: number; iconUri: string; projectUri: string };

const SCHEMAS: Record<string, z.ZodType<ObjectResource, z.ZodTypeDef, unknown>> = {
  [OBJECT_RESOURCE_TYPES.ObjectCore]: z
    .object({ allow_ungated_transfer: z.boolean(), owner: address, guid_creation_num: numeric.default('0') })
    .transform(
      (r): ObjectResource => ({
        kind: 'ObjectCore',
        allowUngatedTransfer: r.allow_ungated_transfer,
        owner: r.owner,
        guidCreationNum: r.guid_creation_num,
      }),
    ),
  [OBJECT_RESOURCE_TYPES.Untransferable]: z.unknown().transform((): ObjectResource => ({ kind: 'Untransferable' })),
  [OBJECT_RESOURCE_TYPES.FixedSupply]: z
    .object({ current_supply: numeric, max_supply: numeric, total_minted: numeric })
    .transform(
      (r): ObjectResource => ({
        kind: 'FixedSupply',
        currentSupply: r.current_supply,
        maxSupply: r.max_supply,
        totalMinted: r.total_minted,
      }),
    ),
  [OBJECT_RESOURCE_TYPES.UnlimitedSupply]: z
    .object({ current_supply: numeric, total_minted: numeric })
    .transform(
      (r): ObjectResource => ({ kind: 'UnlimitedSupply', currentSupply: r.current_supply, totalMinted: r.total_minted }),
    ),
  [OBJECT_RESOURCE_TYPES.ConcurrentSupply]: z
    .object({ current_supply: aggregator, total_minted: aggregator })
    .transform(
      (r): ObjectResource => ({
        kind: 'ConcurrentSupply',
        currentSupply: r.current_supply.value,
        maxSupply: r.current_supply.max_value,
        totalMinted: r.total_minted.value,
      }),
    ),
  [OBJECT_RESOURCE_TYPES.Collection]: z
    .object({ creator: address, description: z.string(), name: z.string(), uri: z.string() })
    .transform((r): ObjectResource => ({ kind: 'Collection', ...r })),
  [OBJECT_RESOURCE_TYPES.Token]: z
    .object({
      collection: z.object({ inner: address }),
      description: z.string(),
      name: z.string(),
      uri: z.string(),
      index: numeric.optional(),
    })
    .transform(
      (r): ObjectResource => ({
        kind: 'Token',
        collection: r.collection.inner,
        description: r.description,
        name: r.name,
        uri: r.uri,
        index: r.index ?? null,
      }),
    ),
  [OBJECT_RESOURCE_TYPES.TokenIdentifiers]: z
    .object({ name: z.object({ value: z.string() }) })
    .transform((r): ObjectResource => ({ kind: 'TokenIdentifiers', name: r.name.value })),
  [OBJECT_RESOURCE_TYPES.PropertyMap]: z
    .object({ inner: z.unknown() })
    .transform((r): ObjectResource => ({ kind: 'PropertyMap', inner: r.inner ?? null })),
  [OBJECT_RESOURCE_TYPES.FungibleAssetMetadata]: z
    .object({
      name: z.string(),
      symbol: z.string(),
      decimals: z.number().int(),
      icon_uri: z.string().default(''),
      project_uri: z.string().default(''),
    })
    .transform(
      (r): ObjectResource => ({
        kind: 'FungibleAssetMetadata',
        name: r.name,
        symbol: r.symbol,
        decimals: r.decimals,
        iconUri: r.icon_uri,
        projectUri: r.project_uri,
      }),
    ),
};

/**
 * Maps a written resource to its {@link ObjectResource} variant. Type arguments are ignored.
 *
 * @returns `null` for resource types outside the object/token model.
 * @throws {DecodeError} when a known type carries a payload of the wrong shape.
 */
export function parseObjectResource(typeStr: string, data: string, version: number): ObjectResource | null {
  const schema = SCHEMAS[outerType(typeStr)];
  if (!schema) return null;
  const parsed = schema.safeParse(parseJsonPayload(typeStr, data, version));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(typeStr, version, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  return parsed.data;
}
