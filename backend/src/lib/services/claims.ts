// Decoding of Wikidata claims into typed property values

import { z } from 'zod';
import type { ClaimValue, KnowledgeBaseProperty, PropertyResult } from '@orgld/shared';
import { config } from '../config.js';

// Wikidata property ids consumed by the profile
export const PROPERTY_CODES: Record<KnowledgeBaseProperty, string> = {
  siren: 'P1616',
  lei: 'P1278',
  website: 'P856',
  foundingDate: 'P571',
  logo: 'P154',
  parentOrganization: 'P749',
  ownedBy: 'P127',
  founder: 'P112',
};

const statementSchema = z.object({
  rank: z.enum(['preferred', 'normal', 'deprecated']).optional(),
  mainsnak: z.object({
    snaktype: z.string().optional(),
    datavalue: z.object({ value: z.unknown() }).optional(),
  }),
});

const referenceSchema = z.union([
  z.object({ id: z.string().min(1) }).transform((v) => v.id),
  z.object({ 'numeric-id': z.number().int() }).transform((v) => `Q${v['numeric-id']}`),
]);

const timeSchema = z.object({ time: z.string() });

type ClaimResult =
  | { status: 'found'; value: ClaimValue }
  | { status: 'absent' }
  | { status: 'malformed'; reason: string };

/**
 * Decode a raw datavalue. Strings are scalars, objects carrying an entity id
 * are references, time objects become their time string.
 */
export function decodeClaimValue(raw: unknown): ClaimValue | null {
  if (typeof raw === 'string') {
    return { kind: 'scalar', value: raw };
  }

  const reference = referenceSchema.safeParse(raw);
  if (reference.success) {
    return { kind: 'reference', id: reference.data };
  }

  const time = timeSchema.safeParse(raw);
  if (time.success) {
    return { kind: 'scalar', value: time.data.time };
  }

  return null;
}

/**
 * Read the best statement for a property: preferred rank first, then the
 * first non-deprecated one.
 */
export function readClaim(claims: Record<string, unknown>, propertyId: string): ClaimResult {
  const raw = claims[propertyId];
  if (raw === undefined) {
    return { status: 'absent' };
  }

  const statements = z.array(statementSchema).safeParse(raw);
  if (!statements.success) {
    return { status: 'malformed', reason: `${propertyId}: unexpected statement shape` };
  }

  const usable = statements.data.filter((s) => s.rank !== 'deprecated');
  const statement = usable.find((s) => s.rank === 'preferred') ?? usable[0];
  if (!statement) {
    return { status: 'absent' };
  }

  const snaktype = statement.mainsnak.snaktype ?? 'value';
  if (snaktype !== 'value') {
    // "no value" / "unknown value" statements
    return { status: 'absent' };
  }

  if (!statement.mainsnak.datavalue) {
    return { status: 'malformed', reason: `${propertyId}: missing datavalue` };
  }

  const value = decodeClaimValue(statement.mainsnak.datavalue.value);
  if (!value) {
    return { status: 'malformed', reason: `${propertyId}: unsupported value` };
  }

  return { status: 'found', value };
}

// Converters from a decoded claim to the string stored on the record
type Converter = (value: ClaimValue) => string | null;

const asText: Converter = (value) => (value.kind === 'scalar' && value.value.trim() ? value.value.trim() : null);

// Entity properties may arrive as a reference object or as a bare id string
const asEntityId: Converter = (value) => {
  if (value.kind === 'reference') return value.id;
  return /^Q\d+$/.test(value.value) ? value.value : null;
};

// "+1995-01-01T00:00:00Z" -> "1995-01-01"; unknown month/day become 01
const asIsoDate: Converter = (value) => {
  if (value.kind !== 'scalar') return null;
  const match = /^\+(\d{4})-(\d{2})-(\d{2})T/.exec(value.value);
  if (!match) return null;
  const [, year, month, day] = match;
  return `${year}-${month === '00' ? '01' : month}-${day === '00' ? '01' : day}`;
};

const asCommonsFileUrl: Converter = (value) => {
  const file = asText(value);
  return file ? `${config.knowledgeBase.commonsFileUrl}${encodeURIComponent(file.replace(/ /g, '_'))}` : null;
};

const CONVERTERS: Record<KnowledgeBaseProperty, Converter> = {
  siren: asText,
  lei: asText,
  website: asText,
  foundingDate: asIsoDate,
  logo: asCommonsFileUrl,
  parentOrganization: asEntityId,
  ownedBy: asEntityId,
  founder: asEntityId,
};

export function extractProperty(
  claims: Record<string, unknown>,
  property: KnowledgeBaseProperty
): PropertyResult {
  const propertyId = PROPERTY_CODES[property];
  const claim = readClaim(claims, propertyId);
  if (claim.status !== 'found') {
    return claim;
  }

  const converted = CONVERTERS[property](claim.value);
  if (converted === null) {
    return { status: 'malformed', reason: `${propertyId}: value has the wrong form` };
  }
  return { status: 'found', value: converted };
}

/**
 * Extract every consumed property independently; one bad property never
 * prevents the others from being read.
 */
export function extractProperties(
  claims: Record<string, unknown>
): Record<KnowledgeBaseProperty, PropertyResult> {
  return {
    siren: extractProperty(claims, 'siren'),
    lei: extractProperty(claims, 'lei'),
    website: extractProperty(claims, 'website'),
    foundingDate: extractProperty(claims, 'foundingDate'),
    logo: extractProperty(claims, 'logo'),
    parentOrganization: extractProperty(claims, 'parentOrganization'),
    ownedBy: extractProperty(claims, 'ownedBy'),
    founder: extractProperty(claims, 'founder'),
  };
}

// Value of a property, '' when it was absent or malformed
export function propertyValue(result: PropertyResult): string {
  return result.status === 'found' ? result.value : '';
}
