import { FindingSeverity, type OrganizationJsonLd, type ValidationFinding } from '@orgld/shared';

type DocumentKey = keyof OrganizationJsonLd;

const REQUIRED: ReadonlyArray<[DocumentKey, string]> = [
  ['name', 'name is required'],
  ['@type', '@type is required'],
  ['@context', '@context is required'],
];

const RECOMMENDED: ReadonlyArray<[DocumentKey, string]> = [
  ['url', 'url is recommended'],
  ['logo', 'logo is recommended for rich results'],
  ['sameAs', 'sameAs links help disambiguate the organization'],
  ['description', 'description is recommended'],
  ['address', 'address is recommended'],
];

function isMissing(value: unknown): boolean {
  if (value === undefined || value === null) return true;
  if (typeof value === 'string') return value.trim() === '';
  if (Array.isArray(value)) return value.length === 0;
  return false;
}

/**
 * Local structural check against schema.org Organization expectations.
 * Errors come first, then warnings, each in a fixed order.
 */
export function validateJsonLd(doc: OrganizationJsonLd): ValidationFinding[] {
  const findings: ValidationFinding[] = [];

  for (const [field, message] of REQUIRED) {
    if (isMissing(doc[field])) {
      findings.push({ severity: FindingSeverity.ERROR, field, message });
    }
  }

  for (const [field, message] of RECOMMENDED) {
    if (isMissing(doc[field])) {
      findings.push({ severity: FindingSeverity.WARNING, field, message });
    }
  }

  return findings;
}
