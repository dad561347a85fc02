import {
  ContactType,
  OrgType,
  ParentSource,
  type AssistantEnrichment,
  type EntityRecord,
  type KnowledgeBaseEntityDetail,
  type ParentLinkage,
  type RegistryCompany,
  type SocialLinks,
} from '@orgld/shared';
import type { UpdateRecordInput, UpdateSocialLinksInput } from '../validation.js';
import { propertyValue } from './claims.js';

export function createEmptyRecord(): EntityRecord {
  return {
    name: '',
    nameEn: '',
    legalName: '',
    alternateNames: '',
    descriptionFr: '',
    descriptionEn: '',
    expertiseFr: '',
    expertiseEn: '',
    slogan: '',
    orgType: OrgType.ORGANIZATION,
    qid: '',
    siren: '',
    siret: '',
    lei: '',
    naf: '',
    website: '',
    logoUrl: '',
    logoWidth: '',
    logoHeight: '',
    parentOrgName: '',
    parentOrgQid: '',
    parentOrgSiren: '',
    parentSource: ParentSource.NONE,
    streetAddress: '',
    addressLocality: '',
    postalCode: '',
    addressCountry: 'FR',
    phone: '',
    email: '',
    contactType: ContactType.CUSTOMER_SERVICE,
    availableLanguages: 'French',
    foundingDate: '',
    founderName: '',
    founderUrl: '',
    ratingValue: '',
    reviewCount: '',
    searchUrlTemplate: '',
    areaServed: 'France',
  };
}

export function createEmptySocialLinks(): SocialLinks {
  return {
    linkedin: '',
    twitter: '',
    facebook: '',
    instagram: '',
    tiktok: '',
    youtube: '',
    wikipedia: '',
  };
}

// Weighted fields of the completeness score
const SCORE_WEIGHTS: ReadonlyArray<[keyof EntityRecord, number]> = [
  ['qid', 20],
  ['siren', 20],
  ['lei', 15],
  ['website', 15],
  ['parentOrgQid', 15],
  ['expertiseFr', 15],
];

/**
 * Completeness score, 0-100.
 */
export function scoreRecord(record: EntityRecord): number {
  let score = 0;
  for (const [field, weight] of SCORE_WEIGHTS) {
    if (record[field]) score += weight;
  }
  return Math.min(score, 100);
}

export function hasSubject(record: EntityRecord): boolean {
  return Boolean(record.name || record.qid || record.siren);
}

/**
 * Forget what the previous Wikidata entity contributed, parent included.
 * Used when the record switches to another subject.
 */
export function clearKnowledgeBaseFields(record: EntityRecord): void {
  record.nameEn = '';
  record.descriptionFr = '';
  record.descriptionEn = '';
  record.siren = '';
  record.lei = '';
  record.website = '';
  record.foundingDate = '';
  record.logoUrl = '';
  record.logoWidth = '';
  record.logoHeight = '';
  record.founderName = '';
  record.founderUrl = '';
  clearParentLinkage(record);
}

/**
 * Fill the record from a selected Wikidata entity. Identifiers already
 * entered for the same subject are kept; the parent linkage is left to
 * the resolver.
 */
export function applyKnowledgeBaseDetail(
  record: EntityRecord,
  detail: KnowledgeBaseEntityDetail,
  fallbackLabel = ''
): void {
  const p = detail.properties;
  if (record.qid && record.qid !== detail.qid) {
    clearKnowledgeBaseFields(record);
  }

  record.qid = detail.qid;
  record.name = detail.labels.fr || fallbackLabel || detail.labels.en || record.name;
  record.nameEn = detail.labels.en || record.nameEn;
  record.descriptionFr = detail.descriptions.fr || record.descriptionFr;
  record.descriptionEn = detail.descriptions.en || record.descriptionEn;
  record.siren = record.siren || propertyValue(p.siren);
  record.lei = propertyValue(p.lei) || record.lei;
  record.website = record.website || propertyValue(p.website);
  record.foundingDate = record.foundingDate || propertyValue(p.foundingDate);
  record.logoUrl = record.logoUrl || propertyValue(p.logo);
}

/**
 * Fill the record from a selected registry company.
 */
export function applyRegistryCompany(record: EntityRecord, company: RegistryCompany): void {
  record.name = record.name || company.name;
  record.legalName = company.legalName;
  record.siren = company.siren;
  record.siret = company.siret;
  record.naf = company.naf;
  record.streetAddress = company.streetAddress;
  record.postalCode = company.postalCode;
  record.addressLocality = company.city;
  record.addressCountry = 'FR';
  if (!record.foundingDate && /^\d{4}-\d{2}-\d{2}$/.test(company.creationDate)) {
    record.foundingDate = company.creationDate;
  }
}

/**
 * Copy fields from the assistant; blank answers keep the current values.
 */
export function applyAssistantCopy(record: EntityRecord, enrichment: AssistantEnrichment): void {
  record.descriptionFr = enrichment.descriptionFr || record.descriptionFr;
  record.descriptionEn = enrichment.descriptionEn || record.descriptionEn;
  record.expertiseFr = enrichment.expertiseFr || record.expertiseFr;
  record.expertiseEn = enrichment.expertiseEn || record.expertiseEn;
  record.slogan = enrichment.slogan || record.slogan;
}

export function getParentLinkage(record: EntityRecord): ParentLinkage {
  return {
    parentOrgName: record.parentOrgName,
    parentOrgQid: record.parentOrgQid,
    parentOrgSiren: record.parentOrgSiren,
    parentSource: record.parentSource,
  };
}

/**
 * Write the four parent fields as one unit.
 */
export function applyParentLinkage(record: EntityRecord, linkage: ParentLinkage): void {
  if (linkage.parentOrgQid && !linkage.parentOrgName) {
    throw new Error(`Parent id ${linkage.parentOrgQid} has no name`);
  }
  if ((linkage.parentOrgQid || linkage.parentOrgName) && !linkage.parentSource) {
    throw new Error('Parent linkage has no source');
  }

  record.parentOrgName = linkage.parentOrgName;
  record.parentOrgQid = linkage.parentOrgQid;
  record.parentOrgSiren = linkage.parentOrgSiren;
  record.parentSource = linkage.parentSource;
}

export function clearParentLinkage(record: EntityRecord): void {
  applyParentLinkage(record, {
    parentOrgName: '',
    parentOrgQid: '',
    parentOrgSiren: '',
    parentSource: ParentSource.NONE,
  });
}

// Manual form edit; the schema already rejects parent fields
export function applyManualEdit(record: EntityRecord, input: UpdateRecordInput): void {
  if (input.qid !== undefined && input.qid !== record.qid) {
    clearParentLinkage(record);
  }
  Object.assign(record, input);
}

export function applySocialLinks(links: SocialLinks, input: UpdateSocialLinksInput): void {
  Object.assign(links, input);
}
