import type { ContactType, OrgType, ParentSource, SocialPlatform } from './enums.js';

// The organization being profiled. Every text field defaults to ''.
export interface EntityRecord {
  // Identity
  name: string;
  nameEn: string;
  legalName: string;
  alternateNames: string;     // comma-joined
  descriptionFr: string;
  descriptionEn: string;
  expertiseFr: string;        // comma-joined
  expertiseEn: string;        // comma-joined
  slogan: string;

  orgType: OrgType;

  // Identifiers
  qid: string;                // Wikidata, Q + digits
  siren: string;              // 9 digits
  siret: string;              // 14 digits
  lei: string;                // 20 alphanumerics
  naf: string;

  // Web presence
  website: string;
  logoUrl: string;
  logoWidth: string;
  logoHeight: string;

  // Parent linkage (always written together)
  parentOrgName: string;
  parentOrgQid: string;
  parentOrgSiren: string;
  parentSource: ParentSource;

  // Address
  streetAddress: string;
  addressLocality: string;
  postalCode: string;
  addressCountry: string;

  // Contact
  phone: string;
  email: string;
  contactType: ContactType;
  availableLanguages: string; // comma-joined

  // Provenance facts
  foundingDate: string;       // YYYY-MM-DD
  founderName: string;
  founderUrl: string;

  // Social proof
  ratingValue: string;
  reviewCount: string;

  searchUrlTemplate: string;  // contains {search_term_string}
  areaServed: string;
}

export type SocialLinks = Record<SocialPlatform, string>;

export interface ParentLinkage {
  parentOrgName: string;
  parentOrgQid: string;
  parentOrgSiren: string;
  parentSource: ParentSource;
}

// Full snapshot written by the config export and accepted by import
export interface ConfigSnapshot {
  version: string;
  exportedAt: string;
  entity: EntityRecord;
  socialLinks: SocialLinks;
}
