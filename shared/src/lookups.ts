// Results returned by the external lookups (Wikidata, company registry, Mistral)

export interface KnowledgeBaseCandidate {
  qid: string;
  label: string;
  description: string;
}

// A Wikidata claim value, decoded at the boundary
export type ClaimValue =
  | { kind: 'scalar'; value: string }
  | { kind: 'reference'; id: string };

export type PropertyResult =
  | { status: 'found'; value: string }
  | { status: 'absent' }
  | { status: 'malformed'; reason: string };

export type KnowledgeBaseProperty =
  | 'siren'
  | 'lei'
  | 'website'
  | 'foundingDate'
  | 'logo'
  | 'parentOrganization'
  | 'ownedBy'
  | 'founder';

export interface KnowledgeBaseEntityDetail {
  qid: string;
  labels: { fr: string; en: string };
  descriptions: { fr: string; en: string };
  properties: Record<KnowledgeBaseProperty, PropertyResult>;
}

export interface RegistryCompany {
  siren: string;
  siret: string;              // head office establishment
  name: string;
  legalName: string;
  naf: string;
  streetAddress: string;
  postalCode: string;
  city: string;
  active: boolean;
  creationDate: string;
}

// Parsed Mistral response; unknown values are ''
export interface AssistantEnrichment {
  descriptionFr: string;
  descriptionEn: string;
  expertiseFr: string;
  expertiseEn: string;
  slogan: string;
  parentOrgName: string;
  parentOrgQid: string;
}

export interface AssistantFacts {
  name: string;
  siren: string;
  qid: string;
}
