import type { FindingSeverity } from './enums.js';

// schema.org Organization document as produced by the builder.
// Optional keys are omitted, never set to '' or null.

export interface PropertyValueNode {
  '@type': 'PropertyValue';
  propertyID: 'SIREN' | 'SIRET' | 'LEI';
  value: string;
}

export interface ImageObjectNode {
  '@type': 'ImageObject';
  url: string;
  width?: string;
  height?: string;
}

export interface PostalAddressNode {
  '@type': 'PostalAddress';
  streetAddress: string;
  addressLocality: string;
  postalCode: string;
  addressCountry: string;
}

export interface ContactPointNode {
  '@type': 'ContactPoint';
  telephone?: string;
  email?: string;
  contactType: string;
  availableLanguage?: string[];
}

export interface PersonNode {
  '@type': 'Person';
  name: string;
  sameAs?: string;
}

export interface ParentOrganizationNode {
  '@type': 'Organization';
  name: string;
  sameAs?: string;
  taxID?: string;
}

export interface AggregateRatingNode {
  '@type': 'AggregateRating';
  ratingValue: string;
  reviewCount: string;
  bestRating: '5';
  worstRating: '1';
}

export interface SearchActionNode {
  '@type': 'SearchAction';
  target: { '@type': 'EntryPoint'; urlTemplate: string };
  'query-input': 'required name=search_term_string';
}

export interface OrganizationJsonLd {
  '@context'?: string;
  '@type'?: string;
  name?: string;
  legalName?: string;
  alternateName?: string[];
  '@id'?: string;
  url?: string;
  logo?: ImageObjectNode;
  description?: string;
  slogan?: string;
  taxID?: string;
  vatID?: string;
  iso6523Code?: string;
  identifier?: PropertyValueNode[];
  sameAs?: string[];
  knowsAbout?: string[];
  areaServed?: { '@type': 'Country'; name: string };
  address?: PostalAddressNode;
  contactPoint?: ContactPointNode[];
  foundingDate?: string;
  founders?: PersonNode[];
  parentOrganization?: ParentOrganizationNode;
  aggregateRating?: AggregateRatingNode;
  potentialAction?: SearchActionNode;
}

export interface ValidationFinding {
  severity: FindingSeverity;
  field: string;
  message: string;
}
