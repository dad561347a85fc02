// schema.org Organization JSON-LD builder

import type {
  EntityRecord,
  OrganizationJsonLd,
  PropertyValueNode,
  SocialLinks,
  SocialPlatform,
} from '@orgld/shared';
import { entityUrl } from './knowledge-base.js';

export const SCHEMA_CONTEXT = 'https://schema.org';

// Order in which social profiles follow the Wikidata URL in sameAs
export const SAME_AS_ORDER: readonly SocialPlatform[] = [
  'wikipedia',
  'linkedin',
  'twitter',
  'facebook',
  'instagram',
  'tiktok',
  'youtube',
];

/**
 * Split a comma-joined field, trimming and dropping empty tokens.
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((token) => token.trim())
    .filter((token) => token.length > 0);
}

function identifiers(record: EntityRecord): PropertyValueNode[] {
  const nodes: PropertyValueNode[] = [];
  if (record.siren) nodes.push({ '@type': 'PropertyValue', propertyID: 'SIREN', value: record.siren });
  if (record.siret) nodes.push({ '@type': 'PropertyValue', propertyID: 'SIRET', value: record.siret });
  if (record.lei) nodes.push({ '@type': 'PropertyValue', propertyID: 'LEI', value: record.lei });
  return nodes;
}

function sameAs(record: EntityRecord, links: SocialLinks): string[] {
  const urls: string[] = [];
  if (record.qid) urls.push(entityUrl(record.qid));
  for (const platform of SAME_AS_ORDER) {
    if (links[platform]) urls.push(links[platform]);
  }
  return urls;
}

/**
 * Build the document for a record. Keys are emitted in a fixed order and
 * omitted when their source field is blank, so equal records always give
 * byte-identical output.
 */
export function buildJsonLd(record: EntityRecord, links: SocialLinks): OrganizationJsonLd {
  const doc: OrganizationJsonLd = {
    '@context': SCHEMA_CONTEXT,
    '@type': record.orgType,
  };
  if (record.name) doc.name = record.name;

  if (record.legalName) doc.legalName = record.legalName;

  const alternateNames = splitList(record.alternateNames);
  if (alternateNames.length > 0) doc.alternateName = alternateNames;

  if (record.website) {
    doc['@id'] = `${record.website.replace(/\/+$/, '')}/#organization`;
    doc.url = record.website;
  }

  if (record.logoUrl) {
    doc.logo = {
      '@type': 'ImageObject',
      url: record.logoUrl,
      ...(record.logoWidth && { width: record.logoWidth }),
      ...(record.logoHeight && { height: record.logoHeight }),
    };
  }

  if (record.descriptionFr) doc.description = record.descriptionFr;
  if (record.slogan) doc.slogan = record.slogan;

  if (record.siren) {
    doc.taxID = `FR${record.siren}`;
    doc.vatID = `FR${record.siren}`;
    doc.iso6523Code = `0002:${record.siren}`;
  }

  const ids = identifiers(record);
  if (ids.length > 0) doc.identifier = ids;

  const profiles = sameAs(record, links);
  if (profiles.length > 0) doc.sameAs = profiles;

  const expertise = splitList(record.expertiseFr);
  if (expertise.length > 0) doc.knowsAbout = expertise;

  if (record.areaServed) {
    doc.areaServed = { '@type': 'Country', name: record.areaServed };
  }

  // Blank sub-fields are kept inside the address object
  if (record.streetAddress || record.addressLocality) {
    doc.address = {
      '@type': 'PostalAddress',
      streetAddress: record.streetAddress,
      addressLocality: record.addressLocality,
      postalCode: record.postalCode,
      addressCountry: record.addressCountry,
    };
  }

  if (record.phone || record.email) {
    const languages = splitList(record.availableLanguages);
    doc.contactPoint = [
      {
        '@type': 'ContactPoint',
        ...(record.phone && { telephone: record.phone }),
        ...(record.email && { email: record.email }),
        contactType: record.contactType,
        ...(languages.length > 0 && { availableLanguage: languages }),
      },
    ];
  }

  if (record.foundingDate) doc.foundingDate = record.foundingDate;

  if (record.founderName) {
    doc.founders = [
      {
        '@type': 'Person',
        name: record.founderName,
        ...(record.founderUrl && { sameAs: record.founderUrl }),
      },
    ];
  }

  if (record.parentOrgName) {
    doc.parentOrganization = {
      '@type': 'Organization',
      name: record.parentOrgName,
      ...(record.parentOrgQid && { sameAs: entityUrl(record.parentOrgQid) }),
      ...(record.parentOrgSiren && { taxID: `FR${record.parentOrgSiren}` }),
    };
  }

  if (record.ratingValue && record.reviewCount) {
    doc.aggregateRating = {
      '@type': 'AggregateRating',
      ratingValue: record.ratingValue,
      reviewCount: record.reviewCount,
      bestRating: '5',
      worstRating: '1',
    };
  }

  if (record.searchUrlTemplate) {
    doc.potentialAction = {
      '@type': 'SearchAction',
      target: { '@type': 'EntryPoint', urlTemplate: record.searchUrlTemplate },
      'query-input': 'required name=search_term_string',
    };
  }

  return doc;
}

export function serializeJsonLd(doc: OrganizationJsonLd): string {
  return JSON.stringify(doc, null, 2);
}

/**
 * Page-embeddable form. "<" is escaped so text fields cannot close the
 * script element.
 */
export function renderEmbedSnippet(doc: OrganizationJsonLd): string {
  const json = serializeJsonLd(doc).replace(/</g, '\\u003c');
  return `<script type="application/ld+json">\n${json}\n</script>`;
}
