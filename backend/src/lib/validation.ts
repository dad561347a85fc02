import { z } from 'zod';
import {
  ContactType,
  OrgType,
  ParentSource,
  SearchSource,
} from '@orgld/shared';

// Common validators
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);
export const qidSchema = z.string().regex(/^Q\d+$/, 'Expected a Wikidata id such as Q2110465');
export const sirenSchema = z.string().regex(/^\d{9}$/, 'SIREN is 9 digits');
export const siretSchema = z.string().regex(/^\d{14}$/, 'SIRET is 14 digits');
export const leiSchema = z.string().regex(/^[A-Z0-9]{20}$/, 'LEI is 20 alphanumeric characters');
export const isoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
export const searchTemplateSchema = z
  .string()
  .url()
  .refine((value) => value.includes('{search_term_string}'), {
    message: 'Template must contain {search_term_string}',
  });

// Form fields are blank or well-formed
const blankOr = <T extends z.ZodTypeAny>(schema: T) => z.union([z.literal(''), schema]);

const shortText = z.string().trim().max(500);
const longText = z.string().trim().max(5000);
const digits = z.string().regex(/^\d+$/);

// Stored records are trusted as plain strings; formats are checked on input and import
const stored = z.string().default('');

export const storedRecordSchema = z.object({
  name: stored,
  nameEn: stored,
  legalName: stored,
  alternateNames: stored,
  descriptionFr: stored,
  descriptionEn: stored,
  expertiseFr: stored,
  expertiseEn: stored,
  slogan: stored,
  orgType: z.nativeEnum(OrgType).default(OrgType.ORGANIZATION),
  qid: stored,
  siren: stored,
  siret: stored,
  lei: stored,
  naf: stored,
  website: stored,
  logoUrl: stored,
  logoWidth: stored,
  logoHeight: stored,
  parentOrgName: stored,
  parentOrgQid: stored,
  parentOrgSiren: stored,
  parentSource: z.nativeEnum(ParentSource).default(ParentSource.NONE),
  streetAddress: stored,
  addressLocality: stored,
  postalCode: stored,
  addressCountry: z.string().default('FR'),
  phone: stored,
  email: stored,
  contactType: z.nativeEnum(ContactType).default(ContactType.CUSTOMER_SERVICE),
  availableLanguages: z.string().default('French'),
  foundingDate: stored,
  founderName: stored,
  founderUrl: stored,
  ratingValue: stored,
  reviewCount: stored,
  searchUrlTemplate: stored,
  areaServed: z.string().default('France'),
});

// Editable record fields: blank or well-formed
const recordFieldFormats = {
  name: shortText,
  nameEn: shortText,
  legalName: shortText,
  alternateNames: longText,
  descriptionFr: longText,
  descriptionEn: longText,
  expertiseFr: longText,
  expertiseEn: longText,
  slogan: shortText,
  orgType: z.nativeEnum(OrgType),
  qid: blankOr(qidSchema),
  siren: blankOr(sirenSchema),
  siret: blankOr(siretSchema),
  lei: blankOr(leiSchema),
  naf: blankOr(z.string().regex(/^\d{2}\.\d{2}[A-Z]$/, 'NAF code such as 64.19Z')),
  website: blankOr(z.string().url()),
  logoUrl: blankOr(z.string().url()),
  logoWidth: blankOr(digits),
  logoHeight: blankOr(digits),
  streetAddress: shortText,
  addressLocality: shortText,
  postalCode: blankOr(z.string().regex(/^\d{5}$/)),
  addressCountry: blankOr(z.string().regex(/^[A-Z]{2}$/)),
  phone: blankOr(z.string().regex(/^\+?[\d\s().-]{6,20}$/)),
  email: blankOr(z.string().email()),
  contactType: z.nativeEnum(ContactType),
  availableLanguages: shortText,
  foundingDate: blankOr(isoDateSchema),
  founderName: shortText,
  founderUrl: blankOr(z.string().url()),
  ratingValue: blankOr(z.string().regex(/^\d+(\.\d+)?$/)),
  reviewCount: blankOr(digits),
  searchUrlTemplate: blankOr(searchTemplateSchema),
  areaServed: shortText,
};

// Manual edits; parent linkage fields are rejected
export const updateRecordSchema = z.object(recordFieldFormats).partial().strict();

const socialUrl = blankOr(z.string().url());

export const socialLinksSchema = z.object({
  linkedin: socialUrl.default(''),
  twitter: socialUrl.default(''),
  facebook: socialUrl.default(''),
  instagram: socialUrl.default(''),
  tiktok: socialUrl.default(''),
  youtube: socialUrl.default(''),
  wikipedia: socialUrl.default(''),
});

export const updateSocialLinksSchema = z
  .object({
    linkedin: socialUrl,
    twitter: socialUrl,
    facebook: socialUrl,
    instagram: socialUrl,
    tiktok: socialUrl,
    youtube: socialUrl,
    wikipedia: socialUrl,
  })
  .partial()
  .strict();

export const loginSchema = z.object({
  password: z.string().min(1).max(200),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1).max(200),
  source: z.nativeEnum(SearchSource).optional().default(SearchSource.BOTH),
  limit: z.coerce.number().int().min(1).max(25).optional(),
});

export const selectKnowledgeBaseSchema = z.object({
  qid: qidSchema,
  label: z.string().max(500).optional(),
});

export const registryCompanySchema = z.object({
  siren: sirenSchema,
  siret: blankOr(siretSchema).default(''),
  name: z.string().max(500).default(''),
  legalName: z.string().max(500).default(''),
  naf: z.string().max(20).default(''),
  streetAddress: z.string().max(500).default(''),
  postalCode: z.string().max(20).default(''),
  city: z.string().max(200).default(''),
  active: z.boolean().default(true),
  creationDate: z.string().max(20).default(''),
});

export const resolveParentSchema = z.object({
  force: z.boolean().optional().default(false),
  useAssistant: z.boolean().optional().default(false),
});

// Imported entities carry the parent linkage too; missing fields take record defaults
const snapshotEntitySchema = z
  .object({
    ...recordFieldFormats,
    parentOrgName: shortText,
    parentOrgQid: blankOr(qidSchema),
    parentOrgSiren: blankOr(sirenSchema),
    parentSource: z.nativeEnum(ParentSource),
  })
  .partial()
  .superRefine((entity, ctx) => {
    if (entity.parentOrgQid && !entity.parentOrgName) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parentOrgQid'],
        message: 'A parent id needs a parent name',
      });
    }
    if ((entity.parentOrgName || entity.parentOrgQid || entity.parentOrgSiren) && !entity.parentSource) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parentSource'],
        message: 'A parent linkage needs a source',
      });
    }
  })
  .transform((entity) => ({ ...storedRecordSchema.parse({}), ...entity }));

export const configSnapshotSchema = z.object({
  version: z.string().default(''),
  exportedAt: z.string().default(''),
  entity: snapshotEntitySchema,
  socialLinks: socialLinksSchema.default({}),
});

export const traceEntrySchema = z.object({
  at: z.string(),
  level: z.enum(['INFO', 'OK', 'WARN', 'ERROR', 'HTTP']),
  message: z.string(),
});

export const sessionStateSchema = z.object({
  sessionId: z.string(),
  authenticated: z.boolean().default(false),
  record: storedRecordSchema,
  socialLinks: socialLinksSchema.catch({
    linkedin: '',
    twitter: '',
    facebook: '',
    instagram: '',
    tiktok: '',
    youtube: '',
    wikipedia: '',
  }),
  trace: z.array(traceEntrySchema).default([]),
  createdAt: z.string(),
  updatedAt: z.string(),
  expiresAt: z.number(),
});

// Inferred types
export type UpdateRecordInput = z.infer<typeof updateRecordSchema>;
export type UpdateSocialLinksInput = z.infer<typeof updateSocialLinksSchema>;
export type LoginInput = z.infer<typeof loginSchema>;
export type SearchQueryInput = z.infer<typeof searchQuerySchema>;
export type SelectKnowledgeBaseInput = z.infer<typeof selectKnowledgeBaseSchema>;
export type RegistryCompanyInput = z.infer<typeof registryCompanySchema>;
export type ResolveParentInput = z.infer<typeof resolveParentSchema>;
export type ConfigSnapshotInput = z.infer<typeof configSnapshotSchema>;
