// schema.org type used as the document's @type
export const OrgType = {
  ORGANIZATION: 'Organization',
  CORPORATION: 'Corporation',
  LOCAL_BUSINESS: 'LocalBusiness',
  BANK_OR_CREDIT_UNION: 'BankOrCreditUnion',
  INSURANCE_AGENCY: 'InsuranceAgency',
  FINANCIAL_SERVICE: 'FinancialService',
} as const;
export type OrgType = (typeof OrgType)[keyof typeof OrgType];

// Which source supplied the parent-organization linkage.
// P749 and P127 are the Wikidata properties "parent organization" and "owned by".
export const ParentSource = {
  NONE: '',
  PARENT_ORGANIZATION: 'P749',
  OWNED_BY: 'P127',
  ASSISTANT: 'Mistral',
} as const;
export type ParentSource = (typeof ParentSource)[keyof typeof ParentSource];

// schema.org ContactPoint contactType values offered in the form
export const ContactType = {
  CUSTOMER_SERVICE: 'customer service',
  TECHNICAL_SUPPORT: 'technical support',
  SALES: 'sales',
  BILLING_SUPPORT: 'billing support',
  PRESS: 'press',
} as const;
export type ContactType = (typeof ContactType)[keyof typeof ContactType];

// Closed set of social platforms merged into sameAs
export const SocialPlatform = {
  LINKEDIN: 'linkedin',
  TWITTER: 'twitter',
  FACEBOOK: 'facebook',
  INSTAGRAM: 'instagram',
  TIKTOK: 'tiktok',
  YOUTUBE: 'youtube',
  WIKIPEDIA: 'wikipedia',
} as const;
export type SocialPlatform = (typeof SocialPlatform)[keyof typeof SocialPlatform];

// Trace line levels shown in the session log
export const TraceLevel = {
  INFO: 'INFO',
  OK: 'OK',
  WARN: 'WARN',
  ERROR: 'ERROR',
  HTTP: 'HTTP',
} as const;
export type TraceLevel = (typeof TraceLevel)[keyof typeof TraceLevel];

// Lookup source for the search endpoint
export const SearchSource = {
  KNOWLEDGE_BASE: 'knowledge-base',
  REGISTRY: 'registry',
  BOTH: 'both',
} as const;
export type SearchSource = (typeof SearchSource)[keyof typeof SearchSource];

export const FindingSeverity = {
  ERROR: 'error',
  WARNING: 'warning',
} as const;
export type FindingSeverity = (typeof FindingSeverity)[keyof typeof FindingSeverity];
