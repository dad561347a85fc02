// Environment configuration
export const config = {
  // AWS Region
  region: process.env.AWS_REGION || 'eu-west-3',

  // DynamoDB Tables
  tables: {
    sessions: process.env.SESSIONS_TABLE || 'OrgLdSessions',
  },

  // S3 Buckets
  buckets: {
    exports: process.env.EXPORTS_BUCKET || 'orgld-exports',
  },

  // SSM parameter names for secrets (env fallbacks are read in ssm.ts)
  secrets: {
    sharedSecretParam: process.env.SHARED_SECRET_PARAM_NAME || '',
    mistralApiKeyParam: process.env.MISTRAL_API_KEY_PARAM_NAME || '',
  },

  // Wikidata
  knowledgeBase: {
    apiUrl: process.env.WIKIDATA_API_URL || 'https://www.wikidata.org/w/api.php',
    entityUrl: 'https://www.wikidata.org/wiki/',
    commonsFileUrl: 'https://commons.wikimedia.org/wiki/Special:FilePath/',
    language: 'fr',
    searchLimit: 12,
    timeoutMs: 20_000,
    labelTimeoutMs: 10_000,
  },

  // recherche-entreprises.api.gouv.fr
  registry: {
    searchUrl: process.env.REGISTRY_SEARCH_URL || 'https://recherche-entreprises.api.gouv.fr/search',
    perPage: 10,
    timeoutMs: 15_000,
  },

  // Mistral chat completions
  assistant: {
    apiUrl: process.env.MISTRAL_API_URL || 'https://api.mistral.ai/v1/chat/completions',
    model: process.env.MISTRAL_MODEL || 'mistral-small-latest',
    temperature: 0.2,
    timeoutMs: 30_000,
  },

  // Outbound User-Agent (Wikimedia requires a contactable one)
  userAgent: process.env.OUTBOUND_USER_AGENT || 'OrgLd/0.1 (organization profile builder; ops@orgld.example)',

  // Session settings
  session: {
    traceLimit: 50,
    ttlHours: 24,
  },

  // API settings
  api: {
    presignedUrlExpirySeconds: 3600, // 1 hour
  },

  // App version (set during build)
  version: process.env.APP_VERSION || '0.1.0',
} as const;
