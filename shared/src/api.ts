// Common API types
import type { OrganizationJsonLd, ValidationFinding } from './jsonld.js';
import type { KnowledgeBaseCandidate, RegistryCompany } from './lookups.js';

// Standard error response
export interface ApiError {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  SESSION_EXPIRED: 'SESSION_EXPIRED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// Health check response
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  version: string;
}

export interface SearchResponse {
  knowledgeBase: KnowledgeBaseCandidate[];
  registry: RegistryCompany[];
}

export interface JsonLdResponse {
  document: OrganizationJsonLd;
  findings: ValidationFinding[];
  snippet: string;
}

export interface ExportFile {
  filename: string;
  key: string;
  downloadUrl: string;
}

export interface ExportResponse {
  jsonLd: ExportFile;
  snippet: ExportFile;
  config: ExportFile;
}
