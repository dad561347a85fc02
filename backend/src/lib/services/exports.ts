// Export artifacts: JSON-LD file, embed snippet, config snapshot

import type {
  ConfigSnapshot,
  EntityRecord,
  ExportFile,
  ExportResponse,
  SessionState,
  SocialLinks,
} from '@orgld/shared';
import { config } from '../config.js';
import { ValidationError } from '../errors.js';
import { getPresignedDownloadUrl, putObject } from '../s3.js';
import type { Trace } from '../trace.js';
import { configSnapshotSchema } from '../validation.js';
import { buildJsonLd, renderEmbedSnippet, serializeJsonLd } from './jsonld.js';

export interface ExportArtifact {
  filename: string;
  contentType: string;
  body: string;
}

export interface ExportArtifacts {
  jsonLd: ExportArtifact;
  snippet: ExportArtifact;
  config: ExportArtifact;
}

// Files are named after the SIREN, else the Wikidata id
export function exportBaseName(record: EntityRecord): string {
  return record.siren || record.qid || 'export';
}

export function buildConfigSnapshot(
  record: EntityRecord,
  socialLinks: SocialLinks,
  now: Date = new Date()
): ConfigSnapshot {
  return {
    version: config.version,
    exportedAt: now.toISOString(),
    entity: record,
    socialLinks,
  };
}

export function buildExportArtifacts(
  record: EntityRecord,
  socialLinks: SocialLinks,
  now: Date = new Date()
): ExportArtifacts {
  const base = exportBaseName(record);
  const doc = buildJsonLd(record, socialLinks);

  return {
    jsonLd: {
      filename: `jsonld_${base}.json`,
      contentType: 'application/ld+json',
      body: serializeJsonLd(doc),
    },
    snippet: {
      filename: `snippet_${base}.html`,
      contentType: 'text/html; charset=utf-8',
      body: renderEmbedSnippet(doc),
    },
    config: {
      filename: `config_${base}.json`,
      contentType: 'application/json',
      body: JSON.stringify(buildConfigSnapshot(record, socialLinks, now), null, 2),
    },
  };
}

async function upload(sessionId: string, artifact: ExportArtifact): Promise<ExportFile> {
  const bucket = config.buckets.exports;
  const key = `exports/${sessionId}/${artifact.filename}`;
  await putObject(bucket, key, artifact.body, artifact.contentType);
  const downloadUrl = await getPresignedDownloadUrl(bucket, key, artifact.filename);
  return { filename: artifact.filename, key, downloadUrl };
}

/**
 * Write the three artifacts to the exports bucket and return download links.
 */
export async function exportSession(session: SessionState, trace: Trace): Promise<ExportResponse> {
  const artifacts = buildExportArtifacts(session.record, session.socialLinks);

  // One upload at a time
  const jsonLd = await upload(session.sessionId, artifacts.jsonLd);
  const snippet = await upload(session.sessionId, artifacts.snippet);
  const configFile = await upload(session.sessionId, artifacts.config);

  trace.ok(`Exported ${artifacts.jsonLd.filename}, ${artifacts.snippet.filename}, ${artifacts.config.filename}`);
  return { jsonLd, snippet, config: configFile };
}

/**
 * Validate a previously exported config snapshot for reload.
 */
export function parseConfigSnapshot(input: unknown): { record: EntityRecord; socialLinks: SocialLinks } {
  const parsed = configSnapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError('Invalid config snapshot', { issues: parsed.error.issues });
  }
  return { record: parsed.data.entity, socialLinks: parsed.data.socialLinks };
}
