// Wikidata client: entity search, entity detail, label lookup

import { z } from 'zod';
import type { KnowledgeBaseCandidate, KnowledgeBaseEntityDetail } from '@orgld/shared';
import { config } from '../config.js';
import { describeError, requestJson, withQuery } from '../http.js';
import type { Trace } from '../trace.js';
import { extractProperties, extractProperty, propertyValue } from './claims.js';

const { apiUrl, language, timeoutMs, labelTimeoutMs } = config.knowledgeBase;

const searchResponseSchema = z.object({
  search: z.array(
    z.object({
      id: z.string(),
      label: z.string().optional(),
      description: z.string().optional(),
    })
  ),
});

const languageValueSchema = z.object({ value: z.string() });

const entitySchema = z.object({
  labels: z.record(languageValueSchema).optional().default({}),
  descriptions: z.record(languageValueSchema).optional().default({}),
  claims: z.record(z.unknown()).optional().default({}),
});

const entitiesResponseSchema = z.object({
  entities: z.record(z.unknown()),
});

type WikidataEntity = z.infer<typeof entitySchema>;

function pick(values: Record<string, { value: string }>, lang: string): string {
  return values[lang]?.value ?? '';
}

/**
 * Search entities by free text, ranked by Wikidata relevance.
 * Returns [] on any failure.
 */
export async function searchKnowledgeBase(
  text: string,
  limit: number,
  trace: Trace
): Promise<KnowledgeBaseCandidate[]> {
  trace.http(`Wikidata search: '${text}'`);

  try {
    const raw = await requestJson(
      withQuery(apiUrl, {
        action: 'wbsearchentities',
        search: text,
        language,
        uselang: language,
        format: 'json',
        limit,
        type: 'item',
      }),
      { timeoutMs }
    );

    const parsed = searchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      trace.error('Wikidata search: unexpected response shape');
      return [];
    }

    const candidates = parsed.data.search.slice(0, limit).map((item) => ({
      qid: item.id,
      label: item.label ?? item.id,
      description: item.description ?? '',
    }));
    trace.ok(`${candidates.length} Wikidata results`);
    return candidates;
  } catch (error) {
    trace.error(`Wikidata search error: ${describeError(error)}`);
    return [];
  }
}

// Fetch one entity with the requested props; null when missing or unreadable
async function fetchEntity(
  qid: string,
  props: string,
  requestTimeoutMs: number
): Promise<WikidataEntity | null> {
  const raw = await requestJson(
    withQuery(apiUrl, {
      action: 'wbgetentities',
      ids: qid,
      languages: 'fr|en',
      props,
      format: 'json',
    }),
    { timeoutMs: requestTimeoutMs }
  );

  const response = entitiesResponseSchema.safeParse(raw);
  if (!response.success) return null;

  const entity = entitySchema.safeParse(response.data.entities[qid]);
  if (!entity.success) return null;

  // Unknown ids come back as { id, missing: "" } with no labels
  if (Object.keys(entity.data.labels).length === 0 && Object.keys(entity.data.claims).length === 0) {
    return null;
  }
  return entity.data;
}

/**
 * Labels, descriptions and the consumed properties of one entity.
 * Each property is decoded on its own; null only when the entity itself
 * could not be fetched.
 */
export async function getEntityDetail(
  qid: string,
  trace: Trace
): Promise<KnowledgeBaseEntityDetail | null> {
  trace.http(`Get entity: ${qid}`);

  let entity: WikidataEntity | null;
  try {
    entity = await fetchEntity(qid, 'labels|descriptions|claims', timeoutMs);
  } catch (error) {
    trace.error(`Wikidata entity error: ${describeError(error)}`);
    return null;
  }

  if (!entity) {
    trace.error(`Entity ${qid} not found`);
    return null;
  }

  const properties = extractProperties(entity.claims);
  for (const [property, result] of Object.entries(properties)) {
    if (result.status === 'found') {
      trace.ok(`${property}: ${result.value}`);
    } else if (result.status === 'malformed') {
      trace.warn(`Could not read ${result.reason}`);
    }
  }

  const detail: KnowledgeBaseEntityDetail = {
    qid,
    labels: { fr: pick(entity.labels, 'fr'), en: pick(entity.labels, 'en') },
    descriptions: { fr: pick(entity.descriptions, 'fr'), en: pick(entity.descriptions, 'en') },
    properties,
  };
  trace.ok(`Entity loaded: ${detail.labels.fr || detail.labels.en || qid}`);
  return detail;
}

/**
 * Label of an entity: French, then English, then the id itself.
 */
export async function getLabel(qid: string, trace: Trace): Promise<string> {
  try {
    const entity = await fetchEntity(qid, 'labels', labelTimeoutMs);
    if (entity) {
      return pick(entity.labels, 'fr') || pick(entity.labels, 'en') || qid;
    }
  } catch (error) {
    trace.warn(`Label lookup failed for ${qid}: ${describeError(error)}`);
  }
  return qid;
}

/**
 * SIREN (P1616) recorded on an entity, '' when absent or on failure.
 */
export async function getRegistryNumber(qid: string, trace: Trace): Promise<string> {
  try {
    const entity = await fetchEntity(qid, 'claims', timeoutMs);
    if (!entity) return '';
    return propertyValue(extractProperty(entity.claims, 'siren'));
  } catch (error) {
    trace.warn(`SIREN lookup failed for ${qid}: ${describeError(error)}`);
    return '';
  }
}

export function entityUrl(qid: string): string {
  return `${config.knowledgeBase.entityUrl}${qid}`;
}
