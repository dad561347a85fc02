// Session-level operations behind the API: search, selection, enrichment, rendering

import {
  SearchSource,
  type AssistantEnrichment,
  type AssistantFacts,
  type EntityRecord,
  type JsonLdResponse,
  type SearchResponse,
  type SessionState,
} from '@orgld/shared';
import { config } from '../config.js';
import { ValidationError } from '../errors.js';
import { getMistralApiKey } from '../ssm.js';
import type { Trace } from '../trace.js';
import type {
  RegistryCompanyInput,
  ResolveParentInput,
  SearchQueryInput,
  SelectKnowledgeBaseInput,
} from '../validation.js';
import { enrichWithAssistant } from './assistant.js';
import {
  applyAssistantCopy,
  applyKnowledgeBaseDetail,
  applyRegistryCompany,
  clearKnowledgeBaseFields,
  clearParentLinkage,
  hasSubject,
} from './entity-record.js';
import { buildJsonLd, renderEmbedSnippet } from './jsonld.js';
import { entityUrl, getEntityDetail, getLabel, searchKnowledgeBase } from './knowledge-base.js';
import { resolveParent, type AssistantFallback, type ParentOutcome } from './parent-resolver.js';
import { searchRegistry } from './registry.js';
import { validateJsonLd } from './validator.js';

export async function search(query: SearchQueryInput, trace: Trace): Promise<SearchResponse> {
  const wantsKnowledgeBase = query.source !== SearchSource.REGISTRY;
  const wantsRegistry = query.source !== SearchSource.KNOWLEDGE_BASE;

  const knowledgeBase = wantsKnowledgeBase
    ? await searchKnowledgeBase(query.q, query.limit ?? config.knowledgeBase.searchLimit, trace)
    : [];
  const registry = wantsRegistry
    ? await searchRegistry(query.q, query.limit ?? config.registry.perPage, trace)
    : [];

  return { knowledgeBase, registry };
}

/**
 * Apply a Wikidata search result to the record, then resolve its parent
 * from the detail just fetched. Choosing a different entity re-resolves.
 */
export async function selectKnowledgeBaseEntity(
  session: SessionState,
  input: SelectKnowledgeBaseInput,
  trace: Trace
): Promise<ParentOutcome> {
  const record = session.record;
  const subjectChanged = record.qid !== input.qid;
  trace.info(`Selection: ${input.qid}`);

  const detail = await getEntityDetail(input.qid, trace);
  if (!detail) {
    // The previous subject's parent must not carry over
    if (subjectChanged && record.qid) {
      clearKnowledgeBaseFields(record);
    } else if (subjectChanged) {
      clearParentLinkage(record);
    }
    record.qid = input.qid;
    record.name = input.label || record.name;
    return 'none';
  }

  applyKnowledgeBaseDetail(record, detail, input.label);

  const founder = detail.properties.founder;
  if (founder.status === 'found') {
    record.founderName = record.founderName || (await getLabel(founder.value, trace));
    record.founderUrl = record.founderUrl || entityUrl(founder.value);
  }

  const resolution = await resolveParent(record, { detail, force: subjectChanged }, trace);
  return resolution.outcome;
}

export function selectRegistryCompany(
  session: SessionState,
  company: RegistryCompanyInput,
  trace: Trace
): void {
  applyRegistryCompany(session.record, company);
  trace.ok(`Registry: ${company.name || company.siren}`);
}

function assistantFacts(record: EntityRecord): AssistantFacts {
  return { name: record.name, siren: record.siren, qid: record.qid };
}

// Calls the assistant at most once per operation
function memoizedAssistant(record: EntityRecord, apiKey: string, trace: Trace): AssistantFallback {
  let pending: Promise<AssistantEnrichment | null> | undefined;
  return () => {
    if (!pending) {
      pending = enrichWithAssistant(assistantFacts(record), apiKey, trace);
    }
    return pending;
  };
}

export async function resolveParentForSession(
  session: SessionState,
  input: ResolveParentInput,
  trace: Trace
): Promise<ParentOutcome> {
  const assistantFallback = input.useAssistant
    ? memoizedAssistant(session.record, await getMistralApiKey(), trace)
    : undefined;

  const resolution = await resolveParent(
    session.record,
    { force: input.force, assistantFallback },
    trace
  );
  return resolution.outcome;
}

/**
 * Assistant enrichment: SEO copy always, parent linkage only when neither
 * Wikidata property yields one and no linkage is recorded yet.
 */
export async function enrichSession(
  session: SessionState,
  trace: Trace
): Promise<{ enriched: boolean; outcome: ParentOutcome }> {
  if (!hasSubject(session.record)) {
    throw new ValidationError('Select or enter an organization before enrichment');
  }

  const ask = memoizedAssistant(session.record, await getMistralApiKey(), trace);

  const resolution = await resolveParent(session.record, { assistantFallback: ask }, trace);

  const enrichment = await ask();
  if (enrichment) {
    applyAssistantCopy(session.record, enrichment);
  }

  return { enriched: enrichment !== null, outcome: resolution.outcome };
}

export function renderJsonLd(session: SessionState): JsonLdResponse {
  const document = buildJsonLd(session.record, session.socialLinks);
  return {
    document,
    findings: validateJsonLd(document),
    snippet: renderEmbedSnippet(document),
  };
}
