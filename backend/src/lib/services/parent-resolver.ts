// Parent-organization resolution across Wikidata, the registry and Mistral

import {
  ParentSource,
  type AssistantEnrichment,
  type EntityRecord,
  type KnowledgeBaseEntityDetail,
  type KnowledgeBaseProperty,
  type ParentLinkage,
} from '@orgld/shared';
import type { Trace } from '../trace.js';
import { applyParentLinkage, clearParentLinkage, getParentLinkage } from './entity-record.js';
import { PROPERTY_CODES } from './claims.js';
import { getEntityDetail, getLabel, getRegistryNumber, searchKnowledgeBase } from './knowledge-base.js';
import { resolveNameToRegistryNumber } from './registry.js';

export type AssistantFallback = () => Promise<AssistantEnrichment | null>;

export interface ResolveParentOptions {
  // Detail of the subject when the caller already fetched it
  detail?: KnowledgeBaseEntityDetail | null;
  // Re-resolve even when a linkage is already recorded
  force?: boolean;
  // Lowest-priority source; only consulted when supplied
  assistantFallback?: AssistantFallback;
}

export type ParentOutcome = 'resolved' | 'kept' | 'none';

export interface ParentResolution {
  outcome: ParentOutcome;
  linkage: ParentLinkage;
}

interface ParentCandidate {
  name: string;
  qid: string;
  source: ParentSource;
}

// Wikidata properties tried in order
const GRAPH_SOURCES: ReadonlyArray<{
  property: KnowledgeBaseProperty;
  source: ParentSource;
  label: string;
}> = [
  { property: 'parentOrganization', source: ParentSource.PARENT_ORGANIZATION, label: 'parent organization' },
  { property: 'ownedBy', source: ParentSource.OWNED_BY, label: 'owned by' },
];

async function subjectDetail(
  record: EntityRecord,
  options: ResolveParentOptions,
  trace: Trace
): Promise<KnowledgeBaseEntityDetail | null> {
  if (!record.qid) return null;
  if (options.detail && options.detail.qid === record.qid) {
    return options.detail;
  }
  return getEntityDetail(record.qid, trace);
}

async function fromKnowledgeGraph(
  detail: KnowledgeBaseEntityDetail,
  trace: Trace
): Promise<ParentCandidate | null> {
  for (const { property, source, label } of GRAPH_SOURCES) {
    const result = detail.properties[property];
    const code = PROPERTY_CODES[property];

    if (result.status === 'found') {
      const name = await getLabel(result.value, trace);
      trace.ok(`Parent via ${code}: ${name} (${result.value})`);
      return { name, qid: result.value, source };
    }

    if (result.status === 'absent') {
      trace.info(`No ${label} (${code})`);
    } else {
      trace.warn(`Unreadable ${label}: ${result.reason}`);
    }
  }
  return null;
}

async function fromAssistant(
  fallback: AssistantFallback,
  trace: Trace
): Promise<ParentCandidate | null> {
  const guess = await fallback();
  if (!guess) return null;

  let name = guess.parentOrgName;
  let qid = guess.parentOrgQid;

  if (name && !qid) {
    // Best effort: top search hit for the guessed name
    const [top] = await searchKnowledgeBase(name, 1, trace);
    qid = top?.qid ?? '';
    if (qid) {
      trace.info(`Parent id from search on '${name}': ${qid} (unverified)`);
    }
  } else if (!name && qid) {
    const label = await getLabel(qid, trace);
    if (label === qid) {
      trace.warn(`Mistral parent ${qid} has no label, ignored`);
      return null;
    }
    name = label;
  }

  if (!name) {
    trace.info('Mistral: no known parent');
    return null;
  }

  trace.ok(`Parent via Mistral: ${name}${qid ? ` (${qid})` : ''}`);
  return { name, qid, source: ParentSource.ASSISTANT };
}

// Parent SIREN: Wikidata P1616 on the parent, else first registry hit by name
async function parentRegistryNumber(candidate: ParentCandidate, trace: Trace): Promise<string> {
  let siren = '';
  if (candidate.qid) {
    siren = await getRegistryNumber(candidate.qid, trace);
  }
  if (!siren) {
    siren = await resolveNameToRegistryNumber(candidate.name, trace);
  }
  if (siren) {
    trace.ok(`Parent SIREN: ${siren}`);
  }
  return siren;
}

/**
 * Fill the parent linkage of a record. Sources are consulted strictly one
 * after another and the first that yields a parent wins: P749, then P127,
 * then the assistant. Only the parent fields are written.
 */
export async function resolveParent(
  record: EntityRecord,
  options: ResolveParentOptions,
  trace: Trace
): Promise<ParentResolution> {
  if (record.parentSource && !options.force) {
    trace.info(`Parent already set from ${record.parentSource}, kept`);
    return { outcome: 'kept', linkage: getParentLinkage(record) };
  }

  let candidate: ParentCandidate | null = null;

  const detail = await subjectDetail(record, options, trace);
  if (detail) {
    candidate = await fromKnowledgeGraph(detail, trace);
  }

  if (!candidate && options.assistantFallback) {
    candidate = await fromAssistant(options.assistantFallback, trace);
  }

  if (!candidate) {
    if (options.force) {
      clearParentLinkage(record);
    }
    trace.info('No parent organization found');
    return { outcome: 'none', linkage: getParentLinkage(record) };
  }

  const parentOrgSiren = await parentRegistryNumber(candidate, trace);

  applyParentLinkage(record, {
    parentOrgName: candidate.name,
    parentOrgQid: candidate.qid,
    parentOrgSiren,
    parentSource: candidate.source,
  });

  return { outcome: 'resolved', linkage: getParentLinkage(record) };
}
