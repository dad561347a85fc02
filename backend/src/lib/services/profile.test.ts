import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ParentSource, type KnowledgeBaseEntityDetail, type SessionState } from '@orgld/shared';
import { Trace } from '../trace.js';

vi.mock('./knowledge-base.js', () => ({
  entityUrl: (qid: string) => `https://www.wikidata.org/wiki/${qid}`,
  getEntityDetail: vi.fn(),
  getLabel: vi.fn(),
  getRegistryNumber: vi.fn(),
  searchKnowledgeBase: vi.fn(),
}));

vi.mock('./registry.js', () => ({
  searchRegistry: vi.fn(),
  resolveNameToRegistryNumber: vi.fn(),
}));

vi.mock('./assistant.js', () => ({
  enrichWithAssistant: vi.fn(),
}));

vi.mock('../ssm.js', () => ({
  getMistralApiKey: vi.fn(),
}));

import {
  enrichSession,
  renderJsonLd,
  resolveParentForSession,
  search,
  selectKnowledgeBaseEntity,
  selectRegistryCompany,
} from './profile.js';
import { createEmptyRecord, createEmptySocialLinks } from './entity-record.js';
import { getEntityDetail, getLabel, getRegistryNumber, searchKnowledgeBase } from './knowledge-base.js';
import { resolveNameToRegistryNumber, searchRegistry } from './registry.js';
import { enrichWithAssistant } from './assistant.js';
import { getMistralApiKey } from '../ssm.js';

const LABELS: Record<string, string> = {
  Q270618: 'Société Générale',
  Q3308284: 'Jeanne Exemple',
};

function quietTrace() {
  return new Trace([], 50, { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
}

function session(): SessionState {
  return {
    sessionId: '01ARZ3NDEKTSV4RRFFQ69G5FAV',
    authenticated: true,
    record: createEmptyRecord(),
    socialLinks: createEmptySocialLinks(),
    trace: [],
    createdAt: '2025-01-19T09:00:00.000Z',
    updatedAt: '2025-01-19T09:00:00.000Z',
    expiresAt: 1737363600,
  };
}

function boursoramaDetail(): KnowledgeBaseEntityDetail {
  return {
    qid: 'Q2110465',
    labels: { fr: 'Boursorama', en: 'Boursorama' },
    descriptions: { fr: 'banque en ligne française', en: '' },
    properties: {
      siren: { status: 'found', value: '351058151' },
      lei: { status: 'absent' },
      website: { status: 'found', value: 'https://www.boursorama.com' },
      foundingDate: { status: 'absent' },
      logo: { status: 'absent' },
      parentOrganization: { status: 'found', value: 'Q270618' },
      ownedBy: { status: 'absent' },
      founder: { status: 'found', value: 'Q3308284' },
    },
  };
}

const enrichment = {
  descriptionFr: 'Banque en ligne française.',
  descriptionEn: 'French online bank.',
  expertiseFr: 'Banque en ligne, Bourse',
  expertiseEn: 'Online banking, Brokerage',
  slogan: 'La banque en ligne',
  parentOrgName: 'Société Générale',
  parentOrgQid: 'Q270618',
};

beforeEach(() => {
  vi.clearAllMocks();
  vi.mocked(getLabel).mockImplementation(async (qid) => LABELS[qid] ?? qid);
  vi.mocked(getRegistryNumber).mockResolvedValue('552120222');
  vi.mocked(resolveNameToRegistryNumber).mockResolvedValue('');
  vi.mocked(searchKnowledgeBase).mockResolvedValue([]);
  vi.mocked(searchRegistry).mockResolvedValue([]);
  vi.mocked(getMistralApiKey).mockResolvedValue('test-key');
});

describe('search', () => {
  it('queries both sources by default', async () => {
    vi.mocked(searchKnowledgeBase).mockResolvedValue([
      { qid: 'Q2110465', label: 'Boursorama', description: 'banque en ligne française' },
    ]);
    const trace = quietTrace();

    const result = await search({ q: 'Boursorama', source: 'both' }, trace);

    expect(result.knowledgeBase).toHaveLength(1);
    expect(result.registry).toEqual([]);
    expect(searchKnowledgeBase).toHaveBeenCalledWith('Boursorama', 12, trace);
    expect(searchRegistry).toHaveBeenCalledWith('Boursorama', 10, trace);
  });

  it('queries the registry alone when asked', async () => {
    await search({ q: 'Acme', source: 'registry', limit: 5 }, quietTrace());

    expect(searchKnowledgeBase).not.toHaveBeenCalled();
    expect(searchRegistry).toHaveBeenCalledWith('Acme', 5, expect.any(Trace));
  });
});

describe('selectKnowledgeBaseEntity', () => {
  it('fills the record and resolves the parent in one step', async () => {
    vi.mocked(getEntityDetail).mockResolvedValue(boursoramaDetail());
    const s = session();

    const outcome = await selectKnowledgeBaseEntity(s, { qid: 'Q2110465', label: 'Boursorama' }, quietTrace());

    expect(outcome).toBe('resolved');
    expect(getEntityDetail).toHaveBeenCalledTimes(1);
    expect(s.record).toMatchObject({
      name: 'Boursorama',
      qid: 'Q2110465',
      siren: '351058151',
      website: 'https://www.boursorama.com',
      founderName: 'Jeanne Exemple',
      founderUrl: 'https://www.wikidata.org/wiki/Q3308284',
      parentOrgName: 'Société Générale',
      parentOrgQid: 'Q270618',
      parentOrgSiren: '552120222',
      parentSource: ParentSource.PARENT_ORGANIZATION,
    });
  });

  it('re-resolves the parent when another entity is chosen', async () => {
    vi.mocked(getEntityDetail).mockResolvedValue({
      ...boursoramaDetail(),
      qid: 'Q42',
      properties: { ...boursoramaDetail().properties, parentOrganization: { status: 'absent' } },
    });
    const s = session();
    s.record.qid = 'Q2110465';
    s.record.parentOrgName = 'Société Générale';
    s.record.parentOrgQid = 'Q270618';
    s.record.parentSource = ParentSource.PARENT_ORGANIZATION;

    const outcome = await selectKnowledgeBaseEntity(s, { qid: 'Q42' }, quietTrace());

    expect(outcome).toBe('none');
    expect(s.record.parentSource).toBe('');
  });

  it('keeps the label when the entity cannot be loaded', async () => {
    vi.mocked(getEntityDetail).mockResolvedValue(null);
    const s = session();

    const outcome = await selectKnowledgeBaseEntity(s, { qid: 'Q42', label: 'Acme' }, quietTrace());

    expect(outcome).toBe('none');
    expect(s.record.qid).toBe('Q42');
    expect(s.record.name).toBe('Acme');
  });

  it('drops the previous parent when the new entity cannot be loaded', async () => {
    vi.mocked(getEntityDetail).mockResolvedValueOnce(boursoramaDetail());
    const s = session();
    await selectKnowledgeBaseEntity(s, { qid: 'Q2110465', label: 'Boursorama' }, quietTrace());
    expect(s.record.parentSource).toBe(ParentSource.PARENT_ORGANIZATION);

    vi.mocked(getEntityDetail).mockResolvedValue(null);
    await selectKnowledgeBaseEntity(s, { qid: 'Q42', label: 'Acme' }, quietTrace());

    expect(s.record).toMatchObject({
      qid: 'Q42',
      name: 'Acme',
      siren: '',
      website: '',
      descriptionFr: '',
      founderName: '',
      parentOrgName: '',
      parentOrgQid: '',
      parentOrgSiren: '',
      parentSource: '',
    });

    const outcome = await resolveParentForSession(s, { force: false, useAssistant: false }, quietTrace());
    expect(outcome).toBe('none');
    expect(renderJsonLd(s).document.parentOrganization).toBeUndefined();
  });

  it('replaces the previous entity fields when another entity is chosen', async () => {
    vi.mocked(getEntityDetail).mockResolvedValueOnce(boursoramaDetail());
    const s = session();
    await selectKnowledgeBaseEntity(s, { qid: 'Q2110465', label: 'Boursorama' }, quietTrace());

    vi.mocked(getEntityDetail).mockResolvedValue({
      qid: 'Q42',
      labels: { fr: 'Acme', en: '' },
      descriptions: { fr: '', en: '' },
      properties: {
        siren: { status: 'absent' },
        lei: { status: 'absent' },
        website: { status: 'found', value: 'https://acme.example' },
        foundingDate: { status: 'absent' },
        logo: { status: 'absent' },
        parentOrganization: { status: 'absent' },
        ownedBy: { status: 'absent' },
        founder: { status: 'absent' },
      },
    });
    await selectKnowledgeBaseEntity(s, { qid: 'Q42' }, quietTrace());

    expect(s.record).toMatchObject({
      qid: 'Q42',
      name: 'Acme',
      nameEn: '',
      descriptionFr: '',
      siren: '',
      website: 'https://acme.example',
      founderName: '',
      founderUrl: '',
      parentSource: '',
    });
  });
});

it('selectRegistryCompany copies the company and traces it', () => {
  const s = session();
  const trace = quietTrace();

  selectRegistryCompany(
    s,
    {
      siren: '123456789',
      siret: '',
      name: 'ACME FRANCE',
      legalName: 'ACME FRANCE SAS',
      naf: '62.01Z',
      streetAddress: '',
      postalCode: '',
      city: '',
      active: true,
      creationDate: '',
    },
    trace
  );

  expect(s.record.siren).toBe('123456789');
  expect(s.record.name).toBe('ACME FRANCE');
  expect(trace.entries[0].message).toBe('Registry: ACME FRANCE');
});

describe('resolveParentForSession', () => {
  it('leaves the assistant out unless asked', async () => {
    vi.mocked(getEntityDetail).mockResolvedValue({
      ...boursoramaDetail(),
      properties: { ...boursoramaDetail().properties, parentOrganization: { status: 'absent' } },
    });
    const s = session();
    s.record.qid = 'Q2110465';

    const outcome = await resolveParentForSession(s, { force: false, useAssistant: false }, quietTrace());

    expect(outcome).toBe('none');
    expect(enrichWithAssistant).not.toHaveBeenCalled();
  });

  it('asks the assistant when allowed', async () => {
    vi.mocked(enrichWithAssistant).mockResolvedValue(enrichment);
    const s = session();
    s.record.name = 'Boursorama';

    const outcome = await resolveParentForSession(s, { force: false, useAssistant: true }, quietTrace());

    expect(outcome).toBe('resolved');
    expect(s.record.parentSource).toBe('Mistral');
  });
});

describe('enrichSession', () => {
  it('applies the copy and the parent guess with one assistant call', async () => {
    vi.mocked(enrichWithAssistant).mockResolvedValue(enrichment);
    const s = session();
    s.record.name = 'Boursorama';
    s.record.siren = '351058151';

    const result = await enrichSession(s, quietTrace());

    expect(result).toEqual({ enriched: true, outcome: 'resolved' });
    expect(enrichWithAssistant).toHaveBeenCalledTimes(1);
    expect(enrichWithAssistant).toHaveBeenCalledWith(
      { name: 'Boursorama', siren: '351058151', qid: '' },
      'test-key',
      expect.any(Trace)
    );
    expect(s.record.expertiseFr).toBe('Banque en ligne, Bourse');
    expect(s.record.parentOrgName).toBe('Société Générale');
    expect(s.record.parentSource).toBe('Mistral');
  });

  it('keeps a graph parent and still applies the copy', async () => {
    vi.mocked(enrichWithAssistant).mockResolvedValue({ ...enrichment, parentOrgName: 'Autre Groupe', parentOrgQid: '' });
    const s = session();
    s.record.name = 'Boursorama';
    s.record.parentOrgName = 'Société Générale';
    s.record.parentOrgQid = 'Q270618';
    s.record.parentSource = ParentSource.PARENT_ORGANIZATION;

    const result = await enrichSession(s, quietTrace());

    expect(result.outcome).toBe('kept');
    expect(s.record.parentOrgName).toBe('Société Générale');
    expect(s.record.slogan).toBe('La banque en ligne');
  });

  it('refuses to enrich an empty record', async () => {
    await expect(enrichSession(session(), quietTrace())).rejects.toThrow(
      'Select or enter an organization before enrichment'
    );
    expect(enrichWithAssistant).not.toHaveBeenCalled();
  });

  it('reports nothing enriched when the assistant is unavailable', async () => {
    vi.mocked(enrichWithAssistant).mockResolvedValue(null);
    const s = session();
    s.record.name = 'Acme';

    expect(await enrichSession(s, quietTrace())).toEqual({ enriched: false, outcome: 'none' });
  });
});

it('renderJsonLd returns the document, findings and snippet', () => {
  const s = session();
  s.record.name = 'Acme';

  const result = renderJsonLd(s);

  expect(result.document.name).toBe('Acme');
  expect(result.findings.map((f) => f.field)).toEqual(['url', 'logo', 'sameAs', 'description', 'address']);
  expect(result.snippet.startsWith('<script type="application/ld+json">')).toBe(true);
});
