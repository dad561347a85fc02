import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ParentSource, type KnowledgeBaseEntityDetail, type PropertyResult } from '@orgld/shared';
import { Trace } from '../trace.js';

vi.mock('./knowledge-base.js', () => ({
  getEntityDetail: vi.fn(),
  getLabel: vi.fn(),
  getRegistryNumber: vi.fn(),
  searchKnowledgeBase: vi.fn(),
}));

vi.mock('./registry.js', () => ({
  resolveNameToRegistryNumber: vi.fn(),
}));

import { resolveParent } from './parent-resolver.js';
import { createEmptyRecord } from './entity-record.js';
import { getEntityDetail, getLabel, getRegistryNumber, searchKnowledgeBase } from './knowledge-base.js';
import { resolveNameToRegistryNumber } from './registry.js';

const LABELS: Record<string, string> = {
  Q270618: 'Société Générale',
  Q499707: 'BNP Paribas',
};

function quietTrace() {
  return new Trace([], 50, { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() });
}

function subject(
  parentOrganization: PropertyResult = { status: 'absent' },
  ownedBy: PropertyResult = { status: 'absent' }
): KnowledgeBaseEntityDetail {
  return {
    qid: 'Q2110465',
    labels: { fr: 'Boursorama', en: 'Boursorama' },
    descriptions: { fr: '', en: '' },
    properties: {
      siren: { status: 'found', value: '351058151' },
      lei: { status: 'absent' },
      website: { status: 'absent' },
      foundingDate: { status: 'absent' },
      logo: { status: 'absent' },
      parentOrganization,
      ownedBy,
      founder: { status: 'absent' },
    },
  };
}

function boursorama() {
  return { ...createEmptyRecord(), name: 'Boursorama', qid: 'Q2110465', siren: '351058151' };
}

function guess(parentOrgName: string, parentOrgQid: string) {
  return vi.fn().mockResolvedValue({
    descriptionFr: '',
    descriptionEn: '',
    expertiseFr: '',
    expertiseEn: '',
    slogan: '',
    parentOrgName,
    parentOrgQid,
  });
}

describe('resolveParent', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(getLabel).mockImplementation(async (qid) => LABELS[qid] ?? qid);
    vi.mocked(getRegistryNumber).mockResolvedValue('');
    vi.mocked(resolveNameToRegistryNumber).mockResolvedValue('');
    vi.mocked(searchKnowledgeBase).mockResolvedValue([]);
  });

  it('links Boursorama to Société Générale through P749', async () => {
    vi.mocked(getRegistryNumber).mockResolvedValue('552120222');
    const record = boursorama();
    const trace = quietTrace();

    const result = await resolveParent(
      record,
      { detail: subject({ status: 'found', value: 'Q270618' }) },
      trace
    );

    expect(result.outcome).toBe('resolved');
    expect(result.linkage).toEqual({
      parentOrgName: 'Société Générale',
      parentOrgQid: 'Q270618',
      parentOrgSiren: '552120222',
      parentSource: ParentSource.PARENT_ORGANIZATION,
    });
    expect(getEntityDetail).not.toHaveBeenCalled();
    expect(trace.entries.map((e) => e.message)).toEqual([
      'Parent via P749: Société Générale (Q270618)',
      'Parent SIREN: 552120222',
    ]);
  });

  it('prefers P749 over P127', async () => {
    const record = boursorama();

    const result = await resolveParent(
      record,
      {
        detail: subject({ status: 'found', value: 'Q270618' }, { status: 'found', value: 'Q499707' }),
      },
      quietTrace()
    );

    expect(result.linkage.parentOrgQid).toBe('Q270618');
    expect(result.linkage.parentSource).toBe('P749');
  });

  it('falls back to P127 when P749 is absent', async () => {
    const record = boursorama();
    const trace = quietTrace();

    const result = await resolveParent(
      record,
      { detail: subject({ status: 'absent' }, { status: 'found', value: 'Q499707' }) },
      trace
    );

    expect(result.linkage).toMatchObject({ parentOrgName: 'BNP Paribas', parentSource: 'P127' });
    expect(trace.entries[0]).toMatchObject({ level: 'INFO', message: 'No parent organization (P749)' });
  });

  it('reads P127 when P749 is malformed', async () => {
    const record = boursorama();
    const trace = quietTrace();

    const result = await resolveParent(
      record,
      {
        detail: subject(
          { status: 'malformed', reason: 'P749: missing datavalue' },
          { status: 'found', value: 'Q499707' }
        ),
      },
      trace
    );

    expect(result.linkage.parentSource).toBe('P127');
    expect(trace.entries[0]).toMatchObject({
      level: 'WARN',
      message: 'Unreadable parent organization: P749: missing datavalue',
    });
  });

  it('does not ask the assistant when the graph has a parent', async () => {
    const fallback = guess('Autre Groupe', '');

    await resolveParent(
      boursorama(),
      { detail: subject({ status: 'found', value: 'Q270618' }), assistantFallback: fallback },
      quietTrace()
    );

    expect(fallback).not.toHaveBeenCalled();
  });

  it('uses the assistant guess when the graph has none', async () => {
    vi.mocked(resolveNameToRegistryNumber).mockResolvedValue('552120222');
    const record = boursorama();

    const result = await resolveParent(
      record,
      { detail: subject(), assistantFallback: guess('Société Générale', 'Q270618') },
      quietTrace()
    );

    expect(result.outcome).toBe('resolved');
    expect(result.linkage).toEqual({
      parentOrgName: 'Société Générale',
      parentOrgQid: 'Q270618',
      parentOrgSiren: '552120222',
      parentSource: ParentSource.ASSISTANT,
    });
    expect(resolveNameToRegistryNumber).toHaveBeenCalledWith('Société Générale', expect.any(Trace));
  });

  it('finds an id for a name-only guess by search', async () => {
    vi.mocked(searchKnowledgeBase).mockResolvedValue([
      { qid: 'Q270618', label: 'Société Générale', description: 'banque française' },
    ]);

    const result = await resolveParent(
      boursorama(),
      { detail: subject(), assistantFallback: guess('Société Générale', '') },
      quietTrace()
    );

    expect(searchKnowledgeBase).toHaveBeenCalledWith('Société Générale', 1, expect.any(Trace));
    expect(result.linkage.parentOrgQid).toBe('Q270618');
  });

  it('keeps a name-only guess when search finds nothing', async () => {
    const result = await resolveParent(
      boursorama(),
      { detail: subject(), assistantFallback: guess('Groupe Inconnu SA', '') },
      quietTrace()
    );

    expect(result.linkage).toMatchObject({ parentOrgName: 'Groupe Inconnu SA', parentOrgQid: '', parentSource: 'Mistral' });
  });

  it('ignores an id-only guess whose label cannot be found', async () => {
    const record = boursorama();

    const result = await resolveParent(
      record,
      { detail: subject(), assistantFallback: guess('', 'Q123456') },
      quietTrace()
    );

    expect(result.outcome).toBe('none');
    expect(record.parentOrgQid).toBe('');
  });

  it('reports none without writing when no source has a parent', async () => {
    const record = boursorama();
    const trace = quietTrace();

    const result = await resolveParent(record, { detail: subject(), assistantFallback: guess('', '') }, trace);

    expect(result.outcome).toBe('none');
    expect(result.linkage.parentSource).toBe('');
    expect(trace.entries.at(-1)?.message).toBe('No parent organization found');
  });

  it('fetches the subject when no detail is given', async () => {
    vi.mocked(getEntityDetail).mockResolvedValue(subject({ status: 'found', value: 'Q270618' }));

    const result = await resolveParent(boursorama(), {}, quietTrace());

    expect(getEntityDetail).toHaveBeenCalledWith('Q2110465', expect.any(Trace));
    expect(result.outcome).toBe('resolved');
  });

  it('skips the graph for a record without a Wikidata id', async () => {
    const record = { ...createEmptyRecord(), name: 'Acme' };

    const result = await resolveParent(record, {}, quietTrace());

    expect(getEntityDetail).not.toHaveBeenCalled();
    expect(result.outcome).toBe('none');
  });

  it('keeps a recorded linkage', async () => {
    const record = {
      ...boursorama(),
      parentOrgName: 'Société Générale',
      parentOrgQid: 'Q270618',
      parentSource: ParentSource.ASSISTANT,
    };
    const trace = quietTrace();

    const result = await resolveParent(record, { detail: subject({ status: 'found', value: 'Q499707' }) }, trace);

    expect(result.outcome).toBe('kept');
    expect(record.parentOrgQid).toBe('Q270618');
    expect(trace.entries[0].message).toBe('Parent already set from Mistral, kept');
  });

  it('replaces a recorded linkage when forced', async () => {
    const record = {
      ...boursorama(),
      parentOrgName: 'Société Générale',
      parentOrgQid: 'Q270618',
      parentSource: ParentSource.ASSISTANT,
    };

    const result = await resolveParent(
      record,
      { detail: subject({ status: 'found', value: 'Q499707' }), force: true },
      quietTrace()
    );

    expect(result.outcome).toBe('resolved');
    expect(record.parentOrgQid).toBe('Q499707');
    expect(record.parentSource).toBe('P749');
  });

  it('clears a recorded linkage when forced and nothing is found', async () => {
    const record = {
      ...boursorama(),
      parentOrgName: 'Société Générale',
      parentOrgQid: 'Q270618',
      parentOrgSiren: '552120222',
      parentSource: ParentSource.OWNED_BY,
    };

    const result = await resolveParent(record, { detail: subject(), force: true }, quietTrace());

    expect(result.outcome).toBe('none');
    expect(result.linkage).toEqual({ parentOrgName: '', parentOrgQid: '', parentOrgSiren: '', parentSource: '' });
  });

  it('touches only the parent fields', async () => {
    const record = boursorama();
    const before = { ...record };

    await resolveParent(record, { detail: subject({ status: 'found', value: 'Q270618' }) }, quietTrace());

    const { parentOrgName, parentOrgQid, parentOrgSiren, parentSource, ...rest } = record;
    const { parentOrgName: _n, parentOrgQid: _q, parentOrgSiren: _s, parentSource: _p, ...restBefore } = before;
    expect(rest).toEqual(restBefore);
    expect(parentOrgName).toBe('Société Générale');
    expect([parentOrgQid, parentOrgSiren, parentSource]).toEqual(['Q270618', '', 'P749']);
  });
});
