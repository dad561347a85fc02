// Company registry client (recherche-entreprises.api.gouv.fr)

import { z } from 'zod';
import type { RegistryCompany } from '@orgld/shared';
import { config } from '../config.js';
import { describeError, requestJson, withQuery } from '../http.js';
import type { Trace } from '../trace.js';

const text = z.string().nullish().transform((value) => value ?? '');

const headOfficeSchema = z.object({
  siret: text,
  adresse: text,
  numero_voie: text,
  type_voie: text,
  libelle_voie: text,
  code_postal: text,
  libelle_commune: text,
  commune: text,
});

const resultSchema = z.object({
  siren: z.string().regex(/^\d{9}$/),
  nom_complet: text,
  nom_raison_sociale: text,
  activite_principale: text,
  etat_administratif: text,
  date_creation: text,
  siege: headOfficeSchema.nullish(),
});

const searchResponseSchema = z.object({
  results: z.array(z.unknown()),
});

type RegistryResult = z.infer<typeof resultSchema>;

// "12 RUE DE LA PAIX" from its parts, else the head office one-line address
function streetOf(siege: z.infer<typeof headOfficeSchema>): string {
  const parts = [siege.numero_voie, siege.type_voie, siege.libelle_voie].filter(Boolean);
  if (parts.length > 0) {
    return parts.join(' ');
  }
  return siege.adresse;
}

export function toRegistryCompany(result: RegistryResult): RegistryCompany {
  const siege = result.siege;
  return {
    siren: result.siren,
    siret: siege?.siret ?? '',
    name: result.nom_complet,
    legalName: result.nom_raison_sociale,
    naf: result.activite_principale,
    streetAddress: siege ? streetOf(siege) : '',
    postalCode: siege?.code_postal ?? '',
    city: siege ? siege.libelle_commune || siege.commune : '',
    active: result.etat_administratif === 'A',
    creationDate: result.date_creation,
  };
}

/**
 * Free-text company search. Malformed result items are skipped;
 * any failure yields [].
 */
export async function searchRegistry(
  query: string,
  limit: number,
  trace: Trace
): Promise<RegistryCompany[]> {
  trace.http(`Registry search: '${query}'`);

  try {
    const raw = await requestJson(
      withQuery(config.registry.searchUrl, { q: query, per_page: limit }),
      { timeoutMs: config.registry.timeoutMs }
    );

    const parsed = searchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      trace.error('Registry search: unexpected response shape');
      return [];
    }

    const companies: RegistryCompany[] = [];
    for (const item of parsed.data.results.slice(0, limit)) {
      const result = resultSchema.safeParse(item);
      if (result.success) {
        companies.push(toRegistryCompany(result.data));
      }
    }

    trace.ok(`${companies.length} registry results`);
    return companies;
  } catch (error) {
    trace.error(`Registry error: ${describeError(error)}`);
    return [];
  }
}

/**
 * SIREN of the most relevant hit for a name. Approximate: the first hit is
 * taken without disambiguation. '' when nothing matches.
 */
export async function resolveNameToRegistryNumber(name: string, trace: Trace): Promise<string> {
  const [first] = await searchRegistry(name, 1, trace);
  return first?.siren ?? '';
}
