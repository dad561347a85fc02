// LLM-based SEO copy and parent-organization guess (Mistral)

import { z } from 'zod';
import type { AssistantEnrichment, AssistantFacts } from '@orgld/shared';
import { config } from '../config.js';
import { describeError } from '../http.js';
import { invokeMistralCompletion } from '../mistral.js';
import type { Trace } from '../trace.js';

// Verified parent/subsidiary pairs shown to the model as reference
const PARENT_EXAMPLES = [
  { subsidiary: 'Boursorama', parent: 'Société Générale', qid: 'Q270618' },
  { subsidiary: 'BNP Paribas Suisse', parent: 'BNP Paribas', qid: 'Q499707' },
] as const;

// Values the model uses to say "unknown"
const NULL_EQUIVALENTS = new Set(['', 'null', 'none', 'n/a', 'na', 'unknown', 'inconnu', 'aucun', 'aucune', 'indépendant', 'independent']);

const nullableText = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((value) => {
    const trimmed = (value ?? '').trim();
    return NULL_EQUIVALENTS.has(trimmed.toLowerCase()) ? '' : trimmed;
  });

// Expertise may come back as a list despite the instructions
const commaList = z
  .union([z.string(), z.array(z.string()), z.null(), z.undefined()])
  .transform((value) => (Array.isArray(value) ? value.join(', ') : (value ?? '').trim()));

const responseSchema = z.object({
  description_fr: nullableText,
  description_en: nullableText,
  expertise_fr: commaList,
  expertise_en: commaList,
  slogan: nullableText,
  parent_org_name: nullableText,
  parent_org_qid: nullableText,
});

/**
 * Deterministic prompt built from the facts already known about the entity.
 */
export function buildEnrichmentPrompt(facts: AssistantFacts): string {
  const examples = PARENT_EXAMPLES.map(
    (e) => `- ${e.subsidiary} → parent_org_name: "${e.parent}", parent_org_qid: "${e.qid}"`
  ).join('\n');

  return `Expert SEO. Analyse cette entreprise française:
NOM: ${facts.name || 'N/A'}
SIREN: ${facts.siren || 'N/A'}
QID: ${facts.qid || 'N/A'}

Génère en JSON:
- description_fr: Description SEO (150-200 car)
- description_en: English translation
- expertise_fr: 3-5 domaines (virgules)
- expertise_en: English translation
- slogan: Slogan court (moins de 60 car)
- parent_org_name: Maison mère (null si indépendant/inconnu)
- parent_org_qid: QID Wikidata du parent (Qxxxxx ou null)

Exemples de filiations vérifiées:
${examples}

Ne devine pas: si la maison mère n'est pas certaine, réponds null.
RÉPONDS UNIQUEMENT EN JSON VALIDE:`;
}

/**
 * Parse the model output. Returns null when it is not a JSON object.
 */
export function parseAssistantResponse(content: string): AssistantEnrichment | null {
  let jsonStr = content.trim();

  // Remove markdown code block if present
  if (jsonStr.startsWith('```')) {
    jsonStr = jsonStr.split('\n').slice(1, -1).join('\n');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(jsonStr);
  } catch {
    return null;
  }

  const parsed = responseSchema.safeParse(raw);
  if (!parsed.success) {
    return null;
  }

  const r = parsed.data;
  return {
    descriptionFr: r.description_fr,
    descriptionEn: r.description_en,
    expertiseFr: r.expertise_fr,
    expertiseEn: r.expertise_en,
    slogan: r.slogan,
    parentOrgName: r.parent_org_name,
    parentOrgQid: /^Q\d+$/.test(r.parent_org_qid) ? r.parent_org_qid : '',
  };
}

/**
 * Ask the model for copy and a parent guess. No api key means no call.
 * Failures are traced and yield null.
 */
export async function enrichWithAssistant(
  facts: AssistantFacts,
  apiKey: string,
  trace: Trace
): Promise<AssistantEnrichment | null> {
  if (!apiKey) {
    trace.warn('Mistral key missing, enrichment skipped');
    return null;
  }

  trace.http('Mistral optimization...');

  try {
    const response = await invokeMistralCompletion({
      prompt: buildEnrichmentPrompt(facts),
      apiKey,
      temperature: config.assistant.temperature,
    });

    const enrichment = parseAssistantResponse(response.content);
    if (!enrichment) {
      trace.error('Mistral returned an unreadable response');
      return null;
    }

    trace.ok('Mistral OK', {
      inputTokens: response.inputTokens,
      outputTokens: response.outputTokens,
    });
    return enrichment;
  } catch (error) {
    trace.error(`Mistral error: ${describeError(error)}`);
    return null;
  }
}
