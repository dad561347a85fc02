import { z } from 'zod';
import { config } from './config.js';
import { requestJson } from './http.js';

const completionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

export interface CompletionRequest {
  prompt: string;
  apiKey: string;
  temperature: number;
}

export interface CompletionResult {
  content: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * Single-turn chat completion constrained to a JSON object response.
 */
export async function invokeMistralCompletion(request: CompletionRequest): Promise<CompletionResult> {
  const raw = await requestJson(config.assistant.apiUrl, {
    method: 'POST',
    timeoutMs: config.assistant.timeoutMs,
    headers: { Authorization: `Bearer ${request.apiKey}` },
    body: {
      model: config.assistant.model,
      messages: [{ role: 'user', content: request.prompt }],
      response_format: { type: 'json_object' },
      temperature: request.temperature,
    },
  });

  const parsed = completionResponseSchema.parse(raw);

  return {
    content: parsed.choices[0].message.content,
    inputTokens: parsed.usage?.prompt_tokens ?? 0,
    outputTokens: parsed.usage?.completion_tokens ?? 0,
  };
}
