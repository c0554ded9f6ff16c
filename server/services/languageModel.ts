/**
 * Language Model
 *
 * One-shot structured completions: a system role plus a single user
 * instruction, no conversation history. Agents depend on the LanguageModel
 * interface; OpenAILanguageModel backs it with the tiered client factory.
 */

import type { ZodType, ZodTypeDef } from 'zod';
import { getAIClient, type AITier } from './aiClientFactory';

// ============================================================================
// TYPES
// ============================================================================

export interface CompletionRequest {
  /** System role description */
  role: string;
  instruction: string;
  temperature: number;
  json: boolean;
  tier?: AITier;
  maxTokens?: number;
}

export interface LanguageModel {
  complete(request: CompletionRequest): Promise<string>;
}

export type ParsedOutput<T> =
  | { ok: true; data: T }
  | { ok: false; error: string };

// ============================================================================
// OPENAI IMPLEMENTATION
// ============================================================================

export class OpenAILanguageModel implements LanguageModel {
  async complete(request: CompletionRequest): Promise<string> {
    const { openai, model } = getAIClient(request.tier ?? 'planner');

    const response = await openai.chat.completions.create({
      model,
      messages: [
        { role: 'system', content: request.role },
        { role: 'user', content: request.instruction },
      ],
      ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
      temperature: request.temperature,
      max_tokens: request.maxTokens ?? 4000,
    });

    return response.choices[0]?.message?.content || '';
  }
}

// ============================================================================
// OUTPUT PARSING
// ============================================================================

/** Models occasionally wrap JSON in ```json fences despite JSON mode */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
}

export function parseModelJson<T>(raw: string, schema: ZodType<T, ZodTypeDef, unknown>): ParsedOutput<T> {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (error) {
    return { ok: false, error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    return { ok: false, error: `Unexpected shape at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'invalid'}` };
  }
  return { ok: true, data: parsed.data };
}
