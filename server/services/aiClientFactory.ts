/**
 * AI client factory: one OpenAI-compatible client per endpoint, a model per agent tier.
 *
 * Tiers:
 *   planner   – drafting and refining itineraries   → gpt-4o
 *   reviewer  – hotel review synthesis              → gpt-4o-mini
 *   lookup    – review embeddings                   → gpt-4o-mini
 *
 * Env var cascade:
 *   OPENAI_API_KEY    → primary
 *   DEEPSEEK_API_KEY  → fallback (deepseek-chat for every tier, no embeddings)
 *
 * Model env overrides: AI_PLANNER_MODEL, AI_REVIEWER_MODEL, AI_LOOKUP_MODEL
 */

import OpenAI from 'openai';

// ============================================================================
// TYPES
// ============================================================================

export const AI_TIERS = ['planner', 'reviewer', 'lookup'] as const;

export type AITier = (typeof AI_TIERS)[number];

export type AIProviderName = 'openai' | 'deepseek';

export interface AIClient {
  openai: OpenAI;
  model: string;
  provider: AIProviderName;
}

/** What /api/health and the startup log report; never carries the key */
export interface AIConfigSummary {
  provider: AIProviderName;
  models: Record<AITier, string>;
  embeddings: boolean;
}

// ============================================================================
// PROVIDERS
// ============================================================================

interface ProviderEndpoint {
  name: AIProviderName;
  apiKey: string;
  baseURL?: string;
  /** Used for every tier unless AI_<TIER>_MODEL overrides it */
  defaultModels: Record<AITier, string>;
}

const OPENAI_MODELS: Record<AITier, string> = {
  planner: 'gpt-4o',
  reviewer: 'gpt-4o-mini',
  lookup: 'gpt-4o-mini',
};

const DEEPSEEK_MODELS: Record<AITier, string> = {
  planner: 'deepseek-chat',
  reviewer: 'deepseek-chat',
  lookup: 'deepseek-chat',
};

function detectEndpoint(env: NodeJS.ProcessEnv = process.env): ProviderEndpoint | null {
  if (env.OPENAI_API_KEY) {
    return { name: 'openai', apiKey: env.OPENAI_API_KEY, defaultModels: OPENAI_MODELS };
  }
  if (env.DEEPSEEK_API_KEY) {
    return {
      name: 'deepseek',
      apiKey: env.DEEPSEEK_API_KEY,
      baseURL: 'https://api.deepseek.com',
      defaultModels: DEEPSEEK_MODELS,
    };
  }
  return null;
}

// One SDK instance per endpoint; tiers share it
const clients = new Map<AIProviderName, OpenAI>();

function clientFor(endpoint: ProviderEndpoint): OpenAI {
  let client = clients.get(endpoint.name);
  if (!client) {
    client = new OpenAI({ apiKey: endpoint.apiKey, baseURL: endpoint.baseURL });
    clients.set(endpoint.name, client);
  }
  return client;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/** Model for a tier, or null when no provider key is set. */
export function resolveModel(tier: AITier, env: NodeJS.ProcessEnv = process.env): string | null {
  const endpoint = detectEndpoint(env);
  if (!endpoint) return null;
  return env[`AI_${tier.toUpperCase()}_MODEL`] || endpoint.defaultModels[tier];
}

/**
 * OpenAI client + model for a tier.
 * Throws when no provider key is configured.
 */
export function getAIClient(tier: AITier = 'planner'): AIClient {
  const endpoint = detectEndpoint();
  const model = resolveModel(tier);
  if (!endpoint || !model) {
    throw new Error('[AIClientFactory] No AI API key configured. Set OPENAI_API_KEY or DEEPSEEK_API_KEY.');
  }
  return { openai: clientFor(endpoint), model, provider: endpoint.name };
}

export function isAIConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return detectEndpoint(env) !== null;
}

/** Review embeddings need the OpenAI endpoint; DeepSeek serves none. */
export function isEmbeddingConfigured(env: NodeJS.ProcessEnv = process.env): boolean {
  return detectEndpoint(env)?.name === 'openai';
}

export function describeAIConfig(env: NodeJS.ProcessEnv = process.env): AIConfigSummary | null {
  const endpoint = detectEndpoint(env);
  if (!endpoint) return null;

  const models = { ...endpoint.defaultModels };
  for (const tier of AI_TIERS) {
    models[tier] = resolveModel(tier, env) ?? models[tier];
  }
  return { provider: endpoint.name, models, embeddings: isEmbeddingConfigured(env) };
}

export function logAIConfig(env: NodeJS.ProcessEnv = process.env): void {
  const summary = describeAIConfig(env);
  if (!summary) {
    console.warn('[AIClientFactory] No AI provider configured; plan creation will answer 503');
    return;
  }
  const tiers = AI_TIERS.map((tier) => `${tier}=${summary.models[tier]}`).join(', ');
  console.log(`[AIClientFactory] ${summary.provider}: ${tiers}${summary.embeddings ? '' : ' (no embeddings)'}`);
}
