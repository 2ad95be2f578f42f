/**
 * Model provider configuration
 *
 * Every provider speaks the OpenAI-compatible API, so a single SDK client covers
 * them all; only the key, base URL and model name change.
 *
 * Generation defaults to OpenAI gpt-4o-mini. Embeddings default to
 * text-embedding-3-small, whose 1536-dimension vectors match the pgvector column
 * in supabase/migrations.
 */

import OpenAI from "openai";
import { ConfigError } from "./errors";

export type ModelProvider = "openai" | "groq" | "deepinfra" | "fireworksai";
export type ModelRole = "generation" | "embedding";

export interface ModelConfig {
  apiKey: string;
  baseURL: string;
  model: string;
  provider: ModelProvider;
}

const PROVIDERS: readonly ModelProvider[] = ["openai", "groq", "deepinfra", "fireworksai"];

const PROVIDER_ENDPOINTS: Record<ModelProvider, { baseURL: string; apiKeyEnv: string }> = {
  openai: { baseURL: "https://api.openai.com/v1", apiKeyEnv: "OPENAI_API_KEY" },
  groq: { baseURL: "https://api.groq.com/openai/v1", apiKeyEnv: "GROQ_API_KEY" },
  deepinfra: { baseURL: "https://api.deepinfra.com/v1/openai", apiKeyEnv: "DEEPINFRA_API_KEY" },
  fireworksai: { baseURL: "https://api.fireworks.ai/inference/v1", apiKeyEnv: "FIREWORKSAI_API_KEY" },
};

// groq serves no embedding model, so TUTOR_EMBEDDING_MODEL must name one there
const DEFAULT_MODELS: Record<ModelRole, Partial<Record<ModelProvider, string>>> = {
  generation: {
    openai: "gpt-4o-mini",
    groq: "openai/gpt-oss-20b", // Groq uses openai/ prefix
    deepinfra: "openai/gpt-oss-120b",
    fireworksai: "accounts/fireworks/models/gpt-oss-120b",
  },
  embedding: {
    openai: "text-embedding-3-small",
    deepinfra: "BAAI/bge-large-en-v1.5",
    fireworksai: "nomic-ai/nomic-embed-text-v1.5",
  },
};

function readProvider(value: string | undefined): ModelProvider {
  const trimmed = value?.trim().toLowerCase();
  if (!trimmed) return "openai";
  const provider = PROVIDERS.find((candidate) => candidate === trimmed);
  if (!provider) {
    throw new ConfigError(`Unknown model provider "${value}"`, `Expected one of ${PROVIDERS.join(", ")}`);
  }
  return provider;
}

/**
 * Resolve the provider, endpoint and model for one role from TUTOR_GENERATION_* /
 * TUTOR_EMBEDDING_* variables. TUTOR_*_BASE_URL points either role at a
 * self-hosted OpenAI-compatible gateway.
 */
export function getModelConfig(role: ModelRole, env: NodeJS.ProcessEnv = process.env): ModelConfig {
  const prefix = role === "generation" ? "TUTOR_GENERATION" : "TUTOR_EMBEDDING";
  const provider = readProvider(env[`${prefix}_PROVIDER`]);
  const endpoint = PROVIDER_ENDPOINTS[provider];
  const model = env[`${prefix}_MODEL`]?.trim() || DEFAULT_MODELS[role][provider];
  if (!model) {
    throw new ConfigError(`No default ${role} model for provider ${provider}`, `Set ${prefix}_MODEL`);
  }
  return {
    apiKey: env[endpoint.apiKeyEnv] || "",
    baseURL: env[`${prefix}_BASE_URL`]?.trim() || endpoint.baseURL,
    model,
    provider,
  };
}

/**
 * Create an OpenAI-compatible client for one role. SDK-level retries are off:
 * the engine applies its own timeout and backoff around every call.
 */
export function createModelClient(role: ModelRole, env: NodeJS.ProcessEnv = process.env) {
  const config = getModelConfig(role, env);
  if (!config.apiKey) {
    throw new ConfigError(
      `Missing API key for the ${role} model`,
      `Set ${PROVIDER_ENDPOINTS[config.provider].apiKeyEnv}`
    );
  }

  return {
    client: new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      maxRetries: 0,
    }),
    model: config.model,
    provider: config.provider,
    config,
  };
}
