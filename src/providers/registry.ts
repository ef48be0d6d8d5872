import type { LanguageModel } from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { createVertex } from "@ai-sdk/google-vertex";
import { createVertexAnthropic } from "@ai-sdk/google-vertex/anthropic";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { getProviderMeta, fetchModelsDb, type ProviderMeta } from "./models.js";

// ── Types ───────────────────────────────────────────

interface SDK {
  languageModel(modelId: string): LanguageModel;
}

// Each factory has different option types; custom loaders are
// responsible for providing the correct shape.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type SDKFactory = (options?: any) => SDK;

interface CustomLoaderResult {
  options?: Record<string, unknown>;
}

// ── Bundled providers ───────────────────────────────
// npm package name (as listed by models.dev) → SDK factory.

const BUNDLED_PROVIDERS: Record<string, SDKFactory> = {
  "@ai-sdk/openai": createOpenAI,
  "@ai-sdk/anthropic": createAnthropic,
  "@ai-sdk/google": createGoogleGenerativeAI,
  "@ai-sdk/google-vertex": createVertex,
  "@ai-sdk/google-vertex/anthropic": createVertexAnthropic,
  "@ai-sdk/openai-compatible": createOpenAICompatible,
};

// ── Known provider packages ─────────────────────────
// Resolved without a models.dev lookup. Compatible endpoints map onto
// the openai-compatible package.

const PROVIDER_NPM: Record<string, string> = {
  openai: "@ai-sdk/openai",
  anthropic: "@ai-sdk/anthropic",
  google: "@ai-sdk/google",
  "google-vertex": "@ai-sdk/google-vertex",
  "google-vertex-anthropic": "@ai-sdk/google-vertex/anthropic",
  openrouter: "@ai-sdk/openai-compatible",
  ollama: "@ai-sdk/openai-compatible",
};

// ── Custom loaders ──────────────────────────────────

function vertexProject(): string | undefined {
  return process.env.GOOGLE_CLOUD_PROJECT ?? process.env.GCP_PROJECT ?? process.env.GCLOUD_PROJECT;
}

const CUSTOM_LOADERS: Partial<Record<string, (meta: ProviderMeta | null) => CustomLoaderResult>> = {
  "google-vertex": () => ({
    options: {
      project: vertexProject(),
      location: process.env.GOOGLE_CLOUD_LOCATION ?? process.env.VERTEX_LOCATION ?? "us-central1",
    },
  }),

  "google-vertex-anthropic": () => ({
    options: {
      project: vertexProject(),
      location: process.env.GOOGLE_CLOUD_LOCATION ?? process.env.VERTEX_LOCATION ?? "global",
    },
  }),

  openrouter: (meta) => ({
    options: {
      name: meta?.name ?? "openrouter",
      apiKey: process.env.OPENROUTER_API_KEY,
      baseURL: meta?.api ?? "https://openrouter.ai/api/v1",
    },
  }),

  ollama: (meta) => ({
    options: {
      name: meta?.name ?? "ollama",
      baseURL: process.env.OLLAMA_BASE_URL ?? meta?.api ?? "http://localhost:11434/v1",
    },
  }),
};

// ── SDK cache ───────────────────────────────────────
// Keyed by (npm + options) so one provider with different options gets
// separate instances.

const sdkCache = new Map<string, SDK>();

function getSDK(npm: string, options?: Record<string, unknown>): SDK {
  const key = JSON.stringify({ npm, options });
  const cached = sdkCache.get(key);
  if (cached) return cached;

  const factory = BUNDLED_PROVIDERS[npm];
  if (!factory) {
    throw new Error(
      `No bundled provider for npm package "${npm}". ` +
        `Known packages: ${Object.keys(BUNDLED_PROVIDERS).join(", ")}`,
    );
  }

  const sdk = factory(options);
  sdkCache.set(key, sdk);
  return sdk;
}

async function getProviderNpm(providerId: string): Promise<string> {
  const known = PROVIDER_NPM[providerId];
  if (known) return known;

  const db = await fetchModelsDb();
  const npm = db[providerId]?.npm;
  if (!npm) {
    throw new Error(`Unknown provider "${providerId}". Not found in models.dev database.`);
  }
  return npm;
}

// ── Model specs ─────────────────────────────────────

export interface ModelSpec {
  provider: string;
  model: string;
  registryId: string;
}

/**
 * Parse "provider:model". Everything after the first colon is the model
 * id, so ollama-style ids ("ollama:llama3.1:8b") survive intact.
 */
export function parseModelSpec(spec: string): ModelSpec {
  const colon = spec.indexOf(":");
  if (colon <= 0 || colon === spec.length - 1) {
    throw new Error(`Invalid model spec "${spec}". Expected format: provider:model`);
  }
  const provider = spec.slice(0, colon);
  const model = spec.slice(colon + 1);
  return { provider, model, registryId: `${provider}:${model}` };
}

/**
 * Accept bare model names ("gpt-4o") as shorthand for the openai provider.
 */
export function normalizeModelSpec(spec: string, defaultProvider = "openai"): string {
  const trimmed = spec.trim();
  if (!trimmed) throw new Error("Model spec must be non-empty");
  return trimmed.includes(":") ? parseModelSpec(trimmed).registryId : `${defaultProvider}:${trimmed}`;
}

/**
 * Resolve a spec like "anthropic:claude-sonnet-4-5" to an AI SDK model.
 */
export async function resolveModel(spec: string): Promise<LanguageModel> {
  const { provider, model } = parseModelSpec(spec);
  const npm = await getProviderNpm(provider);
  const loader = CUSTOM_LOADERS[provider];
  const meta = loader ? await getProviderMeta(provider).catch(() => null) : null;
  const sdk = getSDK(npm, loader?.(meta).options);
  return sdk.languageModel(model);
}
