import { existsSync } from "fs";
import { readFile, writeFile, mkdir } from "fs/promises";
import { join } from "path";

const MODELS_API_URL = "https://models.dev/api.json";
const CACHE_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours

function cacheFile(): string {
  return join(process.cwd(), "data", "models-cache.json");
}

interface ModelsDevProvider {
  id: string;
  name: string;
  api?: string; // Base URL for API calls
  env?: string[]; // Required environment variables
  npm?: string;
}

export type ModelsDb = Record<string, ModelsDevProvider>;

let cachedDb: ModelsDb | null = null;

async function readCache(): Promise<{ timestamp: number; data: ModelsDb } | null> {
  const path = cacheFile();
  if (!existsSync(path)) return null;
  const raw = await readFile(path, "utf-8");
  return JSON.parse(raw) as { timestamp: number; data: ModelsDb };
}

/**
 * Fetch the models.dev provider database, using a local cache when
 * available and falling back to a stale cache when offline.
 */
export async function fetchModelsDb(): Promise<ModelsDb> {
  if (cachedDb) return cachedDb;

  const cached = await readCache().catch(() => null);
  if (cached && Date.now() - cached.timestamp < CACHE_TTL_MS) {
    cachedDb = cached.data;
    return cachedDb;
  }

  try {
    const response = await fetch(MODELS_API_URL);
    if (!response.ok) {
      throw new Error(`Failed to fetch models.dev: ${response.status}`);
    }
    const data = (await response.json()) as ModelsDb;
    cachedDb = data;

    const dir = join(process.cwd(), "data");
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    await writeFile(cacheFile(), JSON.stringify({ timestamp: Date.now(), data }, null, 2));
    return data;
  } catch (error) {
    if (cached) {
      cachedDb = cached.data;
      return cachedDb;
    }
    throw error;
  }
}

export interface ProviderMeta {
  name: string;
  api?: string;
  npm?: string;
  env?: string[];
}

/**
 * Look up provider metadata from the models.dev database.
 */
export async function getProviderMeta(providerId: string): Promise<ProviderMeta | null> {
  const db = await fetchModelsDb();
  const p = db[providerId];
  if (!p) return null;
  return { name: p.name, api: p.api, npm: p.npm, env: p.env };
}

/** Env vars the common providers read, so checks work offline. */
const KNOWN_PROVIDER_ENV: Record<string, string[]> = {
  openai: ["OPENAI_API_KEY"],
  anthropic: ["ANTHROPIC_API_KEY"],
  google: ["GOOGLE_GENERATIVE_AI_API_KEY"],
  openrouter: ["OPENROUTER_API_KEY"],
};

/**
 * Warnings for providers whose credentials are missing from the
 * environment. Uses models.dev when the provider is not a known one and
 * stays silent if metadata cannot be loaded.
 */
export async function checkProviderEnv(
  providers: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<string[]> {
  const warnings: string[] = [];
  for (const provider of providers) {
    let required = KNOWN_PROVIDER_ENV[provider];
    if (!required) {
      const meta = await getProviderMeta(provider).catch(() => null);
      required = meta?.env ?? [];
    }
    if (required.length > 0 && !required.some((name) => env[name])) {
      warnings.push(`${provider}: none of ${required.join(", ")} is set`);
    }
  }
  return warnings;
}
