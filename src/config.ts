import { readFile } from "fs/promises";
import { join } from "path";
import { parse as parseTOML } from "smol-toml";
import { z } from "zod";
import { DEFAULT_CONCURRENCY_CAP, DEFAULT_GRACE_PERIOD_MS } from "./engine/orchestrator.js";
import { DEFAULT_RETRY_POLICY, validateRetryPolicy, type RetryPolicy } from "./engine/retry.js";
import { normalizeModelSpec } from "./providers/registry.js";
import type { AgentProfile, ControllerConfig, Workload } from "./types.js";

export const DEFAULT_MODEL = "openai:gpt-4o";
export const DEFAULT_CATEGORY = "AI";
export const DEFAULT_STYLE = "tech";
export const DEFAULT_CONFIG_PATH = join("config", "controllers.toml");

// ── Zod schemas for the controller profile TOML ────

const AgentSchema = z.object({
  role: z.string().min(1),
  goal: z.string().min(1),
  backstory: z.string().min(1),
});

const ProfileSchema = z.object({
  agents: z.array(AgentSchema).min(1).optional(),
  tools: z.array(z.string()).optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_output_tokens: z.number().int().positive().optional(),
});

const ProfilesTomlSchema = z.object({
  defaults: ProfileSchema.optional(),
  controllers: z.record(z.string(), ProfileSchema).optional(),
});

type ProfileToml = z.infer<typeof ProfileSchema>;

export interface ControllerProfile {
  agents?: AgentProfile[];
  tools?: string[];
  temperature?: number;
  maxOutputTokens?: number;
}

export interface ControllerProfiles {
  defaults: ControllerProfile;
  controllers: Record<string, ControllerProfile>;
}

/** Used when no profile file is given. */
export const DEFAULT_PROFILES: ControllerProfiles = {
  defaults: {
    agents: [
      {
        role: "Content Manager",
        goal: "Plan and deliver a publishable article that fits the requested category and style",
        backstory: "An editor-in-chief who coordinates researchers and writers on tight deadlines.",
      },
      {
        role: "Researcher",
        goal: "Gather accurate, current facts and angles for the topic",
        backstory: "A meticulous analyst who separates verified facts from speculation.",
      },
      {
        role: "Writer",
        goal: "Turn research into a clear, engaging article",
        backstory: "A versatile writer comfortable with technical and general audiences.",
      },
    ],
    tools: [],
  },
  controllers: {},
};

function fromToml(profile: ProfileToml | undefined): ControllerProfile {
  if (!profile) return {};
  return {
    agents: profile.agents,
    tools: profile.tools,
    temperature: profile.temperature,
    maxOutputTokens: profile.max_output_tokens,
  };
}

/**
 * Parse and validate controller profiles from TOML text.
 */
export function parseControllerProfiles(raw: string): ControllerProfiles {
  const validated = ProfilesTomlSchema.parse(parseTOML(raw));
  const controllers: Record<string, ControllerProfile> = {};
  for (const [type, profile] of Object.entries(validated.controllers ?? {})) {
    controllers[type] = fromToml(profile);
  }
  return { defaults: fromToml(validated.defaults), controllers };
}

/**
 * Load controller profiles from a TOML file.
 */
export async function loadControllerProfiles(path: string): Promise<ControllerProfiles> {
  const raw = await readFile(path, "utf-8");
  try {
    return parseControllerProfiles(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid controller profile file ${path}: ${reason}`, { cause: err });
  }
}

/**
 * Config lookup for the orchestrator: a controller's own profile
 * overrides the defaults field by field, and every controller uses
 * `model`. Falls back to the built-in agent roster.
 */
export function controllerConfigFor(
  profiles: ControllerProfiles,
  model: string,
): (typeId: string) => ControllerConfig {
  return (typeId) => {
    const own = profiles.controllers[typeId] ?? {};
    const defaults = profiles.defaults;
    return {
      model,
      agents: own.agents ?? defaults.agents ?? DEFAULT_PROFILES.defaults.agents ?? [],
      tools: own.tools ?? defaults.tools ?? [],
      temperature: own.temperature ?? defaults.temperature,
      maxOutputTokens: own.maxOutputTokens ?? defaults.maxOutputTokens,
    };
  };
}

/**
 * Split `--controllers` values ("a,b" and/or repeated flags) into ids.
 * Returns undefined when the flag was not given, so the caller can
 * default to every registered type.
 */
export function parseControllerList(values: string[] | undefined): string[] | undefined {
  if (values == null) return undefined;
  return values
    .flatMap((v) => v.split(","))
    .map((v) => v.trim())
    .filter((v) => v.length > 0);
}

// ── Benchmark config assembly ───────────────────────

export interface BenchmarkConfig {
  workload: Workload;
  controllerTypes?: string[];
  model: string;
  retryPolicy: RetryPolicy;
  concurrency: number;
  gracePeriodMs: number;
  deadlineMs?: number;
  outputPath?: string;
  verbose: boolean;
  archive: boolean;
  logDir: string;
}

/**
 * Assemble a complete BenchmarkConfig from CLI arguments. Durations
 * arrive in seconds and are stored in milliseconds.
 */
export function createBenchmarkConfig(opts: {
  category?: string;
  style?: string;
  controllers?: string[];
  model?: string;
  output?: string;
  verbose?: boolean;
  concurrency?: number;
  maxRetries?: number;
  initialDelay?: number;
  backoff?: number;
  timeout?: number;
  grace?: number;
  archive?: boolean;
  logDir?: string;
}): BenchmarkConfig {
  const retryPolicy = validateRetryPolicy({
    ...DEFAULT_RETRY_POLICY,
    maxRetries: opts.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    initialDelayMs:
      opts.initialDelay != null ? opts.initialDelay * 1000 : DEFAULT_RETRY_POLICY.initialDelayMs,
    backoffMultiplier: opts.backoff ?? DEFAULT_RETRY_POLICY.backoffMultiplier,
  });

  return {
    workload: {
      category: opts.category ?? DEFAULT_CATEGORY,
      style: opts.style ?? DEFAULT_STYLE,
    },
    controllerTypes: parseControllerList(opts.controllers),
    model: normalizeModelSpec(opts.model ?? DEFAULT_MODEL),
    retryPolicy,
    concurrency: opts.concurrency ?? DEFAULT_CONCURRENCY_CAP,
    gracePeriodMs: opts.grace != null ? opts.grace * 1000 : DEFAULT_GRACE_PERIOD_MS,
    deadlineMs: opts.timeout != null ? opts.timeout * 1000 : undefined,
    outputPath: opts.output,
    verbose: opts.verbose ?? false,
    archive: opts.archive ?? true,
    logDir: opts.logDir ?? ".",
  };
}
