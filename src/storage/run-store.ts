import { existsSync } from "fs";
import { readFile, writeFile, mkdir, readdir } from "fs/promises";
import { join } from "path";
import type { AggregateStats, BenchmarkRun } from "../types.js";

export const DEFAULT_DATA_DIR = join("data", "runs");

export interface ArchivedRun {
  run: BenchmarkRun;
  stats: AggregateStats;
  reportPath?: string;
}

function runDir(dataDir: string, runId: string): string {
  return join(dataDir, runId);
}

/**
 * Archive a finished run and its stats as `<dataDir>/<runId>/run.json`.
 */
export async function saveRun(archived: ArchivedRun, dataDir = DEFAULT_DATA_DIR): Promise<string> {
  const dir = runDir(dataDir, archived.run.id);
  if (!existsSync(dir)) {
    await mkdir(dir, { recursive: true });
  }

  const path = join(dir, "run.json");
  // Run records are write-once
  await writeFile(path, JSON.stringify(archived, null, 2), { flag: "wx" });
  return path;
}

/**
 * Load an archived run.
 */
export async function loadRun(runId: string, dataDir = DEFAULT_DATA_DIR): Promise<ArchivedRun> {
  const path = join(runDir(dataDir, runId), "run.json");
  if (!existsSync(path)) {
    throw new Error(`Run not found: ${runId}`);
  }

  const raw = await readFile(path, "utf-8");
  return JSON.parse(raw) as ArchivedRun;
}

/**
 * List archived run IDs, newest first. IDs start with the ISO start
 * time, so lexical order is chronological.
 */
export async function listRuns(dataDir = DEFAULT_DATA_DIR): Promise<string[]> {
  if (!existsSync(dataDir)) {
    return [];
  }

  const entries = await readdir(dataDir, { withFileTypes: true });
  return entries
    .filter((e) => e.isDirectory())
    .map((e) => e.name)
    .sort()
    .reverse();
}

/**
 * Load the most recent run, or null when nothing is archived.
 */
export async function loadLatestRun(dataDir = DEFAULT_DATA_DIR): Promise<ArchivedRun | null> {
  const runs = await listRuns(dataDir);
  if (runs.length === 0) return null;
  return loadRun(runs[0], dataDir);
}
