import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync } from "fs";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import type { RunArgs } from "./cli.js";
import { handleResults, handleRun } from "./commands.js";
import type { TextGenerator } from "./providers/generate.js";
import { listRuns, loadLatestRun } from "./storage/run-store.js";

let dir: string;
let stdout: string[];

function runArgs(overrides: Partial<RunArgs> = {}): RunArgs {
  return {
    category: "AI",
    style: "tech",
    controllers: ["custom_sequential"],
    model: "openai:gpt-4o",
    output: join(dir, "report.md"),
    verbose: false,
    maxRetries: 1,
    initialDelay: 0.01,
    backoff: 2,
    grace: 0,
    logDir: join(dir, "logs"),
    archive: true,
    ...overrides,
  };
}

async function readRunLog(): Promise<string> {
  const files = await readdir(join(dir, "logs"));
  expect(files).toHaveLength(1);
  return readFile(join(dir, "logs", files[0]), "utf-8");
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "commands-test-"));
  stdout = [];
  vi.spyOn(console, "log").mockImplementation((...parts: unknown[]) => {
    stdout.push(parts.map(String).join(" "));
  });
  vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(dir, { recursive: true, force: true });
});

// ── handleRun ───────────────────────────────────────

describe("handleRun", () => {
  it("writes the report, archives the run and exits 0", async () => {
    const generator = vi.fn<TextGenerator>(async () => "Article text");
    const dataDir = join(dir, "runs");

    const code = await handleRun(runArgs(), { generator, dataDir });

    expect(code).toBe(0);
    expect(generator).toHaveBeenCalledTimes(4);
    expect(existsSync(join(dir, "report.md"))).toBe(true);
    const archived = await loadLatestRun(dataDir);
    expect(archived?.reportPath).toBe(join(dir, "report.md"));
    expect(archived?.run.results.map((r) => [r.controllerType, r.success, r.content])).toEqual([
      ["custom_sequential", true, "Article text"],
    ]);
    expect(stdout).toContain("Success rate: 100.0% (1/1)");
  });

  it("exits 1 with cancelled results when interrupted", async () => {
    const generator = vi.fn<TextGenerator>(async () => "Article text");
    const dataDir = join(dir, "runs");
    const interrupt = new AbortController();
    interrupt.abort();

    const code = await handleRun(runArgs(), { generator, interrupt: interrupt.signal, dataDir });

    expect(code).toBe(1);
    expect(generator).not.toHaveBeenCalled();
    const archived = await loadLatestRun(dataDir);
    expect(archived?.run.results[0].error?.kind).toBe("cancelled");
    expect(await readRunLog()).toContain(" - bench - WARN - Interrupted, cancelling run");
  });

  it("exits 1 but still archives the run when the report cannot be written", async () => {
    // A regular file where the report's directory should be
    const blocker = join(dir, "blocker");
    await writeFile(blocker, "");
    const output = join(blocker, "report.md");
    const dataDir = join(dir, "runs");

    const code = await handleRun(runArgs({ output }), { generator: async () => "Article text", dataDir });

    expect(code).toBe(1);
    expect(await listRuns(dataDir)).toHaveLength(1);
    const archived = await loadLatestRun(dataDir);
    expect(archived?.reportPath).toBe(output);
    expect(archived?.run.results[0].success).toBe(true);
    expect(await readRunLog()).toContain(` - bench - ERROR - Failed to write report to ${output}: `);
  });

  it("records a failure to start in the run log", async () => {
    const dataDir = join(dir, "runs");

    const code = await handleRun(runArgs({ config: join(dir, "missing.toml") }), {
      generator: async () => "Article text",
      dataDir,
    });

    expect(code).toBe(1);
    expect(await readRunLog()).toContain(" - bench - ERROR - Benchmark failed: ENOENT");
    expect(await listRuns(dataDir)).toEqual([]);
  });
});

// ── handleResults ───────────────────────────────────

describe("handleResults", () => {
  it("reports when nothing is archived", async () => {
    expect(await handleResults({ latest: true, format: "table" }, join(dir, "runs"))).toBe(0);
    expect(stdout).toEqual(["No runs found."]);
  });

  it("prints the latest archived run as JSON", async () => {
    const dataDir = join(dir, "runs");
    await handleRun(runArgs(), { generator: async () => "Article text", dataDir });
    stdout = [];

    expect(await handleResults({ latest: true, format: "json" }, dataDir)).toBe(0);
    expect(stdout).toEqual([JSON.stringify(await loadLatestRun(dataDir), null, 2)]);
  });
});
