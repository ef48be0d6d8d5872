import { existsSync } from "fs";
import { join } from "path";
import type { ResultsArgs, RunArgs } from "./cli.js";
import {
  DEFAULT_CONFIG_PATH,
  DEFAULT_PROFILES,
  controllerConfigFor,
  createBenchmarkConfig,
  loadControllerProfiles,
} from "./config.js";
import { createDefaultRegistry } from "./controllers/index.js";
import { CancelledError, ReportWriteError } from "./engine/errors.js";
import { aggregate } from "./engine/metrics.js";
import { BenchmarkOrchestrator } from "./engine/orchestrator.js";
import { consoleSink, createLogger, fileSink } from "./logging/logger.js";
import { createAiTextGenerator, type TextGenerator } from "./providers/generate.js";
import { checkProviderEnv } from "./providers/models.js";
import { parseModelSpec } from "./providers/registry.js";
import { generateReport, reportHeadTail, timestampSlug } from "./report/report.js";
import { DEFAULT_DATA_DIR, loadLatestRun, loadRun, saveRun, type ArchivedRun } from "./storage/run-store.js";
import type { Report } from "./types.js";

export interface RunDeps {
  /** Defaults to the AI SDK generator. */
  generator?: TextGenerator;
  /** Aborting it has the same effect as the first Ctrl+C. */
  interrupt?: AbortSignal;
  dataDir?: string;
}

/**
 * Execute one benchmark run end to end. Resolves to the process exit
 * code: 1 when interrupted, when the report could not be written, or
 * when the run could not be carried out at all.
 */
export async function handleRun(args: RunArgs, deps: RunDeps = {}): Promise<number> {
  const config = createBenchmarkConfig(args);
  const logFile = fileSink(join(config.logDir, `benchmark_${timestampSlug(new Date())}.log`));
  const logger = createLogger({ scope: "bench", sinks: [consoleSink(), logFile.sink] });

  // First Ctrl+C cancels the run gracefully, the second exits at once
  const abort = new AbortController();
  let interrupted = false;
  const onInterrupt = () => {
    if (interrupted) process.exit(1);
    interrupted = true;
    logger.warn("Interrupted, cancelling run (press Ctrl+C again to exit immediately)");
    abort.abort(new CancelledError("Interrupted by user"));
  };
  process.on("SIGINT", onInterrupt);
  if (deps.interrupt?.aborted) onInterrupt();
  else deps.interrupt?.addEventListener("abort", onInterrupt, { once: true });

  try {
    const profilesPath = args.config ?? (existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : undefined);
    const profiles = profilesPath ? await loadControllerProfiles(profilesPath) : DEFAULT_PROFILES;

    for (const warning of await checkProviderEnv([parseModelSpec(config.model).provider])) {
      logger.warn(`Missing credentials: ${warning}`);
    }

    const registry = createDefaultRegistry(deps.generator ?? createAiTextGenerator());
    const orchestrator = new BenchmarkOrchestrator({
      registry,
      controllerConfig: controllerConfigFor(profiles, config.model),
      retryPolicy: config.retryPolicy,
      concurrency: config.concurrency,
      gracePeriodMs: config.gracePeriodMs,
      logger,
    });

    const requested = config.controllerTypes ?? registry.types();
    logger.info(`Initializing controllers: ${requested.join(", ") || "(none)"}`);
    const init = orchestrator.initializeControllers(requested);
    for (const failure of init.failures) {
      logger.warn(`Controller ${failure.controllerType} will be reported as failed: ${failure.message}`);
    }

    const { category, style } = config.workload;
    const run = await orchestrator.runBenchmark(category, style, requested, {
      signal: abort.signal,
      deadlineMs: config.deadlineMs,
    });
    const stats = aggregate(run);

    let exitCode = interrupted ? 1 : 0;
    let report: Report;
    try {
      report = await generateReport(run, stats, config.outputPath, {
        describe: (type) => registry.describe(type),
      });
      logger.info(`Benchmark complete, report saved to: ${report.filePath}`);
    } catch (err) {
      if (!(err instanceof ReportWriteError)) throw err;
      logger.error(err.message);
      report = err.report;
      exitCode = 1;
    }

    if (config.archive) {
      const path = await saveRun({ run, stats, reportPath: report.filePath }, deps.dataDir);
      logger.info(`Run archived to: ${path}`);
    }

    console.log(`\nRun: ${run.id}`);
    console.log(`Duration: ${(run.durationMs / 1000).toFixed(1)}s`);
    console.log(`Success rate: ${(stats.successRate * 100).toFixed(1)}% (${stats.successes}/${stats.total})`);
    for (const r of run.results) {
      const status = r.success ? "ok" : `failed (${r.error.kind}: ${r.error.message})`;
      console.log(`  ${r.controllerType.padEnd(20)} ${(r.elapsedMs / 1000).toFixed(2).padStart(8)}s  ${status}`);
    }

    if (config.verbose) {
      console.log("\n" + "=".repeat(50));
      console.log("Report overview:");
      console.log("=".repeat(50));
      console.log(reportHeadTail(report.markdown));
      console.log(`\nFull report: ${report.filePath}`);
    }

    return exitCode;
  } catch (err) {
    logger.error(`Benchmark failed: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  } finally {
    process.off("SIGINT", onInterrupt);
    deps.interrupt?.removeEventListener("abort", onInterrupt);
    await logFile.close();
  }
}

function printRunTable(archived: ArchivedRun): void {
  const { run, stats } = archived;
  console.log(`\nRun: ${run.id}`);
  console.log(`Workload: ${run.category} / ${run.style}`);
  console.log(`Model: ${run.model}`);
  console.log(`Duration: ${(run.durationMs / 1000).toFixed(1)}s`);
  if (archived.reportPath) console.log(`Report: ${archived.reportPath}`);

  console.log("─".repeat(60));
  console.log(`${"#".padEnd(4)}${"Controller".padEnd(24)}${"Status".padEnd(10)}${"Elapsed".padStart(10)}${"Tries".padStart(7)}`);
  console.log("─".repeat(60));
  run.results.forEach((r, i) => {
    const status = r.success ? "OK" : r.error.kind.toUpperCase();
    console.log(
      `${String(i + 1).padEnd(4)}${r.controllerType.padEnd(24)}${status.padEnd(10)}${`${(r.elapsedMs / 1000).toFixed(2)}s`.padStart(10)}${String(r.attempts).padStart(7)}`,
    );
  });
  console.log("─".repeat(60));
  console.log(`Success rate: ${(stats.successRate * 100).toFixed(1)}%`);
}

export async function handleResults(args: ResultsArgs, dataDir = DEFAULT_DATA_DIR): Promise<number> {
  let archived: ArchivedRun | null;
  if (args.runId && !args.latest) {
    archived = await loadRun(args.runId, dataDir);
  } else {
    archived = await loadLatestRun(dataDir);
  }
  if (!archived) {
    console.log("No runs found.");
    return 0;
  }

  if (args.format === "json") {
    console.log(JSON.stringify(archived, null, 2));
  } else {
    printRunTable(archived);
  }
  return 0;
}
