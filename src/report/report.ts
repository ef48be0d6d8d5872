import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import { ReportWriteError } from "../engine/errors.js";
import { ERROR_KINDS, type AggregateStats, type BenchmarkRun, type ControllerResult, type Report } from "../types.js";

/** Max characters of content shown in the results table. */
export const PREVIEW_LENGTH = 80;

/** Max characters of content shown per controller in the Content section. */
export const EXCERPT_LENGTH = 200;

export interface RenderOptions {
  /** Human label for a controller type; defaults to the id. */
  describe?: (controllerType: string) => string;
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** `YYYYMMDD_HHMMSS` in local time, used for default file names. */
export function timestampSlug(date: Date): string {
  return (
    `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}_` +
    `${pad2(date.getHours())}${pad2(date.getMinutes())}${pad2(date.getSeconds())}`
  );
}

export function defaultReportPath(run: BenchmarkRun): string {
  return `benchmark_report_${timestampSlug(new Date(run.startedAt))}.md`;
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(2)}s`;
}

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/** Single-line, pipe-safe table cell. */
export function preview(text: string, max = PREVIEW_LENGTH): string {
  return truncate(text.replace(/\s+/g, " ").trim(), max).replace(/\|/g, "\\|");
}

function resultCell(r: ControllerResult): string {
  return r.success ? preview(r.content) : preview(`${r.error.kind}: ${r.error.message}`);
}

/**
 * Render a run and its stats as Markdown. Section order is fixed:
 * header, controllers, results table, content excerpts, summary.
 */
export function renderReport(run: BenchmarkRun, stats: AggregateStats, options: RenderOptions = {}): string {
  const describe = options.describe ?? ((t: string) => t);
  const lines: string[] = [];

  lines.push("# Controller Benchmark Report", "");
  lines.push(`- Run ID: ${run.id}`);
  lines.push(`- Category: ${run.category}`);
  lines.push(`- Style: ${run.style}`);
  lines.push(`- Model: ${run.model}`);
  lines.push(`- Started: ${run.startedAt}`);
  lines.push(`- Finished: ${run.finishedAt}`);
  lines.push(`- Duration: ${seconds(run.durationMs)}`);

  lines.push("", "## Controllers", "");
  run.requestedControllerTypes.forEach((type, i) => {
    const label = describe(type);
    lines.push(label === type ? `${i + 1}. ${type}` : `${i + 1}. ${type}: ${label}`);
  });

  lines.push("", "## Results", "");
  lines.push("| # | Controller | Status | Elapsed | Attempts | Preview |");
  lines.push("| --- | --- | --- | --- | --- | --- |");
  run.results.forEach((r, i) => {
    const status = r.success ? "OK" : "FAILED";
    lines.push(`| ${i + 1} | ${r.controllerType} | ${status} | ${seconds(r.elapsedMs)} | ${r.attempts} | ${resultCell(r)} |`);
  });

  lines.push("", "## Content");
  const succeeded = run.results
    .map((r, i) => ({ r, i }))
    .filter(({ r }) => r.success);
  if (succeeded.length === 0) {
    lines.push("", "_No controller produced content._");
  }
  for (const { r, i } of succeeded) {
    const excerpt = truncate(r.content.trim(), EXCERPT_LENGTH).replace(/```/g, "'''");
    lines.push("", `### ${i + 1}. ${r.controllerType}`, "", `Length: ${r.content.length} characters`, "", "```", excerpt, "```");
  }

  lines.push("", "## Summary", "");
  lines.push(`- Controllers: ${stats.total}`);
  lines.push(`- Succeeded: ${stats.successes}`);
  lines.push(`- Failed: ${stats.failures}`);
  lines.push(`- Success rate: ${(stats.successRate * 100).toFixed(1)}%`);
  lines.push(`- Mean elapsed (successful): ${stats.meanElapsedMs == null ? "n/a" : seconds(stats.meanElapsedMs)}`);
  lines.push(
    `- Latency min / median / max: ${
      stats.latency == null
        ? "n/a"
        : `${seconds(stats.latency.minMs)} / ${seconds(stats.latency.medianMs)} / ${seconds(stats.latency.maxMs)}`
    }`,
  );
  lines.push(`- Failures by kind: ${ERROR_KINDS.map((k) => `${k} ${stats.failuresByKind[k]}`).join(", ")}`);

  return lines.join("\n") + "\n";
}

/**
 * Render and persist a report. The file goes to `outputPath`, or a
 * timestamped default in the working directory; an existing file is
 * never overwritten. If writing fails the ReportWriteError still carries
 * the rendered text.
 */
export async function generateReport(
  run: BenchmarkRun,
  stats: AggregateStats,
  outputPath?: string,
  options: RenderOptions = {},
): Promise<Report> {
  const markdown = renderReport(run, stats, options);
  const filePath = outputPath ?? defaultReportPath(run);

  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, markdown, { encoding: "utf-8", flag: "wx" });
  } catch (cause) {
    throw new ReportWriteError({ markdown, filePath }, { cause });
  }

  return { markdown, filePath };
}

/**
 * First 10 lines of a report and, for reports over 20 lines, the last 10.
 */
export function reportHeadTail(markdown: string): string {
  const lines = markdown.replace(/\n$/, "").split("\n");
  const head = lines.slice(0, 10).join("\n");
  if (lines.length <= 20) return head;
  return `${head}\n...\n${lines.slice(-10).join("\n")}`;
}
