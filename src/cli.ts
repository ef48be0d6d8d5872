import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { DEFAULT_CATEGORY, DEFAULT_MODEL, DEFAULT_STYLE } from "./config.js";

export interface RunArgs {
  category: string;
  style: string;
  controllers?: string[];
  model: string;
  output?: string;
  verbose: boolean;
  config?: string;
  concurrency?: number;
  maxRetries: number;
  initialDelay: number;
  backoff: number;
  timeout?: number;
  grace: number;
  logDir: string;
  archive: boolean;
}

export interface ResultsArgs {
  runId?: string;
  latest: boolean;
  format: "table" | "json";
}

export type Command =
  | { command: "run"; args: RunArgs }
  | { command: "results"; args: ResultsArgs };

export async function parseArgs(argv: string[] = hideBin(process.argv)): Promise<Command> {
  return new Promise((resolve, reject) => {
    yargs(argv)
      .scriptName("controller-bench")
      .usage("$0 [run] [options]")
      .command(
        ["run", "$0"],
        "Run every requested controller on one workload and write a comparison report",
        (y) =>
          y
            .option("category", {
              alias: "c",
              type: "string",
              default: DEFAULT_CATEGORY,
              describe: "Content category of the workload",
            })
            .option("style", {
              alias: "s",
              type: "string",
              default: DEFAULT_STYLE,
              describe: "Writing style of the workload",
            })
            .option("controllers", {
              type: "string",
              array: true,
              describe:
                "Controller types to compare, comma separated or repeated (default: all registered)",
            })
            .option("model", {
              alias: "m",
              type: "string",
              default: DEFAULT_MODEL,
              describe: "Model spec provider:model passed to every controller (bare names use openai)",
            })
            .option("output", {
              alias: "o",
              type: "string",
              describe: "Report path (default: benchmark_report_<timestamp>.md)",
            })
            .option("verbose", {
              alias: "v",
              type: "boolean",
              default: false,
              describe: "Print the head and tail of the report",
            })
            .option("config", {
              type: "string",
              describe: "Controller profile TOML (default: config/controllers.toml when present)",
            })
            .option("concurrency", {
              type: "number",
              describe: "Max controllers in flight (default: min(requested, 4))",
            })
            .option("max-retries", {
              type: "number",
              default: 3,
              describe: "Total attempts per controller (0 or 1 = a single attempt)",
            })
            .option("initial-delay", {
              type: "number",
              default: 1,
              describe: "Backoff before the second attempt, in seconds",
            })
            .option("backoff", {
              type: "number",
              default: 2,
              describe: "Backoff multiplier between attempts",
            })
            .option("timeout", {
              type: "number",
              describe: "Deadline for the whole run, in seconds",
            })
            .option("grace", {
              type: "number",
              default: 5,
              describe: "Seconds an in-flight attempt may finish after cancellation",
            })
            .option("log-dir", {
              type: "string",
              default: ".",
              describe: "Directory for the run log file",
            })
            .option("archive", {
              type: "boolean",
              default: true,
              describe: "Archive the run record under data/runs (use --no-archive to skip)",
            })
            .check((argv) => {
              const maxRetries = argv["max-retries"];
              if (maxRetries < 0 || !Number.isInteger(maxRetries)) {
                throw new Error("--max-retries must be a non-negative integer");
              }
              if (!(argv["initial-delay"] > 0)) throw new Error("--initial-delay must be positive");
              if (!(argv.backoff >= 1)) throw new Error("--backoff must be at least 1");
              if (argv.concurrency != null && !(argv.concurrency >= 1)) {
                throw new Error("--concurrency must be at least 1");
              }
              if (argv.timeout != null && !(argv.timeout > 0)) throw new Error("--timeout must be positive");
              if (!(argv.grace >= 0)) throw new Error("--grace must be non-negative");
              return true;
            }),
        (argv) => {
          resolve({
            command: "run",
            args: {
              category: argv.category,
              style: argv.style,
              controllers: argv.controllers,
              model: argv.model,
              output: argv.output,
              verbose: argv.verbose,
              config: argv.config,
              concurrency: argv.concurrency,
              maxRetries: argv.maxRetries,
              initialDelay: argv.initialDelay,
              backoff: argv.backoff,
              timeout: argv.timeout,
              grace: argv.grace,
              logDir: argv.logDir,
              archive: argv.archive,
            },
          });
        },
      )
      .command(
        "results [run-id]",
        "Show archived runs",
        (y) =>
          y
            .positional("run-id", {
              type: "string",
              describe: "Run ID to show",
            })
            .option("latest", {
              type: "boolean",
              default: false,
              describe: "Show the most recent run",
            })
            .option("format", {
              type: "string",
              choices: ["table", "json"] as const,
              default: "table" as const,
              describe: "Output format",
            }),
        (argv) => {
          resolve({
            command: "results",
            args: {
              runId: argv.runId,
              latest: argv.latest,
              format: argv.format,
            },
          });
        },
      )
      .strict()
      .help()
      .fail((msg, err) => {
        if (err) reject(err);
        else reject(new Error(msg));
      })
      .parse();
  });
}
