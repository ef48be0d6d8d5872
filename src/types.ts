// ── Workload ────────────────────────────────────────

/** What every controller in a run is asked to produce. */
export interface Workload {
  category: string;
  style: string;
}

// ── Controller config ───────────────────────────────

export interface AgentProfile {
  role: string;
  goal: string;
  backstory: string;
}

export interface ControllerConfig {
  model: string; // "provider:model" spec passed to resolveModel()
  agents: readonly AgentProfile[];
  tools: readonly string[];
  temperature?: number;
  maxOutputTokens?: number;
}

// ── Errors ──────────────────────────────────────────

export type ErrorKind = "transient" | "permanent" | "resolution" | "cancelled";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "transient",
  "permanent",
  "resolution",
  "cancelled",
];

export interface ErrorDetail {
  kind: ErrorKind;
  name: string;
  message: string;
  statusCode?: number;
  stack?: string;
}

// ── Results ─────────────────────────────────────────

export interface ControllerSuccess {
  controllerType: string;
  success: true;
  content: string;
  elapsedMs: number;
  attempts: number;
  error?: undefined;
}

export interface ControllerFailure {
  controllerType: string;
  success: false;
  content: "";
  elapsedMs: number;
  attempts: number;
  error: ErrorDetail;
}

export type ControllerResult = ControllerSuccess | ControllerFailure;

/**
 * One execution of a workload across a set of controllers.
 * `results[i]` always belongs to `requestedControllerTypes[i]`.
 */
export interface BenchmarkRun {
  readonly id: string;
  readonly category: string;
  readonly style: string;
  readonly model: string;
  readonly requestedControllerTypes: readonly string[];
  readonly results: readonly ControllerResult[];
  readonly startedAt: string; // ISO timestamp
  readonly finishedAt: string;
  readonly durationMs: number;
}

// ── Metrics ─────────────────────────────────────────

export interface LatencyStats {
  minMs: number;
  medianMs: number;
  maxMs: number;
}

export interface ControllerBreakdown {
  controllerType: string;
  success: boolean;
  elapsedMs: number;
  attempts: number;
  contentLength: number;
  errorKind?: ErrorKind;
}

export interface AggregateStats {
  total: number;
  successes: number;
  failures: number;
  successRate: number; // 0..1, 0 for an empty run
  meanElapsedMs: number | null; // successful results only
  latency: LatencyStats | null;
  failuresByKind: Record<ErrorKind, number>;
  perController: ControllerBreakdown[];
}

// ── Report ──────────────────────────────────────────

export interface Report {
  markdown: string;
  filePath: string;
}

// ── Events ──────────────────────────────────────────

export type BenchmarkEvent =
  | { type: "run_start"; runId: string; controllerTypes: readonly string[]; workload: Workload }
  | { type: "controller_start"; runId: string; index: number; controllerType: string }
  | {
      type: "attempt_failed";
      runId: string;
      index: number;
      controllerType: string;
      attempt: number;
      delayMs: number;
      message: string;
    }
  | { type: "controller_done"; runId: string; index: number; result: ControllerResult }
  | { type: "run_done"; run: BenchmarkRun };
