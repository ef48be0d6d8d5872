import { nanoid } from "nanoid";
import type { ControllerRegistry } from "../controllers/registry.js";
import type { Controller } from "../controllers/types.js";
import { silentLogger, type Logger } from "../logging/logger.js";
import type {
  BenchmarkEvent,
  BenchmarkRun,
  ControllerConfig,
  ControllerFailure,
  ControllerResult,
  ErrorDetail,
} from "../types.js";
import { CancelledError, ResolutionError, RunStructureError, toErrorDetail } from "./errors.js";
import {
  DEFAULT_RETRY_POLICY,
  invoke,
  validateRetryPolicy,
  type RetryOutcome,
  type RetryPolicy,
  type Sleep,
} from "./retry.js";
import { settledPool } from "./scheduler.js";

type EventHandler = (event: BenchmarkEvent) => void;

/** Upper bound on controllers in flight when no concurrency is given. */
export const DEFAULT_CONCURRENCY_CAP = 4;

/** Time an in-flight attempt gets to settle after cancellation. */
export const DEFAULT_GRACE_PERIOD_MS = 5_000;

export interface OrchestratorOptions {
  registry: ControllerRegistry;
  /** Configuration handed to a controller factory for a type id. */
  controllerConfig: (typeId: string) => ControllerConfig;
  retryPolicy?: RetryPolicy;
  concurrency?: number;
  gracePeriodMs?: number;
  logger?: Logger;
  /** Millisecond clock used for timestamps and elapsed times. */
  now?: () => number;
  sleep?: Sleep;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Abort the run after this many milliseconds. */
  deadlineMs?: number;
}

export interface InitializationReport {
  initialized: string[];
  failures: ResolutionError[];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

function failure(
  controllerType: string,
  error: ErrorDetail,
  elapsedMs: number,
  attempts: number,
): ControllerFailure {
  return { controllerType, success: false, content: "", elapsedMs, attempts, error };
}

/**
 * Combine the caller's signal and an optional deadline into one signal.
 */
function linkSignals(
  signal: AbortSignal | undefined,
  deadlineMs: number | undefined,
): { signal?: AbortSignal; dispose: () => void } {
  if (!signal && deadlineMs == null) return { signal: undefined, dispose: () => undefined };

  const linked = new AbortController();
  const forward = () => linked.abort(signal?.reason);
  if (signal?.aborted) forward();
  else signal?.addEventListener("abort", forward, { once: true });

  const timer =
    deadlineMs != null
      ? setTimeout(() => linked.abort(new CancelledError(`Run deadline of ${deadlineMs}ms exceeded`)), deadlineMs)
      : undefined;

  return {
    signal: linked.signal,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forward);
    },
  };
}

/**
 * Drives a set of controllers through the same workload.
 *
 * Controllers run in a bounded pool, each behind the retry invoker.
 * Results are written by request index, so `run.results[i]` always
 * belongs to the i-th requested type regardless of completion order.
 * A failing or unresolvable controller yields a failed result; only a
 * run with nothing to execute throws (RunStructureError).
 */
export class BenchmarkOrchestrator {
  private handlers: EventHandler[] = [];
  private controllers = new Map<string, Controller>();
  // One outstanding call per controller instance
  private lanes = new Map<Controller, Promise<void>>();
  // Ids of the last initializeControllers() request, failures included
  private initRequest?: string[];

  private registry: ControllerRegistry;
  private controllerConfig: (typeId: string) => ControllerConfig;
  private retryPolicy: RetryPolicy;
  private concurrency: number;
  private gracePeriodMs: number;
  private logger: Logger;
  private now: () => number;
  private sleep?: Sleep;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry.seal();
    this.controllerConfig = options.controllerConfig;
    this.retryPolicy = validateRetryPolicy(options.retryPolicy ?? { ...DEFAULT_RETRY_POLICY });
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY_CAP));
    this.gracePeriodMs = Math.max(0, options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS);
    this.logger = (options.logger ?? silentLogger).child("orchestrator");
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep;
  }

  on(handler: EventHandler): void {
    this.handlers.push(handler);
  }

  private emit(event: BenchmarkEvent): void {
    for (const h of this.handlers) {
      try {
        h(event);
      } catch (err) {
        // A listener fault must not change any controller's result
        this.logger.error(`Event handler failed on ${event.type}: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
  }

  /** Type ids with a live controller instance, in initialization order. */
  initializedTypes(): string[] {
    return [...this.controllers.keys()];
  }

  /**
   * Build controllers for `typeIds` (default: every registered type).
   * Resolution failures are returned, never thrown.
   */
  initializeControllers(typeIds?: readonly string[]): InitializationReport {
    const ids = [...new Set(typeIds ?? this.registry.types())];
    this.initRequest = ids;
    return this.resolveControllers(ids);
  }

  private resolveControllers(ids: readonly string[]): InitializationReport {
    const report: InitializationReport = { initialized: [], failures: [] };

    for (const typeId of ids) {
      if (this.controllers.has(typeId)) {
        report.initialized.push(typeId);
        continue;
      }

      this.logger.info(`Initializing controller: ${this.registry.describe(typeId)}`, { type: typeId });
      const resolution = this.registry.resolve(typeId, this.controllerConfig(typeId));
      if (resolution.ok) {
        this.controllers.set(typeId, resolution.controller);
        report.initialized.push(typeId);
      } else {
        this.logger.warn(resolution.error.message, { type: typeId, reason: resolution.error.reason });
        report.failures.push(resolution.error);
      }
    }

    return report;
  }

  /**
   * Run every requested controller against (category, style).
   *
   * Without `typeIds` the ids of the last initializeControllers() call
   * are used, including those that failed to resolve, or every
   * registered type when nothing has been initialized yet.
   */
  async runBenchmark(
    category: string,
    style: string,
    typeIds?: readonly string[],
    options: RunOptions = {},
  ): Promise<BenchmarkRun> {
    const requested = [...(typeIds ?? this.initRequest ?? this.registry.types())];
    if (requested.length === 0) {
      throw new RunStructureError("No controller types requested for the run");
    }

    const resolutionErrors = new Map<string, ResolutionError>();
    const missing = requested.filter((id) => !this.controllers.has(id));
    if (missing.length > 0) {
      for (const err of this.resolveControllers([...new Set(missing)]).failures) {
        resolutionErrors.set(err.controllerType, err);
      }
    }
    if (!requested.some((id) => this.controllers.has(id))) {
      throw new RunStructureError(
        `None of the requested controller types could be resolved: ${requested.join(", ")}`,
      );
    }

    const startMs = this.now();
    const startedAt = new Date(startMs).toISOString();
    const runId = `${startedAt.replace(/[:.]/g, "-")}-${nanoid(6)}`;
    const model = this.controllerConfig(requested[0]).model;

    this.emit({ type: "run_start", runId, controllerTypes: requested, workload: { category, style } });
    this.logger.info(`Starting benchmark: category=${category}, style=${style}`, {
      run: runId,
      controllers: requested.join(","),
    });

    const { signal, dispose } = linkSignals(options.signal, options.deadlineMs);
    const limit = Math.min(requested.length, this.concurrency);
    const settled = await settledPool(limit, requested, (typeId, index) =>
      this.runController(runId, typeId, index, category, style, signal, resolutionErrors.get(typeId)),
    ).finally(dispose);

    const results = settled.map((entry, index): ControllerResult =>
      entry.status === "fulfilled"
        ? entry.value
        : failure(requested[index], toErrorDetail(entry.reason, "permanent"), 0, 0),
    );

    const finishMs = this.now();
    const run: BenchmarkRun = deepFreeze({
      id: runId,
      category,
      style,
      model,
      requestedControllerTypes: requested,
      results,
      startedAt,
      finishedAt: new Date(finishMs).toISOString(),
      durationMs: Math.max(0, finishMs - startMs),
    });

    const successes = results.filter((r) => r.success).length;
    this.logger.info(`Benchmark finished: ${successes}/${results.length} controller(s) succeeded`, {
      run: runId,
      durationMs: run.durationMs,
    });
    this.emit({ type: "run_done", run });
    return run;
  }

  private async runController(
    runId: string,
    typeId: string,
    index: number,
    category: string,
    style: string,
    signal: AbortSignal | undefined,
    resolutionError: ResolutionError | undefined,
  ): Promise<ControllerResult> {
    const controller = this.controllers.get(typeId);
    if (!controller) {
      const err =
        resolutionError ?? new ResolutionError(typeId, "unknown_type", `Controller "${typeId}" is not initialized`);
      const result = failure(typeId, toErrorDetail(err, "resolution"), 0, 0);
      this.emit({ type: "controller_done", runId, index, result });
      return result;
    }

    this.emit({ type: "controller_start", runId, index, controllerType: typeId });
    this.logger.info(`Running controller: ${this.registry.describe(typeId)}`, { run: runId, index });

    const started = this.now();
    const attemptAbort = new AbortController();
    let attempts = 0;

    const work = this.inLane(controller, () =>
      invoke(
        (attempt) => {
          attempts = attempt;
          return controller.process(category, style, attemptAbort.signal);
        },
        this.retryPolicy,
        {
          signal,
          sleep: this.sleep,
          logger: this.logger.child("retry"),
          label: typeId,
          onRetry: (attempt, err, delayMs) => {
            this.emit({
              type: "attempt_failed",
              runId,
              index,
              controllerType: typeId,
              attempt,
              delayMs,
              message: err instanceof Error ? err.message : String(err),
            });
          },
        },
      ),
    );

    const outcome = await this.withGrace(work, signal, () => attemptAbort.abort(), () => attempts);
    const elapsedMs = Math.max(0, this.now() - started);

    const result: ControllerResult = outcome.ok
      ? { controllerType: typeId, success: true, content: outcome.value, elapsedMs, attempts: outcome.attempts }
      : failure(typeId, toErrorDetail(outcome.error, outcome.kind), elapsedMs, outcome.attempts);

    if (result.success) {
      this.logger.info(`Controller ${typeId} completed in ${(elapsedMs / 1000).toFixed(2)}s`, { run: runId, index });
    } else {
      this.logger.error(`Controller ${typeId} failed: ${result.error.message}`, {
        run: runId,
        index,
        kind: result.error.kind,
      });
    }
    this.emit({ type: "controller_done", runId, index, result });
    return result;
  }

  /**
   * Queue `task` behind any call already outstanding on `controller`.
   */
  private inLane<T>(controller: Controller, task: () => Promise<T>): Promise<T> {
    const previous = this.lanes.get(controller) ?? Promise.resolve();
    const run = previous.then(task);
    const done = run.then(
      () => undefined,
      () => undefined,
    );
    this.lanes.set(controller, done);
    void done.then(() => {
      if (this.lanes.get(controller) === done) this.lanes.delete(controller);
    });
    return run;
  }

  /**
   * Once `signal` aborts, give `work` the grace period to settle. If it
   * does not, resolve as cancelled and call `onExpire` to abort the
   * attempt itself.
   */
  private withGrace<T>(
    work: Promise<RetryOutcome<T>>,
    signal: AbortSignal | undefined,
    onExpire: () => void,
    attempts: () => number,
  ): Promise<RetryOutcome<T>> {
    if (!signal) return work;

    return new Promise<RetryOutcome<T>>((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const onAbort = () => {
        timer = setTimeout(() => {
          onExpire();
          resolve({
            ok: false,
            kind: "cancelled",
            error: new CancelledError(`Cancelled: attempt did not finish within the ${this.gracePeriodMs}ms grace period`),
            attempts: attempts(),
          });
        }, this.gracePeriodMs);
      };
      const finish = (outcome: RetryOutcome<T>) => {
        clearTimeout(timer);
        signal.removeEventListener("abort", onAbort);
        resolve(outcome);
      };

      if (signal.aborted) onAbort();
      else signal.addEventListener("abort", onAbort, { once: true });

      void work.then(finish, (err: unknown) => finish({ ok: false, kind: "permanent", error: err, attempts: attempts() }));
    });
  }
}
