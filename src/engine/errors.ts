import type { ErrorDetail, ErrorKind } from "../types.js";

/**
 * A failure worth retrying: timeouts, rate limits, overloaded providers,
 * truncated or empty model output.
 */
export class TransientError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.name = "TransientError";
    this.statusCode = options?.statusCode;
  }
}

/**
 * A failure that another attempt will not fix (bad configuration,
 * malformed workload, rejected credentials).
 */
export class PermanentError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.name = "PermanentError";
    this.statusCode = options?.statusCode;
  }
}

export type ResolutionReason = "unknown_type" | "factory_failed";

/** Registry lookup failure for one controller type. */
export class ResolutionError extends Error {
  constructor(
    readonly controllerType: string,
    readonly reason: ResolutionReason,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = "ResolutionError";
  }
}

/** A run that cannot execute at all, e.g. zero controllers resolved. */
export class RunStructureError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunStructureError";
  }
}

/** Raised when a run is aborted before a controller produced its result. */
export class CancelledError extends Error {
  constructor(message = "Cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

/**
 * Report persistence failed. The rendered report is attached so the
 * caller still has the text.
 */
export class ReportWriteError extends Error {
  constructor(
    readonly report: { markdown: string; filePath: string },
    options: { cause: unknown },
  ) {
    const reason = options.cause instanceof Error ? options.cause.message : String(options.cause);
    super(`Failed to write report to ${report.filePath}: ${reason}`, options);
    this.name = "ReportWriteError";
  }
}

function readStatusCode(err: Error): number | undefined {
  if (err instanceof TransientError || err instanceof PermanentError) return err.statusCode;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

/**
 * Normalize anything thrown into the serializable ErrorDetail stored on
 * a failed ControllerResult.
 */
export function toErrorDetail(err: unknown, kind: ErrorKind): ErrorDetail {
  if (!(err instanceof Error)) {
    return { kind, name: "Error", message: String(err) };
  }

  let message = err.message;
  // Surface the underlying cause when the wrapper message hides it
  if (err.cause instanceof Error && err.cause.message !== message) {
    message = `${message} (cause: ${err.cause.message})`;
  }

  const detail: ErrorDetail = { kind, name: err.name, message };
  const statusCode = readStatusCode(err);
  if (statusCode != null) detail.statusCode = statusCode;
  if (err.stack) detail.stack = err.stack;
  return detail;
}
