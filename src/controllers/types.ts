import type { ControllerConfig } from "../types.js";

/**
 * A content-generation strategy under comparison.
 *
 * `process` resolves with the generated text or rejects with
 * TransientError (worth retrying) or PermanentError. Instances are
 * immutable once built and are reused across runs.
 */
export interface Controller {
  readonly type: string;
  readonly config: Readonly<ControllerConfig>;
  process(category: string, style: string, signal?: AbortSignal): Promise<string>;
}

export type ControllerFactory = (config: ControllerConfig) => Controller;

export interface ControllerRegistration {
  /** Human-readable label used in reports and logs. */
  description: string;
  create: ControllerFactory;
}
