import { ResolutionError } from "../engine/errors.js";
import type { ControllerConfig } from "../types.js";
import type { Controller, ControllerRegistration } from "./types.js";

export type Resolution =
  | { ok: true; controller: Controller }
  | { ok: false; error: ResolutionError };

/**
 * Explicit table of controller variants, keyed by type id.
 *
 * Populated once at startup, then sealed when an orchestrator takes it
 * over. Lookups never throw; an unknown id or a failing factory comes
 * back as a ResolutionError.
 */
export class ControllerRegistry {
  private entries = new Map<string, ControllerRegistration>();
  private sealed = false;

  register(typeId: string, registration: ControllerRegistration): this {
    if (this.sealed) {
      throw new Error(`Registry is sealed; cannot register "${typeId}"`);
    }
    if (!typeId.trim()) {
      throw new Error("Controller type id must be non-empty");
    }
    if (this.entries.has(typeId)) {
      throw new Error(`Controller type "${typeId}" is already registered`);
    }
    this.entries.set(typeId, registration);
    return this;
  }

  /** Make the registry read-only. Idempotent. */
  seal(): this {
    this.sealed = true;
    return this;
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  has(typeId: string): boolean {
    return this.entries.has(typeId);
  }

  /** Registered type ids, in registration order. */
  types(): string[] {
    return [...this.entries.keys()];
  }

  /** Report label for a type, falling back to the id itself. */
  describe(typeId: string): string {
    return this.entries.get(typeId)?.description ?? typeId;
  }

  resolve(typeId: string, config: ControllerConfig): Resolution {
    const entry = this.entries.get(typeId);
    if (!entry) {
      return {
        ok: false,
        error: new ResolutionError(
          typeId,
          "unknown_type",
          `Unknown controller type "${typeId}". Known types: ${this.types().join(", ") || "(none)"}`,
        ),
      };
    }

    try {
      return { ok: true, controller: entry.create(config) };
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return {
        ok: false,
        error: new ResolutionError(
          typeId,
          "factory_failed",
          `Failed to build controller "${typeId}": ${reason}`,
          { cause: err },
        ),
      };
    }
  }
}
