import { generateText, type LanguageModel } from "ai";
import { resolveModel } from "./registry.js";
import { PermanentError, TransientError } from "../engine/errors.js";

export interface GenerationRequest {
  model: string; // "provider:model"
  system: string;
  prompt: string;
  temperature?: number;
  maxOutputTokens?: number;
  signal?: AbortSignal;
}

/**
 * The only way controllers talk to a model. Implementations reject with
 * TransientError or PermanentError.
 */
export type TextGenerator = (request: GenerationRequest) => Promise<string>;

/** Patterns that indicate a provider-level issue (rate limit or server error). */
const PROVIDER_ERROR_PATTERNS = [
  /too.many.requests/i,
  /rate.limit/i,
  /(?:status|code|error|returned|received|response|http)\s*:?\s*429\b/i,
  /(?:status|code|error|returned|received|response|http)\s*:?\s*5\d\d\b/i,
  /\b5\d\d\s+(?:internal|bad|service|gateway|server|error)/i,
  /overloaded/i,
  /server.error/i,
  /timed?.?out/i,
  /ECONNRESET|ETIMEDOUT|ECONNREFUSED|EAI_AGAIN/,
];

/** AI SDK error names that describe an unusable but retryable response. */
const RETRYABLE_SDK_ERRORS = new Set([
  "AI_NoOutputGeneratedError",
  "AI_NoObjectGeneratedError",
  "AI_RetryError",
]);

function numericField(err: Error, field: string): number | undefined {
  const value: unknown = Reflect.get(err, field);
  return typeof value === "number" ? value : undefined;
}

/**
 * Whether the error indicates a provider-level issue (rate limit, server
 * error, overload, network fault).
 */
export function isProviderError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = numericField(err, "statusCode");
  if (code != null && (code === 408 || code === 429 || (code >= 500 && code < 600))) return true;
  // The AI SDK's APICallError sets isRetryable for 429/5xx responses.
  if (Reflect.get(err, "isRetryable") === true) return true;
  const body: unknown = Reflect.get(err, "responseBody");
  const text = err.message + (body != null ? String(body) : "");
  return PROVIDER_ERROR_PATTERNS.some((p) => p.test(text));
}

/**
 * Map whatever the AI SDK threw onto the two-class controller contract.
 */
export function classifyGenerationError(err: unknown): TransientError | PermanentError {
  if (err instanceof TransientError || err instanceof PermanentError) return err;
  const message = err instanceof Error ? err.message : String(err);
  const statusCode = err instanceof Error ? numericField(err, "statusCode") : undefined;
  if (err instanceof Error && err.name === "AbortError") {
    return new PermanentError(`Generation aborted: ${message}`, { cause: err });
  }
  if (isProviderError(err) || (err instanceof Error && RETRYABLE_SDK_ERRORS.has(err.name))) {
    return new TransientError(message, { cause: err, statusCode });
  }
  return new PermanentError(message, { cause: err, statusCode });
}

/**
 * TextGenerator backed by the AI SDK. Truncated and empty outputs are
 * retryable, since models often produce usable text on the next try.
 */
export function createAiTextGenerator(
  resolve: typeof resolveModel = resolveModel,
): TextGenerator {
  return async (request) => {
    let model: LanguageModel;
    try {
      model = await resolve(request.model);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new PermanentError(`Cannot resolve model "${request.model}": ${message}`, { cause: err });
    }

    try {
      const result = await generateText({
        model,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature,
        maxOutputTokens: request.maxOutputTokens,
        abortSignal: request.signal,
        maxRetries: 0, // retries belong to the benchmark's policy
      });
      if (result.finishReason === "length") {
        throw new TransientError("Output truncated (finishReason: length)");
      }
      if (!result.text.trim()) {
        throw new TransientError("Model returned empty output");
      }
      return result.text;
    } catch (err) {
      throw classifyGenerationError(err);
    }
  };
}
