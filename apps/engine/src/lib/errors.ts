export class ReelError extends Error {
  public code: string;
  public statusCode: number;
  public retryable: boolean;
  public details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    retryable: boolean = false,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "ReelError";
    this.code = code;
    this.statusCode = statusCode;
    this.retryable = retryable;
    this.details = details;
  }
}

export const ErrorCodes = {
  INVALID_INPUT: "invalid_input",
  MISSING_ASSET: "missing_asset",
  RENDER_FAILED: "render_failed",
  RENDER_CANCELLED: "render_cancelled",
  RENDER_TIMEOUT: "render_timeout",
  PROVIDER_FAILED: "provider_failed",
  NOT_FOUND: "not_found",
  INTERNAL_ERROR: "internal_error"
} as const;

export class InputValidationError extends ReelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.INVALID_INPUT, 400, false, details);
    this.name = "InputValidationError";
  }
}

export class MissingAssetError extends ReelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.MISSING_ASSET, 500, false, details);
    this.name = "MissingAssetError";
  }
}

export class RenderError extends ReelError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.RENDER_FAILED, 500, false, details);
    this.name = "RenderError";
  }
}

export class RenderCancelledError extends ReelError {
  constructor(message = "Job was cancelled") {
    super(message, ErrorCodes.RENDER_CANCELLED, 409);
    this.name = "RenderCancelledError";
  }
}

export class RenderTimeoutError extends ReelError {
  constructor(timeoutMs: number) {
    super(`Job timed out after ${timeoutMs}ms`, ErrorCodes.RENDER_TIMEOUT, 504, false, { timeoutMs });
    this.name = "RenderTimeoutError";
  }
}

/** Upstream HTTP collaborator failure (TTS, story generation). 429 and 5xx are retryable. */
export class ProviderError extends ReelError {
  constructor(provider: string, status: number, message: string) {
    super(
      `${provider} request failed (${status}): ${message}`,
      ErrorCodes.PROVIDER_FAILED,
      502,
      status === 429 || status >= 500,
      { provider, status }
    );
    this.name = "ProviderError";
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}

/** Maps an AbortSignal reason to the error a render should surface. */
export function abortReasonToError(reason: unknown): ReelError {
  if (reason instanceof RenderCancelledError || reason instanceof RenderTimeoutError) {
    return reason;
  }
  if (reason instanceof ReelError) {
    return reason;
  }
  return new RenderCancelledError(reason === undefined ? undefined : errorMessage(reason));
}

export function toErrorResponse(error: unknown): {
  statusCode: number;
  body: { error: string; message: string; details?: Record<string, unknown> };
} {
  if (error instanceof ReelError) {
    return {
      statusCode: error.statusCode,
      body: { error: error.code, message: error.message, details: error.details }
    };
  }
  return {
    statusCode: 500,
    body: { error: ErrorCodes.INTERNAL_ERROR, message: errorMessage(error) }
  };
}

function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReasonToError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReasonToError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: {
    maxAttempts?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    retryIf?: (error: unknown) => boolean;
    label?: string;
    signal?: AbortSignal;
  } = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    initialDelayMs = 1000,
    maxDelayMs = 15000,
    retryIf = (error) => error instanceof ReelError && error.retryable,
    label = "request",
    signal
  } = options;

  let delay = initialDelayMs;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= maxAttempts || !retryIf(error)) {
        throw error;
      }
      console.warn(`[reel] ${label} attempt=${attempt} failed, retrying in ${delay}ms`);
      await sleep(delay, signal);
      delay = Math.min(delay * 2, maxDelayMs);
    }
  }
}
