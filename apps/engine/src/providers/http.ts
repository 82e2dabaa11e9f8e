import { ProviderError, abortReasonToError, errorMessage } from "../lib/errors";

export type HttpResponse = {
  status: number;
  ok: boolean;
  body: Buffer;
};

export function makeUrl(baseUrl: string, pathSuffix: string) {
  const base = baseUrl.replace(/\/$/, "");
  const suffix = pathSuffix.startsWith("/") ? pathSuffix : `/${pathSuffix}`;
  return `${base}${suffix}`;
}

export function makeBodySnippet(text: string) {
  const trimmed = text.trim();
  if (trimmed.length <= 200) {
    return trimmed;
  }
  return `${trimmed.slice(0, 200)}...`;
}

/**
 * One HTTP exchange with a collaborator. A request timeout and network
 * failures surface as `ProviderError` with status 0; an aborted job surfaces
 * as its abort reason.
 */
export async function requestBody(
  url: string,
  init: RequestInit,
  options: { provider: string; timeoutMs: number; signal?: AbortSignal }
): Promise<HttpResponse> {
  if (options.signal?.aborted) {
    throw abortReasonToError(options.signal.reason);
  }
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
  const forwardAbort = () => controller.abort();
  options.signal?.addEventListener("abort", forwardAbort, { once: true });
  try {
    const res = await fetch(url, { ...init, signal: controller.signal });
    const body = Buffer.from(await res.arrayBuffer());
    return { status: res.status, ok: res.ok, body };
  } catch (err) {
    if (options.signal?.aborted) {
      throw abortReasonToError(options.signal.reason);
    }
    if (controller.signal.aborted) {
      throw new ProviderError(options.provider, 0, `Request timed out after ${options.timeoutMs}ms`);
    }
    throw new ProviderError(options.provider, 0, errorMessage(err));
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", forwardAbort);
  }
}

/** Retry transient collaborator failures: 429, 5xx, timeouts and dropped connections. */
export function isTransientProviderError(error: unknown) {
  return error instanceof ProviderError && (error.retryable || error.details?.status === 0);
}
