/**
 * OCI Extension — REST API Request Helpers
 *
 * Signed requests against the OCI REST APIs using native `fetch()`. Every
 * request is bounded by a timeout and honours the caller's AbortSignal.
 */

import { OperationCancelledError } from "../errors.js";
import type { UnsignedRequest } from "./signer.js";

// =============================================================================
// Types
// =============================================================================

/** Non-2xx response or transport timeout (statusCode 0). */
export class OciApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly opcRequestId?: string,
    public readonly headers: Record<string, string> = {},
  ) {
    super(message);
    this.name = "OciApiError";
  }
}

/** Produces the signed header set for a request. */
export type RequestSigner = (request: UnsignedRequest) => Record<string, string>;

export type OciRequestOptions = {
  method?: string;
  body?: unknown;
  query?: Record<string, string | number | boolean | undefined>;
  /** Extra request headers, signed along with the defaults. */
  headers?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
};

export type OciResponse = {
  data: unknown;
  opcRequestId?: string;
  opcWorkRequestId?: string;
  opcNextPage?: string;
};

// =============================================================================
// Core Request
// =============================================================================

export function buildUrl(base: string, query?: OciRequestOptions["query"]): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

/**
 * Make a signed request to an OCI REST endpoint.
 *
 * @returns Parsed JSON body (null when empty) plus the opc-* response headers.
 */
export async function ociRequest(url: string, sign: RequestSigner, opts?: OciRequestOptions): Promise<OciResponse> {
  const method = (opts?.method ?? "GET").toUpperCase();
  const fullUrl = buildUrl(url, opts?.query);
  const body = opts?.body === undefined ? undefined : JSON.stringify(opts.body);
  const signal = opts?.signal;

  if (signal?.aborted) throw new OperationCancelledError(`${method} ${url}`);

  const controller = new AbortController();
  const timeoutMs = opts?.timeoutMs ?? 30_000;
  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutMs);
  const onAbort = () => controller.abort();
  signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const headers = sign({ method, url: fullUrl, body, headers: { accept: "application/json", ...opts?.headers } });
    const res = await fetch(fullUrl, { method, headers, body, signal: controller.signal });

    const opcRequestId = res.headers.get("opc-request-id") ?? undefined;

    if (!res.ok) {
      const errBody: unknown = await res.json().catch(() => ({}));
      const message =
        isRecord(errBody) && typeof errBody.message === "string" ? errBody.message : `OCI API error: HTTP ${res.status}`;
      const code = isRecord(errBody) && typeof errBody.code === "string" ? errBody.code : "";
      const errorHeaders: Record<string, string> = {};
      const retryAfter = res.headers.get("retry-after");
      if (retryAfter) errorHeaders["retry-after"] = retryAfter;
      throw new OciApiError(message, res.status, code, opcRequestId, errorHeaders);
    }

    const text = res.status === 204 ? "" : await res.text();
    const data: unknown = text ? JSON.parse(text) : null;

    return {
      data,
      opcRequestId,
      opcWorkRequestId: res.headers.get("opc-work-request-id") ?? undefined,
      opcNextPage: res.headers.get("opc-next-page") ?? undefined,
    };
  } catch (error) {
    if (timedOut) {
      throw new OciApiError(`Request timed out after ${timeoutMs}ms: ${method} ${url}`, 0, "ETIMEDOUT");
    }
    if (signal?.aborted) throw new OperationCancelledError(`${method} ${url}`);
    throw error;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onAbort);
  }
}

// =============================================================================
// Paginated List
// =============================================================================

/**
 * Fetch every page of an OCI list endpoint by following `opc-next-page`.
 *
 * @param maxPages - Safety limit on pages (default 50).
 */
export async function ociList(
  url: string,
  sign: RequestSigner,
  opts?: Omit<OciRequestOptions, "method" | "body">,
  maxPages = 50,
): Promise<unknown[]> {
  const results: unknown[] = [];
  let page: string | undefined;
  let count = 0;

  do {
    const res = await ociRequest(url, sign, { ...opts, query: { ...opts?.query, page } });
    if (Array.isArray(res.data)) results.push(...res.data);
    page = res.opcNextPage;
    count++;
  } while (page && count < maxPages);

  return results;
}
