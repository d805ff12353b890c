import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { OperationCancelledError } from "../errors.js";
import { OciApiError, buildUrl, ociList, ociRequest, type RequestSigner } from "./client.js";

// ---------------------------------------------------------------------------
// Mock fetch
// ---------------------------------------------------------------------------

const mockFetch = vi.fn<typeof fetch>();

beforeEach(() => {
  vi.stubGlobal("fetch", mockFetch);
  mockFetch.mockReset();
});

afterEach(() => {
  vi.unstubAllGlobals();
});

/** Helper to build a JSON Response. */
function fakeResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(body === undefined ? null : JSON.stringify(body), { status, headers });
}

const sign = vi.fn<RequestSigner>(() => ({ authorization: "Signature test" }));

function initOf(call: number): RequestInit {
  return mockFetch.mock.calls[call]?.[1] ?? {};
}

// ===========================================================================
// buildUrl
// ===========================================================================

describe("buildUrl", () => {
  it("appends defined query values only", () => {
    expect(buildUrl("https://iaas.example.com/20160918/instances", { compartmentId: "c1", page: undefined, limit: 5 })).toBe(
      "https://iaas.example.com/20160918/instances?compartmentId=c1&limit=5",
    );
  });
});

// ===========================================================================
// ociRequest
// ===========================================================================

describe("ociRequest", () => {
  it("sends signed headers and returns data plus opc headers", async () => {
    mockFetch.mockResolvedValueOnce(
      fakeResponse({ id: "i1" }, 200, { "opc-request-id": "req-1", "opc-work-request-id": "wr-1" }),
    );

    const result = await ociRequest("https://iaas.example.com/20160918/instances/i1", sign);

    expect(result).toEqual({ data: { id: "i1" }, opcRequestId: "req-1", opcWorkRequestId: "wr-1", opcNextPage: undefined });
    expect(sign).toHaveBeenCalledWith({
      method: "GET",
      url: "https://iaas.example.com/20160918/instances/i1",
      body: undefined,
      headers: { accept: "application/json" },
    });
    expect(initOf(0).headers).toEqual({ authorization: "Signature test" });
  });

  it("serializes a JSON body", async () => {
    mockFetch.mockResolvedValueOnce(fakeResponse({}));
    await ociRequest("https://db.example.com/x", sign, { method: "put", body: { computeCount: 4 } });
    expect(initOf(0).method).toBe("PUT");
    expect(initOf(0).body).toBe('{"computeCount":4}');
  });

  it("returns null data for an empty body", async () => {
    mockFetch.mockResolvedValueOnce(new Response(null, { status: 204 }));
    const result = await ociRequest("https://iaas.example.com/x", sign, { method: "POST" });
    expect(result.data).toBeNull();
  });

  it("throws OciApiError with service code and retry-after", async () => {
    mockFetch.mockResolvedValueOnce(
      fakeResponse({ code: "TooManyRequests", message: "slow down" }, 429, {
        "opc-request-id": "req-9",
        "retry-after": "2",
      }),
    );

    const error = await ociRequest("https://iaas.example.com/x", sign).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(OciApiError);
    expect(error).toMatchObject({
      message: "slow down",
      statusCode: 429,
      code: "TooManyRequests",
      opcRequestId: "req-9",
      headers: { "retry-after": "2" },
    });
  });

  it("falls back to a generic message for a non-JSON error body", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>", { status: 502 }));
    await expect(ociRequest("https://iaas.example.com/x", sign)).rejects.toThrow("OCI API error: HTTP 502");
  });

  it("rejects an already-aborted signal without calling fetch", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(ociRequest("https://iaas.example.com/x", sign, { signal: controller.signal })).rejects.toBeInstanceOf(
      OperationCancelledError,
    );
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("maps a caller abort during the request to OperationCancelledError", async () => {
    const controller = new AbortController();
    mockFetch.mockImplementationOnce(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(Object.assign(new Error("aborted"), { name: "AbortError" })));
        }),
    );

    const promise = ociRequest("https://iaas.example.com/x", sign, { signal: controller.signal });
    controller.abort();
    await expect(promise).rejects.toThrow("Operation GET https://iaas.example.com/x was cancelled");
  });

  describe("timeouts", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("reports a timeout as status 0 ETIMEDOUT", async () => {
      mockFetch.mockImplementationOnce(
        (_input, init) =>
          new Promise((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(Object.assign(new Error("aborted"), { name: "AbortError" })));
          }),
      );

      const promise = ociRequest("https://iaas.example.com/x", sign, { timeoutMs: 1_000 });
      const assertion = expect(promise).rejects.toMatchObject({ statusCode: 0, code: "ETIMEDOUT" });
      await vi.advanceTimersByTimeAsync(1_000);
      await assertion;
    });
  });
});

// ===========================================================================
// ociList
// ===========================================================================

describe("ociList", () => {
  it("follows opc-next-page", async () => {
    mockFetch
      .mockResolvedValueOnce(fakeResponse([{ id: "a" }], 200, { "opc-next-page": "p2" }))
      .mockResolvedValueOnce(fakeResponse([{ id: "b" }]));

    const items = await ociList("https://iaas.example.com/instances", sign, { query: { compartmentId: "c" } });

    expect(items).toEqual([{ id: "a" }, { id: "b" }]);
    expect(mockFetch.mock.calls[1]?.[0]).toBe("https://iaas.example.com/instances?compartmentId=c&page=p2");
  });

  it("stops at maxPages", async () => {
    mockFetch.mockImplementation(async () => fakeResponse([{ id: "x" }], 200, { "opc-next-page": "more" }));
    const items = await ociList("https://iaas.example.com/instances", sign, {}, 3);
    expect(items).toHaveLength(3);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });
});
