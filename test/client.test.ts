import { gzipSync } from "node:zlib";
import { describe, expect, test, vi } from "vitest";
import { GranolaApiClient } from "../src/granola/client.ts";
import { GranolaHttpError } from "../src/lib/http.ts";

describe("GranolaApiClient", () => {
  test("posts JSON with bearer auth", async () => {
    const fetchImpl = vi.fn(async (_url: string, _init?: RequestInit) =>
      new Response(JSON.stringify([{ text: "hi" }])),
    );
    const client = new GranolaApiClient("test-token", {
      baseUrl: "https://api.example.test/",
      fetchImpl,
    });

    expect(await client.fetchTranscript("doc-1")).toEqual([{ text: "hi" }]);
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("https://api.example.test/v1/get-document-transcript");
    expect(init?.method).toBe("POST");
    expect(init?.body).toBe(JSON.stringify({ document_id: "doc-1" }));
    expect(new Headers(init?.headers).get("Authorization")).toBe("Bearer test-token");
  });

  test("decodes gzip bodies sent without a content-encoding header", async () => {
    const body = new Uint8Array(gzipSync(Buffer.from(JSON.stringify({ ok: true }))));
    const client = new GranolaApiClient("test-token", {
      baseUrl: "https://api.example.test",
      fetchImpl: async () => new Response(body),
    });
    expect(await client.post("/v1/thing", {})).toEqual({ ok: true });
  });

  test("waits out rate limits before retrying", async () => {
    const fetchImpl = vi
      .fn(async () => new Response(JSON.stringify([])))
      .mockResolvedValueOnce(new Response("slow down", { status: 429, headers: { "Retry-After": "2" } }));
    const sleep = vi.fn(async () => {});
    const client = new GranolaApiClient("test-token", {
      baseUrl: "https://api.example.test",
      fetchImpl,
      sleep,
    });

    expect(await client.post("/v1/thing", {})).toEqual([]);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  test("HTTP failures carry their status", async () => {
    const client = new GranolaApiClient("test-token", {
      baseUrl: "https://api.example.test",
      fetchImpl: async () => new Response("missing", { status: 404 }),
    });
    const err = await client.fetchTranscript("doc-1").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(GranolaHttpError);
    expect(err instanceof GranolaHttpError && err.status).toBe(404);
  });

  test("non-array transcript payloads become empty", async () => {
    const client = new GranolaApiClient("test-token", {
      baseUrl: "https://api.example.test",
      fetchImpl: async () => new Response(JSON.stringify({ detail: "none" })),
    });
    expect(await client.fetchTranscript("doc-1")).toEqual([]);
  });
});
