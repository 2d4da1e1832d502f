import { describe, it, expect, vi } from "vitest";
import { HttpSyncTransport } from "./http-sync-transport";
import { NetworkError, ProtocolError, RemoteServerError } from "../application/errors";
import { fileRecord, snapshotOf } from "../testing/in-memory";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

describe("http-sync-transport", () => {
  it("posts the snapshot to /snapshot and returns the decoded plan", async () => {
    const fetchImpl = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({ sync_action_metadata: { files: { "a.txt": { action: "upload" } } } })
    );
    const transport = new HttpSyncTransport({ serverUrl: "http://sync.test/api/", fetchImpl });

    const plan = await transport.submitSnapshot("client-a", snapshotOf(fileRecord("a.txt", "h")));

    expect(plan).toEqual({ files: { "a.txt": { action: "upload" } } });
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://sync.test/api/snapshot");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({
      client_id: "client-a",
      final_snapshot: {
        files: { "a.txt": { path: "a.txt", status: "present", kind: "file", size: 1, mtime_ms: 1000, hash: "h" } },
      },
    });
  });

  it("returns null when the server reports nothing to do", async () => {
    const transport = new HttpSyncTransport({
      serverUrl: "http://sync.test",
      fetchImpl: async () => jsonResponse({ sync_action_metadata: null }),
    });

    await expect(transport.submitSnapshot("client-a", snapshotOf())).resolves.toBeNull();
  });

  it("wraps transport failures in NetworkError", async () => {
    const transport = new HttpSyncTransport({
      serverUrl: "http://sync.test",
      fetchImpl: async () => {
        throw new TypeError("fetch failed");
      },
    });

    await expect(transport.submitSnapshot("client-a", snapshotOf())).rejects.toBeInstanceOf(NetworkError);
  });

  it("fails on non-2xx responses with the status code", async () => {
    const transport = new HttpSyncTransport({
      serverUrl: "http://sync.test",
      fetchImpl: async () => new Response("overloaded", { status: 503 }),
    });

    const err = await transport.submitSnapshot("client-a", snapshotOf()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RemoteServerError);
    expect(err).toMatchObject({ statusCode: 503, message: "POST http://sync.test/snapshot returned 503: overloaded" });
  });

  it("fails on undecodable bodies", async () => {
    const transport = new HttpSyncTransport({
      serverUrl: "http://sync.test",
      fetchImpl: async () => new Response("not json", { status: 200 }),
    });

    await expect(transport.submitSnapshot("client-a", snapshotOf())).rejects.toBeInstanceOf(ProtocolError);
  });
});
