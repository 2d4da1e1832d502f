import type { ClientId, DirectorySnapshot, SyncActionPlan } from "@dirsync/core-domain";
import type { SyncTransport } from "../ports/sync-transport";
import { NetworkError, RemoteServerError } from "../application/errors";
import { decodeSnapshotResponse, encodeSnapshotRequest } from "../application/sync-wire";

export type HttpSyncTransportOptions = {
  serverUrl: string;
  fetchImpl?: typeof fetch;
};

/** Submits snapshots to `POST {serverUrl}/snapshot`. */
export class HttpSyncTransport implements SyncTransport {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HttpSyncTransportOptions) {
    this.baseUrl = opts.serverUrl.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async submitSnapshot(clientId: ClientId, snapshot: DirectorySnapshot): Promise<SyncActionPlan | null> {
    const url = `${this.baseUrl}/snapshot`;
    const body = JSON.stringify(encodeSnapshotRequest(clientId, snapshot));

    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body,
      });
    } catch (err) {
      throw new NetworkError(`POST ${url} failed`, err);
    }

    let text: string;
    try {
      text = await res.text();
    } catch (err) {
      throw new NetworkError(`Failed to read response body from ${url}`, err);
    }

    if (!res.ok) {
      throw new RemoteServerError(`POST ${url} returned ${res.status}: ${text.slice(0, 200)}`, res.status);
    }

    return decodeSnapshotResponse(text);
  }
}
