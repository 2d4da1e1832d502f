import fs from "node:fs/promises";
import { createWriteStream, openAsBlob } from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { z } from "zod";

import type { ClientId, NormalizedPath } from "@dirsync/core-domain";
import type { FileTransfer, UploadResult } from "../ports/file-transfer";
import type { PathMapper } from "../ports/path-mapper";
import { NetworkError, ProtocolError, RemoteServerError } from "../application/errors";

const uploadResponseSchema = z.object({ file_url: z.string() }).passthrough();

export type HttpFileTransferOptions = {
  serverUrl: string;
  paths: PathMapper;
  fetchImpl?: typeof fetch;
};

/**
 * Moves file contents between the sync root and the server:
 * - `POST {serverUrl}/upload` multipart (`file`, `path`, `client_id`) → `{ file_url }`
 * - `GET {serverUrl}/download?path=<normalized>` → raw bytes
 */
export class HttpFileTransfer implements FileTransfer {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: HttpFileTransferOptions) {
    this.baseUrl = opts.serverUrl.replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  private async send(url: string, init?: RequestInit): Promise<Response> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, init);
    } catch (err) {
      throw new NetworkError(`${init?.method ?? "GET"} ${url} failed`, err);
    }
    if (!res.ok) {
      throw new RemoteServerError(`${init?.method ?? "GET"} ${url} returned ${res.status}`, res.status);
    }
    return res;
  }

  async upload(localAbsolutePath: string, clientId: ClientId): Promise<UploadResult> {
    const normalized = this.opts.paths.toNormalized(localAbsolutePath);

    const form = new FormData();
    form.append("client_id", clientId);
    form.append("path", normalized);
    form.append("file", await openAsBlob(localAbsolutePath), path.basename(localAbsolutePath));

    const url = `${this.baseUrl}/upload`;
    const res = await this.send(url, { method: "POST", body: form });

    let parsed: unknown;
    try {
      parsed = await res.json();
    } catch (err) {
      throw new ProtocolError(`Upload response from ${url} is not valid JSON`, err);
    }

    const result = uploadResponseSchema.safeParse(parsed);
    if (!result.success) {
      throw new ProtocolError(`Upload response from ${url} has no file_url`, result.error);
    }
    return { fileUrl: result.data.file_url };
  }

  async download(normalizedPath: NormalizedPath): Promise<void> {
    const dest = this.opts.paths.toAbsolute(normalizedPath);
    const url = `${this.baseUrl}/download?path=${encodeURIComponent(normalizedPath)}`;

    const res = await this.send(url);

    // streamed beside the destination, then renamed over it
    const tmp = `${dest}.download.tmp`;
    await fs.mkdir(path.dirname(dest), { recursive: true });
    try {
      const body = res.body ? Readable.fromWeb(res.body) : Readable.from([]);
      await pipeline(body, createWriteStream(tmp));
      await fs.rename(tmp, dest);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw err;
    }
  }
}
