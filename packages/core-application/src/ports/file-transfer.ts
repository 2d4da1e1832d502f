import type { ClientId, NormalizedPath } from "@dirsync/core-domain";

export type UploadResult = {
  fileUrl: string;
};

export interface FileTransfer {
  upload(localAbsolutePath: string, clientId: ClientId): Promise<UploadResult>;

  /** The transfer owns mapping the path to its local destination. */
  download(normalizedPath: NormalizedPath): Promise<void>;
}
