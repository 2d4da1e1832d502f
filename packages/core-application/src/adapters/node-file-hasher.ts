import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { FileHasher, ContentHash } from "../ports/file-hasher";

export class NodeFileHasher implements FileHasher {
  async hashFile(absolutePath: string): Promise<ContentHash> {
    const hash = createHash("sha256");
    for await (const chunk of createReadStream(absolutePath)) {
      hash.update(chunk);
    }
    return { algorithm: "sha256", value: hash.digest("hex") };
  }
}
