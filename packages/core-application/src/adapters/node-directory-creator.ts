import fs from "node:fs/promises";
import type { DirectoryCreator } from "../ports/directory-creator";

export class NodeDirectoryCreator implements DirectoryCreator {
  async mkdir(localAbsolutePath: string): Promise<void> {
    // recursive mkdir does not fail on an existing directory
    await fs.mkdir(localAbsolutePath, { recursive: true });
  }
}
