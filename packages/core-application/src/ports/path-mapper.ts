import type { NormalizedPath } from "@dirsync/core-domain";

export interface PathMapper {
  readonly rootAbs: string;
  toAbsolute(normalized: NormalizedPath): string;
  toNormalized(absolutePath: string): NormalizedPath;
}
