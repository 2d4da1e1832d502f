import path from "node:path";
import type { NormalizedPath } from "@dirsync/core-domain";
import type { PathMapper } from "../ports/path-mapper";
import { PathOutsideRootError } from "../application/errors";

export function toPosix(p: string): string {
  return p.replaceAll("\\", "/");
}

function isInsideRoot(rel: string): boolean {
  return rel !== "" && rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
}

/**
 * Maps between root-relative posix paths (wire/storage form) and absolute
 * local paths. Anything that would land on the root itself or outside it is
 * rejected.
 */
export class NodePathMapper implements PathMapper {
  readonly rootAbs: string;

  constructor(rootDir: string) {
    this.rootAbs = path.resolve(rootDir);
  }

  toAbsolute(normalized: NormalizedPath): string {
    const posix = toPosix(normalized);
    if (posix.startsWith("/") || path.isAbsolute(normalized) || /^[a-zA-Z]:/.test(posix)) {
      throw new PathOutsideRootError(normalized, this.rootAbs);
    }

    const abs = path.resolve(this.rootAbs, ...posix.split("/"));
    if (!isInsideRoot(path.relative(this.rootAbs, abs))) {
      throw new PathOutsideRootError(normalized, this.rootAbs);
    }
    return abs;
  }

  toNormalized(absolutePath: string): NormalizedPath {
    const rel = path.relative(this.rootAbs, path.resolve(absolutePath));
    if (!isInsideRoot(rel)) {
      throw new PathOutsideRootError(absolutePath, this.rootAbs);
    }
    return toPosix(rel);
  }
}
