import path from "node:path";

export const STATE_DIR_NAME = ".dirsync";

export function createSyncIgnore(rootDir: string, stateDirName = STATE_DIR_NAME) {
  const root = path.resolve(rootDir);

  return (absPath: string) => {
    const p = path.resolve(absPath);

    // anything outside the root is never part of a snapshot
    const relNative = path.relative(root, p);
    if (relNative === "" || relNative === ".." || relNative.startsWith(`..${path.sep}`)) return true;
    if (path.isAbsolute(relNative)) return true;

    const rel = relNative.replaceAll("\\", "/");

    if (rel === stateDirName || rel.startsWith(`${stateDirName}/`)) return true;

    // editor and OS leftovers
    const base = path.posix.basename(rel);
    if (base.endsWith("~")) return true;
    if (base.endsWith(".tmp")) return true;
    if (base.endsWith(".swp")) return true;
    if (base === ".DS_Store") return true;

    return false;
  };
}
