import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
export type Logger = pino.Logger;

function getModuleName(module: string | ImportMeta): string {
  const moduleUrl = typeof module === "string" ? module : module.url;
  const lastSlashIndex = moduleUrl.lastIndexOf("/");
  const fileName = lastSlashIndex >= 0 ? moduleUrl.substring(lastSlashIndex + 1) : moduleUrl;
  const parts = fileName.split(".");
  return parts.length > 1 ? parts.slice(0, -1).join(".") : fileName;
}

export function createRootLogger(level: LogLevel = "info"): Logger {
  return pino({
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Child logger bound to a module name. Call as `childLogger(root, import.meta)`
 * near the top of a file, or pass a plain name.
 */
export function childLogger(parent: Logger, module: string | ImportMeta): Logger {
  return parent.child({ module: getModuleName(module) });
}

export function logError(logger: Logger, err: unknown, message: string): void {
  if (err instanceof Error) {
    logger.error({ err }, message);
  } else {
    logger.error({ err: String(err) }, message);
  }
}
