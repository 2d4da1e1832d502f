import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { z } from "zod";

import { ConfigError } from "./errors";
import type { LogLevel } from "../infra/logger";

const requiredString = (key: string) =>
  z
    .string({ required_error: `${key} is required` })
    .trim()
    .min(1, `${key} is required`);

const configSchema = z.object({
  CLIENT_ID: requiredString("CLIENT_ID"),
  RABBITMQ_ADDRESS: requiredString("RABBITMQ_ADDRESS"),
  RABBITMQ_QUEUE_NAME: requiredString("RABBITMQ_QUEUE_NAME"),
  // trailing slash stripped so endpoint paths can be appended
  SYNC_SERVER_URL: requiredString("SYNC_SERVER_URL")
    .url("SYNC_SERVER_URL must be a URL")
    .transform((url) => url.replace(/\/+$/, "")),
  SYNC_DIRECTORY: requiredString("SYNC_DIRECTORY"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
});

export type ClientConfig = {
  clientId: string;
  queueAddress: string;
  queueName: string;
  serverUrl: string;
  syncDirectory: string;
  logLevel: LogLevel;
};

type Env = Record<string, string | undefined>;

/**
 * Builds the client configuration from an environment map. Empty strings
 * count as missing. Every offending key is reported in one ConfigError.
 */
export function parseConfig(env: Env): ClientConfig {
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === "" ? undefined : value;
  }

  const result = configSchema.safeParse(cleaned);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((i) => String(i.path[0] ?? "")))];
    const details = result.error.issues.map((i) => i.message).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, keys);
  }

  const data = result.data;
  return {
    clientId: data.CLIENT_ID,
    queueAddress: data.RABBITMQ_ADDRESS,
    queueName: data.RABBITMQ_QUEUE_NAME,
    serverUrl: data.SYNC_SERVER_URL,
    syncDirectory: path.resolve(data.SYNC_DIRECTORY),
    logLevel: data.LOG_LEVEL,
  };
}

/** Loads `.env` from the working directory (process env wins), then parses. */
export function loadConfig(envFile = ".env"): ClientConfig {
  loadDotenv({ path: envFile });
  return parseConfig(process.env);
}
