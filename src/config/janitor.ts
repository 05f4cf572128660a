import { resolve } from "node:path";
import { z } from "zod";
import { ConfigError } from "../utils/errors.js";
import { DEFAULT_PAGE_SIZE } from "../utils/pagination.js";

const optionalPath = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? resolve(value) : undefined));

const configSchema = z.object({
  SLACK_JANITOR_SLEEP_FOR: z.coerce
    .number()
    .min(0)
    .default(0)
    .describe("Seconds to sleep after every delete"),
  SLACK_JANITOR_PAGE_SIZE: z.coerce
    .number()
    .int()
    .min(1)
    .max(1000)
    .default(DEFAULT_PAGE_SIZE)
    .describe("Records requested per page"),
  SLACK_JANITOR_LOG_LEVEL: z
    .enum(["debug", "info", "warn", "error"])
    .default("info")
    .describe("Console log level"),
  SLACK_JANITOR_LOG_FILE: optionalPath.describe("File receiving every log line down to debug"),
  SLACK_JANITOR_ERROR_LOG: optionalPath.describe("JSON-lines log of failed deletes and errors"),
});

export interface JanitorConfig {
  sleepForMs: number;
  pageSize: number;
  logLevel: "debug" | "info" | "warn" | "error";
  logFile: string | undefined;
  errorLogPath: string | undefined;
}

/**
 * Reads the janitor settings from the environment. Empty variables count as
 * unset.
 */
export function resolveJanitorConfig(env: NodeJS.ProcessEnv = process.env): JanitorConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(
      (entry): entry is [string, string] =>
        entry[0].startsWith("SLACK_JANITOR_") && entry[1] !== undefined && entry[1].trim() !== ""
    )
  );

  const parsed = configSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid janitor configuration: ${problems.join("; ")}`);
  }

  const config = parsed.data;
  return {
    sleepForMs: config.SLACK_JANITOR_SLEEP_FOR * 1000,
    pageSize: config.SLACK_JANITOR_PAGE_SIZE,
    logLevel: config.SLACK_JANITOR_LOG_LEVEL,
    logFile: config.SLACK_JANITOR_LOG_FILE,
    errorLogPath: config.SLACK_JANITOR_ERROR_LOG,
  };
}
