import * as fs from "node:fs";
import * as path from "node:path";

const MAX_LINES = 1000;
const TRIM_TO = 500;

export interface ErrorLogEntry {
  ts: string;
  level: "error" | "warn";
  component: string;
  code: string;
  message: string;
  context?: Record<string, unknown>;
}

function ensureDir(filePath: string): void {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function readLines(logPath: string): string[] {
  const content = fs.readFileSync(logPath, "utf-8");
  return content.split("\n").filter((l) => l.trim().length > 0);
}

/**
 * Appends one JSON line to the failure log at `logPath`. Never throws: a
 * broken log must not abort a cleanup run.
 */
export function logError(logPath: string, entry: Omit<ErrorLogEntry, "ts">): void {
  try {
    ensureDir(logPath);

    const fullEntry: ErrorLogEntry = {
      ts: new Date().toISOString(),
      ...entry,
    };
    fs.appendFileSync(logPath, JSON.stringify(fullEntry) + "\n", "utf-8");

    rotateIfNeeded(logPath);
  } catch (error) {
    process.stderr.write(
      `[ErrorLog] Cannot write ${logPath}: ${error instanceof Error ? error.message : String(error)}\n`
    );
  }
}

function rotateIfNeeded(logPath: string): void {
  const lines = readLines(logPath);
  if (lines.length > MAX_LINES) {
    const trimmed = lines.slice(-TRIM_TO);
    fs.writeFileSync(logPath, trimmed.join("\n") + "\n", "utf-8");
  }
}

function field(obj: object, key: string): unknown {
  return key in obj ? Reflect.get(obj, key) : undefined;
}

function parseEntry(line: string): ErrorLogEntry | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null) return null;

  const ts = field(parsed, "ts");
  const message = field(parsed, "message");
  if (typeof ts !== "string" || typeof message !== "string") return null;

  const component = field(parsed, "component");
  const code = field(parsed, "code");
  const context = field(parsed, "context");
  return {
    ts,
    level: field(parsed, "level") === "warn" ? "warn" : "error",
    component: typeof component === "string" ? component : "unknown",
    code: typeof code === "string" ? code : "unknown_error",
    message,
    ...(typeof context === "object" &&
      context !== null && { context: Object.fromEntries(Object.entries(context)) }),
  };
}

/**
 * Newest entries first.
 */
export function readErrors(logPath: string, limit: number = 50): ErrorLogEntry[] {
  if (!fs.existsSync(logPath)) {
    return [];
  }

  const lines = readLines(logPath);
  const entries: ErrorLogEntry[] = [];
  for (let i = lines.length - 1; i >= 0 && entries.length < limit; i--) {
    const entry = parseEntry(lines[i]!);
    if (entry) entries.push(entry);
  }
  return entries;
}
