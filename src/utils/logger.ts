import {
  destination,
  multistream,
  pino,
  type DestinationStream,
  type Level,
  type Logger,
  type StreamEntry,
} from "pino";
import type { SlackError } from "../slack/types.js";
import { logError } from "./error-log.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = Record<string, unknown>;

/**
 * Logging sink the janitor reports to. `deleted` is the structured event
 * emitted once per delete attempt.
 */
export interface JanitorLog {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warning(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  deleted(entity: object, error?: SlackError | null): void;
}

/**
 * One level of the delete-counter stack.
 */
export class DeleteCounter {
  deleted = 0;
  errors = 0;

  constructor(readonly name: string) {}

  record(error?: SlackError | null): void {
    if (error) {
      this.errors++;
    } else {
      this.deleted++;
    }
  }

  toString(): string {
    return `${this.name}: deleted: ${this.deleted}, errors: ${this.errors}`;
  }
}

export interface SlackLoggerOptions {
  level?: LogLevel;
  /** Also write every entry, down to debug, to this file */
  logFile?: string;
  /** JSON-lines log receiving failed deletes and error entries */
  errorLogPath?: string;
  /** Console destination, stdout by default */
  destination?: DestinationStream;
  name?: string;
}

const COMPONENT = "SlackJanitor";

export class SlackLogger implements JanitorLog {
  private readonly logger: Logger;
  readonly overall = new DeleteCounter("overall");
  private readonly layers: DeleteCounter[] = [this.overall];
  private readonly errorLogPath: string | undefined;

  constructor(options: SlackLoggerOptions = {}) {
    const level: Level = options.level ?? "info";
    const streams: StreamEntry[] = [
      { level, stream: options.destination ?? process.stdout },
    ];
    if (options.logFile) {
      streams.push({
        level: "debug",
        stream: destination({ dest: options.logFile, sync: true, mkdir: true }),
      });
    }

    this.logger = pino(
      {
        name: options.name ?? "slack-janitor",
        level: options.logFile ? "debug" : level,
      },
      multistream(streams)
    );
    this.errorLogPath = options.errorLogPath;
  }

  debug(message: string, data?: LogData): void {
    this.logger.debug(data ?? {}, message);
  }

  info(message: string, data?: LogData): void {
    this.logger.info(data ?? {}, message);
  }

  warning(message: string, data?: LogData): void {
    this.logger.warn(data ?? {}, message);
  }

  error(message: string, data?: LogData): void {
    this.logger.error(data ?? {}, message);
    if (this.errorLogPath) {
      logError(this.errorLogPath, {
        level: "error",
        component: COMPONENT,
        code: typeof data?.code === "string" ? data.code : "error",
        message,
        ...(data && { context: data }),
      });
    }
  }

  deleted(entity: object, error?: SlackError | null): void {
    for (const layer of this.layers) {
      layer.record(error);
    }

    if (!error) {
      this.debug(`deleted entry: ${String(entity)}`);
      return;
    }

    this.warning(`cannot delete entry: ${String(entity)}: ${error.message}`, {
      code: error.code,
    });
    if (this.errorLogPath) {
      logError(this.errorLogPath, {
        level: "warn",
        component: COMPONENT,
        code: error.code,
        message: error.message,
        context: { entity: String(entity) },
      });
    }
  }

  /**
   * Pushes a named counter; deletes are tallied on it until `pop()`.
   */
  group(name: string): DeleteCounter {
    const layer = new DeleteCounter(name);
    this.info(`start deleting: ${name}`);
    this.layers.push(layer);
    return layer;
  }

  pop(): DeleteCounter | undefined {
    if (this.layers.length <= 1) {
      return undefined;
    }
    const layer = this.layers.pop();
    if (layer) {
      this.info(`stop deleting: ${layer.toString()}`);
    }
    return layer;
  }

  summary(): void {
    this.info(`summary ${this.overall.toString()}`);
  }
}
