/*
Purpose: structured event logging for resolution runs (JSONL file sink and a console sink for the CLI).
Assumptions: a single process writes a given log file; events are small and written synchronously.
Usage: logResolverEvent(logger, "framework.found", { version, path }).
*/

import fs from "node:fs";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export interface EventLogger {
  log(event: LogEvent): void;
}

// =============================================================================
// SINKS
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly context: JsonObject;
  private dirReady = false;

  constructor(
    public readonly filePath: string,
    context: JsonObject = {},
  ) {
    this.context = context;
  }

  log(event: LogEvent): void {
    if (!this.dirReady) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.dirReady = true;
    }

    const record: JsonObject = {
      ts: new Date().toISOString(),
      type: event.type,
      ...this.context,
    };
    if (event.payload) {
      record.payload = event.payload;
    }

    fs.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}

type WritableLike = { write(chunk: string): unknown };

export class ConsoleLogger implements EventLogger {
  constructor(private readonly stream: WritableLike = process.stderr) {}

  log(event: LogEvent): void {
    const fields = Object.entries(event.payload ?? {}).map(
      ([key, value]) => `${key}=${formatField(value)}`,
    );
    this.stream.write(`${[event.type, ...fields].join(" ")}\n`);
  }
}

export function combineLoggers(...loggers: Array<EventLogger | undefined>): EventLogger {
  const active = loggers.filter((logger): logger is EventLogger => logger !== undefined);
  return {
    log: (event) => {
      for (const logger of active) {
        logger.log(event);
      }
    },
  };
}

// =============================================================================
// HELPERS
// =============================================================================

export function logResolverEvent(
  logger: EventLogger | undefined,
  type: string,
  payload?: JsonObject,
): void {
  logger?.log(payload ? { type, payload } : { type });
}

function formatField(value: JsonValue): string {
  if (typeof value === "string") {
    return /\s/.test(value) ? JSON.stringify(value) : value;
  }
  return JSON.stringify(value);
}
