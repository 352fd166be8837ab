import fs from "node:fs";
import path from "node:path";

import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type LogEvent = {
  type: string;
  payload?: JsonObject;
};

export type LogRecord = {
  ts: string;
  type: string;
  payload?: JsonObject;
  [key: string]: JsonValue | undefined;
};

export interface LogSink {
  log(event: LogEvent): void;
}

// =============================================================================
// SINKS
// =============================================================================

/** Appends one JSON object per line; the parent directory is created on first write. */
export class JsonlLogger implements LogSink {
  private ensured = false;

  constructor(
    readonly filePath: string,
    private readonly context: JsonObject = {},
  ) {}

  log(event: LogEvent): void {
    if (!this.ensured) {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      this.ensured = true;
    }

    const record = buildRecord(event, this.context);
    fs.appendFileSync(this.filePath, JSON.stringify(record) + "\n", "utf8");
  }
}

export class MemoryLogSink implements LogSink {
  readonly records: LogRecord[] = [];

  constructor(private readonly context: JsonObject = {}) {}

  log(event: LogEvent): void {
    this.records.push(buildRecord(event, this.context));
  }

  ofType(type: string): LogRecord[] {
    return this.records.filter((record) => record.type === type);
  }
}

export const NullLogSink: LogSink = {
  log: () => undefined,
};

// =============================================================================
// HELPERS
// =============================================================================

export function logEvent(sink: LogSink, type: string, payload?: JsonObject): void {
  sink.log(payload ? { type, payload } : { type });
}

function buildRecord(event: LogEvent, context: JsonObject): LogRecord {
  const record: LogRecord = { ts: isoNow(), ...context, type: event.type };
  if (event.payload) {
    record.payload = event.payload;
  }
  return record;
}
