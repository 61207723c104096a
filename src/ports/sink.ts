import * as fs from "fs";
import type { TraceEvent, TraceSink } from "./types";

export const nullTraceSink: TraceSink = {
  emit: () => undefined,
};

/**
 * Keeps every event in memory; used by tests.
 */
export function memoryTraceSink(events: TraceEvent[] = []): TraceSink & { events: TraceEvent[] } {
  return {
    events,
    emit: (event) => {
      events.push(event);
    },
  };
}

/**
 * Appends one JSON line per event to a file.
 */
export function fileTraceSink(filePath: string): TraceSink {
  const fd = fs.openSync(filePath, "a");
  return {
    emit(event) {
      fs.writeSync(fd, `${JSON.stringify({ ts: new Date().toISOString(), ...event })}\n`);
    },
  };
}
