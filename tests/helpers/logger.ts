import { StructuredLogger, type LogEntry, type LogLevel } from "../../src/logger.js";

/** Logger writing nowhere that keeps every emitted entry for assertions. */
export function createCapturingLogger(level: LogLevel = "debug"): {
  logger: StructuredLogger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({
    level,
    sink: { write: () => true },
    onEntry: (entry) => {
      entries.push(entry);
    },
  });
  return { logger, entries };
}
