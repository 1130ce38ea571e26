/**
 * Telemetry Module
 */

export type { LogLevel, ApiLogContext, Logger, LogEntry } from "./logging";
export {
  noOpLogger,
  InMemoryLogger,
  ConsoleLogger,
} from "./logging";
