import consola from "consola";

import type { ConsolaInstance } from "consola";

/**
 * Progress and diagnostics sink for a generation run. The CLI prints
 * through consola; programmatic callers pass their own.
 */
export interface SdkLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  start(message: string): void;
  /** Run summary */
  box(options: { title: string; message: string }): void;
}

export type LogLevel = keyof SdkLogger;

export interface ConsolaLoggerOptions {
  /** Print warnings and errors only */
  quiet?: boolean;
  instance?: ConsolaInstance;
}

const noop = () => {};

export function createConsolaLogger(
  options: ConsolaLoggerOptions = {},
): SdkLogger {
  const { quiet = false, instance = consola } = options;
  if (quiet) {
    return {
      ...createSilentLogger(),
      warn: (message) => instance.warn(message),
      error: (message) => instance.error(message),
    };
  }
  return {
    info: (message) => instance.info(message),
    success: (message) => instance.success(message),
    warn: (message) => instance.warn(message),
    error: (message) => instance.error(message),
    start: (message) => instance.start(message),
    box: (box) => instance.box(box),
  };
}

export function createSilentLogger(): SdkLogger {
  return {
    info: noop,
    success: noop,
    warn: noop,
    error: noop,
    start: noop,
    box: noop,
  };
}

// ============================================================================
// Recording
// ============================================================================

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export interface RecordingLogger extends SdkLogger {
  /** Every message in the order it was logged */
  readonly entries: LogEntry[];
  /** Messages logged at one level */
  messages(level: LogLevel): string[];
}

/**
 * Keep messages in memory, for tests and for callers that report
 * diagnostics themselves. Box summaries are stored as "title: message".
 */
export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };

  return {
    entries,
    messages: (level) =>
      entries
        .filter((entry) => entry.level === level)
        .map((entry) => entry.message),
    info: record("info"),
    success: record("success"),
    warn: record("warn"),
    error: record("error"),
    start: record("start"),
    box: ({ title, message }) => record("box")(`${title}: ${message}`),
  };
}

export const defaultLogger = createConsolaLogger();
