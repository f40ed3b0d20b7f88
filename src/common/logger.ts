export type LogLevel = 'INFO' | 'WARN' | 'ERROR';

/**
 * Receives one fully formatted log line.
 */
export type LogSink = (line: string) => void;

let sink: LogSink = (line) => {
  console.log(line);
};

/**
 * Replaces the active sink and returns the previous one.
 * Worker threads install a sink that forwards lines to the main thread.
 */
export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

/**
 * Writes an already formatted line, e.g. one forwarded from a worker.
 */
export function writeLogLine(line: string): void {
  sink(line);
}

function timestamp(dt = new Date()): string {
  const y = dt.getFullYear();
  const m = String(dt.getMonth() + 1).padStart(2, '0');
  const d = String(dt.getDate()).padStart(2, '0');
  const hh = String(dt.getHours()).padStart(2, '0');
  const mm = String(dt.getMinutes()).padStart(2, '0');
  const ss = String(dt.getSeconds()).padStart(2, '0');
  const ms = String(dt.getMilliseconds()).padStart(3, '0');
  return `${y}.${m}.${d} ${hh}:${mm}:${ss}.${ms}`;
}

/**
 * Write a jsonl log entry. The entry carries a timestamp, log level, event name, and any additional fields provided.
 */
export function logJsonl(level: LogLevel, event: string, fields: Record<string, unknown> = {}): void {
  sink(
    JSON.stringify({
      timestamp: timestamp(),
      level,
      event,
      ...fields,
    }),
  );
}

export function log(level: LogLevel, message: string): void {
  sink(`[${timestamp()}] ${level} - ${message}`);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

export function getErrorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}
