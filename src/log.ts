export type LogLevel = "INFO" | "WARNING";

export type LogSink = (line: string) => void;

export type Logger = {
  info(msg: string): void;
  warn(msg: string): void;
};

const stderrSink: LogSink = (line) => console.error(line);

export function formatLine(level: LogLevel, id: string, msg: string, now = new Date()): string {
  return `${now.toISOString()} ${level.padEnd(8)} [${id}] ${msg}`;
}

export function createLogger(id: string, sink: LogSink = stderrSink): Logger {
  return {
    info: (msg) => sink(formatLine("INFO", id, msg)),
    warn: (msg) => sink(formatLine("WARNING", id, msg)),
  };
}

/** Collects messages without timestamps; handy for asserting on what was logged. */
export function memoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (msg) => lines.push(`INFO ${msg}`),
    warn: (msg) => lines.push(`WARNING ${msg}`),
  };
}
