export type LoggerLike = {
  info?: (message: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

export type LogLevel = "info" | "warn" | "error";

export type LogLine = {
  at: string;
  level: LogLevel;
  message: string;
};

export const LOG_PREFIX = "[piper-voice]";

/**
 * Forwards to the host logger and keeps the most recent lines in memory so
 * they can be shown by the status action.
 */
export class DiagnosticLog implements Required<LoggerLike> {
  private readonly lines: LogLine[] = [];

  constructor(
    private readonly sink: LoggerLike | undefined,
    private readonly capacity = 200,
    private readonly now: () => Date = () => new Date(),
  ) {}

  info = (message: string): void => this.write("info", message);
  warn = (message: string): void => this.write("warn", message);
  error = (message: string): void => this.write("error", message);

  recent(limit = this.capacity): LogLine[] {
    return limit <= 0 ? [] : this.lines.slice(-limit);
  }

  clear(): void {
    this.lines.length = 0;
  }

  private write(level: LogLevel, message: string): void {
    const text = `${LOG_PREFIX} ${message}`;
    this.sink?.[level]?.(text);

    if (this.capacity <= 0) return;
    this.lines.push({ at: this.now().toISOString(), level, message });
    if (this.lines.length > this.capacity) {
      this.lines.splice(0, this.lines.length - this.capacity);
    }
  }
}
