export interface Logger {
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, metadata?: Record<string, unknown>): void;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly scope: string) {}

  info(message: string, metadata?: Record<string, unknown>): void {
    console.info(`[${this.scope}] ${message}`, metadata ?? "");
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    console.warn(`[${this.scope}] ${message}`, metadata ?? "");
  }

  error(message: string, metadata?: Record<string, unknown>): void {
    console.error(`[${this.scope}] ${message}`, metadata ?? "");
  }
}

export class SilentLogger implements Logger {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  info(_message: string, _metadata?: Record<string, unknown>): void {}
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  warn(_message: string, _metadata?: Record<string, unknown>): void {}
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  error(_message: string, _metadata?: Record<string, unknown>): void {}
}

export type LogLevel = "info" | "silent";

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  return level === "silent" ? new SilentLogger() : new ConsoleLogger(scope);
}
