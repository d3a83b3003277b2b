// Logger centralizado da API de relatórios

type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = Record<string, unknown>;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const SENSITIVE_KEYS = ["password", "token", "secret", "key", "authorization"];

function isLogLevel(v: string | undefined): v is LogLevel {
  return v === "debug" || v === "info" || v === "warn" || v === "error";
}

export class Logger {
  private readonly isDev: boolean;
  private readonly minLevel: LogLevel;
  private readonly silent: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.isDev = env.NODE_ENV !== "production";
    this.silent = env.NODE_ENV === "test";
    const configured = env.LOG_LEVEL?.toLowerCase();
    this.minLevel = isLogLevel(configured) ? configured : this.isDev ? "debug" : "info";
  }

  private enabled(level: LogLevel): boolean {
    return !this.silent && LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context && Object.keys(context).length ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  sanitizeContext(context?: LogContext): LogContext | undefined {
    if (!context) return undefined;

    const sanitized: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
      const lowerKey = key.toLowerCase();
      sanitized[key] = SENSITIVE_KEYS.some((sk) => lowerKey.includes(sk)) ? "***REDACTED***" : value;
    }
    return sanitized;
  }

  info(message: string, context?: LogContext): void {
    if (!this.enabled("info")) return;
    console.log(this.formatMessage("info", message, this.sanitizeContext(context)));
  }

  warn(message: string, context?: LogContext): void {
    if (!this.enabled("warn")) return;
    console.warn(this.formatMessage("warn", message, this.sanitizeContext(context)));
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (!this.enabled("error")) return;

    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;

    console.error(
      this.formatMessage("error", `${message}: ${errorMessage}`, {
        ...this.sanitizeContext(context),
        ...(errorStack && this.isDev ? { stack: errorStack } : {}),
      })
    );
  }

  debug(message: string, context?: LogContext): void {
    if (!this.enabled("debug")) return;
    console.log(this.formatMessage("debug", message, this.sanitizeContext(context)));
  }
}

export const logger = new Logger();
