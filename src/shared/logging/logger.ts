export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = {
  runId?: string;
  itemId?: string;
  provider?: string;
  backend?: string;
  attempt?: number;
  [key: string]: unknown;
};

export type LogThreshold = LogLevel | "silent";

const levelRank: Record<LogThreshold, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export const parseLogLevel = (raw: string | undefined, fallback: LogThreshold = "info"): LogThreshold => {
  const normalized = raw?.trim().toLowerCase();
  if (
    normalized === "debug" ||
    normalized === "info" ||
    normalized === "warn" ||
    normalized === "error" ||
    normalized === "silent"
  ) {
    return normalized;
  }
  return fallback;
};

/**
 * One JSON line per event. `event` is a dotted name such as `pipeline.item_failed`.
 * warn/error go to stderr via console.warn/console.error.
 */
export class Logger {
  constructor(
    private readonly component: string,
    private readonly minLevel: LogThreshold = "info",
    private readonly baseFields: LogFields = {}
  ) {}

  child(component: string, fields: LogFields = {}): Logger {
    return new Logger(component, this.minLevel, { ...this.baseFields, ...fields });
  }

  debug(event: string, fields?: LogFields): void {
    this.write("debug", event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.write("info", event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.write("warn", event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.write("error", event, fields);
  }

  private write(level: LogLevel, event: string, fields?: LogFields): void {
    if (levelRank[level] < levelRank[this.minLevel]) return;

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      event,
      component: this.component,
      ...this.baseFields,
      ...(fields ?? {})
    });

    /* eslint-disable no-console */
    if (level === "error") {
      console.error(line);
      return;
    }
    if (level === "warn") {
      console.warn(line);
      return;
    }
    console.log(line);
    /* eslint-enable no-console */
  }
}

export const createLogger = (component: string, level: LogThreshold = "info"): Logger => new Logger(component, level);

export const silentLogger = new Logger("silent", "silent");
