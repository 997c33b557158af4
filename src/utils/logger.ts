type LogLevel = "debug" | "info" | "warning" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
};

function resolveLevel(raw: string | undefined): LogLevel {
  switch ((raw || "").toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warning";
    case "error":
      return "error";
    default:
      return "info";
  }
}

function formatDetail(detail: unknown): string {
  if (detail === undefined) return "";
  if (detail instanceof Error) {
    return ` ${detail.name}: ${detail.message}`;
  }
  if (typeof detail === "string") return ` ${detail}`;
  try {
    return ` ${JSON.stringify(detail)}`;
  } catch {
    return ` ${String(detail)}`;
  }
}

class Logger {
  private minLevel: LogLevel = resolveLevel(process.env.LOG_LEVEL);

  setLevel(level: string): void {
    this.minLevel = resolveLevel(level);
  }

  debug(message: string, detail?: unknown): void {
    this.write("debug", "DEBUG", message, detail);
  }

  info(message: string, detail?: unknown): void {
    this.write("info", "INFO", message, detail);
  }

  success(message: string, detail?: unknown): void {
    this.write("info", "OK", message, detail);
  }

  warning(message: string, detail?: unknown): void {
    this.write("warning", "WARN", message, detail);
  }

  error(message: string, detail?: unknown): void {
    this.write("error", "ERROR", message, detail);
  }

  /**
   * Trading-permission changes. Always printed, whatever the level.
   */
  critical(message: string, detail?: unknown): void {
    const line = `${new Date().toISOString()} [CRITICAL] ${message}${formatDetail(detail)}`;
    console.error(line);
  }

  private write(
    level: LogLevel,
    tag: string,
    message: string,
    detail: unknown
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return;
    const line = `${new Date().toISOString()} [${tag}] ${message}${formatDetail(detail)}`;
    if (level === "error") {
      console.error(line);
    } else if (level === "warning") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger();
