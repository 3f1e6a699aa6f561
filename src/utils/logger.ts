import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_TAGS: Record<LogLevel, string> = {
  debug: chalk.gray("DEBUG"),
  info: chalk.cyan("INFO "),
  warn: chalk.yellow("WARN "),
  error: chalk.red("ERROR"),
};

const scopeColors: Record<string, (s: string) => string> = {
  scheduler: chalk.magenta,
  executor: chalk.blue,
  notify: chalk.green,
  telegram: chalk.cyan,
  discord: chalk.magenta,
  console: chalk.white,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? "").trim().toLowerCase();
  return v === "debug" || v === "warn" || v === "error" ? v : "info";
}

export class ConsoleLogger implements Logger {
  constructor(private readonly scope: string, private readonly threshold: LogLevel = parseLogLevel(process.env.CRONRELAY_LOG_LEVEL)) {}

  private write(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.threshold]) return;
    const color = scopeColors[this.scope] ?? chalk.gray;
    const line = `${chalk.gray(new Date().toISOString())} ${LEVEL_TAGS[level]} [${color(this.scope)}] ${message}`;
    if (level === "error" || level === "warn") console.error(line);
    else console.log(line);
  }

  debug(message: string): void { this.write("debug", message); }
  info(message: string): void { this.write("info", message); }
  warn(message: string): void { this.write("warn", message); }
  error(message: string): void { this.write("error", message); }
}

export function createLogger(scope: string): Logger {
  return new ConsoleLogger(scope);
}
