import chalk from "chalk";
import { LogLevel } from "../schemas";

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warning: 1,
  info: 2,
  debug: 3,
  trace: 4
};

const LEVEL_STYLE: Record<LogLevel, chalk.Chalk> = {
  error: chalk.red,
  warning: chalk.yellow,
  info: chalk.blue,
  debug: chalk.gray,
  trace: chalk.gray
};

export interface LogSink {
  write(line: string): void;
}

const stderrSink: LogSink = {
  write: (line) => {
    process.stderr.write(`${line}\n`);
  }
};

const settings: { level: LogLevel; sink: LogSink } = {
  level: "warning",
  sink: stderrSink
};

export function parseLogLevel(value: string | undefined): LogLevel {
  const parsed = LogLevel.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : "info";
}

/** --log-level, then --verbose, then QF_LOG_LEVEL, then logging.level in config. */
export function resolveLogLevel(options: {
  flag?: string;
  verbose?: boolean;
  env: NodeJS.ProcessEnv;
  configLevel?: string;
}): LogLevel {
  if (options.flag) return parseLogLevel(options.flag);
  if (options.verbose) return "debug";
  if (options.env.QF_LOG_LEVEL) return parseLogLevel(options.env.QF_LOG_LEVEL);
  if (options.configLevel) return parseLogLevel(options.configLevel);
  return "warning";
}

export function setupLogging(level: LogLevel, sink?: LogSink): void {
  settings.level = level;
  if (sink) {
    settings.sink = sink;
  }
}

export function resetLogging(): void {
  settings.level = "warning";
  settings.sink = stderrSink;
}

export function currentLogLevel(): LogLevel {
  return settings.level;
}

function timestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export class Logger {
  constructor(readonly name: string) {}

  error(message: string): void {
    this.log("error", message);
  }

  warn(message: string): void {
    this.log("warning", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  trace(message: string): void {
    this.log("trace", message);
  }

  enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[settings.level];
  }

  private log(level: LogLevel, message: string): void {
    if (!this.enabled(level)) return;

    const label = level.toUpperCase();
    const verbose = LEVEL_RANK[settings.level] >= LEVEL_RANK.debug;
    const line = verbose
      ? `${timestamp(new Date())} [${label}] ${this.name} - ${message}`
      : `${label}: ${message}`;
    settings.sink.write(LEVEL_STYLE[level](line));
  }
}

export function getLogger(name: string): Logger {
  return new Logger(name);
}
