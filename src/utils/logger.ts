/**
 * Diagnostic logger for flow-graph-lint
 *
 * Reports are written to stdout, so every log line goes to stderr
 * (console.warn for warnings, console.error for the rest).
 * Level and format come from FLOW_LINT_LOG_LEVEL and FLOW_LINT_LOG_JSON,
 * or from the CLI's --debug flag.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export type LogContext = Record<string, unknown>;

type LevelName = Exclude<keyof typeof LogLevel, 'SILENT'>;

const SINKS: Readonly<Record<LevelName, (line: string) => void>> = {
  DEBUG: line => console.error(line),
  INFO: line => console.error(line),
  WARN: line => console.warn(line),
  ERROR: line => console.error(line),
};

/**
 * Parse a level name such as "debug" or "WARN"
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const name = value.toUpperCase();
  for (const level of [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR, LogLevel.SILENT]) {
    if (LogLevel[level] === name) return level;
  }
  return undefined;
}

class Logger {
  private static instance: Logger | undefined;
  private level: LogLevel;
  private jsonOutput: boolean;

  private constructor() {
    this.level = parseLogLevel(process.env.FLOW_LINT_LOG_LEVEL) ?? LogLevel.WARN;
    this.jsonOutput = process.env.FLOW_LINT_LOG_JSON === 'true';
  }

  static getInstance(): Logger {
    Logger.instance ??= new Logger();
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setJsonOutput(enabled: boolean): void {
    this.jsonOutput = enabled;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return level !== LogLevel.SILENT && level >= this.level;
  }

  debug(message: string, context?: LogContext): void {
    this.write('DEBUG', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('INFO', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('WARN', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('ERROR', message, context);
  }

  private write(name: LevelName, message: string, context?: LogContext): void {
    if (!this.isLevelEnabled(LogLevel[name])) {
      return;
    }

    let line: string;
    if (this.jsonOutput) {
      line = JSON.stringify({ timestamp: new Date().toISOString(), level: name, message, context });
    } else {
      line = context ? `[${name}] ${message} ${JSON.stringify(context)}` : `[${name}] ${message}`;
    }
    SINKS[name](line);
  }
}

export type { Logger };

export function getLogger(): Logger {
  return Logger.getInstance();
}

export const logger = Logger.getInstance();
