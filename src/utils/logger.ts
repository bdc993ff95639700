import { ENV_OVERRIDES } from '../constants/index.js';
import { Logger, LogLevel } from '../types/index.js';

const LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Leveled logger. Every line goes to stderr: stdout carries the output of
 * `devshell env` and `devshell deps`, which is piped or eval'd.
 */
export class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel = LogLevel.INFO,
    private readonly write: (line: string) => void = line => console.error(line)
  ) {}

  debug(message: string, meta?: unknown): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log(LogLevel.ERROR, message, meta);
  }

  private log(level: LogLevel, message: string, meta: unknown): void {
    if (LEVELS.indexOf(level) < LEVELS.indexOf(this.level)) {
      return;
    }

    let line = `${new Date().toISOString()} [devshell:${level}] ${message}`;
    if (meta && typeof meta === 'object') {
      // JSON.stringify(new Error()) is {}
      const metaToLog = meta instanceof Error
        ? { name: meta.name, message: meta.message, stack: meta.stack }
        : meta;
      line += `\n${JSON.stringify(metaToLog, null, 2)}`;
    } else if (meta !== undefined) {
      line += ` ${String(meta)}`;
    }
    this.write(line);
  }
}

/**
 * `DEVSHELL_LOG_LEVEL` wins; otherwise `DEVSHELL_VERBOSE=1` means debug and
 * `NODE_ENV=development` means info. Errors only by default.
 */
export function levelFromEnv(env: Readonly<Record<string, string | undefined>>): LogLevel {
  const requested = env[ENV_OVERRIDES.LOG_LEVEL]?.trim().toLowerCase();
  const explicit = LEVELS.find(level => level === requested);
  if (explicit) {
    return explicit;
  }
  if (env[ENV_OVERRIDES.VERBOSE] === '1') {
    return LogLevel.DEBUG;
  }
  return env.NODE_ENV === 'development' ? LogLevel.INFO : LogLevel.ERROR;
}

export const logger = new ConsoleLogger(levelFromEnv(process.env));
