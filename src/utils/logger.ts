import { LogLevel, type Logger } from '../types/index.js';
import { ENV_VARS } from '../constants/index.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40
};

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find(level => level === normalized);
}

function formatMeta(meta: unknown): string {
  if (meta === undefined) return '';
  try {
    return ' ' + JSON.stringify(meta, (_key, value: unknown) => {
      if (value instanceof Error) {
        return { name: value.name, message: value.message };
      }
      return value;
    });
  } catch {
    return ` ${String(meta)}`;
  }
}

/**
 * Leveled diagnostic logger. Writes to stderr so it never mixes with
 * command output such as `lintflow env`.
 */
class ConsoleLogger implements Logger {
  constructor(private level: LogLevel) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: unknown): void {
    this.write(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.write(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.write(LogLevel.WARN, message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.write(LogLevel.ERROR, message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }
    console.error(`[${level}] ${message}${formatMeta(meta)}`);
  }
}

export const logger = new ConsoleLogger(
  parseLogLevel(process.env[ENV_VARS.LOG_LEVEL]) ?? LogLevel.WARN
);
