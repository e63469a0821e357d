import { format } from 'util';
import Logger, { LOG_LEVELS, LogEntry, LogLevel } from './Logger.js';

export interface ConsoleLoggerOptions {
  // Entries below this level are dropped; 'none' drops everything
  logLevel?: LogLevel | 'none';
  include?: {
    level?: boolean;
    originator?: boolean;
    errorStack?: boolean;
  };
}

const DEFAULT_CONSOLE_LOGGER_OPTIONS = {
  logLevel: 'info',
  include: {
    level: true,
    originator: true,
    errorStack: false
  }
} as const;

export default class ConsoleLogger extends Logger {

  #logLevel: LogLevel | 'none';
  #include: Required<NonNullable<ConsoleLoggerOptions['include']>>;

  constructor(options?: ConsoleLoggerOptions) {
    super();
    this.#logLevel = options?.logLevel ?? DEFAULT_CONSOLE_LOGGER_OPTIONS.logLevel;
    this.#include = {
      level: options?.include?.level ?? DEFAULT_CONSOLE_LOGGER_OPTIONS.include.level,
      originator: options?.include?.originator ?? DEFAULT_CONSOLE_LOGGER_OPTIONS.include.originator,
      errorStack: options?.include?.errorStack ?? DEFAULT_CONSOLE_LOGGER_OPTIONS.include.errorStack
    };
  }

  log(entry: LogEntry) {
    if (!this.#shouldLog(entry.level)) {
      return;
    }
    const line = this.toLine(entry);
    switch (entry.level) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      default:
        console.log(line);
    }
  }

  toLine(entry: LogEntry) {
    const prefix: string[] = [];
    if (this.#include.level) {
      prefix.push(`[${entry.level}]`);
    }
    if (this.#include.originator && entry.originator) {
      prefix.push(`${entry.originator}:`);
    }
    const [ first, ...rest ] = entry.message.map((m) => {
      if (m instanceof Error && !this.#include.errorStack) {
        return `${m.name}: ${m.message}`;
      }
      return m;
    });
    return [ ...prefix, format(first, ...rest) ].join(' ');
  }

  #shouldLog(level: LogLevel) {
    if (this.#logLevel === 'none') {
      return false;
    }
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#logLevel);
  }

  end(): Promise<void> {
    return Promise.resolve();
  }
}
