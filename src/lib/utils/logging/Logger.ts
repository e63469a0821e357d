export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  originator: string | null;
  message: unknown[];
}

export default abstract class Logger {
  abstract log(entry: LogEntry): void;
  abstract end(): Promise<void>;
}

export const LOG_LEVELS: readonly LogLevel[] = [ 'debug', 'info', 'warn', 'error' ];

export function commonLog(target: Logger | null | undefined, level: LogLevel, originator: string | null, ...message: unknown[]) {
  if (!target) {
    return;
  }
  target.log({
    level,
    originator,
    message
  });
}
