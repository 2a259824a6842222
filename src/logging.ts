export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'critical';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  critical: 4,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBU',
  info: 'INFO',
  warn: 'WARN',
  error: 'ERRO',
  critical: 'CRIT',
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function formatLogLine(level: LogLevel, message: string, now = new Date()): string {
  const time = `${pad(now.getHours(), 2)}:${pad(now.getMinutes(), 2)}:${pad(now.getSeconds(), 2)}.${pad(now.getMilliseconds(), 3)}`;
  return `${time} ${LEVEL_LABELS[level]} ${message}`;
}

// stdout carries the report, so every log line goes to stderr.
function wantsColor(): boolean {
  if (process.env.NO_COLOR) return false;
  return Boolean(process.stderr.isTTY);
}

function color(level: LogLevel, text: string): string {
  if (!wantsColor()) return text;
  const reset = '\x1b[0m';
  const code =
    level === 'critical' || level === 'error'
      ? '\x1b[31m'
      : level === 'warn'
        ? '\x1b[33m'
        : level === 'info'
          ? '\x1b[36m'
          : '\x1b[90m';
  return `${code}${text}${reset}`;
}

function write(level: LogLevel, message: string): void {
  if (!isLevelEnabled(level)) return;
  console.error(color(level, formatLogLine(level, message)));
}

export const log = {
  debug: (message: string): void => write('debug', message),
  info: (message: string): void => write('info', message),
  warn: (message: string): void => write('warn', message),
  error: (message: string): void => write('error', message),
  critical: (message: string): void => write('critical', message),
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
