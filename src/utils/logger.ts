/**
 * Stderr logger.
 *
 * stdout is reserved for converter output, so every log line goes to stderr.
 * The threshold comes from DOCX_BITS_LOG_LEVEL (debug | info | warn | error | silent).
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(value: string): value is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentThreshold(): number {
  const configured = (process.env.DOCX_BITS_LOG_LEVEL ?? 'info').toLowerCase();
  return isThreshold(configured) ? LEVEL_ORDER[configured] : LEVEL_ORDER.info;
}

export function logToStderr(level: LogLevel, message: string): void {
  if (LEVEL_ORDER[level] < currentThreshold()) return;
  process.stderr.write(`[docx-bits] ${level.toUpperCase()} ${message}\n`);
}

export const logger = {
  debug: (message: string) => logToStderr('debug', message),
  info: (message: string) => logToStderr('info', message),
  warn: (message: string) => logToStderr('warn', message),
  error: (message: string) => logToStderr('error', message),
};
