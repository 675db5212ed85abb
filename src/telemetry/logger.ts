import { isTelemetryDisabled, isVerboseEnabled } from '../utils/runtime_controls.js';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LEVEL_WEIGHTS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_WEIGHTS;
}

function shouldEmit(level: LogLevel): boolean {
  if (isTelemetryDisabled()) {
    return false;
  }

  const envLevel = String(process.env.EVIDENCE_LOG_LEVEL ?? '').toLowerCase().trim();
  if (envLevel === 'silent' || envLevel === 'none' || envLevel === 'off' || envLevel === 'quiet') {
    return false;
  }
  const threshold = isLogLevel(envLevel)
    ? LEVEL_WEIGHTS[envLevel]
    : (isVerboseEnabled() ? LEVEL_WEIGHTS.info : LEVEL_WEIGHTS.warn);

  return LEVEL_WEIGHTS[level] >= threshold;
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (!shouldEmit(level)) return;

  // stdout belongs to command output (`--json`); logs go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
