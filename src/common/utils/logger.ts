import { isSpanContextValid, trace } from '@opentelemetry/api';
import { redactSensitiveData } from './pii-redaction';

/**
 * Service logger.
 * Production: JSON lines. Development: styled output with ANSI colors.
 * Every entry carries the active trace/span ids when a span is in scope.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogType = 'system' | 'http' | 'checkout' | 'collaborator' | 'security';

export interface LogMeta {
  type?: LogType;
  method?: string;
  duration?: number;
  context?: string;
  [key: string]: unknown;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const INDICATORS: Record<LogLevel | LogType, string> = {
  error: '[ERROR]',
  warn: '[WARN ]',
  info: '[INFO ]',
  debug: '[DEBUG]',
  http: '[HTTP ]',
  checkout: '[CHECKOUT]',
  collaborator: '[UPSTREAM]',
  security: '[SECURITY]',
  system: '[SYSTEM]',
};

const ANSI = {
  reset: '\x1b[0m',
  gray: '\x1b[90m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  bold: '\x1b[1m',
};

function getLogLevel(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug');
  if (raw === 'log') return 'info';
  return isLogLevel(raw) ? raw : 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

function shouldLog(level: LogLevel): boolean {
  return LEVELS[level] >= LEVELS[getLogLevel()];
}

function getTimestamp(): string {
  const now = new Date();
  return (
    now.toTimeString().split(' ')[0] +
    '.' +
    String(now.getMilliseconds()).padStart(3, '0')
  );
}

function formatMetaForDisplay(meta?: LogMeta): string {
  const safeMeta = sanitizeMeta(meta);
  if (!safeMeta) {
    return '';
  }

  const filtered = { ...safeMeta };
  delete filtered.type;
  delete filtered.method;
  if (Object.keys(filtered).length === 0) return '';
  return (
    '\n  | ' +
    JSON.stringify(filtered, null, 2).split('\n').join('\n  | ')
  );
}

function sanitizeMeta(meta?: LogMeta): LogMeta | undefined {
  if (!meta) {
    return undefined;
  }

  const redacted = redactSensitiveData(meta);
  if (typeof redacted !== 'object' || redacted === null || Array.isArray(redacted)) {
    return undefined;
  }

  return redacted as LogMeta;
}

function resolveTraceFields(): { trace_id?: string; span_id?: string } {
  const spanContext = trace.getActiveSpan()?.spanContext();
  if (!spanContext || !isSpanContextValid(spanContext)) {
    return {};
  }

  return { trace_id: spanContext.traceId, span_id: spanContext.spanId };
}

function log(level: LogLevel, message: string, meta?: LogMeta, context?: string): void {
  if (!shouldLog(level)) return;

  const type = meta?.type;
  const indicator = type ? INDICATORS[type] : INDICATORS[level];
  const methodPrefix = meta?.method ? `[${meta.method}] ` : '';
  const traceFields = resolveTraceFields();
  const enrichedMeta: LogMeta | undefined =
    meta || traceFields.trace_id ? { ...meta, ...traceFields } : undefined;
  const ctx = context ? `[${context}] ` : '';

  if (process.env.NODE_ENV === 'production') {
    const payload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(context && { context }),
      ...(sanitizeMeta(enrichedMeta) ?? {}),
    };
    const line = JSON.stringify(payload);
    if (level === 'error') process.stderr.write(line + '\n');
    else process.stdout.write(line + '\n');
    return;
  }

  const msgStyle = level === 'error' ? ANSI.red : level === 'warn' ? ANSI.yellow : '';
  const out = `${ANSI.gray}[${getTimestamp()}]${ANSI.reset} ${indicator} ${msgStyle}${ctx}${methodPrefix}${message}${formatMetaForDisplay(enrichedMeta)}${ANSI.reset}`;

  switch (level) {
    case 'error':
      console.error(out);
      break;
    case 'warn':
      console.warn(out);
      break;
    default:
      console.log(out);
  }
}

function createLogFn(level: LogLevel, context?: string) {
  return (message: string, meta?: LogMeta) => log(level, message, meta, context);
}

function createTypedLogFn(level: LogLevel, type: LogType, context?: string) {
  return (message: string, meta?: Omit<LogMeta, 'type'>) =>
    log(level, message, { ...meta, type }, context);
}

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, error?: Error, meta?: LogMeta) => void;
  http: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  checkout: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  collaborator: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  security: (message: string, meta?: Omit<LogMeta, 'type'>) => void;
  boot: (services: readonly string[]) => void;
}

function createLoggerImpl(context?: string): Logger {
  const isDev = process.env.NODE_ENV !== 'production';

  return {
    debug: createLogFn('debug', context),
    info: createLogFn('info', context),
    warn: createLogFn('warn', context),
    error: (message: string, error?: Error, meta?: LogMeta) => {
      const errorMeta: LogMeta = {
        ...meta,
        errorName: error?.name,
        errorMessage: error?.message,
        ...(isDev && error?.stack && { stack: error.stack }),
      };
      log('error', message, errorMeta, context);
    },
    http: createTypedLogFn('debug', 'http', context),
    checkout: createTypedLogFn('info', 'checkout', context),
    collaborator: createTypedLogFn('debug', 'collaborator', context),
    security: createTypedLogFn('warn', 'security', context),
    boot: (services: readonly string[]): void => {
      if (process.env.NODE_ENV === 'production') {
        log('info', 'boot', { type: 'system', services: [...services] }, context);
        return;
      }
      console.log(
        `${ANSI.green}${ANSI.bold}> storefront-checkout // ${new Date().toISOString()}${ANSI.reset}\n` +
          `${ANSI.cyan}  services: ${services.join(', ')}${ANSI.reset}\n` +
          `${ANSI.gray}${'='.repeat(60)}${ANSI.reset}`,
      );
    },
  };
}

export const logger: Logger = createLoggerImpl();

export function createLogger(context: string): Logger {
  return createLoggerImpl(context);
}
