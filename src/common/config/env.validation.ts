import { SERVICE_NAMES, type ServiceName } from '../constants/services.constants';

export type ServiceSelection = ServiceName | 'all';
export type TracesExporter = 'otlp' | 'console' | 'none';

export interface AppEnv {
  NODE_ENV: 'development' | 'test' | 'production';
  SERVICE: ServiceSelection;
  SERVICE_VERSION: string;
  LOG_LEVEL: 'debug' | 'log' | 'info' | 'warn' | 'error';
  CHECKOUT_SERVICE_PORT: number;
  PAYMENT_SERVICE_PORT: number;
  SHIPPING_SERVICE_PORT: number;
  CATALOG_SERVICE_PORT: number;
  CART_SERVICE_PORT: number;
  CURRENCY_SERVICE_PORT: number;
  EMAIL_SERVICE_PORT: number;
  ACCOUNTING_SERVICE_PORT: number;
  FRAUD_SERVICE_PORT: number;
  PAYMENT_SERVICE_URL: string;
  SHIPPING_SERVICE_URL: string;
  CATALOG_SERVICE_URL: string;
  CART_SERVICE_URL: string;
  CURRENCY_SERVICE_URL: string;
  EMAIL_SERVICE_URL: string;
  ACCOUNTING_SERVICE_URL: string;
  FRAUD_SERVICE_URL: string;
  CHECKOUT_DEADLINE_MS: number;
  CATALOG_TIMEOUT_MS: number;
  SHIPPING_TIMEOUT_MS: number;
  CURRENCY_TIMEOUT_MS: number;
  PAYMENT_TIMEOUT_MS: number;
  PAYMENT_REVERSAL_TIMEOUT_MS: number;
  FRAUD_TIMEOUT_MS: number;
  EMAIL_TIMEOUT_MS: number;
  ACCOUNTING_TIMEOUT_MS: number;
  CART_TIMEOUT_MS: number;
  SHIPPING_PLACEHOLDER_COST: number;
  PAYMENT_FAILURE_RATE: number;
  SHIPPING_FAILURE_RATE: number;
  FRAUD_FLAG_RATE: number;
  FRAUD_AMOUNT_THRESHOLD: number;
  THROTTLE_LIMIT: number;
  OTEL_TRACES_EXPORTER: TracesExporter;
  OTEL_EXPORTER_OTLP_ENDPOINT?: string;
}

const COLLABORATOR_URL_KEYS = [
  'PAYMENT_SERVICE_URL',
  'SHIPPING_SERVICE_URL',
  'CATALOG_SERVICE_URL',
  'CART_SERVICE_URL',
  'CURRENCY_SERVICE_URL',
  'EMAIL_SERVICE_URL',
  'ACCOUNTING_SERVICE_URL',
  'FRAUD_SERVICE_URL',
] as const;

type CollaboratorUrlKey = (typeof COLLABORATOR_URL_KEYS)[number];

const DEFAULT_PORTS = {
  CHECKOUT_SERVICE_PORT: 8083,
  PAYMENT_SERVICE_PORT: 8084,
  SHIPPING_SERVICE_PORT: 8085,
  CATALOG_SERVICE_PORT: 8086,
  CART_SERVICE_PORT: 8087,
  CURRENCY_SERVICE_PORT: 8088,
  EMAIL_SERVICE_PORT: 8089,
  ACCOUNTING_SERVICE_PORT: 8091,
  FRAUD_SERVICE_PORT: 8092,
} as const;

function parseNumber(value: unknown, fallback: number): number {
  if (value === undefined || value === null || value === '') {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number value: ${String(value)}`);
  }

  return parsed;
}

function parseRate(value: unknown, fallback: number): number {
  return Math.min(1, Math.max(0, parseNumber(value, fallback)));
}

// Longest delay setTimeout honours; larger values fire after about 1 ms.
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function parseDelay(value: unknown, fallback: number, minimum: number): number {
  return Math.min(MAX_TIMER_DELAY_MS, Math.max(minimum, parseNumber(value, fallback)));
}

function parseTimeout(value: unknown, fallback: number): number {
  return parseDelay(value, fallback, 50);
}

function parseNodeEnv(value: unknown): AppEnv['NODE_ENV'] {
  if (value === 'production' || value === 'test') {
    return value;
  }

  return 'development';
}

function parseLogLevel(value: unknown): AppEnv['LOG_LEVEL'] {
  if (value === 'debug' || value === 'warn' || value === 'error' || value === 'info') {
    return value;
  }

  return 'log';
}

function parseService(value: unknown): ServiceSelection {
  if (value === undefined || value === null || value === '' || value === 'all') {
    return 'all';
  }

  const candidate = String(value).trim();
  const match = SERVICE_NAMES.find((name) => name === candidate);
  if (!match) {
    throw new Error(`Unknown SERVICE: ${candidate} (expected all or one of ${SERVICE_NAMES.join(', ')})`);
  }

  return match;
}

function parseTracesExporter(value: unknown): TracesExporter {
  if (value === 'console' || value === 'none' || value === 'otlp') {
    return value;
  }

  return 'none';
}

function resolveUrl(value: unknown, fallbackPort: number): string {
  const raw = String(value ?? '').trim();
  const url = raw.length > 0 ? raw : `http://localhost:${fallbackPort}`;
  return url.replace(/\/$/, '');
}

export function validateEnv(config: Record<string, unknown>): AppEnv {
  const NODE_ENV = parseNodeEnv(config.NODE_ENV);
  const SERVICE = parseService(config.SERVICE);
  const ports = {
    CHECKOUT_SERVICE_PORT: parseNumber(config.CHECKOUT_SERVICE_PORT, DEFAULT_PORTS.CHECKOUT_SERVICE_PORT),
    PAYMENT_SERVICE_PORT: parseNumber(config.PAYMENT_SERVICE_PORT, DEFAULT_PORTS.PAYMENT_SERVICE_PORT),
    SHIPPING_SERVICE_PORT: parseNumber(config.SHIPPING_SERVICE_PORT, DEFAULT_PORTS.SHIPPING_SERVICE_PORT),
    CATALOG_SERVICE_PORT: parseNumber(config.CATALOG_SERVICE_PORT, DEFAULT_PORTS.CATALOG_SERVICE_PORT),
    CART_SERVICE_PORT: parseNumber(config.CART_SERVICE_PORT, DEFAULT_PORTS.CART_SERVICE_PORT),
    CURRENCY_SERVICE_PORT: parseNumber(config.CURRENCY_SERVICE_PORT, DEFAULT_PORTS.CURRENCY_SERVICE_PORT),
    EMAIL_SERVICE_PORT: parseNumber(config.EMAIL_SERVICE_PORT, DEFAULT_PORTS.EMAIL_SERVICE_PORT),
    ACCOUNTING_SERVICE_PORT: parseNumber(config.ACCOUNTING_SERVICE_PORT, DEFAULT_PORTS.ACCOUNTING_SERVICE_PORT),
    FRAUD_SERVICE_PORT: parseNumber(config.FRAUD_SERVICE_PORT, DEFAULT_PORTS.FRAUD_SERVICE_PORT),
  };

  const urls: Record<CollaboratorUrlKey, string> = {
    PAYMENT_SERVICE_URL: resolveUrl(config.PAYMENT_SERVICE_URL, ports.PAYMENT_SERVICE_PORT),
    SHIPPING_SERVICE_URL: resolveUrl(config.SHIPPING_SERVICE_URL, ports.SHIPPING_SERVICE_PORT),
    CATALOG_SERVICE_URL: resolveUrl(config.CATALOG_SERVICE_URL, ports.CATALOG_SERVICE_PORT),
    CART_SERVICE_URL: resolveUrl(config.CART_SERVICE_URL, ports.CART_SERVICE_PORT),
    CURRENCY_SERVICE_URL: resolveUrl(config.CURRENCY_SERVICE_URL, ports.CURRENCY_SERVICE_PORT),
    EMAIL_SERVICE_URL: resolveUrl(config.EMAIL_SERVICE_URL, ports.EMAIL_SERVICE_PORT),
    ACCOUNTING_SERVICE_URL: resolveUrl(config.ACCOUNTING_SERVICE_URL, ports.ACCOUNTING_SERVICE_PORT),
    FRAUD_SERVICE_URL: resolveUrl(config.FRAUD_SERVICE_URL, ports.FRAUD_SERVICE_PORT),
  };

  // A standalone checkout process in production must be pointed at real collaborators.
  if (NODE_ENV === 'production' && SERVICE === 'checkout') {
    const missing = COLLABORATOR_URL_KEYS.filter(
      (key) => String(config[key] ?? '').trim().length === 0,
    );
    if (missing.length > 0) {
      throw new Error(`${missing.join(', ')} required in production`);
    }
  }

  const OTEL_TRACES_EXPORTER = parseTracesExporter(config.OTEL_TRACES_EXPORTER);
  const OTEL_EXPORTER_OTLP_ENDPOINT =
    String(config.OTEL_EXPORTER_OTLP_ENDPOINT ?? '').trim() || undefined;

  if (OTEL_TRACES_EXPORTER === 'otlp' && !OTEL_EXPORTER_OTLP_ENDPOINT) {
    throw new Error('OTEL_EXPORTER_OTLP_ENDPOINT is required when OTEL_TRACES_EXPORTER=otlp');
  }

  return {
    NODE_ENV,
    SERVICE,
    SERVICE_VERSION: String(config.SERVICE_VERSION ?? '1.0.0').trim() || '1.0.0',
    LOG_LEVEL: parseLogLevel(config.LOG_LEVEL),
    ...ports,
    ...urls,
    CHECKOUT_DEADLINE_MS: parseDelay(config.CHECKOUT_DEADLINE_MS, 10_000, 100),
    CATALOG_TIMEOUT_MS: parseTimeout(config.CATALOG_TIMEOUT_MS, 2000),
    SHIPPING_TIMEOUT_MS: parseTimeout(config.SHIPPING_TIMEOUT_MS, 2000),
    CURRENCY_TIMEOUT_MS: parseTimeout(config.CURRENCY_TIMEOUT_MS, 1500),
    PAYMENT_TIMEOUT_MS: parseTimeout(config.PAYMENT_TIMEOUT_MS, 3000),
    PAYMENT_REVERSAL_TIMEOUT_MS: parseTimeout(config.PAYMENT_REVERSAL_TIMEOUT_MS, 1000),
    FRAUD_TIMEOUT_MS: parseTimeout(config.FRAUD_TIMEOUT_MS, 2000),
    EMAIL_TIMEOUT_MS: parseTimeout(config.EMAIL_TIMEOUT_MS, 2000),
    ACCOUNTING_TIMEOUT_MS: parseTimeout(config.ACCOUNTING_TIMEOUT_MS, 2000),
    CART_TIMEOUT_MS: parseTimeout(config.CART_TIMEOUT_MS, 1500),
    SHIPPING_PLACEHOLDER_COST: Math.max(0, parseNumber(config.SHIPPING_PLACEHOLDER_COST, 0)),
    PAYMENT_FAILURE_RATE: parseRate(config.PAYMENT_FAILURE_RATE, 0.1),
    SHIPPING_FAILURE_RATE: parseRate(config.SHIPPING_FAILURE_RATE, 0.05),
    FRAUD_FLAG_RATE: parseRate(config.FRAUD_FLAG_RATE, 0.02),
    FRAUD_AMOUNT_THRESHOLD: Math.max(0, parseNumber(config.FRAUD_AMOUNT_THRESHOLD, 5000)),
    THROTTLE_LIMIT: Math.max(1, parseNumber(config.THROTTLE_LIMIT, 120)),
    OTEL_TRACES_EXPORTER,
    OTEL_EXPORTER_OTLP_ENDPOINT,
  };
}
