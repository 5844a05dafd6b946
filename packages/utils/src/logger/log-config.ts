/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVEL_PRIORITY, value);
}

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern category:subcategory,
 * e.g. 'sync:backfill', 'provider:yahoo'
 */
export interface LogConfig {
  defaultLevel: LogLevel;
  services: Record<string, LogLevel>;
  /** Write JSON lines to {logDir}/{service}-{date}.log */
  enableFileLogging: boolean;
  /** Write timing entries to {service}-{date}.perf.log */
  enablePerfLogging: boolean;
  logDir: string;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    sync: 'info',
    'sync:staleness': 'info',
    'sync:reconcile': 'info',
    'sync:backfill': 'info',
    'sync:writer': 'info',

    'bulk-load': 'info',

    // Per-request chatter
    provider: 'warn',
    'provider:yahoo': 'warn',

    database: 'info',
  },
  enableFileLogging: false,
  enablePerfLogging: false,
  logDir: 'logs',
};

/**
 * Effective level for a service. First match wins:
 * LOG_LEVEL_{SERVICE}, LOG_LEVEL, exact service entry, parent service entry, default.
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/[:-]/g, '_').toUpperCase()}`;
  const envLevel = process.env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  const globalEnvLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parent = config.services[getServiceFromName(serviceName)];
  if (parent) {
    return parent;
  }

  return config.defaultLevel;
}

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

/**
 * Build runtime config by merging defaults with environment
 */
export function buildRuntimeConfig(): LogConfig {
  return {
    ...DEFAULT_LOG_CONFIG,
    enableFileLogging: process.env.LOG_FILE_ENABLED === 'true',
    enablePerfLogging: process.env.LOG_PERF_ENABLED === 'true',
    logDir: process.env.LOG_DIR || DEFAULT_LOG_CONFIG.logDir,
  };
}
