import pino from 'pino';
import { FileTransport } from './file-transport';
import { PerformanceTracker, createNoOpPerformanceTracker } from './performance';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  buildRuntimeConfig,
  shouldLog,
} from './log-config';

export interface LoggerOptions {
  /** Logger name (e.g., 'sync:backfill') */
  name: string;
  /** Service for file grouping (first name segment if not provided) */
  service?: string;
  /** Minimum log level (from config if not provided) */
  level?: LogLevel;
  enableFileLogging?: boolean;
  enablePerfLogging?: boolean;
  config?: LogConfig;
}

type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  child: (bindings: Record<string, unknown>) => Logger;
  perf: PerformanceTracker;
  flush: () => Promise<void>;
}

// One file transport per service
const fileTransports = new Map<string, FileTransport>();

let runtimeConfig: LogConfig | null = null;

function getFileTransport(service: string, config: LogConfig): FileTransport {
  let transport = fileTransports.get(service);
  if (!transport) {
    transport = new FileTransport({ logDir: config.logDir, service });
    fileTransports.set(service, transport);
  }
  return transport;
}

function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

/**
 * Create a structured logger instance
 *
 * Console output goes through pino (pino-pretty in development). When file
 * logging is enabled every entry is also appended as JSON to the service's
 * daily log file.
 *
 * @param options - Logger options, or just the logger name
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config || getRuntimeConfig();
  const service = opts.service || getServiceFromName(opts.name);
  const level = opts.level || getLogLevel(opts.name, config);
  const enableFileLogging = opts.enableFileLogging ?? config.enableFileLogging;
  const enablePerfLogging = opts.enablePerfLogging ?? config.enablePerfLogging;

  const isDevelopment = process.env.NODE_ENV === 'development';

  const pinoLogger = pino({
    name: opts.name,
    level,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  const fileTransport = enableFileLogging ? getFileTransport(service, config) : null;
  const perfTracker = enablePerfLogging
    ? new PerformanceTracker(fileTransport ?? getFileTransport(service, config))
    : createNoOpPerformanceTracker();

  function build(target: pino.Logger, name: string, bindings: Record<string, unknown>): Logger {
    function method(logLevel: LogLevel): LogMethod {
      return (obj, msg) => {
        if (typeof obj === 'string') {
          target[logLevel](obj);
        } else {
          target[logLevel](obj, msg);
        }

        if (fileTransport && shouldLog(logLevel, level)) {
          const entry: Record<string, unknown> = typeof obj === 'string' ? { msg: obj } : { ...obj, msg };
          fileTransport.write({
            timestamp: new Date().toISOString(),
            level: logLevel.toUpperCase(),
            name,
            service,
            ...bindings,
            ...entry,
          });
        }
      };
    }

    return {
      trace: method('trace'),
      debug: method('debug'),
      info: method('info'),
      warn: method('warn'),
      error: method('error'),
      fatal: method('fatal'),
      child: (childBindings) => {
        const merged = { ...bindings, ...childBindings };
        const childName = typeof childBindings.name === 'string' ? `${name}:${childBindings.name}` : name;
        return build(target.child(childBindings), childName, merged);
      },
      perf: perfTracker,
      flush: async () => {
        if (fileTransport) await fileTransport.flush();
      },
    };
  }

  return build(pinoLogger, opts.name, {});
}

/**
 * Process-wide logger for code without a more specific service name
 */
export const logger = createLogger('candle-sync');

/**
 * Flush all file transports (for graceful shutdown)
 */
export async function flushAllLogs(): Promise<void> {
  await Promise.all([...fileTransports.values()].map((t) => t.flush()));
}

/**
 * Close all file transports (for shutdown)
 */
export function closeAllLogs(): void {
  for (const transport of fileTransports.values()) {
    transport.closeStreams();
  }
  fileTransports.clear();
}

