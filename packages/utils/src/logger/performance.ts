import type { FileTransport } from './file-transport';

/**
 * Performance entry written to .perf.log
 */
export interface PerfEntry {
  timestamp: string;
  operation: string;
  duration: number;
  success: boolean;
  context?: Record<string, unknown>;
  error?: string;
}

/**
 * Times operations and writes one entry per operation to the perf log.
 *
 * ```typescript
 * const written = await logger.perf.track('sync_pair', () => syncPair(pair), { symbol, timeframe });
 * ```
 */
export class PerformanceTracker {
  constructor(private readonly fileTransport: FileTransport | null) {}

  async track<T>(
    operation: string,
    fn: () => T | Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const startTime = performance.now();
    try {
      const result = await fn();
      this.record(operation, startTime, context);
      return result;
    } catch (error) {
      this.record(operation, startTime, context, error);
      throw error;
    }
  }

  private record(
    operation: string,
    startTime: number,
    context: Record<string, unknown> | undefined,
    error?: unknown
  ): void {
    if (!this.fileTransport) {
      return;
    }

    const entry: PerfEntry = {
      timestamp: new Date().toISOString(),
      operation,
      duration: Math.round(performance.now() - startTime),
      success: error === undefined,
      context,
      ...(error !== undefined && { error: error instanceof Error ? error.message : String(error) }),
    };
    this.fileTransport.writePerf({ ...entry });
  }
}

/**
 * Tracker used when perf logging is disabled
 */
export function createNoOpPerformanceTracker(): PerformanceTracker {
  return new PerformanceTracker(null);
}
