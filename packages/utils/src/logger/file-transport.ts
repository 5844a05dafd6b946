import * as fs from 'fs';
import * as path from 'path';

export interface FileTransportConfig {
  logDir: string;
  /** Service name used as the file prefix */
  service: string;
  /** Also write ERROR/FATAL entries to {service}-{date}.error.log */
  separateErrorLog: boolean;
}

type LogFileKind = 'main' | 'error' | 'perf';

function todayUtc(): string {
  return new Date().toISOString().slice(0, 10);
}

/**
 * Appends JSON-lines log entries to daily files:
 * {service}-{YYYY-MM-DD}.log, .error.log and .perf.log
 */
export class FileTransport {
  private readonly config: FileTransportConfig;
  private currentDate: string;
  private streams = new Map<LogFileKind, fs.WriteStream>();

  constructor(config: Pick<FileTransportConfig, 'logDir' | 'service'> & Partial<FileTransportConfig>) {
    this.config = { separateErrorLog: true, ...config };
    this.currentDate = todayUtc();
    fs.mkdirSync(this.config.logDir, { recursive: true });
  }

  private filePath(kind: LogFileKind): string {
    const suffix = kind === 'main' ? '.log' : `.${kind}.log`;
    return path.join(this.config.logDir, `${this.config.service}-${this.currentDate}${suffix}`);
  }

  private stream(kind: LogFileKind): fs.WriteStream {
    const today = todayUtc();
    if (today !== this.currentDate) {
      this.closeStreams();
      this.currentDate = today;
    }

    let stream = this.streams.get(kind);
    if (!stream) {
      stream = fs.createWriteStream(this.filePath(kind), { flags: 'a' });
      this.streams.set(kind, stream);
    }
    return stream;
  }

  write(entry: Record<string, unknown>): void {
    const line = JSON.stringify(entry) + '\n';
    this.stream('main').write(line);

    if (this.config.separateErrorLog && (entry.level === 'ERROR' || entry.level === 'FATAL')) {
      this.stream('error').write(line);
    }
  }

  writePerf(entry: Record<string, unknown>): void {
    this.stream('perf').write(JSON.stringify(entry) + '\n');
  }

  closeStreams(): void {
    for (const stream of this.streams.values()) {
      stream.end();
    }
    this.streams.clear();
  }

  /**
   * Resolve once everything written so far has reached the files.
   * An empty write's callback fires after all earlier writes on that stream.
   */
  async flush(): Promise<void> {
    const pending = [...this.streams.values()].filter((s) => s.writableLength > 0);
    await Promise.all(
      pending.map((s) => new Promise<void>((resolve) => s.write('', () => resolve())))
    );
  }
}
