import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, describe, it, expect } from 'vitest';
import { FileTransport } from './file-transport';

describe('FileTransport', () => {
  let logDir: string;
  let transport: FileTransport;

  afterEach(() => {
    transport.closeStreams();
    rmSync(logDir, { recursive: true, force: true });
  });

  it('flushes a small buffered write to disk', async () => {
    logDir = mkdtempSync(join(tmpdir(), 'candle-sync-logs-'));
    transport = new FileTransport({ logDir, service: 'sync' });
    transport.write({ level: 'INFO', msg: 'hello' });

    const settled = await Promise.race([
      transport.flush().then(() => 'flushed'),
      new Promise<string>((resolve) => setTimeout(() => resolve('timed out'), 2000)),
    ]);

    expect(settled).toBe('flushed');
    const date = new Date().toISOString().slice(0, 10);
    expect(readFileSync(join(logDir, `sync-${date}.log`), 'utf-8')).toBe('{"level":"INFO","msg":"hello"}\n');
  });

  it('resolves immediately with nothing written', async () => {
    logDir = mkdtempSync(join(tmpdir(), 'candle-sync-logs-'));
    transport = new FileTransport({ logDir, service: 'sync' });
    await expect(transport.flush()).resolves.toBeUndefined();
  });
});
