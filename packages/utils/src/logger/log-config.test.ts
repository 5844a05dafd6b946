import { afterEach, describe, it, expect } from 'vitest';
import { DEFAULT_LOG_CONFIG, getLogLevel, getServiceFromName, shouldLog } from './log-config';

describe('getLogLevel', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it('uses the exact service entry', () => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL_PROVIDER_YAHOO;
    expect(getLogLevel('provider:yahoo')).toBe('warn');
  });

  it('falls back to the parent service entry', () => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL_SYNC_SOMETHING;
    expect(getLogLevel('sync:something')).toBe('info');
  });

  it('falls back to the default level for unknown services', () => {
    delete process.env.LOG_LEVEL;
    delete process.env.LOG_LEVEL_UNKNOWN;
    expect(getLogLevel('unknown', { ...DEFAULT_LOG_CONFIG, defaultLevel: 'error' })).toBe('error');
  });

  it('prefers a per-service environment override', () => {
    process.env.LOG_LEVEL = 'error';
    process.env.LOG_LEVEL_SYNC_BACKFILL = 'trace';
    expect(getLogLevel('sync:backfill')).toBe('trace');
  });

  it('ignores an invalid environment value', () => {
    delete process.env.LOG_LEVEL_DATABASE;
    process.env.LOG_LEVEL = 'verbose';
    expect(getLogLevel('database')).toBe('info');
  });

  it('ignores inherited object keys as levels', () => {
    delete process.env.LOG_LEVEL;
    process.env.LOG_LEVEL_SYNC_WRITER = 'constructor';
    expect(getLogLevel('sync:writer')).toBe('info');
  });
});

describe('shouldLog', () => {
  it('compares by priority', () => {
    expect(shouldLog('error', 'warn')).toBe(true);
    expect(shouldLog('debug', 'info')).toBe(false);
  });
});

describe('getServiceFromName', () => {
  it('returns the first segment', () => {
    expect(getServiceFromName('sync:reconcile')).toBe('sync');
  });
});
