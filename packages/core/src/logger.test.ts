import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createConfiguredLogger, createLogger, isLogLevel, type LogEntry } from './logger.js';

describe('core:logger', () => {
  let stdoutSpy: MockInstance;
  let stderrSpy: MockInstance;
  const origLevel = process.env.LOG_LEVEL;

  beforeEach(() => {
    stdoutSpy = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    stderrSpy = vi.spyOn(process.stderr, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    stdoutSpy.mockRestore();
    stderrSpy.mockRestore();
    if (origLevel === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = origLevel;
  });

  it('writes one JSON line with namespace and data', () => {
    delete process.env.LOG_LEVEL;
    createLogger('engine').warn('skipped', { tag: 'PatientName' });
    const out = JSON.parse(String(stdoutSpy.mock.calls[0][0]).trim());
    expect(out).toMatchObject({ level: 'warn', ns: 'engine', msg: 'skipped', data: { tag: 'PatientName' } });
    expect(typeof out.ts).toBe('string');
  });

  it('errors go to stderr', () => {
    createLogger('engine').error('boom');
    expect(stderrSpy).toHaveBeenCalledTimes(1);
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('drops debug at the default level', () => {
    delete process.env.LOG_LEVEL;
    createLogger('engine').debug('hidden');
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('follows LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';
    createLogger('engine').warn('hidden');
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('fixed level overrides LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';
    createLogger('engine', { level: 'debug' }).debug('shown');
    expect(stdoutSpy).toHaveBeenCalledTimes(1);
  });

  it('sends entries to a custom sink instead of the streams', () => {
    const entries: LogEntry[] = [];
    createLogger('diff', { level: 'debug', sink: (entry) => entries.push(entry) }).debug('compared', { n: 2 });

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'debug', ns: 'diff', msg: 'compared', data: { n: 2 } });
    expect(stdoutSpy).not.toHaveBeenCalled();
  });

  it('configured level wins over LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'debug';
    const logger = createConfiguredLogger('anonymizer', { logging: { level: 'error' } });
    logger.info('hidden');
    logger.warn('hidden');
    expect(stdoutSpy).not.toHaveBeenCalled();

    logger.error('shown');
    expect(stderrSpy).toHaveBeenCalledTimes(1);
  });

  it('recognises level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
  });
});
