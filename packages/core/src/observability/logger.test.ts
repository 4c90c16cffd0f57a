import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  TidewatchLogger,
  createLogger,
  isDebugMode,
  noopLogger,
  scopedLogger,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type Logger,
} from './logger.js';

function capture(config: { level?: LogLevel; module?: string } = {}) {
  const entries: LogEntry[] = [];
  const logger = createLogger({ ...config, handler: (entry) => entries.push(entry) });
  return { logger, entries };
}

describe('TidewatchLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  it('should filter entries below the configured level', () => {
    const { logger, entries } = capture({ level: 'warn' });

    logger.debug('d');
    logger.info('i');
    logger.warn('w');

    expect(entries.map((e) => e.message)).toEqual(['w']);
    expect(logger.isEnabled('info')).toBe(false);
    expect(logger.isEnabled('error')).toBe(true);
  });

  it('should prefix child modules', () => {
    const { logger, entries } = capture({ module: 'app' });

    logger.child('doc').info('attached', { path: 'users/u1' });

    expect(entries[0]?.module).toBe('app:doc');
    expect(entries[0]?.context).toEqual({ path: 'users/u1' });
  });

  it('should summarize the logged error', () => {
    const { logger, entries } = capture();

    logger.error('failed', new Error('boom'), { attempt: 1 });

    expect(entries[0]?.level).toBe('error');
    expect(entries[0]?.context).toEqual({ attempt: 1 });
    expect(entries[0]?.error).toEqual({ name: 'Error', message: 'boom' });
  });

  it('should keep the code of coded errors', () => {
    const { logger, entries } = capture();

    logger.error('write refused', Object.assign(new Error('denied'), { code: 'TIDEWATCH_A100' }));

    expect(entries[0]?.error).toEqual({ name: 'Error', message: 'denied', code: 'TIDEWATCH_A100' });
    expect(entries[0]?.context).toBeUndefined();
  });

  it('should stay silent without a handler, json or debug', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new TidewatchLogger().warn('quiet');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('should print JSON lines when enabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new TidewatchLogger({ json: true, module: 'm' }).warn('loud');

    expect(warn).toHaveBeenCalledTimes(1);
    const printed: unknown = JSON.parse(String(warn.mock.calls[0]?.[0]));
    expect(printed).toMatchObject({ level: 'warn', message: 'loud', module: 'm' });
  });

  it('should print readable lines in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    new TidewatchLogger({ debug: true, module: 'm' }).debug('attached', { path: 'a/b' });

    expect(log).toHaveBeenCalledWith('[m] attached', { path: 'a/b' });
  });

  it('should lower every logger to debug in global debug mode', () => {
    const { logger, entries } = capture({ level: 'error' });

    setDebugMode(true);
    logger.debug('visible');

    expect(isDebugMode()).toBe(true);
    expect(entries.map((e) => e.message)).toEqual(['visible']);
  });

  it('should print to the console in global debug mode without a handler', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    setDebugMode(true);

    new TidewatchLogger({ module: 'x' }).error('stream failed', new Error('gone'));

    expect(error).toHaveBeenCalledWith('[x] stream failed (Error: gone)');
  });
});

describe('scopedLogger', () => {
  it('should derive a child from a Tidewatch logger', () => {
    const { logger, entries } = capture({ module: 'app' });

    scopedLogger(logger, 'collection').info('hello');

    expect(entries[0]?.module).toBe('app:collection');
  });

  it('should use foreign loggers as they are', () => {
    const foreign: Logger = { ...noopLogger, info: vi.fn() };

    scopedLogger(foreign, 'doc').info('hello');

    expect(foreign.info).toHaveBeenCalledWith('hello');
  });

  it('should create a silent module logger by default', () => {
    const logger = scopedLogger(undefined, 'doc');

    expect(logger).toBeInstanceOf(TidewatchLogger);
    expect(logger instanceof TidewatchLogger ? logger.module : null).toBe('tidewatch:doc');
  });
});
