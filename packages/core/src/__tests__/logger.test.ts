import { afterEach, describe, expect, it, vi } from 'vitest';
import { StorageError } from '../errors/docket-error.js';
import {
  DocketLogger,
  createLogger,
  formatText,
  isDebugMode,
  setDebugMode,
  type LogEntry,
} from '../observability/logger.js';

function collect(entries: LogEntry[]): (entry: LogEntry) => void {
  return (entry) => entries.push(entry);
}

describe('DocketLogger', () => {
  afterEach(() => {
    setDebugMode(false);
    vi.restoreAllMocks();
  });

  describe('creation', () => {
    it('should create via factory', () => {
      const logger = createLogger({ module: 'test' });
      expect(logger).toBeInstanceOf(DocketLogger);
      expect(logger.moduleName).toBe('test');
    });

    it('should default the module name', () => {
      expect(createLogger().moduleName).toBe('docket');
    });

    it('should create child loggers with a suffixed module and bound context', () => {
      const entries: LogEntry[] = [];
      const parent = createLogger({ module: 'parent', handler: collect(entries), context: { db: 'app' } });
      const child = parent.child('users', { collection: 'users' });

      child.info('ready', { count: 2 });

      expect(child).toBeInstanceOf(DocketLogger);
      expect(entries[0]).toMatchObject({
        module: 'parent:users',
        message: 'ready',
        context: { db: 'app', collection: 'users', count: 2 },
      });
    });
  });

  describe('log levels', () => {
    it('should call handler for info and above at default level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: collect(entries) });
      logger.debug('debug msg');
      logger.info('info msg');
      logger.warn('warn msg');
      logger.error('error msg');

      expect(entries.map((e) => e.level)).toEqual(['info', 'warn', 'error']);
    });

    it('should include debug when level is debug', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: collect(entries) });
      logger.debug('debug msg');
      expect(entries).toHaveLength(1);
    });

    it('should only emit errors at error level', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: collect(entries) });
      logger.info('info');
      logger.warn('warn');
      logger.error('error');
      expect(entries).toHaveLength(1);
      expect(logger.isLevelEnabled('warn')).toBe(false);
    });

    it('should stay silent without a handler or format', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      createLogger({ level: 'debug' }).info('nothing');
      expect(spy).not.toHaveBeenCalled();
    });
  });

  describe('debug mode', () => {
    it('should enable global debug mode', () => {
      setDebugMode(true);
      expect(isDebugMode()).toBe(true);
    });

    it('should override level when debug mode is on', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'error', handler: collect(entries) });
      setDebugMode(true);
      logger.debug('should appear');
      expect(entries).toHaveLength(1);
    });
  });

  describe('error logging', () => {
    it('should include error details', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: collect(entries) });
      logger.error('failed', new Error('test error'), { extra: 'data' });

      expect(entries).toHaveLength(1);
      expect(entries[0]?.context).toEqual({ extra: 'data' });
      expect(entries[0]?.error?.message).toBe('test error');
      expect(entries[0]?.error?.code).toBeUndefined();
    });

    it('should carry the code of a Docket error', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', handler: collect(entries) });
      logger.error('failed', new StorageError('DOCKET_S305', 'Database "app" is closed'));

      expect(entries[0]?.error).toMatchObject({ code: 'DOCKET_S305', message: 'Database "app" is closed' });
    });
  });

  describe('time', () => {
    it('should measure operation duration', () => {
      const entries: LogEntry[] = [];
      const logger = createLogger({ module: 'test', level: 'debug', handler: collect(entries) });
      const end = logger.time('my-op');
      const duration = end({ count: 42 });

      expect(entries).toHaveLength(1);
      expect(entries[0]?.message).toBe('my-op completed');
      expect(entries[0]?.context?.['durationMs']).toBe(duration);
      expect(entries[0]?.context?.['count']).toBe(42);
      expect(duration).toBeGreaterThanOrEqual(0);
    });
  });

  describe('console output', () => {
    it('should output JSON when configured', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const logger = createLogger({ module: 'test', format: 'json' });
      logger.info('json test');

      expect(spy).toHaveBeenCalledTimes(1);
      const parsed: unknown = JSON.parse(String(spy.mock.calls[0]?.[0]));
      expect(parsed).toMatchObject({ message: 'json test', module: 'test', level: 'info' });
    });

    it('should send warnings to console.warn', () => {
      const spy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      createLogger({ format: 'text' }).warn('careful');
      expect(spy).toHaveBeenCalledTimes(1);
    });
  });

  describe('formatText', () => {
    it('should render one line with context and error code', () => {
      const line = formatText({
        level: 'warn',
        message: 'insert rejected',
        timestamp: Date.UTC(2024, 0, 1),
        module: 'docket:users',
        context: { errors: 2 },
        error: { message: 'Duplicate key', code: 'DOCKET_I603' },
      });

      expect(line).toBe(
        '2024-01-01T00:00:00.000Z WARN [docket:users] insert rejected {"errors":2} (DOCKET_I603) Duplicate key'
      );
    });

    it('should omit empty context', () => {
      const line = formatText({ level: 'info', message: 'ok', timestamp: 0, module: 'docket', context: {} });
      expect(line).toBe('1970-01-01T00:00:00.000Z INFO [docket] ok');
    });
  });
});
