import { describe, it, expect, afterEach, vi } from 'vitest';
import { createConsoleSink, createLogger, type LogRecord } from '../logger.js';

function capture(): { records: LogRecord[]; sink: (record: LogRecord) => void } {
  const records: LogRecord[] = [];
  return { records, sink: (record) => records.push(record) };
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should hand records to the sink with namespace and arguments', () => {
    const { records, sink } = capture();

    createLogger('E2EE', { level: 'debug', sink }).info('ready', 3);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: 'info',
      namespace: 'E2EE',
      message: 'ready',
      args: [3],
    });
  });

  it('should nest child namespaces and keep the sink', () => {
    const { records, sink } = capture();

    createLogger('E2EE', { level: 'debug', sink }).child('devices').child('timer').warn('late');

    expect(records.map((record) => record.namespace)).toEqual(['E2EE:devices:timer']);
  });

  it('should drop records below the threshold', () => {
    const { records, sink } = capture();
    const logger = createLogger('E2EE', { level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.child('cache').info('hidden');

    expect(records.map((record) => record.message)).toEqual(['shown']);
  });

  it('should never drop errors', () => {
    const { records, sink } = capture();

    createLogger('E2EE', { level: 'error', sink }).error('failed');

    expect(records.map((record) => record.level)).toEqual(['error']);
  });

  describe('console sink', () => {
    it('should print the namespace prefix through the matching console method', () => {
      const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const logger = createLogger('E2EE', { level: 'debug', sink: createConsoleSink(false) });

      logger.debug('cache hit', { id: 1 });
      logger.warn('revoked');

      expect(log).toHaveBeenCalledWith('[E2EE] cache hit', { id: 1 });
      expect(warn).toHaveBeenCalledWith('[E2EE] revoked');
    });

    it('should add an ISO timestamp when asked', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      createLogger('E2EE', { level: 'debug', sink: createConsoleSink(true) }).warn('late');

      expect(warn.mock.calls[0]?.[0]).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[E2EE\] late$/);
    });
  });
});
