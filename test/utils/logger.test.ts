import { afterEach, describe, expect, it, vi } from 'vitest';
import { logger, setLogContext, setLogLevel } from '../../src/utils/logger';

describe('logger', () => {
  afterEach(() => {
    setLogLevel('error');
  });

  it('writes one JSON line with the context and serialized errors', () => {
    const write = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setLogLevel('info');
    setLogContext({ pair: 'SOL/USDT' });

    logger.info('grid_order_placed', { event: 'grid_order_placed', failure: new Error('boom') });

    expect(write).toHaveBeenCalledTimes(1);
    const entry: unknown = JSON.parse(String(write.mock.calls[0][0]));
    expect(entry).toMatchObject({
      level: 'info',
      msg: 'grid_order_placed',
      pair: 'SOL/USDT',
      event: 'grid_order_placed',
      failure: { name: 'Error', message: 'boom' },
    });
  });

  it('drops entries below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    setLogLevel('warn');

    logger.debug('hidden');
    logger.warn('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('rejects unknown levels', () => {
    expect(() => setLogLevel('verbose')).toThrow('invalid_log_level:verbose');
  });
});
