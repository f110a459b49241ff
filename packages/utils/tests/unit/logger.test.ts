import { describe, it, expect, vi } from 'vitest';

const sink = vi.hoisted(() => ({
  error: vi.fn(),
  warn: vi.fn(),
  info: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('winston', () => {
  const format = () => ({});
  return {
    createLogger: () => sink,
    format: { combine: format, timestamp: format, errors: format, splat: format, json: format, colorize: format, printf: format },
    transports: { Console: class {} },
  };
});

vi.mock('winston-daily-rotate-file', () => ({ default: class {} }));

import { createLogger, logger } from '../../src/logger.js';

describe('logger', () => {
  it('should tag entries with the namespace', () => {
    createLogger('@paramlab/storage').info('Run saved', { runId: 'run-1' });

    expect(sink.info).toHaveBeenCalledWith('Run saved', { namespace: '@paramlab/storage', runId: 'run-1' });
  });

  it('should carry child context into every entry, call context last', () => {
    const log = logger.child({ strategyId: 'ma-cross', searchKind: 'grid' }).child({ runId: 'run-1' });

    log.warn('Slow trial', { trialIndex: 3, searchKind: 'adaptive' });

    expect(sink.warn).toHaveBeenCalledWith('Slow trial', {
      namespace: 'paramlab',
      strategyId: 'ma-cross',
      searchKind: 'adaptive',
      runId: 'run-1',
      trialIndex: 3,
    });
  });

  it('should not leak child context into the parent', () => {
    logger.child({ runId: 'run-1' });

    logger.debug('Scheduler starting');

    expect(sink.debug).toHaveBeenCalledWith('Scheduler starting', { namespace: 'paramlab' });
  });

  it('should flatten an Error into the entry', () => {
    const error = new Error('disk full');

    createLogger('@paramlab/lab').error('Adaptive search aborted', error, { backend: 'random' });

    expect(sink.error).toHaveBeenCalledWith('Adaptive search aborted', {
      namespace: '@paramlab/lab',
      backend: 'random',
      error: { message: 'disk full', stack: error.stack, name: 'Error' },
    });
  });
});
