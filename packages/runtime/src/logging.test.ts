// Tests for catalog loggers

import { describe, it, expect, vi, afterEach } from 'vitest';
import { consoleLogger, createCapturingLogger } from './logging.js';

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes messages and passes the data along', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    consoleLogger.warn('Rejected create_entry', { rule: 'DUPLICATE_PATH' });

    expect(warn).toHaveBeenCalledWith('[catalog] Rejected create_entry', { rule: 'DUPLICATE_PATH' });
  });

  it('passes an empty string when there is no data', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    consoleLogger.info('Committed delete_entry');

    expect(info).toHaveBeenCalledWith('[catalog] Committed delete_entry', '');
  });
});

describe('createCapturingLogger', () => {
  it('keeps entries in the order they were logged', () => {
    const logger = createCapturingLogger();

    logger.info('Committed create_identity', { resourceId: '1' });
    logger.error('Failed rename_identity');

    expect(logger.entries.map((e) => [e.level, e.message, e.data])).toEqual([
      ['info', 'Committed create_identity', { resourceId: '1' }],
      ['error', 'Failed rename_identity', undefined],
    ]);
  });
});
