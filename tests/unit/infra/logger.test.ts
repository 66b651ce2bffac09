import { describe, expect, it } from 'vitest';

import { createLogger, createStageLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured level and name', () => {
    const logger = createLogger({ level: 'silent', name: 'test-pipeline' });

    expect(logger.level).toBe('silent');
    expect(logger.bindings()).toMatchObject({ name: 'test-pipeline' });
  });

  it('binds the stage on child loggers', () => {
    const logger = createStageLogger(createLogger({ level: 'silent' }), 'parse');

    expect(logger.bindings()).toMatchObject({ stage: 'parse' });
    expect(logger.level).toBe('silent');
  });
});
