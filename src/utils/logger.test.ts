import { describe, it, expect } from 'vitest';
import { createChildLogger, getLogger } from './logger.js';
import { getConfig } from '../config/index.js';

describe('logger', () => {
  it('returns the same root logger on every call', () => {
    expect(getLogger()).toBe(getLogger());
  });

  it('takes its level from the config', () => {
    expect(getLogger().level).toBe(getConfig().logging.level);
  });

  it('binds context on child loggers', () => {
    expect(createChildLogger({ service: 'dispatch' }).bindings()).toEqual({ service: 'dispatch' });
  });
});
