/**
 * Tests for logger - level selection, component children
 */

import { describe, it, expect } from 'vitest';
import { logger, createChildLogger } from './logger.js';

describe('logger', () => {
  it('should take its level from LOG_LEVEL', () => {
    expect(logger.level).toBe('silent');
  });

  it('should bind the component on child loggers', () => {
    const child = createChildLogger('retrieval');

    expect(child.bindings()).toEqual({ component: 'retrieval' });
    expect(child.level).toBe('silent');
  });
});
