/**
 * @fileoverview ConsoleLogger Unit Tests
 *
 * @license Apache-2.0
 */

import { describe, it, expect, vi } from 'vitest';

import { LogLevel } from '../../../src/domain/logging';
import { ConsoleLogger, NoopLogger } from '../../../src/infrastructure/logging';

describe('ConsoleLogger', () => {
  it('should prefix the level and pass fields through', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new ConsoleLogger().warn('hot grill', { station: 2 });

    expect(warn).toHaveBeenCalledWith('[graphward] warn: hot grill', { station: 2 });
  });

  it('should omit fields when none are given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger().error('fryer offline');

    expect(error).toHaveBeenCalledWith('[graphward] error: fryer offline');
  });

  it('should drop messages below the threshold', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});
    const info = vi.spyOn(console, 'info').mockImplementation(() => {});

    const logger = new ConsoleLogger();
    logger.debug('Scope opened');
    logger.info('Scope opened');

    expect(debug).not.toHaveBeenCalled();
    expect(info).not.toHaveBeenCalled();
  });

  it('should honour a lower threshold and a custom prefix', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new ConsoleLogger(LogLevel.Debug, '[kitchen]').debug('Plan built');

    expect(debug).toHaveBeenCalledWith('[kitchen] debug: Plan built');
  });

  it('should print nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    new ConsoleLogger(LogLevel.Silent).error('Release hook failed');

    expect(error).not.toHaveBeenCalled();
  });
});

describe('NoopLogger', () => {
  it('should write nothing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    new NoopLogger().warn();

    expect(warn).not.toHaveBeenCalled();
  });
});
