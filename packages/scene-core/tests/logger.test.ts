import { afterEach, describe, it, expect, vi } from 'vitest';
import { Logger, configFromEnv } from '../src/utils/logger';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('logger', () => {
  it('prefixes the level and context', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = new Logger('Export', { minLevel: 'info', includeTimestamp: false });

    log.warn('File not saved.', 42);

    expect(warn).toHaveBeenCalledWith('[WARN] [Export] File not saved.', 42);
  });

  it('drops messages below the minimum level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const log = new Logger('Prep', { minLevel: 'info', includeTimestamp: false });

    log.debug('hidden');
    log.info('shown');

    expect(debug).not.toHaveBeenCalled();
    expect(info).toHaveBeenCalledWith('[INFO] [Prep] shown');
  });

  it('children nest their context and follow suppression', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const parent = new Logger('Export', { minLevel: 'debug', includeTimestamp: false });
    const child = parent.child('Files');

    child.error('disk full');
    parent.suppress();
    child.error('ignored');
    parent.restore();
    child.error('again');

    expect(error.mock.calls).toEqual([['[ERROR] [Export:Files] disk full'], ['[ERROR] [Export:Files] again']]);
  });

  it('reads the level from the environment', () => {
    expect(configFromEnv({ SCENE_PREP_LOG_LEVEL: 'ERROR' }).minLevel).toBe('error');
    expect(configFromEnv({ SCENE_PREP_LOG_LEVEL: 'loud' }).minLevel).toBe('debug');
    expect(configFromEnv({ NODE_ENV: 'production' }).minLevel).toBe('warn');
    expect(configFromEnv({ SCENE_PREP_LOG_TIMESTAMPS: '1' }).includeTimestamp).toBe(true);
    expect(configFromEnv({})).toEqual({ minLevel: 'debug', enabled: true, includeTimestamp: false });
  });
});
