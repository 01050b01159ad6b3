import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, debugEnabled } from '../log';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('stays quiet at debug level unless LFR_DEBUG is set', () => {
    const spy = vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.stubEnv('LFR_DEBUG', '');
    createLogger('lfr').debug('hidden');
    expect(spy).not.toHaveBeenCalled();

    vi.stubEnv('LFR_DEBUG', '1');
    createLogger('lfr').debug('shown');
    expect(spy).toHaveBeenCalledWith('[DEBUG] lfr: shown');
  });

  it('treats 0 and false as off', () => {
    vi.stubEnv('LFR_DEBUG', '0');
    expect(debugEnabled()).toBe(false);
    vi.stubEnv('LFR_DEBUG', 'false');
    expect(debugEnabled()).toBe(false);
    vi.stubEnv('LFR_DEBUG', 'yes');
    expect(debugEnabled()).toBe(true);
  });

  it('always prints warnings with the scope', () => {
    const spy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    createLogger('export').warn('disk full');
    expect(spy).toHaveBeenCalledWith('export: disk full');
  });
});
