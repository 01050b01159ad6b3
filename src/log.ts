/**
 * Scoped console logging. Debug lines are printed only when LFR_DEBUG is set.
 */

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
}

export function debugEnabled(): boolean {
  const flag = process.env.LFR_DEBUG;
  return flag !== undefined && flag !== '' && flag !== '0' && flag !== 'false';
}

export function createLogger(scope: string): Logger {
  return {
    debug(message, ...details) {
      if (debugEnabled()) console.debug(`[DEBUG] ${scope}: ${message}`, ...details);
    },
    warn(message, ...details) {
      console.warn(`${scope}: ${message}`, ...details);
    },
  };
}
