import { env } from 'node:process';

let debugEnabled = Boolean(env.DEBUG);

export const setDebugEnabled = (enabled: boolean): void => {
  debugEnabled = enabled;
};

// Writes to stderr so `--format json` output on stdout stays parseable.
export const debug = (...args: unknown[]): void => {
  if (debugEnabled) {
    console.error('[debug]', ...args);
  }
};
