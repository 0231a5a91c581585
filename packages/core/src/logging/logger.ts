import type { Logger } from "@tickwork/contracts";

/** Console logger that prefixes every line with `[tag]`. */
export function createConsoleLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug: (message, ...args) => console.debug(`${prefix} ${message}`, ...args),
    info: (message, ...args) => console.log(`${prefix} ${message}`, ...args),
    warn: (message, ...args) => console.warn(`${prefix} ${message}`, ...args),
    error: (message, ...args) => console.error(`${prefix} ${message}`, ...args),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
