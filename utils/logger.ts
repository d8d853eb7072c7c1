/**
 * Minimal logger contract. Hosts pass their own; the default writes to the console.
 */

export type MemoryLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error?: (msg: string) => void;
  debug?: (msg: string) => void;
};

const PREFIX = "support-memory:";

export const consoleLogger: MemoryLogger = {
  info: (msg) => console.info(`${PREFIX} ${msg}`),
  warn: (msg) => console.warn(`${PREFIX} ${msg}`),
  error: (msg) => console.error(`${PREFIX} ${msg}`),
};

export const silentLogger: MemoryLogger = {
  info: () => {},
  warn: () => {},
};
