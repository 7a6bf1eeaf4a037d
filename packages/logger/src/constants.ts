/**
 * The log levels, mapped to their severity. Entries below a logger's
 * minimum level are dropped before they reach any transport.
 */
export const logLevels = {
  debug: 0,
  info: 1,
  log: 2,
  warn: 3,
  error: 4,
} as const;
