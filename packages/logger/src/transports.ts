import type { LogEntry, Transport } from './types.ts';

/**
 * The console transport for the logger.
 *
 * @param entry - The log entry to transport.
 */
export const consoleTransport: Transport = (entry) => {
  const args = [
    ...(entry.tags.length > 0 ? [entry.tags] : []),
    ...(entry.message ? [entry.message] : []),
    ...(entry.data ?? []),
  ];
  // Ultimately, a console somewhere is an acceptable terminal for logging
  // eslint-disable-next-line no-console
  console[entry.level](...args);
};

/**
 * Make a transport that appends every entry to an array.
 *
 * @param target - The array receiving the entries.
 * @returns The transport.
 */
export const makeArrayTransport = (target: LogEntry[]): Transport => {
  return (entry) => {
    target.push(entry);
  };
};
