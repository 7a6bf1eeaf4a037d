import { Logger, makeArrayTransport } from '@robolink/logger';
import type { LogEntry } from '@robolink/logger';

/**
 * Make a logger that collects its entries instead of printing them.
 *
 * @returns The logger and its entries.
 */
export const makeTestLogger = (): { logger: Logger; entries: LogEntry[] } => {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    tags: ['test'],
    transports: [makeArrayTransport(entries)],
  });
  return { logger, entries };
};

/**
 * The messages of the collected entries at the given level.
 *
 * @param entries - The collected entries.
 * @param level - The level to select.
 * @returns The messages.
 */
export const messagesAt = (
  entries: LogEntry[],
  level: LogEntry['level'],
): (string | undefined)[] =>
  entries.filter((entry) => entry.level === level).map((entry) => entry.message);
