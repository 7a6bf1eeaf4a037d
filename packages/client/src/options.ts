import {
  assert,
  number,
  object,
  optional,
  refine,
} from '@metamask/superstruct';
import { Logger } from '@robolink/logger';
import { makeSystemClock } from '@robolink/utils';
import type { Clock } from '@robolink/utils';

/** The default base poll interval in milliseconds. */
export const DEFAULT_POLL_INTERVAL_MS = 100;
/** The default floor of a near-deadline sleep tick, as a fraction of the base interval. */
export const DEFAULT_MIN_POLL_FRACTION = 0.001;

export type AsyncClientOptions = {
  /** The base poll interval in milliseconds. */
  pollIntervalMs?: number;
  /** The shortest sleep tick, as a fraction of `pollIntervalMs`. */
  minPollFraction?: number;
  logger?: Logger;
  clock?: Clock;
};

const TimingOptionsStruct = object({
  pollIntervalMs: optional(
    refine(
      number(),
      'positive',
      (value) =>
        (Number.isFinite(value) && value > 0) ||
        'must be a finite number greater than 0',
    ),
  ),
  minPollFraction: optional(
    refine(
      number(),
      'fraction',
      (value) => (value > 0 && value <= 1) || 'must be in the range (0, 1]',
    ),
  ),
});

/**
 * Validates client options and fills in the defaults.
 *
 * @param options - The options passed to the client.
 * @returns The complete options.
 * @throws If a timing option is invalid.
 */
export const parseClientOptions = (
  options: AsyncClientOptions,
): Required<AsyncClientOptions> => {
  const { pollIntervalMs, minPollFraction, logger, clock } = options;
  const timing = {
    ...(pollIntervalMs === undefined ? {} : { pollIntervalMs }),
    ...(minPollFraction === undefined ? {} : { minPollFraction }),
  };
  try {
    assert(timing, TimingOptionsStruct);
  } catch (error) {
    throw new Error(
      `Invalid client options: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
  return {
    pollIntervalMs: pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    minPollFraction: minPollFraction ?? DEFAULT_MIN_POLL_FRACTION,
    logger: logger ?? new Logger('robolink'),
    clock: clock ?? makeSystemClock(),
  };
};
