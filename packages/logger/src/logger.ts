/**
 * A Logger is a logging facility that supports multiple transports and tags.
 * The transports are the actual logging functions, and the tags are used to
 * identify the source of the log message independent of its location in the
 * code.
 *
 * @example
 * ```ts
 * const logger = new Logger('robolink');
 * logger.info('Node locked');
 * >>> [robolink] Node locked
 * ```
 *
 * Sub-loggers can be created by calling the `subLogger` method. They inherit
 * the tags, transports and level of their parent logger, and can add
 * additional tags to their own messages.
 *
 * @example
 * ```ts
 * const driverLogger = logger.subLogger('driver');
 * driverLogger.debug('Task completed');
 * >>> [robolink, driver] Task completed
 * ```
 *
 * The transports must be synchronous, since the scheduler logs from inside
 * its quanta and never waits on a transport.
 */

import { logLevels } from './constants.ts';
import { parseOptions, mergeOptions } from './options.ts';
import type {
  LogLevel,
  LogEntry,
  LoggerOptions,
  LogMethod,
  LogArgs,
} from './types.ts';

/**
 * The logger class.
 */
export class Logger {
  readonly #options: LoggerOptions;

  log: LogMethod;

  debug: LogMethod;

  info: LogMethod;

  warn: LogMethod;

  error: LogMethod;

  /**
   * The constructor for the logger. Sub-loggers can be created by calling the
   * `subLogger` method.
   *
   * @param options - The options for the logger, or a string to use as the
   *   logger's tag.
   * @param options.transports - The transports, which deliver the log messages
   *   to the appropriate destination.
   * @param options.tags - The tags for the logger, which are accumulated by
   *   sub-loggers and passed to the transports.
   * @param options.level - The minimum level passed to the transports.
   */
  constructor(options: LoggerOptions | string | undefined = undefined) {
    this.#options = parseOptions(options);

    // Create aliases for the log methods, allowing them to be used in a
    // manner similar to the console object.
    const bind = (level: LogLevel): LogMethod =>
      this.#dispatch.bind<Logger, [LogLevel], LogArgs, void>(this, level);
    this.debug = bind('debug');
    this.info = bind('info');
    this.log = bind('log');
    this.warn = bind('warn');
    this.error = bind('error');
  }

  /**
   * Creates a sub-logger with the given options.
   *
   * @param options - The options for the sub-logger, or a string to use as the
   *   sub-logger's tag.
   * @returns The sub-logger.
   */
  subLogger(options: LoggerOptions | string = {}): Logger {
    return new Logger(
      mergeOptions(
        this.#options,
        typeof options === 'string' ? { tags: [options] } : options,
      ),
    );
  }

  #dispatch(level: LogLevel, ...args: LogArgs): void {
    const { transports, tags, level: minimum } = mergeOptions(this.#options);
    if (logLevels[level] < logLevels[minimum]) {
      return;
    }
    const [message, ...data] = args;
    const entry: LogEntry = { level, tags, message, data };
    transports.forEach((transport) => transport(entry));
  }
}
