export { Logger } from './logger.ts';
export { logLevels } from './constants.ts';
export { consoleTransport, makeArrayTransport } from './transports.ts';
export type {
  LogArgs,
  LogEntry,
  LogLevel,
  LogMethod,
  LoggerOptions,
  Transport,
} from './types.ts';
