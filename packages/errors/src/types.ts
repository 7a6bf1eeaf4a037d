import type { Json } from '@metamask/utils';

import type { ErrorCode } from './constants.ts';

export type ErrorOptionsWithStack = {
  cause?: unknown;
  stack?: string;
};

export type BaseErrorOptions = ErrorOptionsWithStack & {
  data?: Json;
};

export type CodedError = {
  code: ErrorCode;
  data: Json | undefined;
} & Error;
