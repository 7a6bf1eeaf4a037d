import type { Json } from '@metamask/utils';

import type { ErrorCode } from './constants.ts';
import type { BaseErrorOptions } from './types.ts';

export class BaseError extends Error {
  public readonly code: ErrorCode;

  public readonly data: Json | undefined;

  constructor(code: ErrorCode, message: string, options?: BaseErrorOptions) {
    const { cause, stack, data } = options ?? {};
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.data = data;
    if (stack !== undefined) {
      this.stack = stack;
    }
  }
}
