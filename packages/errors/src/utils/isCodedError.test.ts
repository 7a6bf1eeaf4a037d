import { describe, it, expect } from 'vitest';

import { isCodedError } from './isCodedError.ts';
import { ConnectionError } from '../errors/ConnectionError.ts';

describe('isCodedError', () => {
  it.each([
    [new ConnectionError('closed'), true],
    [Object.assign(new Error('foreign copy'), { code: 'LOCK_ERROR' }), true],
    [Object.assign(new Error('other code'), { code: 'ENOENT' }), false],
    [Object.assign(new Error('numeric code'), { code: 42 }), false],
    [new Error('plain'), false],
    [{ code: 'LOCK_ERROR', message: 'not an error' }, false],
  ])('classifies %o as %s', (value, expected) => {
    expect(isCodedError(value)).toBe(expected);
  });
});
