// SPDX-License-Identifier: Apache-2.0

import {InvalidIdentifierError} from '../../core/errors/invalid-identifier-error.js';

const INTEGER_PATTERN: RegExp = /^\s*[+-]?\d+\s*$/;

/**
 * Coerces an identifier to an integer. Finite numbers are truncated toward zero and strings of decimal digits are
 * parsed; everything else is rejected.
 *
 * @param value - the raw identifier.
 * @param field - the name of the field, used in the error message.
 * @throws InvalidIdentifierError if the value cannot be represented as a safe integer.
 */
export function toInteger(value: unknown, field: string = 'id'): number {
  let result: number = Number.NaN;

  if (typeof value === 'number') {
    result = Math.trunc(value);
  } else if (typeof value === 'string' && INTEGER_PATTERN.test(value)) {
    result = Number.parseInt(value.trim(), 10);
  }

  if (!Number.isSafeInteger(result)) {
    throw new InvalidIdentifierError(field, value);
  }

  // Math.trunc(-0.5) yields -0
  return result === 0 ? 0 : result;
}
