// SPDX-License-Identifier: Apache-2.0

import {DataValidationError} from './data-validation-error.js';
import {describeValue} from '../../business/utils/describe-value.js';

export class UnexpectedVersionError extends DataValidationError {
  public constructor(kind: string, expected: number, value: unknown, found: unknown) {
    super(`${kind} data ${describeValue(value)} has unexpected version '${String(found)}'`, expected, found);
  }
}
