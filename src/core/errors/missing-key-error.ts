// SPDX-License-Identifier: Apache-2.0

import {DataValidationError} from './data-validation-error.js';
import {describeValue} from '../../business/utils/describe-value.js';

export class MissingKeyError extends DataValidationError {
  public constructor(
    kind: string,
    public readonly key: string,
    value: unknown,
  ) {
    super(`${kind} data ${describeValue(value)} is missing required key '${key}'`, key, value);
  }
}
