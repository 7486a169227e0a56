// SPDX-License-Identifier: Apache-2.0

import {DataValidationError} from './data-validation-error.js';
import {describeValue} from '../../business/utils/describe-value.js';

export class InvalidIdentifierError extends DataValidationError {
  public constructor(field: string, found: unknown) {
    super(`Invalid ${field} ${describeValue(found)}; expected an integer`, 'integer', found);
  }
}
