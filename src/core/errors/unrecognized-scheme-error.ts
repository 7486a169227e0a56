// SPDX-License-Identifier: Apache-2.0

import {DataValidationError} from './data-validation-error.js';

export class UnrecognizedSchemeError extends DataValidationError {
  public constructor(
    public readonly schemeName: string,
    known: string[] = [],
  ) {
    super(`Unrecognized scheme '${schemeName}'`, known, schemeName);
  }
}
