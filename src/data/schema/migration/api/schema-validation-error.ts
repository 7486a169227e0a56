// SPDX-License-Identifier: Apache-2.0

import {SchemaMigrationError} from './schema-migration-error.js';

export class SchemaValidationError extends SchemaMigrationError {
  public constructor(message: string, cause?: Error, meta?: object) {
    super(message, cause, meta);
  }
}
