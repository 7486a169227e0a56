// SPDX-License-Identifier: Apache-2.0

import {PartitionError} from '../../../../core/errors/partition-error.js';

export class SchemaMigrationError extends PartitionError {
  public constructor(message: string, cause?: Error, meta?: object) {
    super(message, cause, meta);
  }
}
