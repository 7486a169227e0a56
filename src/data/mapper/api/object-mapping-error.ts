// SPDX-License-Identifier: Apache-2.0

import {PartitionError} from '../../../core/errors/partition-error.js';

/**
 * Thrown by an object mapper when an error occurs during the mapping process.
 */
export class ObjectMappingError extends PartitionError {
  public constructor(message: string, cause?: unknown, meta?: object) {
    super(message, cause, meta);
  }
}
