// SPDX-License-Identifier: Apache-2.0

import {type SchemaMigration} from './schema-migration.js';
import {type Version} from '../../../../business/utils/version.js';

/**
 * Defines a schema which can be used to convert versioned input data into a model instance.
 */
export interface Schema<T> {
  /**
   * The name of the schema, used in error messages.
   */
  readonly name: string;

  /**
   * The current version of the schema. Input data of an older version is migrated before the model is built.
   */
  readonly version: Version;

  /**
   * The list of migrations which can be applied to the model data. Migrations are applied in order to bring the input
   * data up to the current schema version.
   */
  readonly migrations: SchemaMigration[];

  /**
   * Transforms the plain javascript object into an instance of the model class. Applies any necessary migrations to the
   * input data before creating the model instance. A model instance is returned unchanged.
   *
   * @param data - The plain javascript object to be transformed.
   * @throws DataValidationError if the data is missing a key, has an unexpected version or holds invalid values.
   */
  transform(data: unknown): T;

  /**
   * Validates the migrations for the schema. A migration chain must start at the oldest supported version and be
   * unbroken, so that data of any supported version reaches the current version and no partially migrated data is
   * ever used.
   *
   * @throws SchemaValidationError if the migration chain has duplicates or gaps.
   */
  validateMigrations(): void;
}
