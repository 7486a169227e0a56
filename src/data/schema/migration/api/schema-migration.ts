// SPDX-License-Identifier: Apache-2.0

import {type VersionRange} from '../../../../business/utils/version-range.js';
import {type Version} from '../../../../business/utils/version.js';
import {type PlainObject} from './plain-object.js';

/**
 * Represents a schema migration which can be applied to a source object to bring it up to date with the schema version
 * of this migration.
 */
export interface SchemaMigration {
  /**
   * The resulting schema version after the migration.
   */
  readonly version: Version;

  /**
   * The range of schema versions which can be migrated by this SchemaMigration instance.
   */
  readonly range: VersionRange;

  /**
   * Migrates the given source object to match the new schema. The source object belongs to the caller and must not
   * be modified.
   *
   * @param source - the object to migrate.
   * @returns the migrated copy.
   */
  migrate(source: PlainObject): PlainObject;
}
