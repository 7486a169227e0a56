// SPDX-License-Identifier: Apache-2.0

import {type SchemaMigration} from '../../api/schema-migration.js';
import {type PlainObject} from '../../api/plain-object.js';
import {InvalidSchemaVersionError} from '../../api/invalid-schema-version-error.js';
import {VersionRange} from '../../../../../business/utils/version-range.js';
import {Version} from '../../../../../business/utils/version.js';
import {VERSION_1_SCHEME} from '../../../../../core/constants.js';

// Version 1 partitions predate schemes; they all use the default scheme
export class UserPartitionV2Migration implements SchemaMigration {
  public get range(): VersionRange {
    return VersionRange.fromIntegerVersion(1);
  }

  public get version(): Version {
    return new Version(2);
  }

  public migrate(source: PlainObject): PlainObject {
    if (source.version !== 1) {
      throw new InvalidSchemaVersionError(source.version, 1);
    }

    return {...source, scheme: VERSION_1_SCHEME, version: this.version.value};
  }
}
