// SPDX-License-Identifier: Apache-2.0

import {type Schema} from './schema.js';
import {type SchemaMigration} from './schema-migration.js';
import {isPlainObject, type PlainObject} from './plain-object.js';
import {SchemaValidationError} from './schema-validation-error.js';
import {Version} from '../../../../business/utils/version.js';
import {describeValue} from '../../../../business/utils/describe-value.js';
import {DataValidationError} from '../../../../core/errors/data-validation-error.js';
import {MissingKeyError} from '../../../../core/errors/missing-key-error.js';
import {UnexpectedVersionError} from '../../../../core/errors/unexpected-version-error.js';
import {type PartitionLogger} from '../../../../core/logging/partition-logger.js';

export abstract class SchemaBase<T> implements Schema<T> {
  public abstract get name(): string;
  public abstract get version(): Version;
  public abstract get migrations(): SchemaMigration[];

  /**
   * Keys every input must carry, in the order they are checked.
   */
  protected abstract get requiredKeys(): string[];

  /**
   * Keys the data must carry once it has been migrated to the current version.
   */
  protected get currentVersionKeys(): string[] {
    return [];
  }

  /**
   * The oldest version the migration chain accepts.
   */
  protected get oldestVersion(): Version {
    return this.version;
  }

  protected constructor(protected readonly logger: PartitionLogger) {}

  protected abstract isInstance(data: unknown): data is T;

  /**
   * Builds the model from data that has reached the current version and carries every required key.
   */
  protected abstract build(data: PlainObject): T;

  public transform(data: unknown): T {
    if (this.isInstance(data)) {
      return data;
    }

    if (!isPlainObject(data)) {
      throw new DataValidationError(`${this.name} data ${describeValue(data)} is not an object`, 'object', data);
    }

    this.requireKeys(data, this.requiredKeys, data);

    const dataVersion: unknown = data.version;
    if (!Version.isValid(dataVersion)) {
      throw new UnexpectedVersionError(this.name, this.version.value, data, dataVersion);
    }

    const migrated: PlainObject = this.applyMigrations(data, new Version(dataVersion));
    if (migrated.version !== this.version.value) {
      throw new UnexpectedVersionError(this.name, this.version.value, data, dataVersion);
    }

    this.requireKeys(migrated, this.currentVersionKeys, data);

    return this.build(migrated);
  }

  public validateMigrations(): void {
    if (this.migrations.length === 0) {
      return;
    }

    const versionJumps: number[] = this.migrations.map(value => value.version.value).sort((l, r) => l - r);

    for (let index = 1; index < versionJumps.length; index++) {
      if (versionJumps[index] === versionJumps[index - 1]) {
        throw new SchemaValidationError(`Duplicate migration version '${versionJumps[index]}'`);
      }
    }

    let currentVersion: Version = this.oldestVersion;

    for (const versionJump of versionJumps) {
      const nextVersion: Version = this.nextVersionJump(currentVersion);
      if (nextVersion.value !== versionJump) {
        throw new SchemaValidationError(
          `Invalid migration version sequence detected; expected version '${versionJump}' but got '${nextVersion.value}'`,
        );
      }

      currentVersion = nextVersion;
    }

    if (!currentVersion.equals(this.version)) {
      throw new SchemaValidationError(
        `Migration sequence ends at version '${currentVersion.value}'; expected version '${this.version.value}'`,
      );
    }
  }

  protected requireKeys(data: PlainObject, keys: string[], original: PlainObject): void {
    for (const key of keys) {
      if (!Object.hasOwn(data, key)) {
        throw new MissingKeyError(this.name, key, original);
      }
    }
  }

  protected requireString(data: PlainObject, key: string): string {
    const value: unknown = data[key];
    if (typeof value !== 'string') {
      throw new DataValidationError(
        `${this.name} data ${describeValue(data)} has a non-string '${key}'`,
        'string',
        value,
      );
    }

    return value;
  }

  protected nextVersionJump(currentVersion: Version): Version {
    const targetMigrations: SchemaMigration[] = this.findMigrations(currentVersion);
    if (targetMigrations.length === 0) {
      throw new SchemaValidationError(
        `No migration found for version '${currentVersion.value}'; there is a gap in the migration sequence`,
      );
    }

    return targetMigrations[0].version;
  }

  protected applyMigrations(data: PlainObject, dataVersion: Version): PlainObject {
    let migrations: SchemaMigration[] = this.findMigrations(dataVersion);

    while (migrations.length > 0) {
      const migration: SchemaMigration = migrations[0];
      data = migration.migrate(data);
      this.logger.debug(`Migrated ${this.name} data from version '${dataVersion}' to '${migration.version}'`);
      dataVersion = migration.version;
      migrations = this.findMigrations(dataVersion);
    }

    return data;
  }

  protected findMigrations(dataVersion: Version): SchemaMigration[] {
    const eligibleMigrations: SchemaMigration[] = this.migrations.filter(value => value.range.contains(dataVersion));

    if (eligibleMigrations.length > 0) {
      eligibleMigrations.sort((l, r) => l.version.compare(r.version));
    }

    return eligibleMigrations;
  }
}
