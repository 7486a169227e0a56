// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {SchemaBase} from '../../api/schema-base.js';
import {type Schema} from '../../api/schema.js';
import {type SchemaMigration} from '../../api/schema-migration.js';
import {type PlainObject} from '../../api/plain-object.js';
import {GroupSchema} from './group-schema.js';
import {UserPartitionV2Migration} from './user-partition-v2-migration.js';
import {UserPartition} from '../../../model/partition/user-partition.js';
import {type Group} from '../../../model/partition/group.js';
import {Version} from '../../../../../business/utils/version.js';
import {describeValue} from '../../../../../business/utils/describe-value.js';
import {UserPartitionSchemes} from '../../../../../business/partitions/scheme/user-partition-schemes.js';
import {InjectTokens} from '../../../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../../../core/dependency-injection/container-helper.js';
import {type PartitionLogger} from '../../../../../core/logging/partition-logger.js';
import {DataValidationError} from '../../../../../core/errors/data-validation-error.js';

@injectable()
export class UserPartitionSchema extends SchemaBase<UserPartition> implements Schema<UserPartition> {
  private readonly groupSchema: GroupSchema;

  public constructor(
    @inject(InjectTokens.PartitionLogger) logger?: PartitionLogger,
    @inject(InjectTokens.GroupSchema) groupSchema?: GroupSchema,
  ) {
    super(patchInject(logger, InjectTokens.PartitionLogger, UserPartitionSchema.name));
    this.groupSchema = patchInject(groupSchema, InjectTokens.GroupSchema, UserPartitionSchema.name);
  }

  public get name(): string {
    return UserPartition.name;
  }

  public get version(): Version {
    return UserPartition.SCHEMA_VERSION;
  }

  public get migrations(): SchemaMigration[] {
    return [new UserPartitionV2Migration()];
  }

  protected get requiredKeys(): string[] {
    return ['id', 'name', 'description', 'version', 'groups'];
  }

  protected get currentVersionKeys(): string[] {
    return ['scheme'];
  }

  protected get oldestVersion(): Version {
    return new Version(1);
  }

  protected isInstance(data: unknown): data is UserPartition {
    return data instanceof UserPartition;
  }

  protected build(data: PlainObject): UserPartition {
    const name: string = this.requireString(data, 'name');
    const description: string = this.requireString(data, 'description');
    const schemeId: string = this.requireString(data, 'scheme');

    const groups: unknown = data.groups;
    if (!Array.isArray(groups)) {
      throw new DataValidationError(`${this.name} data ${describeValue(data)} has non-array 'groups'`, 'array', groups);
    }

    const decodedGroups: Group[] = groups.map((group: unknown) => this.groupSchema.transform(group));

    return new UserPartition(data.id, name, description, decodedGroups, UserPartitionSchemes.get(schemeId));
  }
}
