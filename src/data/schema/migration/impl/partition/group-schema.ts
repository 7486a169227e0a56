// SPDX-License-Identifier: Apache-2.0

import {inject, injectable} from 'tsyringe-neo';
import {SchemaBase} from '../../api/schema-base.js';
import {type Schema} from '../../api/schema.js';
import {type SchemaMigration} from '../../api/schema-migration.js';
import {type PlainObject} from '../../api/plain-object.js';
import {Group} from '../../../model/partition/group.js';
import {type Version} from '../../../../../business/utils/version.js';
import {InjectTokens} from '../../../../../core/dependency-injection/inject-tokens.js';
import {patchInject} from '../../../../../core/dependency-injection/container-helper.js';
import {type PartitionLogger} from '../../../../../core/logging/partition-logger.js';

@injectable()
export class GroupSchema extends SchemaBase<Group> implements Schema<Group> {
  public constructor(@inject(InjectTokens.PartitionLogger) logger?: PartitionLogger) {
    super(patchInject(logger, InjectTokens.PartitionLogger, GroupSchema.name));
  }

  public get name(): string {
    return Group.name;
  }

  public get version(): Version {
    return Group.SCHEMA_VERSION;
  }

  // Only one version of a group exists
  public get migrations(): SchemaMigration[] {
    return [];
  }

  protected get requiredKeys(): string[] {
    return ['id', 'name', 'version'];
  }

  protected isInstance(data: unknown): data is Group {
    return data instanceof Group;
  }

  protected build(data: PlainObject): Group {
    return new Group(data.id, this.requireString(data, 'name'));
  }
}
