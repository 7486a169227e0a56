// SPDX-License-Identifier: Apache-2.0

import {type UserPartitionScheme} from './user-partition-scheme.js';
import {type SchemeExtension} from './scheme-extension.js';
import {type Group} from '../../../data/schema/model/partition/group.js';
import {type UserPartition} from '../../../data/schema/model/partition/user-partition.js';

/**
 * Base class for schemes created from a {@link SchemeExtension}. Schemes are static unless they override
 * {@link isDynamic}.
 */
export abstract class UserPartitionSchemeBase implements UserPartitionScheme {
  public constructor(protected readonly extension?: SchemeExtension) {}

  public get name(): string | undefined {
    return this.extension?.name;
  }

  public get isDynamic(): boolean {
    return false;
  }

  public abstract getGroupForUser(partition: UserPartition): Group | null;
}
