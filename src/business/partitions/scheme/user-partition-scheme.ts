// SPDX-License-Identifier: Apache-2.0

import {type Group} from '../../../data/schema/model/partition/group.js';
import {type UserPartition} from '../../../data/schema/model/partition/user-partition.js';

/**
 * A policy that decides which group of a partition a user belongs to.
 */
export interface UserPartitionScheme {
  /**
   * The name under which the scheme was registered, or `undefined` for a scheme built outside a registry.
   */
  readonly name: string | undefined;

  /**
   * True when the group is computed on every call instead of being assigned once and persisted for the user.
   */
  readonly isDynamic: boolean;

  /**
   * Returns the group to which the current user should be assigned, or `null` if the user is in no group.
   */
  getGroupForUser(partition: UserPartition): Group | null;
}
