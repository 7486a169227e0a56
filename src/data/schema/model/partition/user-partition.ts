// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose, Type} from 'class-transformer';
import {Group} from './group.js';
import {Version} from '../../../../business/utils/version.js';
import {toInteger} from '../../../../business/utils/integers.js';
import {type UserPartitionScheme} from '../../../../business/partitions/scheme/user-partition-scheme.js';
import {UserPartitionSchemes} from '../../../../business/partitions/scheme/user-partition-schemes.js';
import {container} from 'tsyringe-neo';
import {type ObjectMapper} from '../../../mapper/api/object-mapper.js';
import {InjectTokens} from '../../../../core/dependency-injection/inject-tokens.js';
import * as constants from '../../../../core/constants.js';

/**
 * A named way to partition users into groups, primarily intended for running experiments. Each user is expected to
 * be in at most one group of a partition.
 *
 * The id is unique within the context the partition is used in (for partitions within a course, the ids are unique
 * per course). The scheme assigns users to groups.
 */
@Exclude()
export class UserPartition {
  public static readonly SCHEMA_VERSION: Version = new Version(constants.USER_PARTITION_SCHEMA_VERSION);

  public static readonly VERSION_1_SCHEME: string = constants.VERSION_1_SCHEME;

  @Expose()
  public readonly id: number;

  @Expose()
  public readonly name: string;

  @Expose()
  public readonly description: string;

  @Expose()
  @Type(() => Group)
  public readonly groups: readonly Group[];

  public readonly scheme: UserPartitionScheme;

  /**
   * @param id - the partition id, coerced to an integer
   * @param name - the display name
   * @param description - free text
   * @param groups - the groups in lookup order; duplicates are kept
   * @param scheme - the scheme instance; resolved from `schemeId` when omitted
   * @param schemeId - the name of the registered scheme to use when no instance is given
   * @throws InvalidIdentifierError if the id is not an integer.
   * @throws UnrecognizedSchemeError if the scheme has to be resolved and no scheme is registered as `schemeId`.
   */
  public constructor(
    id: unknown,
    name: string,
    description: string,
    groups: readonly Group[],
    scheme?: UserPartitionScheme,
    schemeId: string = UserPartition.VERSION_1_SCHEME,
  ) {
    this.id = toInteger(id, 'user partition id');
    this.name = name;
    this.description = description;
    this.groups = Object.freeze([...groups]);
    this.scheme = scheme ?? UserPartitionSchemes.get(schemeId);
    Object.freeze(this);
  }

  @Expose({name: 'scheme'})
  public get schemeName(): string | undefined {
    return this.scheme.name;
  }

  @Expose()
  public get version(): number {
    return UserPartition.SCHEMA_VERSION.value;
  }

  /**
   * Returns the first group with the specified id, or `null` if there is none.
   */
  public getGroup(groupId: number): Group | null {
    return this.groups.find(group => group.id === groupId) ?? null;
  }

  public equals(other: UserPartition): boolean {
    return (
      this.id === other.id &&
      this.name === other.name &&
      this.description === other.description &&
      this.schemeName === other.schemeName &&
      this.groups.length === other.groups.length &&
      this.groups.every((group, index) => group.equals(other.groups[index]))
    );
  }

  public toJSON(): Record<string, unknown> {
    return container.resolve<ObjectMapper>(InjectTokens.ObjectMapper).toObject(this);
  }
}
