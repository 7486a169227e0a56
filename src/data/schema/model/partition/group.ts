// SPDX-License-Identifier: Apache-2.0

import {Exclude, Expose} from 'class-transformer';
import {Version} from '../../../../business/utils/version.js';
import {toInteger} from '../../../../business/utils/integers.js';
import {container} from 'tsyringe-neo';
import {type ObjectMapper} from '../../../mapper/api/object-mapper.js';
import {InjectTokens} from '../../../../core/dependency-injection/inject-tokens.js';
import * as constants from '../../../../core/constants.js';

/**
 * An id and name for a group of students. The id should be unique within the user partition the group appears in.
 */
@Exclude()
export class Group {
  public static readonly SCHEMA_VERSION: Version = new Version(constants.GROUP_SCHEMA_VERSION);

  @Expose()
  public readonly id: number;

  @Expose()
  public readonly name: string;

  /**
   * @throws InvalidIdentifierError if the id is not an integer.
   */
  public constructor(id: unknown, name: string) {
    this.id = toInteger(id, 'group id');
    this.name = name;
    Object.freeze(this);
  }

  @Expose()
  public get version(): number {
    return Group.SCHEMA_VERSION.value;
  }

  public equals(other: Group): boolean {
    return this.id === other.id && this.name === other.name;
  }

  public toJSON(): Record<string, unknown> {
    return container.resolve<ObjectMapper>(InjectTokens.ObjectMapper).toObject(this);
  }
}
