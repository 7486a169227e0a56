// SPDX-License-Identifier: Apache-2.0

import {instanceToPlain} from 'class-transformer';
import {injectable} from 'tsyringe-neo';
import {type ObjectMapper} from '../api/object-mapper.js';
import {ObjectMappingError} from '../api/object-mapping-error.js';

@injectable()
export class ClassToObjectMapper implements ObjectMapper {
  public toObject<T extends object>(data: T): Record<string, unknown> {
    try {
      return instanceToPlain(data);
    } catch (error) {
      throw new ObjectMappingError(
        `Error converting class instance to object [ cls = '${data.constructor.name}' ]`,
        error,
      );
    }
  }
}
