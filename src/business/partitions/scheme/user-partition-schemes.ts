// SPDX-License-Identifier: Apache-2.0

import {container} from 'tsyringe-neo';
import {type UserPartitionScheme} from './user-partition-scheme.js';
import {type SchemeRegistry} from './scheme-registry.js';
import {type PartitionLogger} from '../../../core/logging/partition-logger.js';
import {InjectTokens} from '../../../core/dependency-injection/inject-tokens.js';
import {UnrecognizedSchemeError} from '../../../core/errors/unrecognized-scheme-error.js';
import {UnsupportedOperationError} from '../../errors/unsupported-operation-error.js';

/**
 * Process-wide scheme lookup. The registry is resolved from the container on first use and kept; each scheme is
 * built once and then served from the cache for the life of the process.
 */
export class UserPartitionSchemes {
  private static registry?: SchemeRegistry;
  private static readonly schemes: Map<string, UserPartitionScheme> = new Map<string, UserPartitionScheme>();

  private constructor() {
    throw new UnsupportedOperationError('This class cannot be instantiated');
  }

  /**
   * Returns the user partition scheme with the given name.
   *
   * @throws UnrecognizedSchemeError if no scheme is registered under the name.
   */
  public static get(name: string): UserPartitionScheme {
    const cached: UserPartitionScheme | undefined = UserPartitionSchemes.schemes.get(name);
    if (cached) {
      return cached;
    }

    if (!UserPartitionSchemes.registry) {
      UserPartitionSchemes.registry = container.resolve<SchemeRegistry>(InjectTokens.SchemeRegistry);
    }

    const extension = UserPartitionSchemes.registry.lookup(name);
    if (!extension) {
      throw new UnrecognizedSchemeError(name, UserPartitionSchemes.registry.names());
    }

    const scheme: UserPartitionScheme = extension.factory(extension);
    UserPartitionSchemes.schemes.set(name, scheme);
    container
      .resolve<PartitionLogger>(InjectTokens.PartitionLogger)
      .debug(`Created user partition scheme '${name}' [ dynamic = ${scheme.isDynamic} ]`);

    return scheme;
  }
}
