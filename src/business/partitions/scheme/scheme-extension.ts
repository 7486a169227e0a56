// SPDX-License-Identifier: Apache-2.0

import {type UserPartitionScheme} from './user-partition-scheme.js';

export type SchemeFactory = (extension: SchemeExtension) => UserPartitionScheme;

/**
 * A registry entry; the factory receives the entry itself as its configuration.
 */
export interface SchemeExtension {
  readonly name: string;
  readonly factory: SchemeFactory;
}
