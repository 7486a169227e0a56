// SPDX-License-Identifier: Apache-2.0

import {type SchemeExtension, type SchemeFactory} from './scheme-extension.js';

/**
 * Maps scheme names to the factories that build them. The host populates the registry at start up and binds it to
 * {@link InjectTokens.SchemeRegistry}.
 */
export interface SchemeRegistry {
  /**
   * Registers a scheme factory under the given name.
   *
   * @throws IllegalArgumentError if the name is empty or already registered.
   */
  register(name: string, factory: SchemeFactory): SchemeRegistry;

  /**
   * @returns the extension registered under the name, or `undefined` when there is none.
   */
  lookup(name: string): SchemeExtension | undefined;

  /**
   * @returns the registered names, in registration order.
   */
  names(): string[];
}
