// SPDX-License-Identifier: Apache-2.0

import {type SchemeRegistry} from './scheme-registry.js';
import {type SchemeExtension, type SchemeFactory} from './scheme-extension.js';
import {IllegalArgumentError} from '../../errors/illegal-argument-error.js';

export class MapSchemeRegistry implements SchemeRegistry {
  private readonly extensions: Map<string, SchemeExtension> = new Map<string, SchemeExtension>();

  public register(name: string, factory: SchemeFactory): SchemeRegistry {
    if (!name) {
      throw new IllegalArgumentError('scheme name must not be empty');
    }

    if (this.extensions.has(name)) {
      throw new IllegalArgumentError(`scheme '${name}' is already registered`);
    }

    this.extensions.set(name, Object.freeze({name, factory}));
    return this;
  }

  public lookup(name: string): SchemeExtension | undefined {
    return this.extensions.get(name);
  }

  public names(): string[] {
    return [...this.extensions.keys()];
  }
}
