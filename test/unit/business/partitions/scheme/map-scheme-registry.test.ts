// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it, beforeEach} from 'mocha';
import {MapSchemeRegistry} from '../../../../../src/business/partitions/scheme/map-scheme-registry.js';
import {IllegalArgumentError} from '../../../../../src/business/errors/illegal-argument-error.js';
import {type SchemeFactory} from '../../../../../src/business/partitions/scheme/scheme-extension.js';
import {FirstGroupScheme} from '../../../fixtures/test-schemes.fixture.js';

describe('MapSchemeRegistry', () => {
  const factory: SchemeFactory = extension => new FirstGroupScheme(extension);
  let registry: MapSchemeRegistry;

  beforeEach(() => {
    registry = new MapSchemeRegistry();
  });

  it('should look up registered extensions by name', () => {
    registry.register('random', factory);

    const extension = registry.lookup('random');
    expect(extension).to.not.be.undefined;
    expect(extension?.name).to.equal('random');
    expect(extension?.factory).to.equal(factory);
  });

  it('should return undefined for unknown names', () => {
    expect(registry.lookup('no-such-scheme')).to.be.undefined;
  });

  it('should list names in registration order', () => {
    registry.register('cohort', factory).register('random', factory);
    expect(registry.names()).to.deep.equal(['cohort', 'random']);
  });

  it('should reject duplicate names', () => {
    registry.register('random', factory);
    expect(() => registry.register('random', factory)).to.throw(
      IllegalArgumentError,
      "scheme 'random' is already registered",
    );
  });

  it('should reject empty names', () => {
    expect(() => registry.register('', factory)).to.throw(IllegalArgumentError, 'scheme name must not be empty');
  });
});
