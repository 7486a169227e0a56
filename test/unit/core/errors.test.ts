// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';

import {PartitionError} from '../../../src/core/errors/partition-error.js';
import {DataValidationError} from '../../../src/core/errors/data-validation-error.js';
import {MissingKeyError} from '../../../src/core/errors/missing-key-error.js';
import {UnexpectedVersionError} from '../../../src/core/errors/unexpected-version-error.js';
import {UnrecognizedSchemeError} from '../../../src/core/errors/unrecognized-scheme-error.js';
import {InvalidIdentifierError} from '../../../src/core/errors/invalid-identifier-error.js';
import {IllegalArgumentError} from '../../../src/business/errors/illegal-argument-error.js';

describe('Errors', () => {
  const message = 'errorMessage';
  const cause = new Error('cause');

  it('should construct correct PartitionError', () => {
    const error = new PartitionError(message, cause);
    expect(error).to.be.instanceof(Error);
    expect(error.name).to.equal('PartitionError');
    expect(error.message).to.equal(message);
    expect(error.cause).to.equal(cause);
    expect(error.meta).to.deep.equal({});
    expect(error.stack).to.include('Caused by: Error: cause');
  });

  it('should construct correct DataValidationError', () => {
    const error = new DataValidationError(message, 'expected', 'found');
    expect(error).to.be.instanceof(PartitionError);
    expect(error.name).to.equal('DataValidationError');
    expect(error.cause).to.be.undefined;
    expect(error.meta).to.deep.equal({expected: 'expected', found: 'found'});
  });

  it('should construct correct MissingKeyError', () => {
    const error = new MissingKeyError('Group', 'name', {id: 1});
    expect(error).to.be.instanceof(DataValidationError);
    expect(error.name).to.equal('MissingKeyError');
    expect(error.message).to.equal(`Group data {"id":1} is missing required key 'name'`);
    expect(error.key).to.equal('name');
  });

  it('should construct correct UnexpectedVersionError', () => {
    const error = new UnexpectedVersionError('Group', 1, {version: 5}, 5);
    expect(error).to.be.instanceof(DataValidationError);
    expect(error.message).to.equal(`Group data {"version":5} has unexpected version '5'`);
    expect(error.meta).to.deep.equal({expected: 1, found: 5});
  });

  it('should construct correct UnrecognizedSchemeError', () => {
    const error = new UnrecognizedSchemeError('cohort');
    expect(error).to.be.instanceof(DataValidationError);
    expect(error.message).to.equal("Unrecognized scheme 'cohort'");
    expect(error.schemeName).to.equal('cohort');
  });

  it('should construct correct InvalidIdentifierError', () => {
    const error = new InvalidIdentifierError('group id', undefined);
    expect(error).to.be.instanceof(DataValidationError);
    expect(error.message).to.equal('Invalid group id undefined; expected an integer');
  });

  it('should construct correct IllegalArgumentError', () => {
    const error = new IllegalArgumentError(message);
    expect(error).to.be.instanceof(PartitionError);
    expect(error.name).to.equal('IllegalArgumentError');
    expect(error.message).to.equal(message);
  });
});
