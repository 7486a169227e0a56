// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {GroupSchema} from '../../../../../../../src/data/schema/migration/impl/partition/group-schema.js';
import {Group} from '../../../../../../../src/data/schema/model/partition/group.js';
import {MissingKeyError} from '../../../../../../../src/core/errors/missing-key-error.js';
import {UnexpectedVersionError} from '../../../../../../../src/core/errors/unexpected-version-error.js';
import {DataValidationError} from '../../../../../../../src/core/errors/data-validation-error.js';
import {InvalidIdentifierError} from '../../../../../../../src/core/errors/invalid-identifier-error.js';

describe('GroupSchema', () => {
  const schema: GroupSchema = new GroupSchema();

  it('should transform plain data to a group', () => {
    const group = schema.transform({id: '4', name: 'A', version: 1});
    expect(group).to.be.instanceOf(Group);
    expect(group.id).to.equal(4);
    expect(group.name).to.equal('A');
  });

  it('should round trip a group', () => {
    const group = new Group(1, 'A');
    expect(schema.transform(group.toJSON()).equals(group)).to.be.true;
  });

  it('should return group instances unchanged', () => {
    const group = new Group(1, 'A');
    expect(schema.transform(group)).to.equal(group);
  });

  it('should name the missing key', () => {
    expect(() => schema.transform({id: 1, name: 'A'}))
      .to.throw(MissingKeyError, `Group data {"id":1,"name":"A"} is missing required key 'version'`)
      .with.property('key', 'version');
  });

  it('should not accept keys inherited from the prototype', () => {
    const data: object = Object.assign(Object.create({version: 1}), {id: 1, name: 'A'});
    expect(() => schema.transform(data)).to.throw(MissingKeyError).with.property('key', 'version');
  });

  it('should check keys in order', () => {
    expect(() => schema.transform({version: 1})).to.throw(MissingKeyError).with.property('key', 'id');
    expect(() => schema.transform({id: 1, version: 1})).to.throw(MissingKeyError).with.property('key', 'name');
  });

  it('should fail for any version but the first', () => {
    expect(() => schema.transform({id: 1, name: 'A', version: 2})).to.throw(
      UnexpectedVersionError,
      `Group data {"id":1,"name":"A","version":2} has unexpected version '2'`,
    );
    expect(() => schema.transform({id: 1, name: 'A', version: 0})).to.throw(UnexpectedVersionError);
    expect(() => schema.transform({id: 1, name: 'A', version: '1'})).to.throw(UnexpectedVersionError);
  });

  it('should fail for data that is not an object', () => {
    expect(() => schema.transform(null)).to.throw(DataValidationError, 'Group data null is not an object');
    expect(() => schema.transform([1, 'A', 1])).to.throw(DataValidationError, 'is not an object');
  });

  it('should fail for invalid field values', () => {
    expect(() => schema.transform({id: 'x', name: 'A', version: 1})).to.throw(InvalidIdentifierError);
    expect(() => schema.transform({id: 1, name: 5, version: 1})).to.throw(
      DataValidationError,
      `Group data {"id":1,"name":5,"version":1} has a non-string 'name'`,
    );
  });

  it('should have no migrations to validate', () => {
    expect(() => schema.validateMigrations()).to.not.throw();
  });
});
