// SPDX-License-Identifier: Apache-2.0

import {expect} from 'chai';
import {describe, it} from 'mocha';
import {container} from 'tsyringe-neo';
import {Group, InjectTokens, UserPartition, UserPartitionSchema, constants} from '../../src/index.js';

describe('user-partitions', () => {
  it('should read partitions stored as JSON text', () => {
    const stored = JSON.stringify({
      id: 12,
      name: 'Content experiment',
      description: 'Which explanation works better',
      version: 1,
      groups: [
        {id: 0, name: 'Control', version: 1},
        {id: 1, name: 'Treatment', version: 1},
      ],
    });

    const schema = container.resolve<UserPartitionSchema>(InjectTokens.UserPartitionSchema);
    const partition: UserPartition = schema.transform(JSON.parse(stored));

    expect(partition.scheme.name).to.equal(constants.VERSION_1_SCHEME);
    expect(partition.getGroup(1)?.equals(new Group(1, 'Treatment'))).to.be.true;
    expect(partition.toJSON()).to.deep.include({scheme: 'random', version: 2});
  });
});
