// SPDX-License-Identifier: Apache-2.0

import 'sinon-chai';

import {type SinonStub} from 'sinon';
import sinon from 'sinon';
import {expect} from 'chai';
import {describe, it, afterEach, beforeEach} from 'mocha';

import {type PartitionLogger} from '../../../src/core/logging/partition-logger.js';
import winston from 'winston';
import os from 'node:os';
import path from 'node:path';
import {PartitionWinstonLogger} from '../../../src/core/logging/partition-winston-logger.js';

describe('Logging', () => {
  let logger: PartitionLogger;
  let loggerStub: SinonStub;

  beforeEach(() => {
    logger = new PartitionWinstonLogger('debug', false, '');
    loggerStub = sinon.stub(winston.Logger.prototype, 'log');
  });

  // Cleanup after each test
  afterEach(() => sinon.restore());

  it('should log at correct severity', () => {
    expect(logger).to.be.instanceof(PartitionWinstonLogger);
    const meta = logger.prepMeta();

    logger.error('Error log');
    expect(loggerStub).to.have.been.calledWith('error', 'Error log', meta);

    logger.warn('Warn log');
    expect(loggerStub).to.have.been.calledWith('warn', 'Warn log', meta);

    logger.info('Info log');
    expect(loggerStub).to.have.been.calledWith('info', 'Info log', meta);

    logger.debug('Debug log');
    expect(loggerStub).to.have.been.calledWith('debug', 'Debug log', meta);
  });

  it('should change the trace id', () => {
    const before = logger.prepMeta().traceId;
    logger.nextTraceId();
    const after = logger.prepMeta().traceId;

    expect(before).to.be.a('string');
    expect(after).to.be.a('string');
    expect(after).to.not.equal(before);
  });

  it('should attach error stacks in dev mode', () => {
    const error = new Error('boom');
    logger.setDevMode(true);
    logger.error('Failed', error);

    expect(loggerStub).to.have.been.calledWith(
      'error',
      'Failed',
      {message: 'boom', stack: error.stack},
      logger.prepMeta(),
    );
  });

  describe('transports', () => {
    it('should write to a file when a log file is configured', () => {
      const add = sinon.spy(winston.Logger.prototype, 'add');
      new PartitionWinstonLogger('info', false, path.join(os.tmpdir(), 'user-partitions-test.log'));

      expect(add).to.have.been.calledOnce;
      expect(add.firstCall.args[0]).to.be.instanceof(winston.transports.File);
    });

    it('should write to the console without a log file', () => {
      const add = sinon.spy(winston.Logger.prototype, 'add');
      new PartitionWinstonLogger('info', false, '');

      expect(add).to.have.been.calledOnce;
      expect(add.firstCall.args[0]).to.be.instanceof(winston.transports.Console);
    });
  });
});
