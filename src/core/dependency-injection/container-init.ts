// SPDX-License-Identifier: Apache-2.0

import {container, Lifecycle} from 'tsyringe-neo';
import * as constants from '../constants.js';
import {InjectTokens} from './inject-tokens.js';
import {type PartitionLogger} from '../logging/partition-logger.js';
import {PartitionWinstonLogger} from '../logging/partition-winston-logger.js';
import {ClassToObjectMapper} from '../../data/mapper/impl/class-to-object-mapper.js';
import {type SchemeRegistry} from '../../business/partitions/scheme/scheme-registry.js';
import {MapSchemeRegistry} from '../../business/partitions/scheme/map-scheme-registry.js';
import {GroupSchema} from '../../data/schema/migration/impl/partition/group-schema.js';
import {UserPartitionSchema} from '../../data/schema/migration/impl/partition/user-partition-schema.js';

/**
 * Container class to manage the dependency injection container
 */
export class Container {
  private static instance?: Container;
  private static isInitialized: boolean = false;

  private constructor() {}

  /**
   * Get the singleton instance of the container
   */
  public static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
    }

    return Container.instance;
  }

  /**
   * Initialize the container with the default dependencies
   * @param logLevel - the log level to use, defaults to constants.PARTITIONS_LOG_LEVEL
   * @param developmentMode - if true, include error stacks in logs
   * @param schemeRegistry - the registry of partition schemes, an empty registry if not provided
   * @param logFile - the file to log to, stderr if empty
   * @param testLogger - a test logger to use, if provided
   */
  public init(
    logLevel: string = constants.PARTITIONS_LOG_LEVEL,
    developmentMode: boolean = constants.PARTITIONS_DEV_MODE,
    schemeRegistry: SchemeRegistry = new MapSchemeRegistry(),
    logFile: string = constants.PARTITIONS_LOG_FILE,
    testLogger?: PartitionLogger,
  ): void {
    if (Container.isInitialized) {
      container.resolve<PartitionLogger>(InjectTokens.PartitionLogger).debug('Container already initialized');
      return;
    }

    // PartitionLogger
    container.register(InjectTokens.LogLevel, {useValue: logLevel});
    container.register(InjectTokens.DevelopmentMode, {useValue: developmentMode});
    container.register(InjectTokens.LogFile, {useValue: logFile});
    if (testLogger) {
      container.registerInstance(InjectTokens.PartitionLogger, testLogger);
      container.resolve<PartitionLogger>(InjectTokens.PartitionLogger).debug('Using test logger');
    } else {
      container.register(
        InjectTokens.PartitionLogger,
        {useClass: PartitionWinstonLogger},
        {lifecycle: Lifecycle.Singleton},
      );
      container.resolve<PartitionLogger>(InjectTokens.PartitionLogger).debug('Using default logger');
    }

    // Data Layer ObjectMapper
    container.register(InjectTokens.ObjectMapper, {useClass: ClassToObjectMapper}, {lifecycle: Lifecycle.Singleton});

    // Partition schemes
    container.registerInstance(InjectTokens.SchemeRegistry, schemeRegistry);

    // Data Layer Schemas
    container.register(InjectTokens.GroupSchema, {useClass: GroupSchema}, {lifecycle: Lifecycle.Singleton});
    container.register(
      InjectTokens.UserPartitionSchema,
      {useClass: UserPartitionSchema},
      {lifecycle: Lifecycle.Singleton},
    );

    Container.isInitialized = true;
  }

  /**
   * clears the container registries and re-initializes the container
   *
   * Scheme instances already resolved stay cached for the life of the process.
   */
  public reset(
    logLevel?: string,
    developmentMode?: boolean,
    schemeRegistry?: SchemeRegistry,
    logFile?: string,
    testLogger?: PartitionLogger,
  ): void {
    if (Container.instance && Container.isInitialized) {
      container.resolve<PartitionLogger>(InjectTokens.PartitionLogger).debug('Resetting container');
      container.reset();
      Container.isInitialized = false;
    }
    Container.getInstance().init(logLevel, developmentMode, schemeRegistry, logFile, testLogger);
  }
}
