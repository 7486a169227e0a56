// SPDX-License-Identifier: Apache-2.0

import 'reflect-metadata';

export * as constants from './core/constants.js';
export {Container} from './core/dependency-injection/container-init.js';
export {InjectTokens} from './core/dependency-injection/inject-tokens.js';
export {PartitionError} from './core/errors/partition-error.js';
export {DataValidationError} from './core/errors/data-validation-error.js';
export {MissingKeyError} from './core/errors/missing-key-error.js';
export {UnexpectedVersionError} from './core/errors/unexpected-version-error.js';
export {UnrecognizedSchemeError} from './core/errors/unrecognized-scheme-error.js';
export {InvalidIdentifierError} from './core/errors/invalid-identifier-error.js';
export {IllegalArgumentError} from './business/errors/illegal-argument-error.js';
export {type PartitionLogger} from './core/logging/partition-logger.js';
export {PartitionWinstonLogger} from './core/logging/partition-winston-logger.js';
export {type UserPartitionScheme} from './business/partitions/scheme/user-partition-scheme.js';
export {UserPartitionSchemeBase} from './business/partitions/scheme/user-partition-scheme-base.js';
export {type SchemeExtension, type SchemeFactory} from './business/partitions/scheme/scheme-extension.js';
export {type SchemeRegistry} from './business/partitions/scheme/scheme-registry.js';
export {MapSchemeRegistry} from './business/partitions/scheme/map-scheme-registry.js';
export {UserPartitionSchemes} from './business/partitions/scheme/user-partition-schemes.js';
export {Group} from './data/schema/model/partition/group.js';
export {UserPartition} from './data/schema/model/partition/user-partition.js';
export {type Schema} from './data/schema/migration/api/schema.js';
export {GroupSchema} from './data/schema/migration/impl/partition/group-schema.js';
export {UserPartitionSchema} from './data/schema/migration/impl/partition/user-partition-schema.js';
