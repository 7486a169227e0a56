// SPDX-License-Identifier: Apache-2.0

/**
 * Dependency injection tokens
 */
export const InjectTokens = {
  LogLevel: Symbol.for('LogLevel'),
  DevelopmentMode: Symbol.for('DevelopmentMode'),
  LogFile: Symbol.for('LogFile'),
  PartitionLogger: Symbol.for('PartitionLogger'),
  ObjectMapper: Symbol.for('ObjectMapper'),
  SchemeRegistry: Symbol.for('SchemeRegistry'),
  GroupSchema: Symbol.for('GroupSchema'),
  UserPartitionSchema: Symbol.for('UserPartitionSchema'),
} as const;
