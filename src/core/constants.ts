// SPDX-License-Identifier: Apache-2.0

// -------------------- logging & runtime configuration -------------------------------------------------------------
export const PARTITIONS_LOG_LEVEL = process.env.PARTITIONS_LOG_LEVEL || 'info';
export const PARTITIONS_LOG_FILE = process.env.PARTITIONS_LOG_FILE || '';
export const PARTITIONS_DEV_MODE = process.env.PARTITIONS_DEV_MODE === 'true';
export const PARTITIONS_LOG_LABEL = 'PARTITIONS';

// -------------------- schema versions ------------------------------------------------------------------------------
export const GROUP_SCHEMA_VERSION = 1;
export const USER_PARTITION_SCHEMA_VERSION = 2;

// The scheme assigned to partitions serialized before schemes existed
export const VERSION_1_SCHEME = 'random';
