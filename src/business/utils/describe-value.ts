// SPDX-License-Identifier: Apache-2.0

import {inspect} from 'node:util';

/**
 * Renders a value for use in an error message. Plain data renders as JSON; anything JSON cannot represent
 * (cycles, bigint, undefined) falls back to `util.inspect`.
 */
export function describeValue(value: unknown): string {
  if (value === undefined || typeof value === 'bigint' || typeof value === 'function' || typeof value === 'symbol') {
    return inspect(value);
  }

  try {
    return JSON.stringify(value);
  } catch {
    return inspect(value, {depth: 2, breakLength: Number.POSITIVE_INFINITY});
  }
}
