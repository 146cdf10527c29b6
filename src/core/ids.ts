/**
 * Correlation id generation.
 */

import { randomUUID } from 'node:crypto';
import type { IdGenerator } from './types.js';

/** `{method}_{uuid}`, e.g. `tools/list_3b241101-e2bb-4255-8caf-4136c566a962`. */
export const randomIdGenerator: IdGenerator = (method) => `${method}_${randomUUID()}`;

/** Deterministic `{method}_{prefix}{n}` ids, for tests and reproducible traces. */
export function sequentialIdGenerator(prefix = ''): IdGenerator {
  let next = 0;
  return (method) => `${method}_${prefix}${++next}`;
}
