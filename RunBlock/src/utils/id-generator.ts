/**
 * Run IDs using Node's built-in crypto.
 */

import { randomUUID } from 'node:crypto';

export function generateRunId(): string {
  return `run_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
}
