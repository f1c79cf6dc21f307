/**
 * UUID Generator Utility - Quest Notifier
 *
 * Run identifiers use crypto.randomUUID(), available in the Node.js 20.x runtime.
 */

import { randomUUID } from 'crypto';

/**
 * Generate a new UUID v4
 *
 * @example
 * const runId = generateUUID();
 * // Returns: "f47ac10b-58cc-4372-a567-0e02b2c3d479"
 */
export const generateUUID = (): string => {
  return randomUUID();
};
