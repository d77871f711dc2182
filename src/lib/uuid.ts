/**
 * UUID Generator Utility - Grooming Alerts
 *
 * Uses crypto.randomUUID() which is available in Node.js 20.x runtime.
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
