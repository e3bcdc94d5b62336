/**
 * Hashing utilities for result identification
 */

import { createHash } from 'crypto';

/**
 * Generate SHA-256 hash of content
 */
export function sha256(content: string | Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Stable result ID from the document and the run that ranked it
 */
export function generateResultId(document: string, persona: string, job: string, timestamp: string): string {
  return sha256(`${document}|${persona}|${job}|${timestamp}`).substring(0, 16);
}
