/**
 * Match Id Generation
 *
 * Ids are 3 random bytes as 6 uppercase hex characters, regenerated until
 * they do not collide with a stored id.
 */

import { randomBytes } from 'crypto';

export const MATCH_ID_PATTERN = /^[0-9A-F]{6}$/;

/**
 * Generate an id not present in `existing` (compared upper-case)
 *
 * @param existing - Ids already in use, upper-case
 * @param random - Source of 3 random bytes
 */
export function generateMatchId(
  existing: Set<string>,
  random: () => Buffer = () => randomBytes(3)
): string {
  for (;;) {
    const id = random().toString('hex').toUpperCase();
    if (!existing.has(id)) {
      return id;
    }
  }
}
