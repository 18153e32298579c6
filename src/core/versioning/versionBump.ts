/**
 * Version bump policy applied when a module's content hash changes
 *
 * NOTE: `minor` keeps the patch component (1.2.3 -> 1.3.3). Existing ledgers
 * and device-side version checks depend on this; do not reset it to 0.
 */

import { log } from '../../utils/logger.js';

export type BumpPolicy = 'patch' | 'minor' | 'major';

export const BUMP_POLICIES: readonly BumpPolicy[] = ['patch', 'minor', 'major'];

export function isBumpPolicy(value: unknown): value is BumpPolicy {
  return typeof value === 'string' && BUMP_POLICIES.some(policy => policy === value);
}

/**
 * Increment a "major.minor.patch" version by policy
 *
 * Strings that are not exactly three non-negative integers are returned
 * unchanged.
 */
export function incrementVersion(version: string, policy: BumpPolicy): string {
  const parts = version.split('.');
  if (parts.length !== 3 || !parts.every(part => /^\d+$/.test(part))) {
    log.debug(`[VERSION] Not a major.minor.patch version, left as is: ${version}`);
    return version;
  }

  let [major, minor, patch] = parts.map(part => parseInt(part, 10));

  switch (policy) {
    case 'patch':
      patch += 1;
      break;
    case 'major':
      major += 1;
      minor = 0;
      patch = 0;
      break;
    case 'minor':
      minor += 1;
      break;
  }

  return `${major}.${minor}.${patch}`;
}
