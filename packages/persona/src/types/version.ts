/**
 * HTTP protocol version carried on the start line (`HTTP/<major>.<minor>`).
 */

import { ErrorCode, PersonaError } from './errors.js';

export interface Version {
  readonly major: number;
  readonly minor: number;
}

const MAX_COMPONENT = 0xff;

/**
 * Create a Version, checking both components fit in an unsigned byte
 */
export function createVersion(major: number, minor: number): Version {
  for (const component of [major, minor]) {
    if (!Number.isInteger(component) || component < 0 || component > MAX_COMPONENT) {
      throw new PersonaError(
        ErrorCode.ERR_INVALID_VERSION,
        `Invalid version component: ${component}`
      );
    }
  }
  return { major, minor };
}

export const HTTP_1_1: Version = createVersion(1, 1);

/**
 * Format as `<major>.<minor>`
 */
export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}`;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return a.major === b.major && a.minor === b.minor;
}
