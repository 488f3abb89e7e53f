import { randomInt } from 'node:crypto';

import { DEFAULT_STATE_LENGTH } from '#constants/session';

const ALPHANUMERIC_CHARS =
  '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz';

/** source of CSRF states, replaceable for deterministic tests */
export type StateGenerator = () => string;

/**
 * generates a random mixed-case alphanumeric string
 * @param length number of characters
 * @returns random string drawn from a cryptographically secure source
 */
export function randomAlphanumeric(length: number): string {
  let result = '';
  for (let index = 0; index < length; index++) {
    result += ALPHANUMERIC_CHARS[randomInt(ALPHANUMERIC_CHARS.length)];
  }

  return result;
}

/**
 * generates a CSRF state for the authorization redirect
 * @returns 20 character mixed-case alphanumeric state
 */
export const generateState: StateGenerator = () =>
  randomAlphanumeric(DEFAULT_STATE_LENGTH);
