import { timingSafeEqual } from 'node:crypto';

/**
 * Check a presented `X-Security-Token` against the configured secret.
 * Without a configured secret every request is authorized.
 */
export function authorize(presentedToken: string | undefined, configuredSecret: string | undefined): boolean {
  if (configuredSecret === undefined) {
    return true;
  }

  if (presentedToken === undefined) {
    return false;
  }

  const presented = Buffer.from(presentedToken, 'utf8');
  const expected = Buffer.from(configuredSecret, 'utf8');

  if (presented.length !== expected.length) {
    return false;
  }

  return timingSafeEqual(presented, expected);
}
