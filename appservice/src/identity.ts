import { InvalidIdentityError } from './errors.js';

const USER_ID_PATTERN = /^@([^:]+):(.+)$/;

export interface UserIdParts {
  localpart: string;
  domain: string;
}

/**
 * Split "@localpart:domain". The domain keeps everything after the first
 * colon, so "@bot:example.org:8448" has the domain "example.org:8448".
 */
export function parseUserId(mxid: string): UserIdParts {
  const match = USER_ID_PATTERN.exec(mxid);
  if (!match) {
    throw new InvalidIdentityError(mxid);
  }
  return { localpart: match[1], domain: match[2] };
}

export function isUserId(value: string): boolean {
  return USER_ID_PATTERN.test(value);
}

export function formatUserId(localpart: string, domain: string): string {
  return `@${localpart}:${domain}`;
}
