/**
 * Bridge permission levels
 *
 *   relaybot < user < puppeting < full < admin
 *
 * Each level grants everything below it. A user's level comes from the
 * bridge.permissions map: exact user ID first, then the homeserver, then "*".
 */

import { isRecord } from './values.js';

export const PERMISSION_LEVELS = ['relaybot', 'user', 'puppeting', 'full', 'admin'] as const;

export type PermissionLevel = typeof PERMISSION_LEVELS[number];

export interface Permissions {
  relaybot: boolean;
  user: boolean;
  puppeting: boolean;
  matrixPuppeting: boolean;
  admin: boolean;
  /** The matched level, "" when nothing matched. */
  level: string;
}

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return PERMISSION_LEVELS.some((level) => level === value);
}

export function permissionsForLevel(level: string): Permissions {
  const admin = level === 'admin';
  const matrixPuppeting = level === 'full' || admin;
  const puppeting = level === 'puppeting' || matrixPuppeting;
  const user = level === 'user' || puppeting;
  const relaybot = level === 'relaybot' || user;
  return { relaybot, user, puppeting, matrixPuppeting, admin, level };
}

/**
 * Find the permission level for a user ID in a bridge.permissions map.
 */
export function resolvePermissionLevel(permissions: unknown, mxid: string): string {
  if (!isRecord(permissions)) return '';

  const lookup = (key: string): string => {
    const level = permissions[key];
    return typeof level === 'string' ? level : '';
  };

  if (Object.hasOwn(permissions, mxid)) {
    return lookup(mxid);
  }

  const colon = mxid.indexOf(':');
  if (colon !== -1) {
    const homeserver = mxid.slice(colon + 1);
    if (Object.hasOwn(permissions, homeserver)) {
      return lookup(homeserver);
    }
  }

  return lookup('*');
}

export function getPermissions(permissions: unknown, mxid: string): Permissions {
  return permissionsForLevel(resolvePermissionLevel(permissions, mxid));
}

const FLAG_LABELS: Array<[keyof Omit<Permissions, 'level'>, string]> = [
  ['relaybot', 'Relaybot'],
  ['user', 'User'],
  ['puppeting', 'Puppeting'],
  ['matrixPuppeting', 'Matrix puppeting'],
  ['admin', 'Admin'],
];

/** One "Label: value" line for the level and each flag. */
export function formatPermissions(permissions: Permissions): string[] {
  const lines = [`${'Level:'.padEnd(18)}${permissions.level || '(none)'}`];
  for (const [flag, label] of FLAG_LABELS) {
    lines.push(`${`${label}:`.padEnd(18)}${permissions[flag] ? 'yes' : 'no'}`);
  }
  return lines;
}
