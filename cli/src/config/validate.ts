/**
 * Config validation: the settings the bridge cannot start without.
 */

import { isPermissionLevel, PERMISSION_LEVELS } from './permissions.js';
import type { RecursiveDict } from './recursive-dict.js';
import { isRecord } from './values.js';

const REQUIRED_KEYS = [
  'homeserver.address',
  'homeserver.domain',
  'appservice.address',
  'appservice.id',
  'appservice.bot_username',
];

/**
 * Validate a loaded config and return any errors.
 */
export function validateConfig(config: RecursiveDict): string[] {
  const errors: string[] = [];

  for (const key of REQUIRED_KEYS) {
    if (!config.has(key)) {
      errors.push(`Missing "${key}"`);
    }
  }

  const port = config.get('appservice.port');
  if (port !== undefined && port !== null) {
    if (typeof port !== 'number' || !Number.isInteger(port) || port <= 0) {
      errors.push(`Invalid appservice.port: "${String(port)}". Must be a positive integer`);
    }
  }

  const permissions = config.get('bridge.permissions');
  if (permissions !== undefined && permissions !== null && !isRecord(permissions)) {
    errors.push('"bridge.permissions" must be a map');
  } else if (isRecord(permissions)) {
    for (const [key, level] of Object.entries(permissions)) {
      if (!isPermissionLevel(level)) {
        errors.push(`Invalid permission level for "${key}": "${String(level)}". Must be one of: ${PERMISSION_LEVELS.join(', ')}`);
      }
    }
  }

  return errors;
}
