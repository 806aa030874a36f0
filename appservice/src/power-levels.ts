/**
 * Power level evaluation over m.room.power_levels content.
 *
 *   user level     = users[mxid] ?? users_default ?? 0
 *   required level = events[type] ?? (state ? state_default ?? 50 : events_default ?? 0)
 */

import type { PowerLevelsContent, UserId } from './types.js';
import { isRecord } from './values.js';

const NUMERIC_FIELDS = [
  'users_default',
  'events_default',
  'state_default',
  'ban',
  'kick',
  'redact',
  'invite',
] as const;

function numberMap(value: unknown): Record<string, number> | undefined {
  if (!isRecord(value)) return undefined;
  const result: Record<string, number> = {};
  for (const [key, level] of Object.entries(value)) {
    if (typeof level === 'number' && Number.isFinite(level)) {
      result[key] = level;
    }
  }
  return result;
}

/**
 * Keep the numeric fields of a raw power levels event and drop the rest.
 */
export function parsePowerLevels(raw: unknown): PowerLevelsContent {
  if (!isRecord(raw)) return {};

  const levels: PowerLevelsContent = {};
  const users = numberMap(raw.users);
  if (users) levels.users = users;
  const events = numberMap(raw.events);
  if (events) levels.events = events;

  for (const field of NUMERIC_FIELDS) {
    const value = raw[field];
    if (typeof value === 'number' && Number.isFinite(value)) {
      levels[field] = value;
    }
  }
  return levels;
}

export function getUserLevel(levels: PowerLevelsContent, userId: UserId): number {
  return levels.users?.[userId] ?? levels.users_default ?? 0;
}

export function getRequiredLevel(
  levels: PowerLevelsContent,
  eventType: string,
  isState = false,
): number {
  const explicit = levels.events?.[eventType];
  if (explicit !== undefined) return explicit;
  return isState ? levels.state_default ?? 50 : levels.events_default ?? 0;
}

export function hasPowerLevel(
  levels: PowerLevelsContent,
  userId: UserId,
  eventType: string,
  isState = false,
): boolean {
  return getUserLevel(levels, userId) >= getRequiredLevel(levels, eventType, isState);
}
