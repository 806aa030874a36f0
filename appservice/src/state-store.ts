/**
 * State Store: membership and power level cache for intents
 *
 * The intent API reads and writes this cache but never owns it; the
 * bridge decides whether it lives in memory or in SQLite. Entries are
 * keyed by room and user and are never deleted for the lifetime of the
 * bridge.
 */

import { hasPowerLevel } from './power-levels.js';
import type { MaybePromise, Membership, PowerLevelsContent, RoomId, UserId } from './types.js';

export interface StateStore {
  getMembership(roomId: RoomId, userId: UserId): MaybePromise<Membership | null>;
  isJoined(roomId: RoomId, userId: UserId): MaybePromise<boolean>;
  joined(roomId: RoomId, userId: UserId): MaybePromise<void>;
  left(roomId: RoomId, userId: UserId): MaybePromise<void>;
  invited(roomId: RoomId, userId: UserId): MaybePromise<void>;

  /** False until power levels of the room were fetched once, even if empty. */
  hasPowerLevelData(roomId: RoomId): MaybePromise<boolean>;
  getPowerLevels(roomId: RoomId): MaybePromise<PowerLevelsContent | null>;
  setPowerLevels(roomId: RoomId, content: PowerLevelsContent): MaybePromise<void>;
  hasPowerLevel(roomId: RoomId, userId: UserId, eventType: string, isState?: boolean): MaybePromise<boolean>;
}

export function membershipKey(roomId: RoomId, userId: UserId): string {
  return `${roomId}|${userId}`;
}

export class MemoryStateStore implements StateStore {
  private memberships = new Map<string, Membership>();
  private powerLevels = new Map<RoomId, PowerLevelsContent>();

  getMembership(roomId: RoomId, userId: UserId): Membership | null {
    return this.memberships.get(membershipKey(roomId, userId)) ?? null;
  }

  isJoined(roomId: RoomId, userId: UserId): boolean {
    return this.getMembership(roomId, userId) === 'join';
  }

  joined(roomId: RoomId, userId: UserId): void {
    this.memberships.set(membershipKey(roomId, userId), 'join');
  }

  left(roomId: RoomId, userId: UserId): void {
    this.memberships.set(membershipKey(roomId, userId), 'leave');
  }

  invited(roomId: RoomId, userId: UserId): void {
    this.memberships.set(membershipKey(roomId, userId), 'invite');
  }

  hasPowerLevelData(roomId: RoomId): boolean {
    return this.powerLevels.has(roomId);
  }

  getPowerLevels(roomId: RoomId): PowerLevelsContent | null {
    return this.powerLevels.get(roomId) ?? null;
  }

  setPowerLevels(roomId: RoomId, content: PowerLevelsContent): void {
    this.powerLevels.set(roomId, content);
  }

  hasPowerLevel(roomId: RoomId, userId: UserId, eventType: string, isState = false): boolean {
    const levels = this.powerLevels.get(roomId);
    if (!levels) return false;
    return hasPowerLevel(levels, userId, eventType, isState);
  }
}
