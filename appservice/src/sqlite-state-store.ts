/**
 * SQLite State Store
 *
 * The StateStore contract persisted with better-sqlite3, so membership and
 * power level facts survive a bridge restart. Reads are synchronous.
 */

import Database from 'better-sqlite3';
import { hasPowerLevel, parsePowerLevels } from './power-levels.js';
import type { StateStore } from './state-store.js';
import { MEMBERSHIPS, type Membership, type PowerLevelsContent, type RoomId, type UserId } from './types.js';
import { isRecord } from './values.js';

export class SqliteStateStore implements StateStore {
  private db: Database.Database;
  private ownsDatabase: boolean;

  constructor(database: string | Database.Database = ':memory:') {
    if (typeof database === 'string') {
      this.db = new Database(database);
      this.db.pragma('journal_mode = WAL');
      this.ownsDatabase = true;
    } else {
      this.db = database;
      this.ownsDatabase = false;
    }
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS mx_room_state (
        room_id TEXT PRIMARY KEY,
        power_levels TEXT
      );

      CREATE TABLE IF NOT EXISTS mx_user_profile (
        room_id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        membership TEXT NOT NULL,
        PRIMARY KEY (room_id, user_id)
      );
    `);
  }

  getMembership(roomId: RoomId, userId: UserId): Membership | null {
    const row: unknown = this.db.prepare(
      'SELECT membership FROM mx_user_profile WHERE room_id = ? AND user_id = ?'
    ).get(roomId, userId);

    if (!isRecord(row)) return null;
    return MEMBERSHIPS.find((membership) => membership === row.membership) ?? null;
  }

  isJoined(roomId: RoomId, userId: UserId): boolean {
    return this.getMembership(roomId, userId) === 'join';
  }

  joined(roomId: RoomId, userId: UserId): void {
    this.setMembership(roomId, userId, 'join');
  }

  left(roomId: RoomId, userId: UserId): void {
    this.setMembership(roomId, userId, 'leave');
  }

  invited(roomId: RoomId, userId: UserId): void {
    this.setMembership(roomId, userId, 'invite');
  }

  private setMembership(roomId: RoomId, userId: UserId, membership: Membership): void {
    this.db.prepare(`
      INSERT INTO mx_user_profile (room_id, user_id, membership) VALUES (?, ?, ?)
      ON CONFLICT (room_id, user_id) DO UPDATE SET membership = excluded.membership
    `).run(roomId, userId, membership);
  }

  hasPowerLevelData(roomId: RoomId): boolean {
    return this.getPowerLevels(roomId) !== null;
  }

  getPowerLevels(roomId: RoomId): PowerLevelsContent | null {
    const row: unknown = this.db.prepare(
      'SELECT power_levels FROM mx_room_state WHERE room_id = ?'
    ).get(roomId);

    if (!isRecord(row) || typeof row.power_levels !== 'string') return null;
    return parsePowerLevels(JSON.parse(row.power_levels));
  }

  setPowerLevels(roomId: RoomId, content: PowerLevelsContent): void {
    this.db.prepare(`
      INSERT INTO mx_room_state (room_id, power_levels) VALUES (?, ?)
      ON CONFLICT (room_id) DO UPDATE SET power_levels = excluded.power_levels
    `).run(roomId, JSON.stringify(content));
  }

  hasPowerLevel(roomId: RoomId, userId: UserId, eventType: string, isState = false): boolean {
    const levels = this.getPowerLevels(roomId);
    if (!levels) return false;
    return hasPowerLevel(levels, userId, eventType, isState);
  }

  /** Close the connection if this store opened it. */
  close(): void {
    if (this.ownsDatabase) {
      this.db.close();
    }
  }
}
