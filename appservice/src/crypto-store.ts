/**
 * Encryption Store: account and session state for the end-to-end
 * encryption library, kept in the bridge's SQLite database.
 *
 * Five tables, keyed as the encryption library expects:
 *   crypto_account                 (user_id, device_id)
 *   crypto_device_key              (user_id, device_id)
 *   crypto_megolm_inbound_session  (session_id)
 *   crypto_olm_session             (session_id)
 *   crypto_outgoing_key_request    (request_id)
 *
 * Pickled account and session blobs are stored as-is; key maps and
 * forwarding chains are stored as JSON.
 */

import Database from 'better-sqlite3';
import { isRecord } from './values.js';

export interface CryptoAccount {
  userId: string;
  deviceId: string;
  shared: boolean;
  syncToken: string;
  account: Buffer;
}

export interface DeviceKey {
  userId: string;
  deviceId: string;
  displayName: string;
  deleted: boolean;
  keys: Record<string, string>;
}

export interface InboundGroupSession {
  sessionId: string;
  senderKey: string;
  fpKey: string;
  roomId: string;
  session: Buffer;
  forwardedChains: string[];
}

export interface OlmSession {
  sessionId: string;
  senderKey: string;
  session: Buffer;
  createdAt: Date;
  lastUsed: Date;
}

export interface OutgoingKeyRequest {
  requestId: string;
  sessionId: string;
  roomId: string;
  algorithm: string;
}

export class CryptoStore {
  private db: Database.Database;
  private ownsDatabase: boolean;

  constructor(database: string | Database.Database = ':memory:') {
    this.ownsDatabase = typeof database === 'string';
    this.db = typeof database === 'string' ? new Database(database) : database;
    this.initialize();
  }

  private initialize(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS crypto_account (
        user_id VARCHAR(255) NOT NULL,
        device_id VARCHAR(255) NOT NULL,
        shared BOOLEAN NOT NULL,
        sync_token TEXT NOT NULL,
        account BLOB NOT NULL,
        PRIMARY KEY (user_id, device_id)
      );

      CREATE TABLE IF NOT EXISTS crypto_device_key (
        user_id VARCHAR(255) NOT NULL,
        device_id VARCHAR(255) NOT NULL,
        display_name VARCHAR(255) NOT NULL,
        deleted BOOLEAN NOT NULL,
        keys TEXT NOT NULL,
        PRIMARY KEY (user_id, device_id)
      );

      CREATE TABLE IF NOT EXISTS crypto_megolm_inbound_session (
        session_id VARCHAR(255) PRIMARY KEY,
        sender_key VARCHAR(255) NOT NULL,
        fp_key VARCHAR(255) NOT NULL,
        room_id VARCHAR(255) NOT NULL,
        session BLOB NOT NULL,
        forwarded_chains TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS crypto_olm_session (
        session_id VARCHAR(255) PRIMARY KEY,
        sender_key VARCHAR(255) NOT NULL,
        session BLOB NOT NULL,
        created_at TEXT NOT NULL,
        last_used TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS crypto_outgoing_key_request (
        request_id VARCHAR(255) PRIMARY KEY,
        session_id VARCHAR(255) NOT NULL,
        room_id VARCHAR(255) NOT NULL,
        algorithm VARCHAR(255) NOT NULL
      );
    `);
  }

  // ─── Account ──────────────────────────────────────────────────

  putAccount(account: CryptoAccount): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO crypto_account (user_id, device_id, shared, sync_token, account)
      VALUES (?, ?, ?, ?, ?)
    `).run(account.userId, account.deviceId, account.shared ? 1 : 0, account.syncToken, account.account);
  }

  getAccount(userId: string, deviceId: string): CryptoAccount | null {
    const row: unknown = this.db.prepare(
      'SELECT * FROM crypto_account WHERE user_id = ? AND device_id = ?'
    ).get(userId, deviceId);

    if (!isRecord(row) || !Buffer.isBuffer(row.account)) return null;
    return {
      userId: String(row.user_id),
      deviceId: String(row.device_id),
      shared: row.shared === 1,
      syncToken: String(row.sync_token),
      account: row.account,
    };
  }

  // ─── Device keys ──────────────────────────────────────────────

  putDeviceKey(key: DeviceKey): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO crypto_device_key (user_id, device_id, display_name, deleted, keys)
      VALUES (?, ?, ?, ?, ?)
    `).run(key.userId, key.deviceId, key.displayName, key.deleted ? 1 : 0, JSON.stringify(key.keys));
  }

  getDeviceKeys(userId: string): DeviceKey[] {
    const rows: unknown[] = this.db.prepare(
      'SELECT * FROM crypto_device_key WHERE user_id = ? ORDER BY device_id'
    ).all(userId);

    return rows.flatMap((row) => {
      if (!isRecord(row)) return [];
      return [{
        userId: String(row.user_id),
        deviceId: String(row.device_id),
        displayName: String(row.display_name),
        deleted: row.deleted === 1,
        keys: parseStringMap(row.keys),
      }];
    });
  }

  // ─── Megolm inbound sessions ──────────────────────────────────

  putInboundGroupSession(session: InboundGroupSession): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO crypto_megolm_inbound_session
        (session_id, sender_key, fp_key, room_id, session, forwarded_chains)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(
      session.sessionId,
      session.senderKey,
      session.fpKey,
      session.roomId,
      session.session,
      JSON.stringify(session.forwardedChains)
    );
  }

  getInboundGroupSession(sessionId: string): InboundGroupSession | null {
    const row: unknown = this.db.prepare(
      'SELECT * FROM crypto_megolm_inbound_session WHERE session_id = ?'
    ).get(sessionId);

    if (!isRecord(row) || !Buffer.isBuffer(row.session)) return null;
    return {
      sessionId: String(row.session_id),
      senderKey: String(row.sender_key),
      fpKey: String(row.fp_key),
      roomId: String(row.room_id),
      session: row.session,
      forwardedChains: parseStringList(row.forwarded_chains),
    };
  }

  // ─── Olm sessions ─────────────────────────────────────────────

  putOlmSession(session: OlmSession): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO crypto_olm_session (session_id, sender_key, session, created_at, last_used)
      VALUES (?, ?, ?, ?, ?)
    `).run(
      session.sessionId,
      session.senderKey,
      session.session,
      session.createdAt.toISOString(),
      session.lastUsed.toISOString()
    );
  }

  /** Sessions with one sender, most recently used first. */
  getOlmSessions(senderKey: string): OlmSession[] {
    const rows: unknown[] = this.db.prepare(
      'SELECT * FROM crypto_olm_session WHERE sender_key = ? ORDER BY last_used DESC'
    ).all(senderKey);

    return rows.flatMap((row) => {
      if (!isRecord(row) || !Buffer.isBuffer(row.session)) return [];
      return [{
        sessionId: String(row.session_id),
        senderKey: String(row.sender_key),
        session: row.session,
        createdAt: new Date(String(row.created_at)),
        lastUsed: new Date(String(row.last_used)),
      }];
    });
  }

  // ─── Outgoing key requests ────────────────────────────────────

  addOutgoingKeyRequest(request: OutgoingKeyRequest): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO crypto_outgoing_key_request (request_id, session_id, room_id, algorithm)
      VALUES (?, ?, ?, ?)
    `).run(request.requestId, request.sessionId, request.roomId, request.algorithm);
  }

  removeOutgoingKeyRequest(requestId: string): boolean {
    const result = this.db.prepare(
      'DELETE FROM crypto_outgoing_key_request WHERE request_id = ?'
    ).run(requestId);
    return result.changes > 0;
  }

  getOutgoingKeyRequests(): OutgoingKeyRequest[] {
    const rows: unknown[] = this.db.prepare(
      'SELECT * FROM crypto_outgoing_key_request ORDER BY request_id'
    ).all();

    return rows.flatMap((row) => {
      if (!isRecord(row)) return [];
      return [{
        requestId: String(row.request_id),
        sessionId: String(row.session_id),
        roomId: String(row.room_id),
        algorithm: String(row.algorithm),
      }];
    });
  }

  close(): void {
    if (this.ownsDatabase) {
      this.db.close();
    }
  }
}

function parseStringMap(raw: unknown): Record<string, string> {
  if (typeof raw !== 'string') return {};
  const parsed: unknown = JSON.parse(raw);
  const result: Record<string, string> = {};
  if (!isRecord(parsed)) return result;
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') result[key] = value;
  }
  return result;
}

function parseStringList(raw: unknown): string[] {
  if (typeof raw !== 'string') return [];
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}
