/**
 * Appservice HTTP API: client-server calls made on behalf of any user
 * in the bridge's namespace.
 *
 * AppServiceApi holds what every session shares: homeserver URL, as_token,
 * bridge domain and the transaction counter. forUser() hands out a
 * MatrixClient bound to one user ID; each request asserts that identity
 * with the `user_id` query parameter.
 *
 * Uses only the built-in `fetch`.
 */

import { MatrixRequestError } from './errors.js';
import { formatUserId } from './identity.js';
import { createLogger, type Logger } from './log.js';
import { parsePowerLevels } from './power-levels.js';
import type { Transport, TransportProvider } from './transport.js';
import {
  MEMBERSHIPS,
  type CreateRoomOptions,
  type EventContent,
  type MemberEvent,
  type PowerLevelsContent,
  type Presence,
  type RoomId,
  type StateEvent,
  type UserId,
} from './types.js';
import { isRecord } from './values.js';

const CLIENT_API = '/_matrix/client/v3';
const MEDIA_API = '/_matrix/media/v3';

export interface AppServiceApiOptions {
  homeserverUrl: string;
  asToken: string;
  domain: string;
  botLocalpart: string;
  log?: Logger;
}

type QueryParams = Record<string, string | number | boolean | undefined>;

interface RequestOptions {
  body?: EventContent | Uint8Array;
  query?: QueryParams;
  apiPath?: string;
  contentType?: string;
}

export class AppServiceApi implements TransportProvider {
  readonly homeserverUrl: string;
  readonly domain: string;
  readonly botUserId: UserId;
  readonly log: Logger;
  private asToken: string;
  private txnCounter = 0;
  private sessions = new Map<UserId, MatrixClient>();

  constructor(options: AppServiceApiOptions) {
    this.homeserverUrl = options.homeserverUrl.replace(/\/$/, '');
    this.asToken = options.asToken;
    this.domain = options.domain;
    this.botUserId = formatUserId(options.botLocalpart, options.domain);
    this.log = options.log ?? createLogger('mxtg.api');
  }

  forUser(userId: UserId): MatrixClient {
    let session = this.sessions.get(userId);
    if (!session) {
      session = new MatrixClient(this, userId);
      this.sessions.set(userId, session);
    }
    return session;
  }

  botClient(): MatrixClient {
    return this.forUser(this.botUserId);
  }

  /** Transaction IDs are unique across every session of this API. */
  nextTxnId(): string {
    this.txnCounter += 1;
    return `mxtg${Date.now()}.${this.txnCounter}`;
  }

  async request(userId: UserId, method: string, path: string, options: RequestOptions = {}): Promise<Response> {
    const url = new URL(`${this.homeserverUrl}${options.apiPath ?? CLIENT_API}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    url.searchParams.set('user_id', userId);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.asToken}`,
    };

    let body: string | Uint8Array | undefined;
    if (options.body instanceof Uint8Array) {
      body = options.body;
      headers['Content-Type'] = options.contentType ?? 'application/octet-stream';
      this.log.debug(`${method} ${path} <${options.body.byteLength} bytes>`);
    } else if (options.body !== undefined) {
      body = JSON.stringify(options.body);
      headers['Content-Type'] = 'application/json';
      this.log.debug(`${method} ${path} ${body}`);
    } else {
      this.log.debug(`${method} ${path}`);
    }

    const response = await fetch(url, { method, headers, body });
    if (!response.ok) {
      const text = await response.text();
      const { errcode, message } = parseErrorBody(text);
      throw new MatrixRequestError(response.status, errcode, message);
    }
    return response;
  }

  async requestJson(userId: UserId, method: string, path: string, options: RequestOptions = {}): Promise<unknown> {
    const response = await this.request(userId, method, path, options);
    const text = await response.text();
    return text ? JSON.parse(text) : {};
  }
}

/**
 * A Transport bound to one user of the appservice namespace.
 */
export class MatrixClient implements Transport {
  constructor(
    private readonly api: AppServiceApi,
    readonly userId: UserId
  ) {}

  private call(method: string, path: string, options?: RequestOptions): Promise<unknown> {
    return this.api.requestJson(this.userId, method, path, options);
  }

  async register(localpart: string): Promise<void> {
    await this.call('POST', '/register', {
      query: { kind: 'user' },
      body: { type: 'm.login.application_service', username: localpart },
    });
  }

  async joinRoom(roomIdOrAlias: string): Promise<RoomId> {
    const body = await this.call('POST', `/join/${encodeURIComponent(roomIdOrAlias)}`, { body: {} });
    return stringField(body, 'room_id');
  }

  async leaveRoom(roomId: RoomId): Promise<void> {
    await this.call('POST', `/rooms/${encodeURIComponent(roomId)}/leave`, { body: {} });
  }

  async inviteUser(roomId: RoomId, userId: UserId): Promise<void> {
    await this.call('POST', `/rooms/${encodeURIComponent(roomId)}/invite`, {
      body: { user_id: userId },
    });
  }

  async kickUser(roomId: RoomId, userId: UserId, reason?: string): Promise<void> {
    await this.call('POST', `/rooms/${encodeURIComponent(roomId)}/kick`, {
      body: reason ? { user_id: userId, reason } : { user_id: userId },
    });
  }

  async sendMessageEvent(roomId: RoomId, type: string, content: EventContent, txnId?: string): Promise<string> {
    const txn = txnId ?? this.api.nextTxnId();
    const path = `/rooms/${encodeURIComponent(roomId)}/send/${encodeURIComponent(type)}/${encodeURIComponent(txn)}`;
    return stringField(await this.call('PUT', path, { body: content }), 'event_id');
  }

  async sendStateEvent(roomId: RoomId, type: string, content: EventContent, stateKey = ''): Promise<string> {
    const path = `/rooms/${encodeURIComponent(roomId)}/state/${encodeURIComponent(type)}/${encodeURIComponent(stateKey)}`;
    return stringField(await this.call('PUT', path, { body: content }), 'event_id');
  }

  async getRoomState(roomId: RoomId): Promise<StateEvent[]> {
    const body = await this.call('GET', `/rooms/${encodeURIComponent(roomId)}/state`);
    if (!Array.isArray(body)) return [];
    return body.flatMap((raw: unknown) => {
      const event = toStateEvent(raw);
      return event ? [event] : [];
    });
  }

  async getRoomMembers(roomId: RoomId): Promise<MemberEvent[]> {
    const body = await this.call('GET', `/rooms/${encodeURIComponent(roomId)}/members`);
    const chunk = isRecord(body) && Array.isArray(body.chunk) ? body.chunk : [];
    return chunk.flatMap((raw: unknown) => {
      const member = toMemberEvent(raw);
      return member ? [member] : [];
    });
  }

  async getPowerLevels(roomId: RoomId): Promise<PowerLevelsContent> {
    const body = await this.call('GET', `/rooms/${encodeURIComponent(roomId)}/state/m.room.power_levels`);
    return parsePowerLevels(body);
  }

  setPowerLevels(roomId: RoomId, content: PowerLevelsContent): Promise<string> {
    return this.sendStateEvent(roomId, 'm.room.power_levels', content);
  }

  async setDisplayName(displayName: string): Promise<void> {
    await this.call('PUT', `/profile/${encodeURIComponent(this.userId)}/displayname`, {
      body: { displayname: displayName },
    });
  }

  async setAvatarUrl(avatarUrl: string): Promise<void> {
    await this.call('PUT', `/profile/${encodeURIComponent(this.userId)}/avatar_url`, {
      body: { avatar_url: avatarUrl },
    });
  }

  async setPresence(presence: Presence): Promise<void> {
    await this.call('PUT', `/presence/${encodeURIComponent(this.userId)}/status`, {
      body: { presence },
    });
  }

  async setTyping(roomId: RoomId, typing: boolean, timeoutMs: number): Promise<void> {
    await this.call('PUT', `/rooms/${encodeURIComponent(roomId)}/typing/${encodeURIComponent(this.userId)}`, {
      body: typing ? { typing, timeout: timeoutMs } : { typing },
    });
  }

  async mediaUpload(data: Uint8Array, contentType: string, filename?: string): Promise<string> {
    const body = await this.call('POST', '/upload', {
      apiPath: MEDIA_API,
      query: { filename },
      body: data,
      contentType,
    });
    return stringField(body, 'content_uri');
  }

  async mediaDownload(mxcUrl: string): Promise<Uint8Array> {
    const { server, mediaId } = parseMxc(mxcUrl);
    const response = await this.api.request(
      this.userId,
      'GET',
      `/download/${encodeURIComponent(server)}/${encodeURIComponent(mediaId)}`,
      { apiPath: MEDIA_API },
    );
    return new Uint8Array(await response.arrayBuffer());
  }

  getDownloadUrl(mxcUrl: string): string {
    const { server, mediaId } = parseMxc(mxcUrl);
    return `${this.api.homeserverUrl}${MEDIA_API}/download/${encodeURIComponent(server)}/${encodeURIComponent(mediaId)}`;
  }

  async createRoom(options: CreateRoomOptions): Promise<RoomId> {
    const content: EventContent = {
      visibility: options.isPublic ? 'public' : 'private',
      is_direct: options.isDirect ?? false,
    };
    if (options.alias) content.room_alias_name = options.alias;
    if (options.invitees && options.invitees.length > 0) content.invite = options.invitees;
    if (options.name) content.name = options.name;
    if (options.topic) content.topic = options.topic;
    if (options.initialState && options.initialState.length > 0) {
      content.initial_state = options.initialState.map((event) => ({
        type: event.type,
        state_key: event.state_key ?? '',
        content: event.content,
      }));
    }

    return stringField(await this.call('POST', '/createRoom', { body: content }), 'room_id');
  }

  async setRoomAlias(alias: string, roomId: RoomId): Promise<void> {
    await this.call('PUT', `/directory/room/${encodeURIComponent(alias)}`, {
      body: { room_id: roomId },
    });
  }

  async removeRoomAlias(alias: string): Promise<void> {
    await this.call('DELETE', `/directory/room/${encodeURIComponent(alias)}`);
  }
}

/**
 * errcode from a Matrix error body; a body that is not JSON becomes the
 * errcode itself.
 */
export function parseErrorBody(text: string): { errcode: string; message: string } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { errcode: text, message: text };
  }
  if (isRecord(parsed) && typeof parsed.errcode === 'string') {
    const message = typeof parsed.error === 'string' ? parsed.error : parsed.errcode;
    return { errcode: parsed.errcode, message };
  }
  return { errcode: text, message: text };
}

export function parseMxc(mxcUrl: string): { server: string; mediaId: string } {
  const match = /^mxc:\/\/([^/]+)\/([^/]+)$/.exec(mxcUrl);
  if (!match) {
    throw new Error(`Invalid mxc URL: ${mxcUrl}`);
  }
  return { server: match[1], mediaId: match[2] };
}

function stringField(body: unknown, field: string): string {
  const value = isRecord(body) ? body[field] : undefined;
  if (typeof value !== 'string') {
    throw new Error(`Homeserver response is missing "${field}"`);
  }
  return value;
}

function toStateEvent(raw: unknown): StateEvent | null {
  if (!isRecord(raw)) return null;
  const { type, state_key, sender, content, event_id } = raw;
  if (typeof type !== 'string' || typeof state_key !== 'string' || typeof sender !== 'string') {
    return null;
  }
  return {
    type,
    state_key,
    sender,
    content: isRecord(content) ? content : {},
    ...(typeof event_id === 'string' ? { event_id } : {}),
  };
}

function toMemberEvent(raw: unknown): MemberEvent | null {
  const event = toStateEvent(raw);
  if (!event || event.type !== 'm.room.member') return null;
  const membership = MEMBERSHIPS.find((value) => value === event.content.membership);
  if (!membership) return null;
  return { ...event, type: 'm.room.member', membership };
}
