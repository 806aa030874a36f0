/**
 * Transport: the homeserver calls an intent needs, bound to one user.
 *
 * Implementations fail with MatrixRequestError so callers can tell
 * M_USER_IN_USE and M_FORBIDDEN apart from everything else.
 */

import type {
  CreateRoomOptions,
  EventContent,
  MemberEvent,
  PowerLevelsContent,
  Presence,
  RoomId,
  StateEvent,
  UserId,
} from './types.js';

export interface Transport {
  /** The user every request is sent as. */
  readonly userId: UserId;

  register(localpart: string): Promise<void>;
  joinRoom(roomIdOrAlias: string): Promise<RoomId>;
  leaveRoom(roomId: RoomId): Promise<void>;
  inviteUser(roomId: RoomId, userId: UserId): Promise<void>;
  kickUser(roomId: RoomId, userId: UserId, reason?: string): Promise<void>;

  sendMessageEvent(roomId: RoomId, type: string, content: EventContent, txnId?: string): Promise<string>;
  sendStateEvent(roomId: RoomId, type: string, content: EventContent, stateKey?: string): Promise<string>;
  getRoomState(roomId: RoomId): Promise<StateEvent[]>;
  getRoomMembers(roomId: RoomId): Promise<MemberEvent[]>;
  getPowerLevels(roomId: RoomId): Promise<PowerLevelsContent>;
  setPowerLevels(roomId: RoomId, content: PowerLevelsContent): Promise<string>;

  setDisplayName(displayName: string): Promise<void>;
  setAvatarUrl(avatarUrl: string): Promise<void>;
  setPresence(presence: Presence): Promise<void>;
  setTyping(roomId: RoomId, typing: boolean, timeoutMs: number): Promise<void>;

  mediaUpload(data: Uint8Array, contentType: string, filename?: string): Promise<string>;
  mediaDownload(mxcUrl: string): Promise<Uint8Array>;
  getDownloadUrl(mxcUrl: string): string;

  createRoom(options: CreateRoomOptions): Promise<RoomId>;
  setRoomAlias(alias: string, roomId: RoomId): Promise<void>;
  removeRoomAlias(alias: string): Promise<void>;
}

/**
 * Hands out transports per user. Implemented by AppServiceApi; tests
 * provide an in-memory one.
 */
export interface TransportProvider {
  readonly botUserId: UserId;
  forUser(userId: UserId): Transport;
}
