/**
 * Intent API: act as one user, with preconditions handled lazily
 *
 * Every room action goes through the same guards:
 *   1. ensureRegistered: register the user once (M_USER_IN_USE counts as done)
 *   2. ensureJoined: join the room unless the state store says we're in;
 *      on M_FORBIDDEN the bot invites us and we retry once
 *   3. ensurePowerLevel: fetch power levels once per room, then check them
 *
 * Registration and each room's join run under a per-intent mutex, so
 * overlapping calls for the same user make one remote call.
 */

import { fileContent, textContent } from './content.js';
import { InviteFailedError, JoinFailedError, matrixErrorCode } from './errors.js';
import { parseUserId } from './identity.js';
import { KeyedMutex } from './lock.js';
import type { Logger } from './log.js';
import type { StateStore } from './state-store.js';
import type { Transport } from './transport.js';
import type {
  CreateRoomOptions,
  EventContent,
  FileInfo,
  Membership,
  MemberEvent,
  MessageContent,
  MessageType,
  PowerLevelsContent,
  Presence,
  RoomId,
  StateEvent,
  UserId,
} from './types.js';

export interface IntentOptions {
  /**
   * Mark the user registered even when registration fails with something
   * other than M_USER_IN_USE. The failure is still logged. Default: true.
   */
  bestEffortRegistration?: boolean;
}

export class IntentAPI {
  readonly mxid: UserId;
  readonly localpart: string;
  readonly domain: string;
  private isRegistered = false;
  private readonly lock = new KeyedMutex();
  private readonly bestEffortRegistration: boolean;

  /**
   * @param bot - transport of the bridge bot, used to invite this user into
   *   rooms it may not join by itself. Absent for the bot's own intent.
   */
  constructor(
    mxid: UserId,
    private readonly client: Transport,
    private readonly stateStore: StateStore,
    private readonly log: Logger,
    private readonly bot?: Transport,
    options: IntentOptions = {}
  ) {
    const { localpart, domain } = parseUserId(mxid);
    this.mxid = mxid;
    this.localpart = localpart;
    this.domain = domain;
    this.bestEffortRegistration = options.bestEffortRegistration ?? true;
  }

  get registered(): boolean {
    return this.isRegistered;
  }

  // ─── User actions ───────────────────────────────────────────────

  async setDisplayName(name: string): Promise<void> {
    await this.ensureRegistered();
    await this.client.setDisplayName(name);
  }

  async setPresence(presence: Presence = 'online'): Promise<void> {
    await this.ensureRegistered();
    await this.client.setPresence(presence);
  }

  async setAvatar(url: string): Promise<void> {
    await this.ensureRegistered();
    await this.client.setAvatarUrl(url);
  }

  /** Upload media and return its mxc:// URI. */
  async uploadFile(data: Uint8Array, mimeType?: string, filename?: string): Promise<string> {
    await this.ensureRegistered();
    return this.client.mediaUpload(data, mimeType || 'application/octet-stream', filename);
  }

  async downloadFile(mxcUrl: string): Promise<Uint8Array> {
    await this.ensureRegistered();
    return this.client.mediaDownload(mxcUrl);
  }

  getDownloadUrl(mxcUrl: string): string {
    return this.client.getDownloadUrl(mxcUrl);
  }

  // ─── Room actions ───────────────────────────────────────────────

  async createRoom(options: CreateRoomOptions = {}): Promise<RoomId> {
    await this.ensureRegistered();
    return this.client.createRoom(options);
  }

  /**
   * Invite a user. M_FORBIDDEN is ignored (the invite is best effort);
   * any other failure becomes InviteFailedError.
   */
  async invite(roomId: RoomId, userId: UserId): Promise<void> {
    await this.ensureJoined(roomId);
    try {
      await this.client.inviteUser(roomId, userId);
    } catch (err) {
      if (matrixErrorCode(err) !== 'M_FORBIDDEN') {
        throw new InviteFailedError(roomId, userId, err);
      }
      this.log.debug(`Not allowed to invite ${userId} to ${roomId}`);
      return;
    }
    await this.stateStore.invited(roomId, userId);
  }

  setRoomAvatar(roomId: RoomId, avatarUrl: string, info?: FileInfo): Promise<string> {
    const content: EventContent = { url: avatarUrl };
    if (info) content.info = info;
    return this.sendStateEvent(roomId, 'm.room.avatar', content);
  }

  setRoomName(roomId: RoomId, name: string): Promise<string> {
    return this.sendStateEvent(roomId, 'm.room.name', { name });
  }

  /** Point #localpart:domain at the room. */
  async addRoomAlias(roomId: RoomId, aliasLocalpart: string): Promise<void> {
    await this.ensureRegistered();
    await this.client.setRoomAlias(`#${aliasLocalpart}:${this.domain}`, roomId);
  }

  async removeRoomAlias(aliasLocalpart: string): Promise<void> {
    await this.ensureRegistered();
    await this.client.removeRoomAlias(`#${aliasLocalpart}:${this.domain}`);
  }

  /** Fetch power levels and refresh the cached copy. */
  async getPowerLevels(roomId: RoomId): Promise<PowerLevelsContent> {
    await this.ensureJoined(roomId);
    const levels = await this.client.getPowerLevels(roomId);
    await this.stateStore.setPowerLevels(roomId, levels);
    return levels;
  }

  async setPowerLevels(roomId: RoomId, content: PowerLevelsContent): Promise<string> {
    await this.ensureJoined(roomId);
    await this.ensurePowerLevel(roomId, 'm.room.power_levels', true);
    const eventId = await this.client.setPowerLevels(roomId, content);
    await this.stateStore.setPowerLevels(roomId, content);
    return eventId;
  }

  async setTyping(roomId: RoomId, typing = true, timeoutMs = 5000): Promise<void> {
    await this.ensureJoined(roomId);
    await this.client.setTyping(roomId, typing, timeoutMs);
  }

  sendText(roomId: RoomId, text: string, html?: string, msgtype: MessageType = 'm.text'): Promise<string> {
    return this.sendMessage(roomId, textContent(text, html, msgtype));
  }

  sendNotice(roomId: RoomId, text: string, html?: string): Promise<string> {
    return this.sendText(roomId, text, html, 'm.notice');
  }

  sendEmote(roomId: RoomId, text: string, html?: string): Promise<string> {
    return this.sendText(roomId, text, html, 'm.emote');
  }

  sendImage(roomId: RoomId, url: string, info: FileInfo = {}, text?: string): Promise<string> {
    return this.sendFile(roomId, url, info, text, 'm.image');
  }

  sendFile(
    roomId: RoomId,
    url: string,
    info: FileInfo = {},
    text?: string,
    msgtype: MessageType = 'm.file'
  ): Promise<string> {
    return this.sendMessage(roomId, fileContent(url, info, text, msgtype));
  }

  sendMessage(roomId: RoomId, content: MessageContent): Promise<string> {
    return this.sendEvent(roomId, 'm.room.message', content);
  }

  /** Send a notice explaining what went wrong, then leave. */
  async errorAndLeave(roomId: RoomId, text: string, html?: string): Promise<void> {
    await this.ensureJoined(roomId);
    await this.sendNotice(roomId, text, html);
    await this.leaveRoom(roomId);
  }

  async kick(roomId: RoomId, userId: UserId, reason?: string): Promise<void> {
    await this.ensureJoined(roomId);
    await this.client.kickUser(roomId, userId, reason);
  }

  async sendEvent(roomId: RoomId, type: string, content: EventContent, txnId?: string): Promise<string> {
    await this.ensureJoined(roomId);
    await this.ensurePowerLevel(roomId, type);
    return this.client.sendMessageEvent(roomId, type, content, txnId);
  }

  async sendStateEvent(roomId: RoomId, type: string, content: EventContent, stateKey = ''): Promise<string> {
    await this.ensureJoined(roomId);
    await this.ensurePowerLevel(roomId, type, true);
    return this.client.sendStateEvent(roomId, type, content, stateKey);
  }

  /** Join even if the state store thinks we're already in the room. */
  joinRoom(roomId: RoomId): Promise<void> {
    return this.ensureJoined(roomId, true);
  }

  /**
   * Leave a room. The state store is updated before the request is sent,
   * so a failed leave leaves the cache saying "left" while the homeserver
   * still has us joined; the next ensureJoined will then re-join.
   */
  async leaveRoom(roomId: RoomId): Promise<void> {
    await this.stateStore.left(roomId, this.mxid);
    await this.client.leaveRoom(roomId);
  }

  getRoomMemberships(roomId: RoomId): Promise<MemberEvent[]> {
    return this.client.getRoomMembers(roomId);
  }

  async getRoomMembers(roomId: RoomId, allowedMemberships: Membership[] = ['join']): Promise<UserId[]> {
    const memberships = await this.getRoomMemberships(roomId);
    return memberships
      .filter((member) => allowedMemberships.includes(member.membership))
      .map((member) => member.state_key);
  }

  async getRoomState(roomId: RoomId): Promise<StateEvent[]> {
    await this.ensureJoined(roomId);
    return this.client.getRoomState(roomId);
  }

  // ─── Ensure functions ───────────────────────────────────────────

  async ensureRegistered(): Promise<void> {
    if (this.isRegistered) return;

    await this.lock.runExclusive('register', async () => {
      if (this.isRegistered) return;
      try {
        await this.client.register(this.localpart);
      } catch (err) {
        if (matrixErrorCode(err) !== 'M_USER_IN_USE') {
          this.log.error(`Failed to register ${this.mxid}`, err);
          if (!this.bestEffortRegistration) throw err;
        }
      }
      this.isRegistered = true;
    });
  }

  async ensureJoined(roomId: RoomId, force = false): Promise<void> {
    if (!force && await this.stateStore.isJoined(roomId, this.mxid)) return;

    await this.lock.runExclusive(`join:${roomId}`, async () => {
      if (!force && await this.stateStore.isJoined(roomId, this.mxid)) return;
      await this.ensureRegistered();

      try {
        await this.client.joinRoom(roomId);
      } catch (err) {
        if (matrixErrorCode(err) !== 'M_FORBIDDEN' || !this.bot) {
          throw new JoinFailedError(this.mxid, roomId, err);
        }
        this.log.debug(`Join of ${roomId} as ${this.mxid} forbidden, asking the bot for an invite`);
        try {
          await this.bot.inviteUser(roomId, this.mxid);
          await this.client.joinRoom(roomId);
        } catch (retryErr) {
          throw new JoinFailedError(this.mxid, roomId, retryErr);
        }
      }

      await this.stateStore.joined(roomId, this.mxid);
    });
  }

  /**
   * Make sure power levels of the room are cached and check ours against
   * the event type. Nothing is enforced yet: a missing level is only logged.
   */
  async ensurePowerLevel(roomId: RoomId, eventType: string, isState = false): Promise<void> {
    if (!(await this.stateStore.hasPowerLevelData(roomId))) {
      await this.getPowerLevels(roomId);
    }
    if (await this.stateStore.hasPowerLevel(roomId, this.mxid, eventType, isState)) {
      return;
    }
    // TODO: decide whether the bot should raise this user's level or the send should fail.
    this.log.debug(`${this.mxid} may lack the power level for ${eventType} in ${roomId}`);
  }
}
