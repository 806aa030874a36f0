/**
 * Matrix Types: rooms, members, power levels, message content
 *
 * Content shapes are type aliases (not interfaces) so they can be passed
 * wherever a generic EventContent record is expected.
 */

export type RoomId = string;
export type UserId = string;

export type MaybePromise<T> = T | Promise<T>;

export type EventContent = Record<string, unknown>;

export type Membership = 'join' | 'invite' | 'leave' | 'ban' | 'knock';

export const MEMBERSHIPS: readonly Membership[] = ['join', 'invite', 'leave', 'ban', 'knock'];

export type PowerLevelsContent = {
  users?: Record<string, number>;
  users_default?: number;
  events?: Record<string, number>;
  events_default?: number;
  state_default?: number;
  ban?: number;
  kick?: number;
  redact?: number;
  invite?: number;
};

export interface StateEvent {
  type: string;
  state_key: string;
  sender: string;
  content: EventContent;
  event_id?: string;
}

export interface MemberEvent extends StateEvent {
  type: 'm.room.member';
  membership: Membership;
}

export type Presence = 'online' | 'offline' | 'unavailable';

export type MessageType =
  | 'm.text'
  | 'm.notice'
  | 'm.emote'
  | 'm.image'
  | 'm.file'
  | 'm.audio'
  | 'm.video';

export type FileInfo = {
  mimetype?: string;
  size?: number;
  w?: number;
  h?: number;
  duration?: number;
  thumbnail_url?: string;
};

export type TextMessageContent = {
  msgtype: MessageType;
  body: string;
  format?: 'org.matrix.custom.html';
  formatted_body?: string;
};

export type FileMessageContent = {
  msgtype: MessageType;
  body: string;
  url: string;
  info: FileInfo;
};

export type MessageContent = TextMessageContent | FileMessageContent;

export interface InitialStateEvent {
  type: string;
  state_key?: string;
  content: EventContent;
}

export interface CreateRoomOptions {
  alias?: string;
  isPublic?: boolean;
  name?: string;
  topic?: string;
  isDirect?: boolean;
  invitees?: UserId[];
  initialState?: InitialStateEvent[];
}
