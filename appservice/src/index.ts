/**
 * Matrix appservice intent API
 *
 * Act as any user of the bridge's namespace without caring whether that
 * user is registered or already in the room.
 */

export { AppServiceApi, MatrixClient, parseErrorBody, parseMxc } from './http-api.js';
export type { AppServiceApiOptions } from './http-api.js';
export { IntentAPI } from './intent.js';
export type { IntentOptions } from './intent.js';
export { IntentManager } from './manager.js';
export type { IntentManagerOptions } from './manager.js';
export { MemoryStateStore, membershipKey } from './state-store.js';
export type { StateStore } from './state-store.js';
export { SqliteStateStore } from './sqlite-state-store.js';
export { CryptoStore } from './crypto-store.js';
export type {
  CryptoAccount,
  DeviceKey,
  InboundGroupSession,
  OlmSession,
  OutgoingKeyRequest,
} from './crypto-store.js';
export type { Transport, TransportProvider } from './transport.js';
export {
  IntentError,
  InvalidIdentityError,
  InviteFailedError,
  JoinFailedError,
  MatrixRequestError,
  matrixErrorCode,
} from './errors.js';
export { formatUserId, isUserId, parseUserId } from './identity.js';
export type { UserIdParts } from './identity.js';
export { fileContent, textContent, HTML_FORMAT } from './content.js';
export { getRequiredLevel, getUserLevel, hasPowerLevel, parsePowerLevels } from './power-levels.js';
export { KeyedMutex } from './lock.js';
export {
  createLogger,
  getEffectiveLevel,
  LOG_LEVELS,
  parseLogLevel,
  resetLogging,
  setLogLevel,
  setLogSink,
} from './log.js';
export type { LogLevel, LogSink, Logger } from './log.js';
export { MEMBERSHIPS } from './types.js';
export type {
  CreateRoomOptions,
  EventContent,
  FileInfo,
  FileMessageContent,
  InitialStateEvent,
  MaybePromise,
  MemberEvent,
  Membership,
  MessageContent,
  MessageType,
  PowerLevelsContent,
  Presence,
  RoomId,
  StateEvent,
  TextMessageContent,
  UserId,
} from './types.js';
