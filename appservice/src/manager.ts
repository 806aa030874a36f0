/**
 * Intent Manager: one IntentAPI per user ID
 *
 * Intents are created on first use and kept for the lifetime of the
 * manager. Every intent except the bot's own gets the bot's transport, so
 * it can be invited into rooms it cannot join directly.
 */

import { formatUserId, parseUserId } from './identity.js';
import { IntentAPI, type IntentOptions } from './intent.js';
import { createLogger, type Logger } from './log.js';
import type { StateStore } from './state-store.js';
import type { TransportProvider } from './transport.js';
import type { UserId } from './types.js';

export interface IntentManagerOptions extends IntentOptions {
  log?: Logger;
}

export class IntentManager {
  private intents = new Map<UserId, IntentAPI>();
  private bot: IntentAPI | null = null;
  private readonly log: Logger;
  private readonly domain: string;

  constructor(
    private readonly transports: TransportProvider,
    private readonly stateStore: StateStore,
    private readonly options: IntentManagerOptions = {}
  ) {
    this.log = options.log ?? createLogger('mxtg.intent');
    this.domain = parseUserId(transports.botUserId).domain;
  }

  get botUserId(): UserId {
    return this.transports.botUserId;
  }

  /**
   * The intent for a user ID, created on first call.
   * Throws InvalidIdentityError if the ID is not @localpart:domain.
   */
  resolve(mxid: UserId): IntentAPI {
    if (mxid === this.transports.botUserId) {
      return this.botIntent();
    }

    const cached = this.intents.get(mxid);
    if (cached) return cached;

    // Validate before a transport is opened for the ID.
    parseUserId(mxid);
    const intent = new IntentAPI(
      mxid,
      this.transports.forUser(mxid),
      this.stateStore,
      this.log,
      this.transports.forUser(this.transports.botUserId),
      this.options
    );
    this.intents.set(mxid, intent);
    return intent;
  }

  botIntent(): IntentAPI {
    if (!this.bot) {
      const botUserId = this.transports.botUserId;
      this.bot = new IntentAPI(
        botUserId,
        this.transports.forUser(botUserId),
        this.stateStore,
        this.log,
        undefined,
        this.options
      );
    }
    return this.bot;
  }

  /** Full user ID for a localpart on the bridge's domain. */
  userIdFor(localpart: string): UserId {
    return formatUserId(localpart, this.domain);
  }
}
