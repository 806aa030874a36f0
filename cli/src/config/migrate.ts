/**
 * Config migration: copy a user's config into the current base template
 *
 * The base template is the authority for structure and defaults: only the
 * keys listed here are taken over from the old config, and only when the
 * old config has a value for them. After the plain copies, the legacy
 * layouts are translated in a fixed order:
 *
 *   1. appservice.protocol/hostname/port  -> appservice.address
 *   2. provisioning shared_secret "generate" -> fresh token
 *   3. flat bridge.message_formats.m_text   -> dropped, template map kept
 *   4. bridge.whitelist / bridge.admins     -> bridge.permissions
 *   5. bridge.authless_relaybot_portals     -> bridge.relaybot.authless_portals
 *   6. appservice.debug                      -> logging levels
 */

import { generateToken } from '../crypto/tokens.js';
import type { RecursiveDict } from './recursive-dict.js';

const HOMESERVER_KEYS = [
  'homeserver.address',
  'homeserver.verify_ssl',
  'homeserver.domain',
];

const APPSERVICE_KEYS = [
  'appservice.hostname',
  'appservice.port',
  'appservice.database',
  'appservice.public.enabled',
  'appservice.public.prefix',
  'appservice.public.external',
  'appservice.provisioning.enabled',
  'appservice.provisioning.prefix',
  'appservice.provisioning.shared_secret',
];

const APPSERVICE_IDENTITY_KEYS = [
  'appservice.id',
  'appservice.bot_username',
  'appservice.bot_displayname',
  'appservice.bot_avatar',
  'appservice.as_token',
  'appservice.hs_token',
];

const BRIDGE_KEYS = [
  'bridge.username_template',
  'bridge.alias_template',
  'bridge.displayname_template',
  'bridge.displayname_preference',
  'bridge.edits_as_replies',
  'bridge.highlight_edits',
  'bridge.bridge_notices',
  'bridge.bot_messages_as_notices',
  'bridge.max_initial_member_sync',
  'bridge.sync_channel_members',
  'bridge.max_telegram_delete',
  'bridge.allow_matrix_login',
  'bridge.inline_images',
  'bridge.plaintext_highlights',
  'bridge.public_portals',
  'bridge.native_stickers',
  'bridge.catch_up',
  'bridge.sync_with_custom_puppets',
];

const STATE_EVENT_FORMAT_KEYS = [
  'bridge.state_event_formats.join',
  'bridge.state_event_formats.leave',
  'bridge.state_event_formats.name_change',
  'bridge.filter.mode',
  'bridge.filter.list',
  'bridge.command_prefix',
];

const RELAYBOT_KEYS = [
  'bridge.relaybot.authless_portals',
  'bridge.relaybot.whitelist_group_admins',
  'bridge.relaybot.whitelist',
  'bridge.relaybot.ignore_own_incoming_events',
];

const TELEGRAM_KEYS = [
  'telegram.api_id',
  'telegram.api_hash',
  'telegram.bot_token',
  'telegram.proxy.type',
  'telegram.proxy.address',
  'telegram.proxy.port',
  'telegram.proxy.rdns',
  'telegram.proxy.username',
  'telegram.proxy.password',
];

/** Loggers whose level follows the legacy appservice.debug flag. */
export const DEBUG_FLAG_LOGGERS = ['mxtg', 'telegram'];

export interface MigrateOptions {
  newToken?: () => string;
}

/**
 * Copy the settings of `source` into `base`. `base` is modified in place;
 * `source` only loses a legacy bridge.message_formats map.
 */
export function migrateConfig(source: RecursiveDict, base: RecursiveDict, options: MigrateOptions = {}): void {
  const newToken = options.newToken ?? generateToken;

  const copy = (from: string, to = from): void => {
    if (source.has(from)) {
      base.set(to, source.getNode(from));
    }
  };

  const copyDict = (from: string, to = from, overrideExisting = true): void => {
    if (!source.has(from)) return;
    if (overrideExisting || !base.has(to)) {
      base.set(to, {});
    }
    for (const [key, value] of source.entries(from)) {
      base.setChild(to, key, value);
    }
  };

  HOMESERVER_KEYS.forEach((key) => copy(key));

  if (source.has('appservice.protocol') && !source.has('appservice.address')) {
    const protocol = String(source.get('appservice.protocol'));
    const hostname = String(source.get('appservice.hostname'));
    const port = String(source.get('appservice.port'));
    base.set('appservice.address', `${protocol}://${hostname}:${port}`);
  } else {
    copy('appservice.address');
  }

  APPSERVICE_KEYS.forEach((key) => copy(key));
  if (base.get('appservice.provisioning.shared_secret') === 'generate') {
    base.set('appservice.provisioning.shared_secret', newToken());
  }

  APPSERVICE_IDENTITY_KEYS.forEach((key) => copy(key));
  BRIDGE_KEYS.forEach((key) => copy(key));

  if (source.has('bridge.message_formats.m_text')) {
    source.delete('bridge.message_formats');
  }
  copyDict('bridge.message_formats', 'bridge.message_formats', false);

  STATE_EVENT_FORMAT_KEYS.forEach((key) => copy(key));

  migratePermissions(source, base, copyDict);

  if (!source.has('bridge.relaybot')) {
    copy('bridge.authless_relaybot_portals', 'bridge.relaybot.authless_portals');
  } else {
    RELAYBOT_KEYS.forEach((key) => copy(key));
  }

  TELEGRAM_KEYS.forEach((key) => copy(key));

  if (source.has('appservice.debug') && !source.has('logging')) {
    const level = source.get('appservice.debug') ? 'DEBUG' : 'INFO';
    base.set('logging.root.level', level);
    for (const logger of DEBUG_FLAG_LOGGERS) {
      base.set(`logging.loggers.${logger}.level`, level);
    }
  } else {
    copy('logging');
  }
}

/**
 * Build bridge.permissions from the legacy whitelist and admin lists when
 * they are still present. Admins are applied last, so an entry in both
 * lists ends up as "admin".
 */
function migratePermissions(
  source: RecursiveDict,
  base: RecursiveDict,
  copyDict: (from: string) => void,
): void {
  const legacy = !source.has('bridge.permissions')
    || source.has('bridge.whitelist')
    || source.has('bridge.admins');

  if (!legacy) {
    copyDict('bridge.permissions');
    return;
  }

  base.set('bridge.permissions', {});
  for (const [key, value] of source.entries('bridge.permissions')) {
    base.setChild('bridge.permissions', key, value);
  }
  for (const entry of listOf(source.get('bridge.whitelist'))) {
    base.setChild('bridge.permissions', entry, 'full');
  }
  for (const entry of listOf(source.get('bridge.admins'))) {
    base.setChild('bridge.permissions', entry, 'admin');
  }
}

function listOf(value: unknown): string[] {
  return Array.isArray(value) ? value.map((entry) => String(entry)) : [];
}
