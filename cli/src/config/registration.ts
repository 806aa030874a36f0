/**
 * Appservice registration file, as read by the homeserver.
 *
 * The user and alias namespaces are the bridge templates with their
 * placeholder replaced by `.+`, on the bridge's homeserver domain.
 */

import type { RecursiveDict } from './recursive-dict.js';
import { stringOr } from './values.js';

export const DEFAULT_APPSERVICE_ID = 'telegram';
export const DEFAULT_USERNAME_TEMPLATE = 'telegram_{userid}';
export const DEFAULT_ALIAS_TEMPLATE = 'telegram_{groupname}';

export interface RegistrationNamespace {
  exclusive: boolean;
  regex: string;
}

export interface Registration {
  id: string;
  as_token: string;
  hs_token: string;
  namespaces: {
    users: RegistrationNamespace[];
    aliases: RegistrationNamespace[];
  };
  url: string | null;
  sender_localpart: string | null;
  rate_limited: boolean;
}

export function buildRegistration(config: RecursiveDict): Registration {
  const domain = stringOr(config.get('homeserver.domain'), '');
  const usernameFormat = stringOr(config.get('bridge.username_template'), DEFAULT_USERNAME_TEMPLATE)
    .replaceAll('{userid}', '.+');
  const aliasFormat = stringOr(config.get('bridge.alias_template'), DEFAULT_ALIAS_TEMPLATE)
    .replaceAll('{groupname}', '.+');

  return {
    id: stringOr(config.get('appservice.id'), DEFAULT_APPSERVICE_ID),
    as_token: stringOr(config.get('appservice.as_token'), ''),
    hs_token: stringOr(config.get('appservice.hs_token'), ''),
    namespaces: {
      users: [{ exclusive: true, regex: `@${usernameFormat}:${domain}` }],
      aliases: [{ exclusive: true, regex: `#${aliasFormat}:${domain}` }],
    },
    url: stringOr(config.get('appservice.address'), null),
    sender_localpart: stringOr(config.get('appservice.bot_username'), null),
    rate_limited: false,
  };
}
