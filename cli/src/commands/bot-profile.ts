/**
 * mxtg bot-profile: Register the bridge bot and apply its display name
 * and avatar from the config.
 */

import { AppServiceApi, IntentManager, MemoryStateStore } from '@mxtg/appservice';
import { configureLogging } from '../config/logging.js';
import { errorMessage } from '../config/values.js';
import { applyBotProfile } from '../core/bot-profile.js';
import { openConfig, type ConfigOptions } from './options.js';

const CONNECTION_KEYS = [
  'homeserver.address',
  'homeserver.domain',
  'appservice.as_token',
  'appservice.bot_username',
];

export async function botProfileCommand(options: ConfigOptions): Promise<void> {
  const config = openConfig(options);
  configureLogging(config);

  const missing = CONNECTION_KEYS.filter((key) => {
    const value = config.get(key);
    return typeof value !== 'string' || value === '';
  });
  if (missing.length > 0) {
    console.error(`  ❌ Missing config values: ${missing.join(', ')}`);
    process.exit(1);
  }

  const api = new AppServiceApi({
    homeserverUrl: String(config.get('homeserver.address')),
    asToken: String(config.get('appservice.as_token')),
    domain: String(config.get('homeserver.domain')),
    botLocalpart: String(config.get('appservice.bot_username')),
  });
  const intents = new IntentManager(api, new MemoryStateStore());

  try {
    const changes = await applyBotProfile(config, intents.botIntent());
    console.log(`  ✅ Bot ${api.botUserId} is registered`);
    for (const change of changes) {
      console.log(`  ${change}`);
    }
  } catch (err) {
    console.error(`  ❌ Failed to update bot profile: ${errorMessage(err)}`);
    process.exit(1);
  }
}
