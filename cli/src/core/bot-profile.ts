/**
 * Bridge bot profile: apply appservice.bot_displayname and
 * appservice.bot_avatar to the bot's Matrix account.
 *
 * A value of "remove" clears the field. A missing value leaves the
 * account as it is.
 */

import type { RecursiveDict } from '../config/recursive-dict.js';

export const REMOVE_VALUE = 'remove';

/** The part of the intent API the profile update needs. */
export interface ProfileTarget {
  ensureRegistered(): Promise<void>;
  setDisplayName(name: string): Promise<void>;
  setAvatar(url: string): Promise<void>;
}

/**
 * Register the bot and update its profile. Returns a description of every
 * change that was made.
 */
export async function applyBotProfile(config: RecursiveDict, bot: ProfileTarget): Promise<string[]> {
  const changes: string[] = [];
  await bot.ensureRegistered();

  const displayName = config.get('appservice.bot_displayname');
  if (typeof displayName === 'string' && displayName !== '') {
    if (displayName === REMOVE_VALUE) {
      await bot.setDisplayName('');
      changes.push('Display name removed');
    } else {
      await bot.setDisplayName(displayName);
      changes.push(`Display name set to "${displayName}"`);
    }
  }

  const avatar = config.get('appservice.bot_avatar');
  if (typeof avatar === 'string' && avatar !== '') {
    if (avatar === REMOVE_VALUE) {
      await bot.setAvatar('');
      changes.push('Avatar removed');
    } else {
      await bot.setAvatar(avatar);
      changes.push(`Avatar set to ${avatar}`);
    }
  }

  return changes;
}
