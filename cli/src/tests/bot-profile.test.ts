import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { applyBotProfile, type ProfileTarget } from '../core/bot-profile.js';
import { RecursiveDict } from '../config/recursive-dict.js';

class RecordingBot implements ProfileTarget {
  calls: string[] = [];

  async ensureRegistered(): Promise<void> {
    this.calls.push('register');
  }

  async setDisplayName(name: string): Promise<void> {
    this.calls.push(`displayname=${name}`);
  }

  async setAvatar(url: string): Promise<void> {
    this.calls.push(`avatar=${url}`);
  }
}

function appservice(lines: string[]): RecursiveDict {
  return RecursiveDict.parse(['appservice:', ...lines.map((line) => `    ${line}`), ''].join('\n'));
}

describe('applyBotProfile', () => {
  it('registers the bot and sets name and avatar', async () => {
    const bot = new RecordingBot();
    const changes = await applyBotProfile(
      appservice(['bot_displayname: Telegram bridge bot', 'bot_avatar: mxc://example.org/avatar']),
      bot,
    );

    assert.deepEqual(bot.calls, ['register', 'displayname=Telegram bridge bot', 'avatar=mxc://example.org/avatar']);
    assert.deepEqual(changes, ['Display name set to "Telegram bridge bot"', 'Avatar set to mxc://example.org/avatar']);
  });

  it('clears fields set to remove', async () => {
    const bot = new RecordingBot();
    const changes = await applyBotProfile(appservice(['bot_displayname: remove', 'bot_avatar: remove']), bot);

    assert.deepEqual(bot.calls, ['register', 'displayname=', 'avatar=']);
    assert.deepEqual(changes, ['Display name removed', 'Avatar removed']);
  });

  it('leaves missing fields alone', async () => {
    const bot = new RecordingBot();
    const changes = await applyBotProfile(appservice(['bot_displayname:', 'bot_username: telegrambot']), bot);

    assert.deepEqual(bot.calls, ['register']);
    assert.deepEqual(changes, []);
  });

  it('stops when registration fails', async () => {
    const bot = new RecordingBot();
    bot.ensureRegistered = async () => {
      throw new Error('homeserver unreachable');
    };

    await assert.rejects(applyBotProfile(appservice(['bot_displayname: Bot']), bot), { message: 'homeserver unreachable' });
    assert.deepEqual(bot.calls, []);
  });
});
