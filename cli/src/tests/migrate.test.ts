import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { migrateConfig } from '../config/migrate.js';
import { RecursiveDict } from '../config/recursive-dict.js';

const BASE = `homeserver:
    address: https://example.com
    domain: example.com
appservice:
    address: http://localhost:29317
    hostname: 0.0.0.0
    port: 29317
    provisioning:
        shared_secret: generate
    id: telegram
bridge:
    message_formats:
        m.text: "<b>$sender_displayname</b>: $message"
        m.emote: "* $sender_displayname $message"
    permissions:
        "*": relaybot
    relaybot:
        authless_portals: true
        whitelist: []
logging:
    root:
        level: INFO
`;

function migrate(source: string, newToken = (): string => 'test-secret'): { base: RecursiveDict; old: RecursiveDict } {
  const old = RecursiveDict.parse(source);
  const base = RecursiveDict.parse(BASE);
  migrateConfig(old, base, { newToken });
  return { base, old };
}

describe('migrateConfig', () => {
  describe('plain copies', () => {
    it('copies listed keys and keeps base defaults for the rest', () => {
      const { base } = migrate('homeserver:\n    address: https://matrix.example.org\n');

      assert.equal(base.get('homeserver.address'), 'https://matrix.example.org');
      assert.equal(base.get('homeserver.domain'), 'example.com');
    });

    it('ignores keys that are not on the list', () => {
      const { base } = migrate('bridge:\n    unknown_option: 1\n');
      assert.equal(base.has('bridge.unknown_option'), false);
    });

    it('ignores null values in the source', () => {
      const { base } = migrate('homeserver:\n    domain:\n');
      assert.equal(base.get('homeserver.domain'), 'example.com');
    });

    it('copies false values', () => {
      const { base } = migrate('homeserver:\n    verify_ssl: false\n');
      assert.equal(base.get('homeserver.verify_ssl'), false);
    });

    it('copies telegram settings into new sections', () => {
      const { base } = migrate([
        'telegram:',
        '    api_id: 12345',
        '    api_hash: test-hash',
        '    proxy:',
        '        type: socks5',
        '        port: 1080',
        '',
      ].join('\n'));

      assert.equal(base.get('telegram.api_id'), 12345);
      assert.equal(base.get('telegram.api_hash'), 'test-hash');
      assert.deepEqual(base.get('telegram.proxy'), { type: 'socks5', port: 1080 });
    });
  });

  describe('appservice address', () => {
    it('builds the address from the legacy protocol, hostname and port', () => {
      const { base } = migrate([
        'appservice:',
        '    protocol: http',
        '    hostname: 10.0.0.2',
        '    port: 8080',
        '',
      ].join('\n'));

      assert.equal(base.get('appservice.address'), 'http://10.0.0.2:8080');
      assert.equal(base.get('appservice.hostname'), '10.0.0.2');
      assert.equal(base.get('appservice.port'), 8080);
    });

    it('prefers an explicit address', () => {
      const { base } = migrate([
        'appservice:',
        '    protocol: http',
        '    hostname: 10.0.0.2',
        '    port: 8080',
        '    address: https://bridge.example.org',
        '',
      ].join('\n'));

      assert.equal(base.get('appservice.address'), 'https://bridge.example.org');
    });
  });

  describe('provisioning shared secret', () => {
    it('replaces "generate" with a new token', () => {
      const { base } = migrate('appservice:\n    id: telegram\n');
      assert.equal(base.get('appservice.provisioning.shared_secret'), 'test-secret');
    });

    it('keeps an existing secret', () => {
      const { base } = migrate('appservice:\n    provisioning:\n        shared_secret: kept-secret\n');
      assert.equal(base.get('appservice.provisioning.shared_secret'), 'kept-secret');
    });

    it('generates a different 64 character token on each run', () => {
      const old = 'appservice:\n    provisioning:\n        shared_secret: generate\n';
      const first = RecursiveDict.parse(BASE);
      const second = RecursiveDict.parse(BASE);
      migrateConfig(RecursiveDict.parse(old), first);
      migrateConfig(RecursiveDict.parse(old), second);

      const firstSecret = first.get('appservice.provisioning.shared_secret');
      const secondSecret = second.get('appservice.provisioning.shared_secret');
      assert.equal(typeof firstSecret, 'string');
      assert.match(String(firstSecret), /^[a-z0-9]{64}$/);
      assert.match(String(secondSecret), /^[a-z0-9]{64}$/);
      assert.notEqual(firstSecret, secondSecret);
    });
  });

  describe('message formats', () => {
    it('drops the legacy flat format map', () => {
      const { base, old } = migrate('bridge:\n    message_formats:\n        m_text: "$sender: $message"\n');

      assert.deepEqual(base.get('bridge.message_formats'), {
        'm.text': '<b>$sender_displayname</b>: $message',
        'm.emote': '* $sender_displayname $message',
      });
      assert.equal(old.has('bridge.message_formats'), false);
    });

    it('merges formats into the template map', () => {
      const { base } = migrate('bridge:\n    message_formats:\n        m.text: "$sender_displayname: $message"\n');

      assert.deepEqual(base.get('bridge.message_formats'), {
        'm.text': '$sender_displayname: $message',
        'm.emote': '* $sender_displayname $message',
      });
    });
  });

  describe('permissions', () => {
    it('gives admin precedence over the whitelist', () => {
      const { base } = migrate([
        'bridge:',
        '    whitelist:',
        '        - "@a:x"',
        '    admins:',
        '        - "@a:x"',
        '',
      ].join('\n'));

      assert.deepEqual(base.get('bridge.permissions'), { '@a:x': 'admin' });
    });

    it('adds legacy lists to an existing permission map', () => {
      const { base } = migrate([
        'bridge:',
        '    permissions:',
        '        example.org: user',
        '    whitelist:',
        '        - "@b:example.org"',
        '',
      ].join('\n'));

      assert.deepEqual(base.get('bridge.permissions'), {
        'example.org': 'user',
        '@b:example.org': 'full',
      });
    });

    it('replaces the template map with a structured map', () => {
      const { base } = migrate('bridge:\n    permissions:\n        "@c:example.org": admin\n');
      assert.deepEqual(base.get('bridge.permissions'), { '@c:example.org': 'admin' });
    });

    it('writes an empty map when there are no permissions at all', () => {
      const { base } = migrate('bridge:\n    command_prefix: "!tg"\n');
      assert.deepEqual(base.get('bridge.permissions'), {});
      assert.equal(base.get('bridge.command_prefix'), '!tg');
    });
  });

  describe('anchors and aliases', () => {
    const ALIASED = [
      'bridge:',
      '    admins: &admins',
      '        - "@a:x"',
      '    filter:',
      '        mode: whitelist',
      '        list: *admins',
      '',
    ].join('\n');

    it('copies the value an alias points to', () => {
      const { base } = migrate(ALIASED);

      assert.deepEqual(base.get('bridge.filter.list'), ['@a:x']);
      assert.equal(base.get('bridge.filter.mode'), 'whitelist');
      assert.deepEqual(base.get('bridge.permissions'), { '@a:x': 'admin' });
    });

    it('writes a document that parses back', () => {
      const { base } = migrate(ALIASED);
      const reparsed = RecursiveDict.parse(base.toString());

      assert.deepEqual(reparsed.get('bridge.filter.list'), ['@a:x']);
    });

    it('copies map entries that are aliases', () => {
      const { base } = migrate([
        'homeserver:',
        '    domain: &domain example.org',
        'bridge:',
        '    relaybot:',
        '        whitelist: &bots',
        '            - bob',
        '    message_formats:',
        '        m.text: *domain',
        '',
      ].join('\n'));

      assert.deepEqual(base.get('bridge.message_formats'), {
        'm.text': 'example.org',
        'm.emote': '* $sender_displayname $message',
      });
      assert.equal(RecursiveDict.parse(base.toString()).get('homeserver.domain'), 'example.org');
    });
  });

  describe('relaybot', () => {
    it('moves the legacy authless portals flag', () => {
      const { base } = migrate('bridge:\n    authless_relaybot_portals: false\n');
      assert.equal(base.get('bridge.relaybot.authless_portals'), false);
    });

    it('copies each relaybot setting', () => {
      const { base } = migrate('bridge:\n    relaybot:\n        whitelist:\n            - bob\n');
      assert.deepEqual(base.get('bridge.relaybot'), { authless_portals: true, whitelist: ['bob'] });
    });
  });

  describe('logging', () => {
    it('derives levels from the legacy debug flag', () => {
      const { base } = migrate('appservice:\n    debug: true\n');
      assert.deepEqual(base.get('logging'), {
        root: { level: 'DEBUG' },
        loggers: { mxtg: { level: 'DEBUG' }, telegram: { level: 'DEBUG' } },
      });
    });

    it('uses INFO when the debug flag is off', () => {
      const { base } = migrate('appservice:\n    debug: false\n');
      assert.equal(base.get('logging.root.level'), 'INFO');
      assert.equal(base.get('logging.loggers.telegram.level'), 'INFO');
    });

    it('copies a structured logging section as it is', () => {
      const { base } = migrate([
        'logging:',
        '    # quieter library output',
        '    loggers:',
        '        telegram:',
        '            level: WARNING',
        '    root:',
        '        level: DEBUG',
        '',
      ].join('\n'));

      assert.deepEqual(base.get('logging'), {
        loggers: { telegram: { level: 'WARNING' } },
        root: { level: 'DEBUG' },
      });
      assert.ok(base.toString().includes('    # quieter library output\n    loggers:\n'));
    });

    it('prefers a structured logging section over the debug flag', () => {
      const { base } = migrate('appservice:\n    debug: true\nlogging:\n    root:\n        level: ERROR\n');
      assert.deepEqual(base.get('logging'), { root: { level: 'ERROR' } });
    });
  });
});
