import { describe, it, before, after, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import http from 'node:http';
import { AppServiceApi, parseErrorBody, parseMxc } from '../src/http-api.js';
import { MatrixRequestError } from '../src/errors.js';

interface ReceivedRequest {
  method: string;
  path: string;
  query: URLSearchParams;
  authorization: string | undefined;
  contentType: string | undefined;
  body: Buffer;
}

interface CannedResponse {
  status: number;
  body: string;
}

function json(status: number, body: unknown): CannedResponse {
  return { status, body: JSON.stringify(body) };
}

describe('AppServiceApi', () => {
  let server: http.Server;
  let api: AppServiceApi;
  let received: ReceivedRequest[] = [];
  let respond: (req: ReceivedRequest) => CannedResponse = () => json(200, {});

  before(async () => {
    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => { chunks.push(chunk); });
      req.on('end', () => {
        const url = new URL(req.url ?? '/', 'http://127.0.0.1');
        const request: ReceivedRequest = {
          method: req.method ?? '',
          path: (req.url ?? '/').split('?')[0],
          query: url.searchParams,
          authorization: req.headers.authorization,
          contentType: req.headers['content-type'],
          body: Buffer.concat(chunks),
        };
        received.push(request);
        const canned = respond(request);
        res.writeHead(canned.status, { 'Content-Type': 'application/json' });
        res.end(canned.body);
      });
    });

    await new Promise<void>((resolve) => {
      server.listen(0, '127.0.0.1', resolve);
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('test server has no port');
    }
    api = new AppServiceApi({
      homeserverUrl: `http://127.0.0.1:${address.port}/`,
      asToken: 'test-as-token',
      domain: 'example.org',
      botLocalpart: 'telegrambot',
    });
  });

  after(() => {
    server.closeAllConnections();
    server.close();
  });

  beforeEach(() => {
    received = [];
    respond = () => json(200, {});
  });

  it('derives the bot user ID from the localpart and domain', () => {
    assert.equal(api.botUserId, '@telegrambot:example.org');
    assert.equal(api.botClient().userId, '@telegrambot:example.org');
  });

  it('hands out one client per user ID', () => {
    const first = api.forUser('@telegram_1:example.org');
    assert.equal(api.forUser('@telegram_1:example.org'), first);
    assert.notEqual(api.forUser('@telegram_2:example.org'), first);
  });

  it('registers users with the appservice login type', async () => {
    await api.forUser('@telegram_1:example.org').register('telegram_1');

    assert.equal(received.length, 1);
    const [request] = received;
    assert.equal(request.method, 'POST');
    assert.equal(request.path, '/_matrix/client/v3/register');
    assert.equal(request.query.get('kind'), 'user');
    assert.equal(request.query.get('user_id'), '@telegram_1:example.org');
    assert.equal(request.authorization, 'Bearer test-as-token');
    assert.equal(request.contentType, 'application/json');
    assert.deepEqual(JSON.parse(request.body.toString('utf8')), {
      type: 'm.login.application_service',
      username: 'telegram_1',
    });
  });

  it('joins a room and returns the room ID from the response', async () => {
    respond = () => json(200, { room_id: '!abc:example.org' });

    const roomId = await api.forUser('@telegram_1:example.org').joinRoom('#tg_chat:example.org');

    assert.equal(roomId, '!abc:example.org');
    assert.equal(received[0].path, '/_matrix/client/v3/join/%23tg_chat%3Aexample.org');
    assert.equal(received[0].query.get('user_id'), '@telegram_1:example.org');
  });

  it('sends message events with transaction IDs shared across users', async () => {
    respond = () => json(200, { event_id: '$sent' });

    const eventId = await api.forUser('@telegram_1:example.org')
      .sendMessageEvent('!abc:example.org', 'm.room.message', { msgtype: 'm.text', body: 'hello' });
    await api.forUser('@telegram_2:example.org')
      .sendMessageEvent('!abc:example.org', 'm.room.message', { msgtype: 'm.text', body: 'hi' });

    assert.equal(eventId, '$sent');
    assert.equal(received[0].method, 'PUT');
    const first = received[0].path.split('/');
    const second = received[1].path.split('/');
    assert.deepEqual(first.slice(0, -1), ['', '_matrix', 'client', 'v3', 'rooms', '!abc%3Aexample.org', 'send', 'm.room.message']);
    const firstCounter = Number(first[first.length - 1].split('.')[1]);
    const secondCounter = Number(second[second.length - 1].split('.')[1]);
    assert.match(first[first.length - 1], /^mxtg\d+\.\d+$/);
    assert.equal(secondCounter, firstCounter + 1);
    assert.deepEqual(JSON.parse(received[0].body.toString('utf8')), { msgtype: 'm.text', body: 'hello' });
  });

  it('uses a caller supplied transaction ID', async () => {
    respond = () => json(200, { event_id: '$sent' });

    await api.forUser('@telegram_1:example.org')
      .sendMessageEvent('!abc:example.org', 'm.room.message', { body: 'x' }, 'txn-1');

    assert.equal(received[0].path, '/_matrix/client/v3/rooms/!abc%3Aexample.org/send/m.room.message/txn-1');
  });

  it('sends state events with an empty state key by default', async () => {
    respond = () => json(200, { event_id: '$state' });

    const eventId = await api.botClient().sendStateEvent('!abc:example.org', 'm.room.name', { name: 'Chat' });

    assert.equal(eventId, '$state');
    assert.equal(received[0].path, '/_matrix/client/v3/rooms/!abc%3Aexample.org/state/m.room.name/');
  });

  it('maps homeserver errors to MatrixRequestError', async () => {
    respond = () => json(403, { errcode: 'M_FORBIDDEN', error: 'You are not invited to this room.' });

    await assert.rejects(
      api.forUser('@telegram_1:example.org').joinRoom('!abc:example.org'),
      (err: unknown) => {
        assert.ok(err instanceof MatrixRequestError);
        assert.equal(err.status, 403);
        assert.equal(err.errcode, 'M_FORBIDDEN');
        assert.equal(err.message, '403 M_FORBIDDEN: You are not invited to this room.');
        return true;
      },
    );
  });

  it('keeps a non-JSON error body as the errcode', async () => {
    respond = () => ({ status: 502, body: 'Bad Gateway' });

    await assert.rejects(
      api.botClient().leaveRoom('!abc:example.org'),
      (err: unknown) => {
        assert.ok(err instanceof MatrixRequestError);
        assert.equal(err.errcode, 'Bad Gateway');
        return true;
      },
    );
  });

  it('keeps only member events with a known membership', async () => {
    respond = () => json(200, {
      chunk: [
        { type: 'm.room.member', state_key: '@a:example.org', sender: '@a:example.org', content: { membership: 'join' } },
        { type: 'm.room.member', state_key: '@b:example.org', sender: '@a:example.org', content: { membership: 'invite' } },
        { type: 'm.room.member', state_key: '@c:example.org', sender: '@c:example.org', content: { membership: 'unknown' } },
        { type: 'm.room.name', state_key: '', sender: '@a:example.org', content: { name: 'x' } },
      ],
    });

    const members = await api.botClient().getRoomMembers('!abc:example.org');

    assert.deepEqual(members.map((m) => [m.state_key, m.membership]), [
      ['@a:example.org', 'join'],
      ['@b:example.org', 'invite'],
    ]);
    assert.equal(received[0].path, '/_matrix/client/v3/rooms/!abc%3Aexample.org/members');
  });

  it('parses power levels from the room state', async () => {
    respond = () => json(200, {
      users: { '@telegrambot:example.org': 100, '@x:example.org': 'high' },
      users_default: 0,
      events: { 'm.room.name': 50 },
      state_default: 50,
      notifications: { room: 50 },
    });

    const levels = await api.botClient().getPowerLevels('!abc:example.org');

    assert.deepEqual(levels, {
      users: { '@telegrambot:example.org': 100 },
      events: { 'm.room.name': 50 },
      users_default: 0,
      state_default: 50,
    });
    assert.equal(received[0].path, '/_matrix/client/v3/rooms/!abc%3Aexample.org/state/m.room.power_levels');
  });

  it('uploads raw bytes to the media API', async () => {
    respond = () => json(200, { content_uri: 'mxc://example.org/abc123' });

    const uri = await api.forUser('@telegram_1:example.org')
      .mediaUpload(new Uint8Array([104, 105]), 'image/png', 'cat.png');

    assert.equal(uri, 'mxc://example.org/abc123');
    const [request] = received;
    assert.equal(request.path, '/_matrix/media/v3/upload');
    assert.equal(request.query.get('filename'), 'cat.png');
    assert.equal(request.contentType, 'image/png');
    assert.equal(request.body.toString('utf8'), 'hi');
  });

  it('creates rooms with the requested options', async () => {
    respond = () => json(200, { room_id: '!new:example.org' });

    const roomId = await api.botClient().createRoom({
      alias: 'telegram_chat',
      name: 'Chat',
      invitees: ['@alice:example.org'],
      isDirect: true,
    });

    assert.equal(roomId, '!new:example.org');
    assert.deepEqual(JSON.parse(received[0].body.toString('utf8')), {
      visibility: 'private',
      is_direct: true,
      room_alias_name: 'telegram_chat',
      invite: ['@alice:example.org'],
      name: 'Chat',
    });
  });

  it('fails when a response misses the expected field', async () => {
    respond = () => json(200, {});

    await assert.rejects(
      api.botClient().createRoom({}),
      { message: 'Homeserver response is missing "room_id"' },
    );
  });

  it('builds download URLs from mxc URIs', () => {
    const url = api.botClient().getDownloadUrl('mxc://example.org/abc123');
    assert.match(url, /^http:\/\/127\.0\.0\.1:\d+\/_matrix\/media\/v3\/download\/example\.org\/abc123$/);
  });
});

describe('parseErrorBody', () => {
  it('falls back to the errcode when there is no message', () => {
    assert.deepEqual(parseErrorBody('{"errcode":"M_UNKNOWN"}'), { errcode: 'M_UNKNOWN', message: 'M_UNKNOWN' });
  });

  it('uses the raw text for JSON without an errcode', () => {
    assert.deepEqual(parseErrorBody('{"detail":"x"}'), { errcode: '{"detail":"x"}', message: '{"detail":"x"}' });
  });
});

describe('parseMxc', () => {
  it('splits server name and media ID', () => {
    assert.deepEqual(parseMxc('mxc://example.org/abc123'), { server: 'example.org', mediaId: 'abc123' });
  });

  it('rejects other URLs', () => {
    assert.throws(() => parseMxc('https://example.org/abc123'), { message: 'Invalid mxc URL: https://example.org/abc123' });
  });
});
