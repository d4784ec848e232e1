import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ChatEventRecorder, ReplyOutbox, bareNick } from '../../src/application/index.js';
import type { ChatEventRecorderOptions } from '../../src/application/index.js';
import { EventClock } from '../../src/domain/index.js';
import type { ChatEvent } from '../../src/domain/index.js';
import type { SinkFailure } from '../../src/domain/index.js';
import { DocumentManager, DocumentStoreClient } from '../../src/infrastructure/store/index.js';
import { FIXED_TIME, TEST_ORIGIN, fakeFetch, fakeLogger, jsonResponse, searchResponse } from '../helpers.js';

const NICK = 'scribe';

function fakeDispatcher() {
  return { dispatch: vi.fn(async (_event: ChatEvent): Promise<SinkFailure[]> => []) };
}

function recorderWith(overrides: Partial<ChatEventRecorderOptions> = {}) {
  const dispatcher = fakeDispatcher();
  const log = fakeLogger();
  const recorder = new ChatEventRecorder({
    nickname: NICK,
    origin: TEST_ORIGIN,
    dispatcher,
    log,
    clock: new EventClock(() => FIXED_TIME),
    ...overrides,
  });
  const dispatched = () => dispatcher.dispatch.mock.calls.map(([event]) => event);
  return { recorder, dispatcher, dispatched, log };
}

const base = { time: FIXED_TIME, origin: TEST_ORIGIN };

describe('bareNick', () => {
  it('strips the user and host part', () => {
    expect(bareNick('alice!al@host.example')).toBe('alice');
    expect(bareNick('alice')).toBe('alice');
  });
});

// ─── callbacks → events ──────────────────────────────────────

describe('ChatEventRecorder callbacks', () => {
  it('records connection state as system events', () => {
    const { recorder, dispatched } = recorderWith();

    recorder.onConnect();
    recorder.onDisconnect('ping timeout');
    recorder.onJoin('#general');

    expect(dispatched()).toEqual([
      { ...base, actor: 'SYSTEM', channel: null, kind: 'CONNECT', payload: 'CONNECTION ESTABLISHED' },
      { ...base, actor: 'SYSTEM', channel: null, kind: 'DISCONNECT', payload: 'CONNECTION LOST: ping timeout' },
      { ...base, actor: 'SYSTEM', channel: null, kind: 'JOIN', payload: 'JOINED CHANNEL (#general)' },
    ]);
  });

  it('records actions, nick changes, joins and leaves', () => {
    const { recorder, dispatched } = recorderWith();

    recorder.onAction('bob!b@h', '#dev', 'waves');
    recorder.onNickChange('bob!b@h', 'robert');
    recorder.onUserJoined('carol!c@h', '#dev');
    recorder.onUserLeft('carol', '#dev');

    expect(dispatched()).toEqual([
      { ...base, actor: 'bob', channel: '#dev', kind: 'ACTION', payload: '* bob waves' },
      { ...base, actor: 'bob', channel: null, kind: 'NICK_CHANGE', payload: 'bob CHANGED NICK TO robert' },
      { ...base, actor: 'carol', channel: '#dev', kind: 'JOIN', payload: null },
      { ...base, actor: 'carol', channel: '#dev', kind: 'LEAVE', payload: null },
    ]);
  });

  it('records ordinary channel messages', async () => {
    const { recorder, dispatched } = recorderWith();

    const event = await recorder.onMessage('alice!a@h', '#general', 'hello');

    expect(event).toEqual({ ...base, actor: 'alice', channel: '#general', kind: 'MESSAGE', payload: 'hello' });
    expect(dispatched()).toEqual([event]);
  });

  it('does not record private, ignored or addressed messages', async () => {
    const { recorder, dispatched, log } = recorderWith({ ignored: ['spammer'] });

    expect(await recorder.onMessage('alice', NICK, 'psst')).toBeNull();
    expect(await recorder.onMessage('spammer!s@h', '#general', 'buy now')).toBeNull();
    expect(await recorder.onMessage('alice', '#general', `${NICK}: help`)).toBeNull();

    expect(dispatched()).toEqual([]);
    expect(vi.mocked(log.debug)).toHaveBeenCalledWith(
      { actor: 'spammer', channel: '#general', text: 'buy now' },
      'Message not recorded',
    );
  });

  it('logs a rejected dispatch instead of throwing', async () => {
    const { recorder, dispatcher, log } = recorderWith();
    dispatcher.dispatch.mockRejectedValueOnce(new Error('unexpected'));

    recorder.onConnect();
    await recorder.settled();

    expect(vi.mocked(log.error)).toHaveBeenCalledWith(
      expect.objectContaining({ kind: 'CONNECT' }),
      'Event dispatch failed',
    );
  });
});

// ─── commands through the recorder ───────────────────────────

describe('ChatEventRecorder commands', () => {
  let replies: ReplyOutbox;

  beforeEach(() => {
    replies = new ReplyOutbox(fakeLogger());
  });

  function withCommands() {
    const { fetch } = fakeFetch(() => jsonResponse(searchResponse([])));
    const client = new DocumentStoreClient({ nodes: ['store:9200'], log: fakeLogger(), fetch });
    const search = new DocumentManager(client, { index: 'chatevents', doctype: 'chatevent' });
    return recorderWith({ commands: { search, replier: replies } });
  }

  it('answers addressed commands after the message', async () => {
    const { recorder } = withCommands();

    await recorder.onMessage('alice', '#general', `${NICK}: whatever`);

    expect(replies.drain()).toEqual([{ target: '#general', text: 'logger and searchbot - try "help"' }]);
  });

  it('stops recording a nick once it is ignored and records the change', async () => {
    const { recorder, dispatched } = withCommands();

    await recorder.onMessage('alice', '#general', `${NICK}: ignore bob`);
    await recorder.onMessage('bob', '#general', 'can anyone hear me');

    expect(recorder.ignoreList.has('bob')).toBe(true);
    expect(dispatched()).toEqual([
      { ...base, actor: 'alice', channel: '#general', kind: 'IGNORE', payload: 'bob' },
    ]);
  });
});
