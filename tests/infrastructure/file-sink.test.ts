import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MultiChannelFileSink, SYSTEM_LOG_NAME } from '../../src/infrastructure/sinks/index.js';
import type { LogFile } from '../../src/infrastructure/sinks/index.js';
import { makeEvent } from '../helpers.js';

const NOW = () => new Date('2026-01-05T12:00:00Z');

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'chatscribe-filesink-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('MultiChannelFileSink', () => {
  it('writes configured channels to their own files', async () => {
    const sink = new MultiChannelFileSink({ directory: dir, channels: ['#general', '#dev'], now: NOW });

    await sink.log(makeEvent({ channel: '#general', payload: 'in general' }));
    await sink.log(makeEvent({ channel: '#dev', actor: 'bob', payload: 'in dev' }));
    await sink.close();

    expect(await readFile(join(dir, '#general'), 'utf-8')).toBe(
      '[#general] 2026-01-05T12:00:00.000Z :  <alice> in general\n',
    );
    expect(await readFile(join(dir, '#dev'), 'utf-8')).toBe(
      '[#dev] 2026-01-05T12:00:00.000Z :  <bob> in dev\n',
    );
  });

  it('writes channel-less events to the system log', async () => {
    const sink = new MultiChannelFileSink({ directory: dir, channels: ['#general'], now: NOW });

    await sink.log(makeEvent({ actor: 'SYSTEM', channel: null, kind: 'CONNECT', payload: 'CONNECTION ESTABLISHED' }));

    expect(await readFile(join(dir, SYSTEM_LOG_NAME), 'utf-8')).toBe(
      '[system] 2026-01-05T12:00:00.000Z :  <SYSTEM> CONNECTION ESTABLISHED\n',
    );
  });

  it('marks events from unknown channels in the system log', async () => {
    const sink = new MultiChannelFileSink({ directory: dir, channels: ['#general'], now: NOW });

    await sink.log(makeEvent({ channel: '#c', payload: 'stray' }));

    expect(await readFile(join(dir, SYSTEM_LOG_NAME), 'utf-8')).toBe(
      '-- Received message from unknown channel:\n\t[#c] 2026-01-05T12:00:00.000Z :  <alice> stray\n',
    );
  });

  it('keeps only the configured number of rotated system logs', async () => {
    const sink = new MultiChannelFileSink({
      directory: dir,
      channels: [],
      now: NOW,
      systemRotateLength: 1,
      systemRotatedFiles: 1,
    });

    for (const payload of ['one', 'two', 'three']) {
      await sink.log(makeEvent({ actor: 'SYSTEM', channel: null, kind: 'CONNECT', payload }));
    }
    await sink.close();

    expect(await readdir(dir)).toEqual([`${SYSTEM_LOG_NAME}.1`]);
    expect(await readFile(join(dir, `${SYSTEM_LOG_NAME}.1`), 'utf-8')).toBe(
      '[system] 2026-01-05T12:00:00.000Z :  <SYSTEM> three\n',
    );
  });

  it('opens files through the injected factories', async () => {
    const written: string[] = [];
    const fake = (path: string): LogFile => ({
      path,
      write: async (text) => { written.push(`${path}|${text}`); },
      close: async () => undefined,
    });
    const sink = new MultiChannelFileSink({
      directory: '/unused',
      channels: ['#general'],
      openChannelFile: (channel) => fake(channel),
      openSystemFile: () => fake('system'),
    });

    await sink.log(makeEvent({ kind: 'JOIN', payload: null }));

    expect(written).toEqual(['#general|[#general] 2026-01-05T12:00:00.000Z :  <alice> has joined #general\n']);
    expect(sink.channels).toEqual(['#general']);
    expect(String(sink)).toBe('File sink for channels #general');
  });
});
