import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ZodError } from 'zod';
import { loadConfig, parseSimpleYaml } from '../../src/infrastructure/config.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'chatscribe-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function writeConfig(content: string): Promise<string> {
  const path = join(dir, 'chatscribe.yaml');
  await writeFile(path, content);
  return path;
}

// ─── parseSimpleYaml ─────────────────────────────────────────

describe('parseSimpleYaml', () => {
  it('reads sections with scalars and lists', () => {
    const parsed = parseSimpleYaml([
      '# comment',
      'chat:',
      '  nickname: "scribe"',
      '  channels:',
      '    - "#general"',
      "    - '#dev'",
      '  ignored: []',
      'server:',
      '  port: 9000',
      '  verbose: true',
    ].join('\n'));

    expect(parsed).toEqual({
      chat: { nickname: 'scribe', channels: ['#general', '#dev'], ignored: [] },
      server: { port: '9000', verbose: true },
    });
  });

  it('ignores list items that do not follow a list key', () => {
    expect(parseSimpleYaml('store:\n  index: x\n  - stray\n')).toEqual({ store: { index: 'x' } });
  });
});

// ─── loadConfig ──────────────────────────────────────────────

describe('loadConfig', () => {
  it('falls back to defaults when the file is missing', () => {
    const config = loadConfig({ path: join(dir, 'missing.yaml'), env: {} });

    expect(config.server).toEqual({ host: '0.0.0.0', port: 8087 });
    expect(config.store.nodes).toEqual(['localhost:9200']);
    expect(config.store.index).toBe('chatevents');
    expect(config.logging.flush_interval_ms).toBe(5000);
    expect(config.chat.channels).toEqual([]);
    expect(config.logging.system_rotated_files).toBeUndefined();
  });

  it('merges file values over defaults and coerces numbers', async () => {
    const path = await writeConfig([
      'chat:',
      '  nickname: scribe',
      '  channels:',
      '    - "#general"',
      'store:',
      '  nodes:',
      '    - es1:9200',
      '    - es2:9200',
      '  timeout_ms: 2500',
      'logging:',
      '  system_rotated_files: 3',
    ].join('\n'));

    const config = loadConfig({ path, env: {} });

    expect(config.chat.nickname).toBe('scribe');
    expect(config.chat.channels).toEqual(['#general']);
    expect(config.store.nodes).toEqual(['es1:9200', 'es2:9200']);
    expect(config.store.timeout_ms).toBe(2500);
    expect(config.store.doctype).toBe('chatevent');
    expect(config.logging.system_rotated_files).toBe(3);
  });

  it('applies environment overrides', async () => {
    const path = await writeConfig('server:\n  port: 9000\n');

    const config = loadConfig({
      path,
      env: { HOST: '127.0.0.1', PORT: '7000', LOG_LEVEL: 'debug', STORE_NODES: 'a:9200, b:9200,' },
    });

    expect(config.server).toEqual({ host: '127.0.0.1', port: 7000 });
    expect(config.logging.level).toBe('debug');
    expect(config.store.nodes).toEqual(['a:9200', 'b:9200']);
  });

  it('rejects invalid values', async () => {
    const path = await writeConfig('server:\n  port: not-a-port\n');
    expect(() => loadConfig({ path, env: {} })).toThrow(ZodError);
  });
});
