import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';

type YamlValue = string | boolean | string[];
type YamlSections = Record<string, Record<string, YamlValue>>;

const csv = (value: string): string[] =>
  value.split(',').map((part) => part.trim()).filter((part) => part !== '');

export const configSchema = z.object({
  server: z.object({
    host: z.string().min(1).default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(8087),
  }).default({}),
  chat: z.object({
    nickname: z.string().min(1).default('chatscribe'),
    origin: z.string().min(1).default('localhost:6667'),
    channels: z.array(z.string().min(1)).default([]),
    ignored: z.array(z.string().min(1)).default([]),
  }).default({}),
  store: z.object({
    nodes: z.array(z.string().min(1)).min(1).default(['localhost:9200']),
    timeout_ms: z.coerce.number().int().positive().default(10_000),
    /** 0 tries every node. */
    attempt_limit: z.coerce.number().int().min(0).default(0),
    index: z.string().min(1).default('chatevents'),
    doctype: z.string().min(1).default('chatevent'),
    decode_offload_bytes: z.coerce.number().int().min(0).default(1024 * 1024),
  }).default({}),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    directory: z.string().min(1).default('./logs'),
    flush_interval_ms: z.coerce.number().int().positive().default(5000),
    system_rotate_bytes: z.coerce.number().int().min(0).default(1_000_000),
    /** Rotated system log copies kept; every copy is kept when unset. */
    system_rotated_files: z.coerce.number().int().min(0).optional(),
  }).default({}),
});

export type ChatscribeConfig = z.infer<typeof configSchema>;

function unquote(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value.endsWith(first)) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/**
 * Minimal YAML reader for the flat config layout: top-level sections
 * holding indented `key: value` scalars and `key:` lists of `- item`s.
 * Not a general-purpose YAML parser.
 */
export function parseSimpleYaml(content: string): YamlSections {
  const result: YamlSections = {};
  let section: Record<string, YamlValue> | null = null;
  let listKey: string | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('#')) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      const name = line.split(':')[0]?.trim() ?? '';
      section = {};
      result[name] = section;
      listKey = null;
      continue;
    }
    if (!section) continue;

    // List item under the last `key:` with no inline value
    if (trimmed.startsWith('- ')) {
      const list = listKey === null ? undefined : section[listKey];
      if (Array.isArray(list)) list.push(unquote(trimmed.slice(2).trim()));
      continue;
    }

    const colonIdx = trimmed.indexOf(':');
    if (colonIdx === -1) continue;
    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === '' || value === '[]') {
      section[key] = [];
      listKey = key;
    } else if (value === 'true' || value === 'false') {
      section[key] = value === 'true';
      listKey = null;
    } else {
      section[key] = unquote(value);
      listKey = null;
    }
  }

  return result;
}

function applyEnvOverrides(sections: YamlSections, env: NodeJS.ProcessEnv): void {
  const sectionOf = (name: string): Record<string, YamlValue> => {
    const existing = sections[name];
    if (existing) return existing;
    const created: Record<string, YamlValue> = {};
    sections[name] = created;
    return created;
  };

  const host = env['HOST'];
  const port = env['PORT'];
  const level = env['LOG_LEVEL'];
  const nodes = env['STORE_NODES'];

  if (host) sectionOf('server')['host'] = host;
  if (port) sectionOf('server')['port'] = port;
  if (level) sectionOf('logging')['level'] = level;
  if (nodes) sectionOf('store')['nodes'] = csv(nodes);
}

export interface LoadConfigOptions {
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Loads configuration from `config/chatscribe.yaml` (or `path`), applies
 * environment overrides and validates the result.
 *
 * A missing or unreadable file falls back to defaults. Values that fail
 * validation throw a ZodError.
 */
export function loadConfig(options: LoadConfigOptions = {}): ChatscribeConfig {
  const filePath = options.path ?? resolve(process.cwd(), 'config', 'chatscribe.yaml');

  let sections: YamlSections;
  try {
    sections = parseSimpleYaml(readFileSync(filePath, 'utf-8'));
  } catch {
    sections = {};
  }

  applyEnvOverrides(sections, options.env ?? process.env);
  return configSchema.parse(sections);
}
