import { appendFile, mkdir, rename, rm, stat } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { join } from 'node:path';

export interface LogFile {
  readonly path: string;
  write(text: string): Promise<void>;
  close(): Promise<void>;
}

export const DEFAULT_ROTATE_LENGTH = 1_000_000;

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

/** `2026-01-05` in UTC → `2026_01_05`. */
export function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10).replaceAll('-', '_');
}

/**
 * Append-only file whose writes and rotations run one at a time,
 * in call order.
 */
abstract class QueuedLogFile implements LogFile {
  readonly path: string;
  private tail: Promise<void> = Promise.resolve();
  private directoryReady = false;

  constructor(
    name: string,
    private readonly directory: string,
  ) {
    this.path = join(directory, name);
  }

  write(text: string): Promise<void> {
    return this.enqueue(async () => {
      if (!this.directoryReady) {
        await mkdir(this.directory, { recursive: true });
        this.directoryReady = true;
      }
      await this.append(text);
    });
  }

  async close(): Promise<void> {
    await this.tail;
  }

  protected abstract append(text: string): Promise<void>;

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.tail.then(task);
    // the caller sees the failure through `run`; the queue itself moves on
    this.tail = run.catch(() => undefined);
    return run;
  }
}

/**
 * Log file rotated when the UTC day changes: the current file is renamed
 * to `<name>.YYYY_MM_DD` for the day it covered. If that name is already
 * taken the file keeps growing instead.
 */
export class DailyLogFile extends QueuedLogFile {
  private day: string | null = null;

  constructor(
    name: string,
    directory: string,
    private readonly now: () => Date = () => new Date(),
  ) {
    super(name, directory);
  }

  protected async append(text: string): Promise<void> {
    const today = dayKey(this.now());

    if (this.day === null) {
      const existing = await statOrNull(this.path);
      this.day = existing ? dayKey(existing.mtime) : today;
    }

    if (today !== this.day) {
      await this.rotate(this.day);
      this.day = today;
    }

    await appendFile(this.path, text, 'utf-8');
  }

  private async rotate(day: string): Promise<void> {
    const target = `${this.path}.${day}`;
    if (await statOrNull(target)) return;
    if (await statOrNull(this.path)) {
      await rename(this.path, target);
    }
  }
}

export interface SizeRotationOptions {
  /** Rotate once the file reaches this many bytes. 0 disables rotation. */
  rotateLength?: number;
  /** Rotated copies to keep; older ones are deleted. Unlimited when omitted. */
  maxRotatedFiles?: number;
}

/**
 * Log file rotated by size: `<name>.N` shifts to `<name>.N+1` and the
 * live file becomes `<name>.1`.
 */
export class SizeRotatedLogFile extends QueuedLogFile {
  private size: number | null = null;
  private readonly rotateLength: number;
  private readonly maxRotatedFiles: number | undefined;

  constructor(name: string, directory: string, options: SizeRotationOptions = {}) {
    super(name, directory);
    this.rotateLength = options.rotateLength ?? DEFAULT_ROTATE_LENGTH;
    this.maxRotatedFiles = options.maxRotatedFiles;
  }

  protected async append(text: string): Promise<void> {
    if (this.size === null) {
      this.size = (await statOrNull(this.path))?.size ?? 0;
    }

    await appendFile(this.path, text, 'utf-8');
    this.size += Buffer.byteLength(text, 'utf-8');

    if (this.rotateLength > 0 && this.size >= this.rotateLength) {
      await this.rotate();
      this.size = 0;
    }
  }

  private async rotate(): Promise<void> {
    let highest = 0;
    while (await statOrNull(`${this.path}.${highest + 1}`)) {
      highest++;
    }

    for (let i = highest; i >= 1; i--) {
      const from = `${this.path}.${i}`;
      if (this.maxRotatedFiles !== undefined && i >= this.maxRotatedFiles) {
        await rm(from, { force: true });
      } else {
        await rename(from, `${this.path}.${i + 1}`);
      }
    }

    if (this.maxRotatedFiles === 0) {
      await rm(this.path, { force: true });
    } else {
      await rename(this.path, `${this.path}.1`);
    }
  }
}
