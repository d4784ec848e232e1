import type { ChatEvent } from '../../domain/index.js';
import { formatEventLine } from '../../domain/index.js';
import type { Sink } from './sink.js';
import type { LogFile } from './log-file.js';
import { DailyLogFile, SizeRotatedLogFile, DEFAULT_ROTATE_LENGTH } from './log-file.js';

export const SYSTEM_LOG_NAME = 'system.logs';
export const UNKNOWN_CHANNEL_PREFIX = '-- Received message from unknown channel:\n\t';

export interface MultiChannelFileSinkOptions {
  directory: string;
  channels: readonly string[];
  /** Size at which `system.logs` rotates. */
  systemRotateLength?: number;
  /** Rotated `system.logs` copies to keep. Unlimited when omitted. */
  systemRotatedFiles?: number;
  now?: () => Date;
  /** Overrides how files are opened; used by tests. */
  openChannelFile?: (channel: string, directory: string) => LogFile;
  openSystemFile?: (directory: string) => LogFile;
}

/**
 * Writes each configured channel to its own daily-rotated file.
 *
 * Everything else goes to a size-rotated `system.logs`: channel-less
 * system events as-is, and events from channels that were not configured
 * behind an "unknown channel" marker.
 */
export class MultiChannelFileSink implements Sink {
  readonly name = 'file';
  private readonly channelFiles = new Map<string, LogFile>();
  private readonly systemFile: LogFile;

  constructor(options: MultiChannelFileSinkOptions) {
    const { directory, now } = options;
    const openChannel = options.openChannelFile
      ?? ((channel: string, dir: string) => new DailyLogFile(channel, dir, now));
    const openSystem = options.openSystemFile
      ?? ((dir: string) => new SizeRotatedLogFile(SYSTEM_LOG_NAME, dir, {
        rotateLength: options.systemRotateLength ?? DEFAULT_ROTATE_LENGTH,
        maxRotatedFiles: options.systemRotatedFiles,
      }));

    this.systemFile = openSystem(directory);
    for (const channel of options.channels) {
      this.channelFiles.set(channel, openChannel(channel, directory));
    }
  }

  get channels(): string[] {
    return [...this.channelFiles.keys()];
  }

  async log(event: ChatEvent): Promise<void> {
    const line = `${formatEventLine(event)}\n`;

    const channelFile = event.channel === null ? undefined : this.channelFiles.get(event.channel);
    if (channelFile) {
      await channelFile.write(line);
      return;
    }

    await this.systemFile.write(event.channel === null ? line : `${UNKNOWN_CHANNEL_PREFIX}${line}`);
  }

  async close(): Promise<void> {
    await Promise.all([
      this.systemFile.close(),
      ...[...this.channelFiles.values()].map((file) => file.close()),
    ]);
  }

  toString(): string {
    return `File sink for channels ${this.channels.join(', ')}`;
  }
}
