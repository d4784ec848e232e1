import type { Logger } from 'pino';
import type { EventKind } from '../domain/index.js';
import { StoreError } from '../domain/index.js';
import type { DocumentManager } from '../infrastructure/store/index.js';
import type { IgnoreList } from './ignore-list.js';
import type { ChatReplier } from './replier.js';

export const DEFAULT_REPLY = 'logger and searchbot - try "help"';
export const INVALID_QUERY_REPLY = 'Invalid Query';
export const SEARCH_FAILED_REPLY = 'Something went wrong, please try again later';

/** Below this many hits, results are posted where the search was asked. */
const PUBLIC_RESULT_LIMIT = 2;
/** From this many hits on, no results are sent at all. */
const NARROW_SEARCH_LIMIT = 10;

const HELP = new Map<string, string>([
  ['search', 'search <query> - searches for messages'],
  ['ignore', 'ignore <optional: nick> - ignores you, or a given nick'],
  ['unignore', 'unignore <optional: nick> - unignores you, or a given nick'],
]);
const HELP_INDEX = 'commands: search, ignore, unignore';

export type RecordIgnoreChange = (
  kind: Extract<EventKind, 'IGNORE' | 'UNIGNORE'>,
  actor: string,
  channel: string | null,
  target: string,
) => void;

export interface CommandHandlerOptions {
  nickname: string;
  search: Pick<DocumentManager, 'filter'>;
  replier: ChatReplier;
  ignoreList: IgnoreList;
  record: RecordIgnoreChange;
  log: Logger;
}

interface Invocation {
  sender: string;
  channel: string;
  replyTo: string;
  isPrivate: boolean;
  command: string;
  args: string | null;
}

/**
 * Answers messages addressed to the bot (`<nick>: cmd args`) or sent to
 * it privately. Anything else is left alone.
 */
export class CommandHandler {
  constructor(private readonly options: CommandHandlerOptions) {}

  async handle(sender: string, channel: string, text: string): Promise<void> {
    const invocation = this.parse(sender, channel, text);
    if (!invocation) return;

    const { replier, log } = this.options;
    log.debug({ sender, command: invocation.command }, 'Handling command');

    switch (invocation.command.toLowerCase()) {
      case 'help':
        replier.say(invocation.replyTo, HELP.get(invocation.args ?? '') ?? HELP_INDEX);
        return;
      case 'search':
        await this.search(invocation);
        return;
      case 'ignore':
        replier.say(invocation.replyTo, this.ignore(invocation));
        return;
      case 'unignore':
        replier.say(invocation.replyTo, this.unignore(invocation));
        return;
      default:
        replier.say(invocation.replyTo, DEFAULT_REPLY);
    }
  }

  private parse(sender: string, channel: string, text: string): Invocation | null {
    const { nickname } = this.options;
    const isPrivate = channel === nickname;
    const prefix = `${nickname}:`;

    const addressed = text.startsWith(prefix);
    if (!isPrivate && !addressed) return null;

    const body = addressed ? text.slice(prefix.length) : text;
    const replyTo = isPrivate ? sender : channel;

    const trimmed = body.trim();
    const match = /^(\S*)\s*([\s\S]*)$/.exec(trimmed);
    const command = match?.[1] ?? '';
    const args = match?.[2] ? match[2] : null;

    return { sender, channel, replyTo, isPrivate, command, args };
  }

  private ignore({ sender, channel, isPrivate, args }: Invocation): string {
    const target = args ?? sender;
    if (!this.options.ignoreList.add(target)) {
      return `${target} is already ignored, I can't ignore ${target} any harder!`;
    }
    this.options.record('IGNORE', sender, isPrivate ? null : channel, target);
    return `I'm now ignoring ${target}`;
  }

  private unignore({ sender, channel, isPrivate, args }: Invocation): string {
    const target = args ?? sender;
    if (!this.options.ignoreList.remove(target)) {
      return `I already wasn't ignoring ${target}`;
    }
    this.options.record('UNIGNORE', sender, isPrivate ? null : channel, target);
    return `I'm paying attention to ${target} now`;
  }

  private async search({ sender, replyTo, args }: Invocation): Promise<void> {
    const { replier, log } = this.options;
    const results = this.options.search.filter(args).orderBy('-time');

    let lines: string[];
    let total: number;
    try {
      const documents = await results.materialize();
      total = await results.count();
      lines = documents.map((doc) => {
        const time = doc.getDate('time')?.toISOString() ?? '';
        return `[${time}] <${doc.getString('actor') ?? ''}> ${doc.getString('payload') ?? ''}`;
      });
    } catch (err: unknown) {
      log.warn({ err, query: args }, 'Search command failed');
      replier.say(replyTo, isInvalidQuery(err) ? INVALID_QUERY_REPLY : SEARCH_FAILED_REPLY);
      return;
    }

    if (total >= NARROW_SEARCH_LIMIT) {
      replier.say(replyTo, `${total} results returned, narrow your search`);
      return;
    }

    replier.say(replyTo, `${total} results returned`);
    const lineTarget = total < PUBLIC_RESULT_LIMIT ? replyTo : sender;
    for (const line of lines) {
      replier.say(lineTarget, line);
    }
  }
}

function isInvalidQuery(err: unknown): boolean {
  if (!(err instanceof StoreError)) return false;
  const marker = 'SearchPhaseExecutionException';
  return err.message.includes(marker) || (JSON.stringify(err.body) ?? '').includes(marker);
}
