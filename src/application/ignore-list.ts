/**
 * Nicknames whose channel messages are not recorded.
 * Shared between the recorder and the ignore/unignore commands.
 */
export class IgnoreList {
  private readonly nicks: Set<string>;

  constructor(initial: Iterable<string> = []) {
    this.nicks = new Set(initial);
  }

  has(nick: string): boolean {
    return this.nicks.has(nick);
  }

  /** Returns false when the nick was already ignored. */
  add(nick: string): boolean {
    if (this.nicks.has(nick)) return false;
    this.nicks.add(nick);
    return true;
  }

  /** Returns false when the nick was not ignored. */
  remove(nick: string): boolean {
    return this.nicks.delete(nick);
  }

  list(): string[] {
    return [...this.nicks];
  }
}
