/**
 * Ordered set of the source chats being relayed
 *
 * Shared between the transport (which drops updates from other chats) and
 * the admin surface (which can add chats while the service runs).
 */
export class SourceChatList {
  private readonly ids: number[] = [];

  constructor(initial: Iterable<number> = []) {
    for (const id of initial) {
      this.add(id);
    }
  }

  /**
   * @returns false when the chat was already listed
   */
  add(id: number): boolean {
    if (this.ids.includes(id)) {
      return false;
    }
    this.ids.push(id);
    return true;
  }

  has(id: number): boolean {
    return this.ids.includes(id);
  }

  list(): number[] {
    return [...this.ids];
  }

  get size(): number {
    return this.ids.length;
  }

  toString(): string {
    return this.ids.join(',');
  }
}
