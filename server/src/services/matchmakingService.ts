/**
 * Pending invitations (challenges or rematches) as directed edges
 * from -> to. A sender has at most one outstanding invitation; offering a new
 * one replaces it.
 */
export class InvitationBook {
  private pending = new Map<string, string>(); // from -> to

  offer(from: string, to: string) {
    this.pending.set(from, to);
  }

  /** Removes the edge from -> to if it exists. False means there was nothing to answer. */
  consume(from: string, to: string): boolean {
    if (this.pending.get(from) !== to) return false;
    this.pending.delete(from);
    return true;
  }

  pendingFor(from: string): string | undefined {
    return this.pending.get(from);
  }

  /** Drops every invitation sent by or to `username`; returns how many went. */
  dropUser(username: string): number {
    let dropped = 0;
    for (const [from, to] of Array.from(this.pending.entries())) {
      if (from === username || to === username) {
        this.pending.delete(from);
        dropped++;
      }
    }
    return dropped;
  }

  get size() {
    return this.pending.size;
  }
}
