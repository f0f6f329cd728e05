/** Who is online, and through which session. At most one session per username. */
export class PresenceRegistry {
  private online = new Map<string, string>(); // username -> sessionId

  /** Claims the username for `sessionId`; false if someone already holds it. */
  markOnline(username: string, sessionId: string): boolean {
    if (this.online.has(username)) return false;
    this.online.set(username, sessionId);
    return true;
  }

  /** With a sessionId, only clears the entry if that session owns it. */
  markOffline(username: string, sessionId?: string): boolean {
    const owner = this.online.get(username);
    if (owner === undefined) return false;
    if (sessionId !== undefined && owner !== sessionId) return false;
    this.online.delete(username);
    return true;
  }

  isOnline(username: string): boolean {
    return this.online.has(username);
  }

  sessionOf(username: string): string | undefined {
    return this.online.get(username);
  }

  listOnline(): string[] {
    return Array.from(this.online.keys());
  }

  get size() {
    return this.online.size;
  }
}
