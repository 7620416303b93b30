import type { GuildSession } from "./guildSession.ts";

export type CreateSessionResult =
  | { created: true; session: GuildSession }
  | { created: false; reason: "already_exists" };

export class SessionRegistry {
  private readonly sessions: Map<string, GuildSession>;
  private readonly pendingGuildIds: Set<string>;

  constructor() {
    this.sessions = new Map();
    this.pendingGuildIds = new Set();
  }

  // The key is reserved before the first await, so concurrent callers see it immediately.
  async createIfAbsent(
    guildId: string,
    factory: () => Promise<GuildSession> | GuildSession
  ): Promise<CreateSessionResult> {
    if (this.sessions.has(guildId) || this.pendingGuildIds.has(guildId)) {
      return { created: false, reason: "already_exists" };
    }

    this.pendingGuildIds.add(guildId);
    try {
      const session = await factory();
      this.sessions.set(guildId, session);
      return { created: true, session };
    } finally {
      this.pendingGuildIds.delete(guildId);
    }
  }

  get(guildId: string) {
    return this.sessions.get(guildId) ?? null;
  }

  has(guildId: string) {
    return this.sessions.has(guildId) || this.pendingGuildIds.has(guildId);
  }

  isPending(guildId: string) {
    return this.pendingGuildIds.has(guildId);
  }

  remove(guildId: string, expected?: GuildSession) {
    const session = this.sessions.get(guildId) ?? null;
    if (!session) return null;
    if (expected && session !== expected) return null;
    this.sessions.delete(guildId);
    return session;
  }

  list() {
    return [...this.sessions.values()];
  }

  get size() {
    return this.sessions.size;
  }
}
