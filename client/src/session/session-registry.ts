import type { SessionHealth } from "@brokerstream/shared";
import type { SessionManager } from "./session-manager.js";

export class SessionRegistry {
  private sessions = new Map<string, SessionManager>();

  register(session: SessionManager): void {
    if (this.sessions.has(session.channel)) {
      throw new Error(`Session already registered: ${session.channel}`);
    }
    this.sessions.set(session.channel, session);
  }

  unregister(channel: string): void {
    this.sessions.delete(channel);
  }

  get(channel: string): SessionManager | undefined {
    return this.sessions.get(channel);
  }

  list(): SessionManager[] {
    return [...this.sessions.values()];
  }

  startAll(): void {
    for (const session of this.sessions.values()) {
      session.start();
    }
  }

  /** Stops every session; they stay registered so their health can still be read. */
  stopAll(): void {
    for (const session of this.sessions.values()) {
      session.stop();
    }
  }

  healthCheck(): SessionHealth[] {
    return this.list().map((session) => session.healthCheck());
  }
}
