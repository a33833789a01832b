import { v4 as uuidv4 } from 'uuid';
import { SessionExistsError, SessionNotFoundError } from './errors';
import { assertSessionName } from './path-safety';
import { Session, SessionRuntime } from './session';

export function generateSessionName(): string {
  return uuidv4().replace(/-/g, '');
}

/**
 * Owns the live sessions of one engine. A name belongs to at most one live
 * session; it can be used again once that session is closed.
 */
export class SessionManager {
  private sessions: Map<string, Session>;
  private opening: Set<string>;
  private runtime: SessionRuntime;
  private baseDir: string;

  constructor(runtime: SessionRuntime, baseDir: string) {
    this.sessions = new Map();
    this.opening = new Set();
    this.runtime = runtime;
    this.baseDir = baseDir;
  }

  async create(name: string = generateSessionName()): Promise<Session> {
    assertSessionName(name);
    if (this.sessions.has(name) || this.opening.has(name)) {
      throw new SessionExistsError(name);
    }

    this.opening.add(name);
    try {
      const session = await Session.open(name, this.baseDir, this.runtime);
      this.sessions.set(name, session);
      return session;
    } finally {
      this.opening.delete(name);
    }
  }

  has(name: string): boolean {
    return this.sessions.has(name);
  }

  get(name: string): Session {
    const session = this.sessions.get(name);
    if (!session) {
      throw new SessionNotFoundError(name);
    }
    return session;
  }

  list(): string[] {
    return Array.from(this.sessions.keys());
  }

  /** Deletes the workspace on the host, then forgets the session. */
  async close(session: Session): Promise<void> {
    if (this.sessions.get(session.name) !== session) {
      throw new SessionNotFoundError(session.name);
    }
    await session.destroy();
    this.sessions.delete(session.name);
  }

  async closeAll(): Promise<void> {
    for (const session of Array.from(this.sessions.values())) {
      try {
        await this.close(session);
      } catch (error) {
        this.runtime.logger.error(`Error closing session ${session.name}:`, error);
      }
    }
  }
}
