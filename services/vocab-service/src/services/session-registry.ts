import { v4 as uuidv4 } from 'uuid';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { FlashcardSession } from './flashcard-session';

interface RegisteredSession {
  session: FlashcardSession;
  touchedAt: number;
}

/**
 * In-memory handles for flashcard sessions driven over HTTP. Sessions idle
 * longer than the TTL are dropped on sweep; nothing is persisted.
 */
export class SessionRegistry {
  private sessions = new Map<string, RegisteredSession>();
  private createSession: () => FlashcardSession;
  private ttlMs: number;
  private now: () => number;

  constructor(createSession: () => FlashcardSession, ttlMs: number, now: () => number = Date.now) {
    this.createSession = createSession;
    this.ttlMs = ttlMs;
    this.now = now;
  }

  create(): { id: string; session: FlashcardSession } {
    const id = uuidv4();
    const session = this.createSession();
    this.sessions.set(id, { session, touchedAt: this.now() });
    return { id, session };
  }

  get(id: string): FlashcardSession {
    const registered = this.sessions.get(id);
    if (!registered) {
      throw new NotFoundError('Flashcard session', { sessionId: id });
    }
    registered.touchedAt = this.now();
    return registered.session;
  }

  discard(id: string): boolean {
    return this.sessions.delete(id);
  }

  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let removed = 0;
    for (const [id, registered] of this.sessions) {
      if (registered.touchedAt < cutoff) {
        this.sessions.delete(id);
        removed++;
      }
    }
    if (removed > 0) {
      logger.info(`Swept ${removed} idle flashcard sessions`);
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
