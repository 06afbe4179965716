import { randomUUID } from 'node:crypto';

import {
  type JsonObject,
  type JsonValue,
  type Logger,
  type MessageRole,
  type RecordStore,
  type Result,
  type SessionMessage,
  KeyedMutex,
  SESSION_DEFAULTS,
  Session,
  SessionNotFoundError,
  err,
  sessionSnapshotSchema,
  errorMessage,
  ok
} from '@helix/core';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SessionStoreOptions {
  records: RecordStore;
  logger: Logger;
  maxSessionAgeMs?: number;
  now?: () => Date;
  createId?: () => string;
}

export interface SessionStats {
  totalSessions: number;
  /** Active sessions accessed in the last 24 hours. */
  activeToday: number;
  totalMessages: number;
  avgMessagesPerSession: number;
}

type SessionResult<T> = Promise<Result<T, SessionNotFoundError>>;

/**
 * Owns every Session in the process. Callers receive copies; mutations are
 * applied to a draft, persisted, and only then published to the cache, all
 * under a per-session FIFO lock.
 */
export class SessionStore {
  private readonly cache = new Map<string, Session>();
  private readonly locks = new KeyedMutex();
  private readonly records: RecordStore;
  private readonly logger: Logger;
  private readonly maxSessionAgeMs: number;
  private readonly now: () => Date;
  private readonly createId: () => string;

  public constructor(options: SessionStoreOptions) {
    this.records = options.records;
    this.logger = options.logger.child({ component: 'session-store' });
    this.maxSessionAgeMs = options.maxSessionAgeMs ?? SESSION_DEFAULTS.MAX_AGE_MS;
    this.now = options.now ?? (() => new Date());
    this.createId = options.createId ?? randomUUID;
  }

  /** Loads active sessions from durable storage into the cache. */
  public async start(): Promise<void> {
    let loaded = 0;
    for (const id of await this.records.list()) {
      const session = await this.scanStored(id);
      if (session?.active) {
        this.cache.set(id, session);
        loaded += 1;
      }
    }
    this.logger.info({ loaded }, 'Sessions loaded');
  }

  public async close(): Promise<void> {
    this.cache.clear();
  }

  public async create(ownerId?: string): Promise<Session> {
    const session = Session.create({ id: this.createId(), ownerId, now: this.now() });
    await this.locks.runExclusive(session.id, async () => {
      await this.records.put(session.id, session.toSnapshot());
      this.cache.set(session.id, session);
    });
    this.logger.info({ sessionId: session.id, ownerId: session.ownerId }, 'Session created');
    return session.clone();
  }

  public async get(id: string): SessionResult<Session> {
    const result = await this.mutate(id, () => undefined);
    return result.ok ? ok(result.value.session) : result;
  }

  /** Returns the active session for `id`, or a new session under a fresh id. */
  public async getOrCreate(id?: string, ownerId?: string): Promise<Session> {
    if (id) {
      const existing = await this.get(id);
      if (existing.ok) return existing.value;
    }
    return this.create(ownerId);
  }

  public async appendMessage(
    id: string,
    role: MessageRole,
    content: string,
    metadata: JsonObject = {}
  ): SessionResult<SessionMessage> {
    const result = await this.mutate(id, (draft, now) => draft.appendMessage(role, content, metadata, now));
    return result.ok ? ok(result.value.value) : result;
  }

  public async setContext(id: string, key: string, value: JsonValue): SessionResult<void> {
    const result = await this.mutate(id, (draft, now) => draft.setContext(key, value, now));
    return result.ok ? ok(undefined) : result;
  }

  /** Sets several context keys in one persisted update; all or none are written. */
  public async updateContext(id: string, entries: JsonObject): SessionResult<void> {
    const result = await this.mutate(id, (draft, now) => {
      for (const [key, value] of Object.entries(entries)) {
        draft.setContext(key, value, now);
      }
    });
    return result.ok ? ok(undefined) : result;
  }

  /** One context value (null when unset), or the whole context object without a key. */
  public async getContext(id: string, key?: string): SessionResult<JsonValue | null> {
    const result = await this.get(id);
    if (!result.ok) return result;
    return ok(key === undefined ? result.value.contextEntries() : result.value.getContext(key));
  }

  public async recentMessages(id: string, limit: number): SessionResult<readonly SessionMessage[]> {
    const result = await this.get(id);
    return result.ok ? ok(result.value.recentMessages(limit)) : result;
  }

  /** Soft delete: the session is deactivated on storage and dropped from the cache. */
  public async delete(id: string): SessionResult<void> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.loadActive(id);
      if (!current) return err(new SessionNotFoundError(id));

      const draft = current.clone();
      draft.deactivate(this.now());
      await this.records.put(id, draft.toSnapshot());
      this.cache.delete(id);
      this.logger.info({ sessionId: id }, 'Session deleted');
      return ok(undefined);
    });
  }

  /**
   * Physically removes active sessions idle for longer than `maxAgeMs`.
   * Returns the removed ids; a second sweep with the same clock removes nothing.
   */
  public async sweepExpired(maxAgeMs: number = this.maxSessionAgeMs): Promise<string[]> {
    const removed: string[] = [];
    const cutoff = this.now().getTime() - maxAgeMs;

    for (const id of await this.records.list()) {
      await this.locks.runExclusive(id, async () => {
        const session = await this.scanStored(id);
        if (!session?.active || session.lastAccessedAt.getTime() >= cutoff) return;

        await this.records.delete(id);
        this.cache.delete(id);
        removed.push(id);
      });
    }

    if (removed.length > 0) {
      this.logger.info({ removed: removed.length }, 'Expired sessions removed');
    }
    return removed;
  }

  public async stats(): Promise<SessionStats> {
    const now = this.now().getTime();
    let totalSessions = 0;
    let activeToday = 0;
    let totalMessages = 0;

    for (const id of await this.records.list()) {
      const session = this.cache.get(id) ?? (await this.scanStored(id));
      if (!session?.active) continue;

      totalSessions += 1;
      totalMessages += session.messageCount;
      if (now - session.lastAccessedAt.getTime() < DAY_MS) activeToday += 1;
    }

    return {
      totalSessions,
      activeToday,
      totalMessages,
      avgMessagesPerSession: totalSessions > 0 ? Math.round((totalMessages / totalSessions) * 100) / 100 : 0
    };
  }

  private async mutate<T>(
    id: string,
    apply: (draft: Session, now: Date) => T
  ): SessionResult<{ session: Session; value: T }> {
    return this.locks.runExclusive(id, async () => {
      const current = await this.loadActive(id);
      if (!current) return err(new SessionNotFoundError(id));

      const now = this.now();
      const draft = current.clone();
      const value = apply(draft, now);
      draft.touch(now);

      await this.records.put(id, draft.toSnapshot());
      this.cache.set(id, draft);
      return ok({ session: draft.clone(), value });
    });
  }

  /**
   * The freshest active copy of a session. A stored snapshot newer than the
   * cached one (written by another process sharing the store) replaces it, so a
   * write never goes over a newer snapshot.
   */
  private async loadActive(id: string): Promise<Session | null> {
    const cached = this.cache.get(id);
    const stored = await this.readStored(id);

    if (!stored) {
      if (cached) {
        this.cache.delete(id);
        this.logger.warn({ sessionId: id }, 'Session vanished from storage');
      }
      return null;
    }

    if (cached && cached.lastAccessedAt.getTime() >= stored.lastAccessedAt.getTime() && cached.active) {
      return cached;
    }

    if (cached) {
      this.logger.debug({ sessionId: id }, 'Reloaded newer stored session');
    }
    if (!stored.active) {
      this.cache.delete(id);
      return null;
    }
    this.cache.set(id, stored);
    return stored;
  }

  /**
   * Reads one stored session. A record that is not a valid snapshot counts as
   * missing; storage errors propagate to the caller.
   */
  private async readStored(id: string): Promise<Session | null> {
    const raw = await this.records.get(id);
    if (raw === null) return null;

    const parsed = sessionSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn({ sessionId: id, error: parsed.error.message }, 'Skipping malformed session record');
      return null;
    }
    return Session.fromSnapshot(parsed.data);
  }

  /** `readStored` for whole-store scans, which skip records they cannot read. */
  private async scanStored(id: string): Promise<Session | null> {
    try {
      return await this.readStored(id);
    } catch (error) {
      this.logger.warn({ sessionId: id, error: errorMessage(error) }, 'Skipping unreadable session record');
      return null;
    }
  }
}
