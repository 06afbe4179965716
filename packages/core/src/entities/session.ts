import { z } from 'zod';

import { type JsonObject, type JsonValue, assertJsonValue, cloneJson, jsonObjectSchema } from '../utils/json';

export const ANONYMOUS_OWNER = 'anonymous';

export type MessageRole = 'user' | 'assistant' | 'system';

export interface SessionMessage {
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: Date;
  readonly metadata: Readonly<JsonObject>;
}

export const sessionSnapshotSchema = z.object({
  id: z.string().min(1),
  ownerId: z.string().min(1),
  createdAt: z.string().datetime(),
  lastAccessedAt: z.string().datetime(),
  active: z.boolean(),
  messages: z.array(z.object({
    role: z.enum(['user', 'assistant', 'system']),
    content: z.string(),
    timestamp: z.string().datetime(),
    metadata: jsonObjectSchema
  })),
  context: jsonObjectSchema
});

/** Durable, JSON-only form of a session. */
export type SessionSnapshot = z.infer<typeof sessionSnapshotSchema>;

function freezeMessage(message: SessionMessage): SessionMessage {
  return Object.freeze({ ...message, metadata: Object.freeze(cloneJson(message.metadata)) });
}

/**
 * Conversation state for one caller. The message log is append-only and the
 * last-access timestamp never moves backwards. Instances are owned by the
 * SessionStore; everyone else receives copies.
 */
export class Session {
  private constructor(
    public readonly id: string,
    public readonly ownerId: string,
    public readonly createdAt: Date,
    private lastAccess: Date,
    private isActive: boolean,
    private readonly log: SessionMessage[],
    private readonly context: JsonObject
  ) { }

  public static create(input: { id: string; ownerId?: string | undefined; now: Date }): Session {
    return new Session(
      input.id,
      input.ownerId?.trim() || ANONYMOUS_OWNER,
      new Date(input.now),
      new Date(input.now),
      true,
      [],
      {}
    );
  }

  /** Validates an untrusted record (e.g. read from storage) before rebuilding. */
  public static parseSnapshot(raw: unknown): SessionSnapshot {
    return sessionSnapshotSchema.parse(raw);
  }

  public static fromSnapshot(snapshot: SessionSnapshot): Session {
    const messages = snapshot.messages.map((message) => freezeMessage({
      role: message.role,
      content: message.content,
      timestamp: new Date(message.timestamp),
      metadata: message.metadata
    }));

    return new Session(
      snapshot.id,
      snapshot.ownerId,
      new Date(snapshot.createdAt),
      new Date(snapshot.lastAccessedAt),
      snapshot.active,
      messages,
      cloneJson(snapshot.context)
    );
  }

  public get lastAccessedAt(): Date {
    return new Date(this.lastAccess);
  }

  public get active(): boolean {
    return this.isActive;
  }

  public get messages(): readonly SessionMessage[] {
    return Object.freeze([...this.log]);
  }

  public get messageCount(): number {
    return this.log.length;
  }

  public recentMessages(limit: number): readonly SessionMessage[] {
    return limit <= 0 ? [] : Object.freeze(this.log.slice(-limit));
  }

  public touch(now: Date): void {
    if (now.getTime() > this.lastAccess.getTime()) {
      this.lastAccess = new Date(now);
    }
  }

  public appendMessage(role: MessageRole, content: string, metadata: JsonObject, now: Date): SessionMessage {
    assertJsonValue('metadata', metadata);
    const message = freezeMessage({ role, content, timestamp: new Date(now), metadata });
    this.log.push(message);
    this.touch(now);
    return message;
  }

  public setContext(key: string, value: JsonValue, now: Date): void {
    assertJsonValue(`context.${key}`, value);
    this.context[key] = cloneJson(value);
    this.touch(now);
  }

  public getContext(key: string): JsonValue | null {
    const value = this.context[key];
    return value === undefined ? null : cloneJson(value);
  }

  public contextEntries(): JsonObject {
    return cloneJson(this.context);
  }

  public deactivate(now: Date): void {
    this.isActive = false;
    this.touch(now);
  }

  public clone(): Session {
    return Session.fromSnapshot(this.toSnapshot());
  }

  public toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      ownerId: this.ownerId,
      createdAt: this.createdAt.toISOString(),
      lastAccessedAt: this.lastAccess.toISOString(),
      active: this.isActive,
      messages: this.log.map((message) => ({
        role: message.role,
        content: message.content,
        timestamp: message.timestamp.toISOString(),
        metadata: cloneJson(message.metadata)
      })),
      context: cloneJson(this.context)
    };
  }
}
