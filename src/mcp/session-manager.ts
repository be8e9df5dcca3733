// This module holds the active session identity and its free-form key/value state.

import { randomBytes } from 'node:crypto';
import { getFallbackLogger, type LogSink } from '../utils/logger.js';

const SESSION_ID_BYTES = 16;

export type RandomSource = (size: number) => Uint8Array;

export interface SessionManagerOptions {
  logger?: LogSink;
  random?: RandomSource;
}

export class SessionManager {
  private sessionId: string | null = null;
  private readonly data = new Map<string, unknown>();
  private readonly logger: LogSink;
  private readonly random: RandomSource;

  public constructor(options: SessionManagerOptions = {}) {
    this.logger = options.logger ?? getFallbackLogger();
    this.random = options.random ?? randomBytes;
  }

  // This method replaces any existing id with 128 random bits rendered as 32 hex characters.
  public generateSessionId(): string {
    const bytes = this.random(SESSION_ID_BYTES);
    if (bytes.length !== SESSION_ID_BYTES) {
      throw new Error(`Random source returned ${bytes.length} bytes, expected ${SESSION_ID_BYTES}.`);
    }

    this.sessionId = Buffer.from(bytes).toString('hex');
    this.logger.debug({ event: 'session_generated' }, 'session_generated');
    return this.sessionId;
  }

  public getSessionId(): string | null {
    return this.sessionId;
  }

  public setSessionId(sessionId: string): void {
    this.sessionId = sessionId;
    this.logger.debug({ event: 'session_assigned' }, 'session_assigned');
  }

  public clear(): void {
    this.sessionId = null;
    this.data.clear();
    this.logger.debug({ event: 'session_cleared' }, 'session_cleared');
  }

  public set(key: string, value: unknown): void {
    this.data.set(key, value);
  }

  public get(key: string, fallback: unknown = null): unknown {
    return this.data.has(key) ? this.data.get(key) : fallback;
  }

  public has(key: string): boolean {
    return this.data.has(key);
  }

  public remove(key: string): boolean {
    return this.data.delete(key);
  }

  public all(): Record<string, unknown> {
    return Object.fromEntries(this.data);
  }
}
