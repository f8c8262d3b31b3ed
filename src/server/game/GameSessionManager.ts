import { v4 as uuidv4 } from 'uuid';
import { GameNotFoundError, InvalidMoveError, SessionLimitError } from '../../shared/errors';
import { StartGameSchema } from '../../shared/validation/schemas';
import { config } from '../config';
import { createComponentLogger } from '../utils/logger';
import { GameSession, type GameSessionSettings } from './GameSession';

const log = createComponentLogger('GameSessionManager');

export interface GameSessionManagerOptions {
  settings?: GameSessionSettings;
  maxSessions?: number;
  idFactory?: () => string;
  clock?: () => number;
}

/**
 * In-memory registry of game sessions.
 *
 * Each owner has at most one open run. Actions on a session should go
 * through `withSession`, which queues them so that two actions on the same
 * board never interleave.
 */
export class GameSessionManager {
  private readonly sessions = new Map<string, GameSession>();
  private readonly queues = new Map<string, Promise<void>>();
  private readonly settings: GameSessionSettings;
  private readonly maxSessions: number;
  private readonly idFactory: () => string;
  private readonly clock: (() => number) | undefined;

  constructor(options: GameSessionManagerOptions = {}) {
    this.settings = options.settings ?? config.game;
    this.maxSessions = options.maxSessions ?? config.sessions.maxSessions;
    this.idFactory = options.idFactory ?? (() => uuidv4());
    this.clock = options.clock;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Return the owner's open run, or start a new one. With `forceNew` an
   * open run is abandoned first.
   */
  public startSession(input: unknown): GameSession {
    const parsed = StartGameSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new InvalidMoveError(issue ? issue.message : 'Invalid start request', {
        path: issue ? issue.path.join('.') : '',
      });
    }
    const { ownerId, forceNew, seed } = parsed.data;

    const existing = this.getActiveSessionFor(ownerId);
    if (existing && !forceNew) {
      return existing;
    }
    if (existing) {
      existing.abandon();
    }

    this.ensureCapacity();

    const session = new GameSession({
      id: this.idFactory(),
      ownerId,
      settings: this.settings,
      seed,
      ...(this.clock && { clock: this.clock }),
    });
    this.sessions.set(session.id, session);
    return session;
  }

  public findSession(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  public getSession(gameId: string): GameSession {
    const session = this.sessions.get(gameId);
    if (!session) {
      throw new GameNotFoundError(gameId);
    }
    return session;
  }

  public getActiveSessionFor(ownerId: string): GameSession | undefined {
    for (const session of this.sessions.values()) {
      if (session.ownerId === ownerId && session.isOpen()) {
        return session;
      }
    }
    return undefined;
  }

  public removeSession(gameId: string): boolean {
    this.queues.delete(gameId);
    return this.sessions.delete(gameId);
  }

  /**
   * Run `operation` against a session once every earlier operation queued
   * for the same session has settled. An unknown id rejects with
   * GameNotFoundError.
   */
  public withSession<T>(
    gameId: string,
    operation: (session: GameSession) => T | Promise<T>
  ): Promise<T> {
    const session = this.sessions.get(gameId);
    if (!session) {
      return Promise.reject(new GameNotFoundError(gameId));
    }
    const previous = this.queues.get(gameId) ?? Promise.resolve();

    const run = previous.then(() => operation(session));
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.queues.get(gameId) === tail) {
          this.queues.delete(gameId);
        }
      });
    this.queues.set(gameId, tail);

    return run;
  }

  /**
   * Drop finished runs (lost or abandoned) when the registry is full; refuse
   * new sessions if that frees nothing.
   */
  private ensureCapacity(): void {
    if (this.sessions.size < this.maxSessions) {
      return;
    }

    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (!session.isOpen() && !this.queues.has(id)) {
        this.sessions.delete(id);
        evicted += 1;
      }
    }

    if (evicted > 0) {
      log.info('Evicted finished sessions', { evicted, remaining: this.sessions.size });
    }
    if (this.sessions.size >= this.maxSessions) {
      log.warn('Session limit reached', { maxSessions: this.maxSessions });
      throw new SessionLimitError(this.maxSessions);
    }
  }
}
