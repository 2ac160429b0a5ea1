import { sanitizeSessionName } from '../lib/name.js';
import {
  SessionCreateFailedError,
  SessionNotFoundError,
  toArborError,
} from '../lib/errors.js';
import type { SessionBackend, SessionKind } from '../types/session.js';

export const DEFAULT_SESSION_PREFIX = 'arbor';
const DETACHED_NAME = 'detached';
const TERMINAL_SUFFIX = '-terminal';

/**
 * Session bookkeeping on top of a multiplexer backend.
 *
 * The multiplexer owns the truth: other terminals, other arbor instances and
 * the user's own shell create and kill sessions behind our back. `known` is a
 * display cache only; every attach, kill and rename asks the backend first.
 *
 * Name derivation is lossy (`fix/a` and `fix-a` share a session). Accepted.
 */
export class SessionRegistry {
  private readonly known = new Map<string, boolean>();
  readonly prefix: string;

  constructor(
    private readonly backend: SessionBackend,
    prefix: string = DEFAULT_SESSION_PREFIX,
  ) {
    this.prefix = sanitizeSessionName(prefix) || DEFAULT_SESSION_PREFIX;
  }

  deriveName(branch: string, kind: SessionKind): string {
    const base = `${this.prefix}-${sanitizeSessionName(branch) || DETACHED_NAME}`;
    return kind === 'terminal' ? `${base}${TERMINAL_SUFFIX}` : base;
  }

  /** Last observed existence, for rendering. Never use for decisions. */
  cached(name: string): boolean | undefined {
    return this.known.get(name);
  }

  async exists(name: string): Promise<boolean> {
    const found = await this.backend.hasSession(name);
    this.known.set(name, found);
    return found;
  }

  async create(name: string, workingDirectory: string, startCommand?: string): Promise<void> {
    try {
      await this.backend.newSession(name, workingDirectory, startCommand || undefined);
    } catch (err) {
      throw new SessionCreateFailedError(name, toArborError(err).message);
    }
    this.known.set(name, true);
  }

  /** Blocks until the user detaches (outside tmux) or the client has switched (inside). */
  async attach(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      throw new SessionNotFoundError(name);
    }
    try {
      await this.backend.attachSession(name);
    } catch (err) {
      if (!(await this.exists(name))) throw new SessionNotFoundError(name);
      throw toArborError(err);
    }
  }

  async kill(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      throw new SessionNotFoundError(name);
    }
    try {
      await this.backend.killSession(name);
    } catch (err) {
      // Lost a race with another killer
      if (!(await this.exists(name))) throw new SessionNotFoundError(name);
      throw toArborError(err);
    }
    this.known.set(name, false);
  }

  async rename(oldName: string, newName: string): Promise<void> {
    if (!(await this.exists(oldName))) {
      throw new SessionNotFoundError(oldName);
    }
    await this.backend.renameSession(oldName, newName);
    this.known.set(oldName, false);
    this.known.set(newName, true);
  }

  /** Sessions carrying the prefix. Each iteration re-queries the multiplexer. */
  async *listAll(prefix: string = this.prefix): AsyncGenerator<string> {
    const names = await this.backend.listSessions();
    for (const name of names) {
      if (name === prefix || name.startsWith(`${prefix}-`)) {
        yield name;
      }
    }
  }
}
