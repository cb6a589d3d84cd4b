/**
 * Owns every live browser session and the "active" marker.
 *
 * One registry per server; it is passed to the dispatcher rather than held
 * in module state, so tests can run isolated instances side by side.
 */

import { randomUUID } from 'crypto';
import {
  BROWSER_KINDS,
  isBrowserKind,
  type BrowserDriver,
  type BrowserKind,
  type DriverFactory,
  type LaunchOptions,
} from './driver.js';
import { ToolError } from './errors.js';
import type { Logger } from './log.js';

export interface Session {
  id: string;
  name?: string;
  kind: BrowserKind;
  driver: BrowserDriver;
  options: LaunchOptions;
  createdAt: Date;
  lastActivity: Date;
  url?: string;
}

/** What callers get to see of a session; never the driver. */
export interface SessionInfo {
  id: string;
  name: string | null;
  kind: BrowserKind;
  url: string | null;
  createdAt: string;
  lastActivity: string;
  active: boolean;
}

export interface SessionRegistryOptions {
  createDriver: DriverFactory;
  log: Logger;
  now?: () => Date;
  newId?: () => string;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private activeId: string | null = null;
  private readonly createDriver: DriverFactory;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(options: SessionRegistryOptions) {
    this.createDriver = options.createDriver;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Start a browser and make it the active session. Nothing is recorded
   * unless the driver comes up.
   */
  async create(kind: string, options: LaunchOptions = {}, name?: string): Promise<SessionInfo> {
    const normalized = kind.trim().toLowerCase();
    if (!isBrowserKind(normalized)) {
      throw new ToolError(
        'UnsupportedBrowserKind',
        `Unsupported browser: ${kind}. Expected one of: ${BROWSER_KINDS.join(', ')}`,
      );
    }

    let driver: BrowserDriver;
    try {
      driver = await this.createDriver(normalized, options);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.error(`Failed to start ${normalized}:`, reason);
      throw new ToolError('DriverStartFailure', `Failed to start ${normalized}: ${reason}`);
    }

    const createdAt = this.now();
    const session: Session = {
      id: this.newId(),
      ...(name ? { name } : {}),
      kind: normalized,
      driver,
      options,
      createdAt,
      lastActivity: createdAt,
    };
    this.sessions.set(session.id, session);
    this.activeId = session.id;
    this.log.info(`Session ${session.id} started (${normalized}${name ? `, "${name}"` : ''})`);
    return this.describe(session);
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values(), (session) => this.describe(session));
  }

  active(): SessionInfo | undefined {
    const session = this.activeId ? this.sessions.get(this.activeId) : undefined;
    return session ? this.describe(session) : undefined;
  }

  get activeSessionId(): string | null {
    return this.activeId;
  }

  switchActive(id: string): SessionInfo {
    const session = this.get(id);
    this.activeId = session.id;
    this.log.debug(`Active session is now ${session.id}`);
    return this.describe(session);
  }

  /**
   * The explicitly named session, or the active one.
   */
  resolve(id?: string): Session {
    if (id !== undefined) return this.get(id);
    const session = this.activeId ? this.sessions.get(this.activeId) : undefined;
    if (!session) {
      throw new ToolError('NoActiveSession', 'No active browser session. Start a browser first.');
    }
    return session;
  }

  touch(id: string, url?: string): void {
    const session = this.sessions.get(id);
    if (!session) return;
    session.lastActivity = this.now();
    if (url !== undefined) session.url = url;
  }

  /**
   * Remove a session and quit its driver. Quit failures are logged, never
   * thrown: the entry is gone either way. The active marker is cleared, not
   * handed to another session.
   */
  async close(id?: string): Promise<SessionInfo> {
    const session = this.resolve(id);
    this.sessions.delete(session.id);
    if (this.activeId === session.id) {
      this.activeId = null;
    }
    const info = this.describe(session);

    try {
      await session.driver.quit();
      this.log.info(`Session ${session.id} closed`);
    } catch (err) {
      this.log.warn(`Session ${session.id} did not shut down cleanly:`, err instanceof Error ? err.message : err);
    }
    return info;
  }

  /** Shutdown sweep. Returns how many sessions were closed. */
  async closeAll(): Promise<number> {
    const ids = Array.from(this.sessions.keys());
    for (const id of ids) {
      await this.close(id);
    }
    return ids.length;
  }

  private get(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) {
      throw new ToolError('SessionNotFound', `Session ${id} not found`);
    }
    return session;
  }

  private describe(session: Session): SessionInfo {
    return {
      id: session.id,
      name: session.name ?? null,
      kind: session.kind,
      url: session.url ?? null,
      createdAt: session.createdAt.toISOString(),
      lastActivity: session.lastActivity.toISOString(),
      active: session.id === this.activeId,
    };
  }
}
