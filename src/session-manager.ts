import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { createLogger } from './logger.js';
import { ErrorCode, ErrorFactory } from './errors.js';
import type {
  CommandResult,
  HistoryEntry,
  SessionContext,
  SessionSummary
} from './types.js';

export interface SessionManagerOptions {
  maxSessions: number;
  /** 0 keeps every entry */
  historyLimit: number;
  /** seconds; 0 disables idle cleanup */
  sessionIdleTimeout: number;
  now?: () => number;
}

/** What the session table needs to know about connections. */
export interface ConnectionRegistry {
  isActive(name: string): boolean;
}

/** Lets the table close a session's shell before the session goes away. */
export interface SessionShellHandler {
  isOpen(sessionId: string): boolean;
  closeIfOpen(sessionId: string): void;
}

interface Session {
  id: string;
  name: string;
  connection: string;
  createdAt: number;
  lastActivity: number;
  history: HistoryEntry[];
  nextSequence: number;
  workingDirectory: string | null;
  environment: Map<string, string>;
  busy: boolean;
}

const EXPORT_VERSION = 1;

const errorPayloadSchema = z.object({
  code: z.nativeEnum(ErrorCode),
  kind: z.string(),
  message: z.string(),
  details: z.record(z.unknown()),
  retryable: z.boolean()
});

const historyEntrySchema = z.object({
  sequence: z.number().int().positive(),
  id: z.string(),
  connection: z.string(),
  sessionId: z.string().optional(),
  command: z.string(),
  stdout: z.string(),
  stderr: z.string(),
  exitCode: z.number().int(),
  signal: z.string().nullable(),
  durationMs: z.number().nonnegative(),
  timestamp: z.string(),
  timedOut: z.boolean(),
  truncated: z.boolean(),
  error: errorPayloadSchema.optional()
});

const sessionDocumentSchema = z.object({
  version: z.literal(EXPORT_VERSION),
  name: z.string().min(1),
  connection: z.string().min(1),
  createdAt: z.string(),
  workingDirectory: z.string().nullable(),
  environment: z.record(z.string()),
  history: z.array(historyEntrySchema)
});

export type SessionDocument = z.infer<typeof sessionDocumentSchema>;

export interface SessionSweepResult {
  removed: string[];
}

/**
 * Table of logical sessions. Each session is bound to one named connection
 * and runs at most one command at a time.
 */
export class SessionManager {
  private sessions: Map<string, Session> = new Map();
  private shells?: SessionShellHandler;
  private logger = createLogger('SessionManager');
  private readonly now: () => number;

  constructor(
    private readonly options: SessionManagerOptions,
    private readonly connections: ConnectionRegistry
  ) {
    this.now = options.now ?? Date.now;
  }

  setShellHandler(handler: SessionShellHandler): void {
    this.shells = handler;
  }

  create(name: string, connection: string): SessionSummary {
    if (!this.connections.isActive(connection)) {
      throw ErrorFactory.connectionNotFound(connection);
    }
    this.ensureCapacity();

    const now = this.now();
    const session: Session = {
      id: uuidv4(),
      name,
      connection,
      createdAt: now,
      lastActivity: now,
      history: [],
      nextSequence: 1,
      workingDirectory: null,
      environment: new Map(),
      busy: false
    };
    this.sessions.set(session.id, session);

    this.logger.info(`Created session ${session.id}`, { name, connection, total: this.sessions.size });
    return this.summarize(session);
  }

  delete(sessionId: string): void {
    this.require(sessionId);
    this.shells?.closeIfOpen(sessionId);
    this.sessions.delete(sessionId);
    this.logger.info(`Deleted session ${sessionId}`);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  get(sessionId: string): SessionSummary {
    return this.summarize(this.require(sessionId));
  }

  connectionOf(sessionId: string): string {
    return this.require(sessionId).connection;
  }

  list(): SessionSummary[] {
    return Array.from(this.sessions.values()).map(session => this.summarize(session));
  }

  /** The most recent `count` entries, oldest first. */
  history(sessionId: string, count = 20): HistoryEntry[] {
    const { history } = this.require(sessionId);
    if (count <= 0) {
      return [];
    }
    return history.slice(-count);
  }

  context(sessionId: string): SessionContext {
    const session = this.require(sessionId);
    return {
      sessionId: session.id,
      name: session.name,
      connection: session.connection,
      workingDirectory: session.workingDirectory,
      environment: Object.fromEntries(session.environment),
      historySize: session.history.length,
      lastActivity: new Date(session.lastActivity).toISOString(),
      shellOpen: this.shells?.isOpen(session.id) ?? false
    };
  }

  /**
   * Marks the session busy. A second caller is rejected, not queued, so
   * history order is the order in which commands were admitted.
   */
  acquire(sessionId: string): void {
    const session = this.require(sessionId);
    if (session.busy) {
      throw ErrorFactory.sessionBusy(sessionId);
    }
    session.busy = true;
    session.lastActivity = this.now();
  }

  release(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (!session) {
      // deleted while the command was running
      return;
    }
    session.busy = false;
    session.lastActivity = this.now();
  }

  touch(sessionId: string): void {
    this.require(sessionId).lastActivity = this.now();
  }

  record(sessionId: string, result: CommandResult): HistoryEntry {
    const session = this.require(sessionId);
    const entry: HistoryEntry = { ...result, sessionId, sequence: session.nextSequence++ };
    session.history.push(entry);

    const limit = this.options.historyLimit;
    if (limit > 0 && session.history.length > limit) {
      session.history.splice(0, session.history.length - limit);
    }
    session.lastActivity = this.now();
    return entry;
  }

  setWorkingDirectory(sessionId: string, directory: string): void {
    this.require(sessionId).workingDirectory = directory;
  }

  setEnvironment(sessionId: string, name: string, value: string): void {
    this.require(sessionId).environment.set(name, value);
  }

  unsetEnvironment(sessionId: string, name: string): void {
    this.require(sessionId).environment.delete(name);
  }

  orphanedBy(connection: string): string[] {
    return Array.from(this.sessions.values())
      .filter(session => session.connection === connection)
      .map(session => session.id);
  }

  /**
   * Deletes sessions idle for longer than the configured timeout. Busy
   * sessions are skipped; connections are left alone.
   */
  sweep(now: number = this.now()): SessionSweepResult {
    const removed: string[] = [];
    const idleLimit = this.options.sessionIdleTimeout * 1000;
    if (idleLimit <= 0) {
      return { removed };
    }

    for (const session of Array.from(this.sessions.values())) {
      if (session.busy || now - session.lastActivity <= idleLimit) {
        continue;
      }
      try {
        this.delete(session.id);
        removed.push(session.id);
      } catch (error) {
        this.logger.error(`Failed to clean up session ${session.id}`, {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    if (removed.length > 0) {
      this.logger.info(`Cleaned up ${removed.length} idle sessions`);
    }
    return { removed };
  }

  export(sessionId: string): string {
    const session = this.require(sessionId);
    const document: SessionDocument = {
      version: EXPORT_VERSION,
      name: session.name,
      connection: session.connection,
      createdAt: new Date(session.createdAt).toISOString(),
      workingDirectory: session.workingDirectory,
      environment: Object.fromEntries(session.environment),
      history: session.history.map(entry => ({ ...entry }))
    };
    return JSON.stringify(document, null, 2);
  }

  /**
   * Restores an exported session under a fresh id. The connection it names
   * must already be registered.
   */
  import(json: string): SessionSummary {
    let raw: unknown;
    try {
      raw = JSON.parse(json);
    } catch (error) {
      throw ErrorFactory.invalidParams('session_import', [
        `document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
      ]);
    }

    const parsed = sessionDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw ErrorFactory.invalidParams(
        'session_import',
        parsed.error.issues.map(issue => `${issue.path.join('.') || 'document'}: ${issue.message}`)
      );
    }

    const document = parsed.data;
    if (!this.connections.isActive(document.connection)) {
      throw ErrorFactory.connectionNotFound(document.connection);
    }
    this.ensureCapacity();

    const id = uuidv4();
    const limit = this.options.historyLimit;
    const ordered = [...document.history].sort((a, b) => a.sequence - b.sequence);
    const history = (limit > 0 ? ordered.slice(-limit) : ordered).map(entry => ({ ...entry, sessionId: id }));
    const createdAt = Date.parse(document.createdAt);
    const now = this.now();

    const session: Session = {
      id,
      name: document.name,
      connection: document.connection,
      createdAt: Number.isNaN(createdAt) ? now : createdAt,
      lastActivity: now,
      history,
      nextSequence: ordered.reduce((max, entry) => Math.max(max, entry.sequence), 0) + 1,
      workingDirectory: document.workingDirectory,
      environment: new Map(Object.entries(document.environment)),
      busy: false
    };
    this.sessions.set(id, session);

    this.logger.info(`Imported session ${id}`, { name: session.name, entries: history.length });
    return this.summarize(session);
  }

  clear(): void {
    for (const id of Array.from(this.sessions.keys())) {
      this.shells?.closeIfOpen(id);
    }
    this.sessions.clear();
  }

  private ensureCapacity(): void {
    if (this.sessions.size >= this.options.maxSessions) {
      throw ErrorFactory.sessionLimit(this.options.maxSessions);
    }
  }

  private require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw ErrorFactory.sessionNotFound(sessionId);
    }
    return session;
  }

  private summarize(session: Session): SessionSummary {
    return {
      id: session.id,
      name: session.name,
      connection: session.connection,
      createdAt: new Date(session.createdAt).toISOString(),
      lastActivity: new Date(session.lastActivity).toISOString(),
      historySize: session.history.length,
      workingDirectory: session.workingDirectory,
      busy: session.busy,
      shellOpen: this.shells?.isOpen(session.id) ?? false
    };
  }
}
