// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import Database from 'better-sqlite3';
import type {
  Agent,
  AgentStatus,
  LogEntry,
  PendingRequest,
  Permission,
  Resolution,
  SystemState,
  Timestamp,
  UnsealedLogEntry,
} from '../types.js';
import { chainTip, sealLogEntry } from '../audit/chain.js';
import { InvalidConfigError } from '../errors.js';
import type {
  LogEntryFilter,
  ResolveOutcome,
  StorageAdapter,
  StorageAdapterOptions,
} from './adapter.js';
import {
  AgentSchema,
  LogEntrySchema,
  PendingRequestSchema,
  PermissionSchema,
  SystemStateSchema,
  parseStoredJson,
} from './schemas.js';

/** Configuration for the SQLite storage adapter. */
export interface SQLiteStorageConfig extends StorageAdapterOptions {
  /** A file path (":memory:" for a private in-memory database) or an open better-sqlite3 handle. */
  database: string | Database.Database;
  /** Table name prefix. Defaults to "gate_". */
  tablePrefix?: string;
}

const PREFIX_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * SQLite-backed implementation of StorageAdapter, on better-sqlite3.
 *
 * Every record is stored as a JSON `data` column next to the handful of
 * columns the adapter filters and orders on.  Rows are validated with zod on
 * the way out.
 *
 * Table schema:
 *   {prefix}agents            agent records
 *   {prefix}permissions       permission grants, creation order by rowid
 *   {prefix}system_state      single row (id = 1) holding the kill switch
 *   {prefix}pending_requests  escalated decisions
 *   {prefix}audit_log         append-only decision log, chain order by seq
 *
 * Writers that touch more than one row run inside an IMMEDIATE transaction,
 * so several processes sharing one database file serialise on the write lock.
 */
export class SQLiteStorageAdapter implements StorageAdapter {
  readonly #db: Database.Database;
  readonly #prefix: string;
  readonly #hashChain: boolean;
  readonly #now: () => Date;

  constructor(config: SQLiteStorageConfig) {
    const prefix = config.tablePrefix ?? 'gate_';
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new InvalidConfigError([`tablePrefix: "${prefix}" is not a valid SQL identifier prefix`]);
    }
    this.#db = typeof config.database === 'string' ? new Database(config.database) : config.database;
    this.#prefix = prefix;
    this.#hashChain = config.hashChain ?? true;
    this.#now = config.now ?? (() => new Date());
  }

  #table(name: string): string {
    return `${this.#prefix}${name}`;
  }

  // -------------------------------------------------------------------------
  // Agents
  // -------------------------------------------------------------------------

  async saveAgent(agent: Agent): Promise<void> {
    this.#db
      .prepare(`INSERT OR REPLACE INTO ${this.#table('agents')} (id, data) VALUES (?, ?)`)
      .run(agent.id, JSON.stringify(agent));
  }

  async getAgent(agentId: string): Promise<Agent | undefined> {
    return this.#readAgent(agentId);
  }

  async setAgentStatus(
    agentId: string,
    status: AgentStatus,
    updatedAt: Timestamp,
  ): Promise<Agent | undefined> {
    const update = this.#db.transaction((): Agent | undefined => {
      const existing = this.#readAgent(agentId);
      if (existing === undefined) {
        return undefined;
      }
      const updated: Agent = { ...existing, status, updatedAt };
      this.#db
        .prepare(`UPDATE ${this.#table('agents')} SET data = ? WHERE id = ?`)
        .run(JSON.stringify(updated), agentId);
      return updated;
    });
    return update.immediate();
  }

  #readAgent(agentId: string): Agent | undefined {
    const raw: unknown = this.#db
      .prepare(`SELECT data FROM ${this.#table('agents')} WHERE id = ?`)
      .pluck()
      .get(agentId);
    return raw === undefined ? undefined : parseStoredJson(AgentSchema, raw, 'agent');
  }

  // -------------------------------------------------------------------------
  // Permissions
  // -------------------------------------------------------------------------

  async addPermission(permission: Permission): Promise<void> {
    this.#db
      .prepare(
        `INSERT INTO ${this.#table('permissions')} (id, agent_id, action, resource, data) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(
        permission.id,
        permission.agentId,
        permission.action,
        permission.resource,
        JSON.stringify(permission),
      );
  }

  async findPermissions(
    agentId: string,
    action: string,
    resource: string,
  ): Promise<readonly Permission[]> {
    const rows: unknown[] = this.#db
      .prepare(
        `SELECT data FROM ${this.#table('permissions')}
         WHERE agent_id = ? AND action = ? AND resource = ?
         ORDER BY rowid ASC`,
      )
      .pluck()
      .all(agentId, action, resource);
    return rows.map((raw) => parseStoredJson(PermissionSchema, raw, 'permission'));
  }

  // -------------------------------------------------------------------------
  // System state
  // -------------------------------------------------------------------------

  async getSystemState(): Promise<SystemState | undefined> {
    const raw: unknown = this.#db
      .prepare(`SELECT data FROM ${this.#table('system_state')} WHERE id = 1`)
      .pluck()
      .get();
    return raw === undefined ? undefined : parseStoredJson(SystemStateSchema, raw, 'system state');
  }

  async setSystemState(state: SystemState): Promise<void> {
    this.#db
      .prepare(`INSERT OR REPLACE INTO ${this.#table('system_state')} (id, data) VALUES (1, ?)`)
      .run(JSON.stringify(state));
  }

  // -------------------------------------------------------------------------
  // Pending requests
  // -------------------------------------------------------------------------

  async createPendingRequest(request: PendingRequest): Promise<void> {
    this.#db
      .prepare(
        `INSERT INTO ${this.#table('pending_requests')} (request_id, status, created_at, data) VALUES (?, ?, ?, ?)`,
      )
      .run(request.requestId, request.status, request.createdAt, JSON.stringify(request));
  }

  async getPendingRequest(requestId: string): Promise<PendingRequest | undefined> {
    return this.#readPending(requestId);
  }

  async listPendingRequests(): Promise<readonly PendingRequest[]> {
    const rows: unknown[] = this.#db
      .prepare(
        `SELECT data FROM ${this.#table('pending_requests')}
         WHERE status = 'pending'
         ORDER BY created_at ASC, rowid ASC`,
      )
      .pluck()
      .all();
    return rows.map((raw) => parseStoredJson(PendingRequestSchema, raw, 'pending request'));
  }

  async resolvePendingRequest(
    requestId: string,
    resolution: Resolution,
    entry: UnsealedLogEntry,
  ): Promise<ResolveOutcome> {
    const resolve = this.#db.transaction((): ResolveOutcome => {
      const current = this.#readPending(requestId);
      if (current === undefined || current.status !== 'pending') {
        return { resolved: false, current };
      }

      const request: PendingRequest = {
        ...current,
        status: resolution.status,
        resolvedBy: resolution.resolvedBy,
        resolvedAt: resolution.resolvedAt,
        ...(resolution.notes !== undefined && { notes: resolution.notes }),
      };
      const info = this.#db
        .prepare(
          `UPDATE ${this.#table('pending_requests')} SET status = ?, data = ?
           WHERE request_id = ? AND status = 'pending'`,
        )
        .run(request.status, JSON.stringify(request), requestId);
      if (info.changes !== 1) {
        return { resolved: false, current: this.#readPending(requestId) };
      }
      return { resolved: true, request, entry: this.#append(entry) };
    });
    return resolve.immediate();
  }

  #readPending(requestId: string): PendingRequest | undefined {
    const raw: unknown = this.#db
      .prepare(`SELECT data FROM ${this.#table('pending_requests')} WHERE request_id = ?`)
      .pluck()
      .get(requestId);
    return raw === undefined ? undefined : parseStoredJson(PendingRequestSchema, raw, 'pending request');
  }

  // -------------------------------------------------------------------------
  // Audit log
  // -------------------------------------------------------------------------

  async appendLogEntry(entry: UnsealedLogEntry): Promise<LogEntry> {
    const append = this.#db.transaction((): LogEntry => this.#append(entry));
    return append.immediate();
  }

  async queryLogEntries(filter?: LogEntryFilter): Promise<readonly LogEntry[]> {
    const conditions: string[] = [];
    const params: string[] = [];

    if (filter?.agentId !== undefined) {
      conditions.push('agent_id = ?');
      params.push(filter.agentId);
    }
    if (filter?.since !== undefined) {
      conditions.push('timestamp >= ?');
      params.push(filter.since);
    }
    if (filter?.until !== undefined) {
      conditions.push('timestamp <= ?');
      params.push(filter.until);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows: unknown[] = this.#db
      .prepare(`SELECT data FROM ${this.#table('audit_log')} ${where} ORDER BY timestamp ASC, seq ASC`)
      .pluck()
      .all(...params);
    return rows.map((raw) => parseStoredJson(LogEntrySchema, raw, 'log entry'));
  }

  async listLogEntries(): Promise<readonly LogEntry[]> {
    const rows: unknown[] = this.#db
      .prepare(`SELECT data FROM ${this.#table('audit_log')} ORDER BY seq ASC`)
      .pluck()
      .all();
    return rows.map((raw) => parseStoredJson(LogEntrySchema, raw, 'log entry'));
  }

  /** Must run inside a transaction: reads the chain tip, then inserts. */
  #append(entry: UnsealedLogEntry): LogEntry {
    const table = this.#table('audit_log');
    const existing: unknown = this.#db
      .prepare(`SELECT data FROM ${table} WHERE decision_id = ?`)
      .pluck()
      .get(entry.decisionId);
    if (existing !== undefined) {
      return parseStoredJson(LogEntrySchema, existing, 'log entry');
    }

    const tipRaw: unknown = this.#db
      .prepare(`SELECT data FROM ${table} ORDER BY seq DESC LIMIT 1`)
      .pluck()
      .get();
    const tip = tipRaw === undefined ? undefined : parseStoredJson(LogEntrySchema, tipRaw, 'log entry');
    const sealed = sealLogEntry(entry, chainTip(tip, this.#hashChain), this.#hashChain);

    this.#db
      .prepare(
        `INSERT INTO ${table} (id, decision_id, agent_id, timestamp, data) VALUES (?, ?, ?, ?, ?)`,
      )
      .run(sealed.id, sealed.decisionId, sealed.agentId, sealed.timestamp, JSON.stringify(sealed));
    return sealed;
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    const prefix = this.#prefix;

    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${prefix}agents (
        id TEXT PRIMARY KEY,
        data TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS ${prefix}permissions (
        id TEXT PRIMARY KEY,
        agent_id TEXT NOT NULL,
        action TEXT NOT NULL,
        resource TEXT NOT NULL,
        data TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}permissions_triple ON ${prefix}permissions(agent_id, action, resource);
      CREATE TABLE IF NOT EXISTS ${prefix}system_state (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        data TEXT NOT NULL
      );
      CREATE TABLE IF NOT EXISTS ${prefix}pending_requests (
        request_id TEXT PRIMARY KEY,
        status TEXT NOT NULL,
        created_at TEXT NOT NULL,
        data TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}pending_status ON ${prefix}pending_requests(status, created_at);
      CREATE TABLE IF NOT EXISTS ${prefix}audit_log (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        id TEXT NOT NULL UNIQUE,
        decision_id TEXT NOT NULL UNIQUE,
        agent_id TEXT NOT NULL,
        timestamp TEXT NOT NULL,
        data TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_${prefix}audit_agent ON ${prefix}audit_log(agent_id);
      CREATE INDEX IF NOT EXISTS idx_${prefix}audit_timestamp ON ${prefix}audit_log(timestamp);
    `);

    const initial: SystemState = { killSwitch: 'disabled', updatedAt: this.#now().toISOString() };
    this.#db
      .prepare(`INSERT OR IGNORE INTO ${prefix}system_state (id, data) VALUES (1, ?)`)
      .run(JSON.stringify(initial));
  }

  async disconnect(): Promise<void> {
    if (this.#db.open) {
      this.#db.close();
    }
  }

  async isHealthy(): Promise<boolean> {
    if (!this.#db.open) {
      return false;
    }
    try {
      this.#db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }
}
