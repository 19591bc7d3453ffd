// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

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

/**
 * StorageAdapter defines the persistence contract for all decision state.
 *
 * The engine never keeps cross-request state in memory; every read and every
 * coordination point (kill switch, pending request status, audit chain tip)
 * goes through this interface so that several engine instances can share one
 * store.
 *
 * Design principles:
 *   1. All methods are async to support network-backed stores.
 *   2. Each terminal step (append a log entry, create a pending request,
 *      resolve a pending request) is ONE adapter call and must be atomic.
 *   3. `resolvePendingRequest` is a compare-and-set: it only transitions a
 *      request whose current status is still "pending".
 *   4. Log entries are append-only.  There is no update or delete method.
 *   5. `connect()` creates whatever the backend needs, including the single
 *      system-state row (kill switch "disabled").  It never overwrites an
 *      existing row.
 */
export interface StorageAdapter {
  // -------------------------------------------------------------------------
  // Agents (written by administrative tooling; the engine only flips status)
  // -------------------------------------------------------------------------

  /** Insert or replace an agent record. */
  saveAgent(agent: Agent): Promise<void>;

  /** Retrieve an agent by id. Returns undefined if not found. */
  getAgent(agentId: string): Promise<Agent | undefined>;

  /** Update an agent's status.  Returns the updated agent, or undefined if not found. */
  setAgentStatus(agentId: string, status: AgentStatus, updatedAt: Timestamp): Promise<Agent | undefined>;

  // -------------------------------------------------------------------------
  // Permissions
  // -------------------------------------------------------------------------

  /** Add a permission grant. */
  addPermission(permission: Permission): Promise<void>;

  /** All grants for the triple, in creation order. */
  findPermissions(agentId: string, action: string, resource: string): Promise<readonly Permission[]>;

  // -------------------------------------------------------------------------
  // System state
  // -------------------------------------------------------------------------

  /** The singleton row, or undefined when it was never initialised. */
  getSystemState(): Promise<SystemState | undefined>;

  /** Upsert the singleton row. */
  setSystemState(state: SystemState): Promise<void>;

  // -------------------------------------------------------------------------
  // Pending requests
  // -------------------------------------------------------------------------

  /** Persist a new pending request. */
  createPendingRequest(request: PendingRequest): Promise<void>;

  /** Retrieve a pending request (in any status) by id. */
  getPendingRequest(requestId: string): Promise<PendingRequest | undefined>;

  /** Requests whose status is still "pending", oldest first. */
  listPendingRequests(): Promise<readonly PendingRequest[]>;

  /**
   * Atomically move a request from "pending" to the resolution's status and
   * append `entry` to the audit log.  Either both happen or neither does.
   */
  resolvePendingRequest(
    requestId: string,
    resolution: Resolution,
    entry: UnsealedLogEntry,
  ): Promise<ResolveOutcome>;

  // -------------------------------------------------------------------------
  // Audit log
  // -------------------------------------------------------------------------

  /**
   * Seal `entry` against the current chain tip and append it.  When an entry
   * with the same `decisionId` already exists, that entry is returned and
   * nothing is written.
   */
  appendLogEntry(entry: UnsealedLogEntry): Promise<LogEntry>;

  /** Entries matching the filter, timestamp ascending, ties in append order. */
  queryLogEntries(filter?: LogEntryFilter): Promise<readonly LogEntry[]>;

  /** Every entry in append order (chain order). */
  listLogEntries(): Promise<readonly LogEntry[]>;

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /** Create tables/state and the system-state row if missing. */
  connect(): Promise<void>;

  /** Release backend resources. */
  disconnect(): Promise<void>;

  /** Returns true if the backend is reachable. */
  isHealthy(): Promise<boolean>;
}

/** Result of StorageAdapter.resolvePendingRequest(). */
export type ResolveOutcome =
  | { readonly resolved: true; readonly request: PendingRequest; readonly entry: LogEntry }
  | { readonly resolved: false; readonly current: PendingRequest | undefined };

/**
 * Filter criteria for querying log entries from storage.
 * All fields are optional and combined with AND semantics; time bounds are
 * normalised `Date#toISOString()` values and inclusive.
 */
export interface LogEntryFilter {
  agentId?: string;
  since?: Timestamp;
  until?: Timestamp;
}

/** Options shared by the bundled adapters. */
export interface StorageAdapterOptions {
  /** Link log entries into a SHA-256 hash chain. Defaults to true. */
  hashChain?: boolean;
  /** Clock used for the system-state row created by connect(). */
  now?: () => Date;
}
