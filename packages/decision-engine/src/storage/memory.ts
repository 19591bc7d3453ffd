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
import { chainTip, sealLogEntry } from '../audit/chain.js';
import { filterLogEntries } from '../audit/query.js';
import type {
  LogEntryFilter,
  ResolveOutcome,
  StorageAdapter,
  StorageAdapterOptions,
} from './adapter.js';

/**
 * In-memory implementation of StorageAdapter.
 *
 * The default backend.  All data is lost when the process exits.  Every
 * mutating method runs to completion without yielding, which is what makes
 * the compare-and-set in resolvePendingRequest() atomic for engines sharing
 * one instance inside a process.
 */
export class MemoryStorageAdapter implements StorageAdapter {
  readonly #agents = new Map<string, Agent>();
  readonly #permissions: Permission[] = [];
  readonly #pending = new Map<string, PendingRequest>();
  readonly #log: LogEntry[] = [];
  readonly #decisionIds = new Map<string, LogEntry>();
  readonly #hashChain: boolean;
  readonly #now: () => Date;
  #systemState: SystemState | undefined;

  constructor(options: StorageAdapterOptions = {}) {
    this.#hashChain = options.hashChain ?? true;
    this.#now = options.now ?? (() => new Date());
  }

  // -------------------------------------------------------------------------
  // Agents
  // -------------------------------------------------------------------------

  async saveAgent(agent: Agent): Promise<void> {
    this.#agents.set(agent.id, agent);
  }

  async getAgent(agentId: string): Promise<Agent | undefined> {
    return this.#agents.get(agentId);
  }

  async setAgentStatus(
    agentId: string,
    status: AgentStatus,
    updatedAt: Timestamp,
  ): Promise<Agent | undefined> {
    const existing = this.#agents.get(agentId);
    if (existing === undefined) {
      return undefined;
    }
    const updated: Agent = { ...existing, status, updatedAt };
    this.#agents.set(agentId, updated);
    return updated;
  }

  // -------------------------------------------------------------------------
  // Permissions
  // -------------------------------------------------------------------------

  async addPermission(permission: Permission): Promise<void> {
    this.#permissions.push(permission);
  }

  async findPermissions(
    agentId: string,
    action: string,
    resource: string,
  ): Promise<readonly Permission[]> {
    return this.#permissions.filter(
      (p) => p.agentId === agentId && p.action === action && p.resource === resource,
    );
  }

  // -------------------------------------------------------------------------
  // System state
  // -------------------------------------------------------------------------

  async getSystemState(): Promise<SystemState | undefined> {
    return this.#systemState;
  }

  async setSystemState(state: SystemState): Promise<void> {
    this.#systemState = state;
  }

  // -------------------------------------------------------------------------
  // Pending requests
  // -------------------------------------------------------------------------

  async createPendingRequest(request: PendingRequest): Promise<void> {
    this.#pending.set(request.requestId, request);
  }

  async getPendingRequest(requestId: string): Promise<PendingRequest | undefined> {
    return this.#pending.get(requestId);
  }

  async listPendingRequests(): Promise<readonly PendingRequest[]> {
    return Array.from(this.#pending.values())
      .filter((request) => request.status === 'pending')
      .sort((a, b) => Date.parse(a.createdAt) - Date.parse(b.createdAt));
  }

  async resolvePendingRequest(
    requestId: string,
    resolution: Resolution,
    entry: UnsealedLogEntry,
  ): Promise<ResolveOutcome> {
    const current = this.#pending.get(requestId);
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
    this.#pending.set(requestId, request);
    return { resolved: true, request, entry: this.#append(entry) };
  }

  // -------------------------------------------------------------------------
  // Audit log
  // -------------------------------------------------------------------------

  async appendLogEntry(entry: UnsealedLogEntry): Promise<LogEntry> {
    return this.#append(entry);
  }

  async queryLogEntries(filter?: LogEntryFilter): Promise<readonly LogEntry[]> {
    return filterLogEntries(this.#log, filter);
  }

  async listLogEntries(): Promise<readonly LogEntry[]> {
    return [...this.#log];
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async connect(): Promise<void> {
    if (this.#systemState === undefined) {
      this.#systemState = { killSwitch: 'disabled', updatedAt: this.#now().toISOString() };
    }
  }

  async disconnect(): Promise<void> {
    // Nothing to release.
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  #append(entry: UnsealedLogEntry): LogEntry {
    const existing = this.#decisionIds.get(entry.decisionId);
    if (existing !== undefined) {
      return existing;
    }
    const sealed = sealLogEntry(entry, chainTip(this.#log.at(-1), this.#hashChain), this.#hashChain);
    this.#log.push(sealed);
    this.#decisionIds.set(sealed.decisionId, sealed);
    return sealed;
  }
}
