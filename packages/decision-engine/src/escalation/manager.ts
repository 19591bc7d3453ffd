// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createLogEntry } from '../audit/entry.js';
import { ConflictError, NotFoundError, toSystemError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { ResolveOutcome, StorageAdapter } from '../storage/adapter.js';
import type {
  DecisionOutcome,
  DecisionReason,
  HumanDecision,
  LogEntry,
  PendingRequest,
  TraceEntry,
} from '../types.js';

export interface EscalationTarget {
  readonly agentId: string;
  readonly action: string;
  readonly resource: string;
}

export interface ResolveInput {
  readonly requestId: string;
  readonly humanId: string;
  readonly decision: HumanDecision;
  readonly notes?: string;
  readonly resolvedAt: Date;
}

export interface ResolvedEscalation {
  readonly request: PendingRequest;
  readonly entry: LogEntry;
}

/**
 * Builds the trace step appended when a human decides.
 */
export function humanDecisionEntry(
  humanId: string,
  decision: HumanDecision,
  notes?: string,
): TraceEntry {
  const verb = decision === 'approve' ? 'approved' : 'denied';
  const suffix = notes !== undefined && notes.length > 0 ? ` (${notes})` : '';
  return {
    ruleChecked: 'human_decision',
    ruleResult: decision === 'approve' ? 'passed' : 'failed',
    notes: `${verb} by human ${humanId}${suffix}`,
  };
}

/**
 * EscalationManager owns the pending-request state machine:
 *
 *   pending ──approve──▶ approved
 *      └─────deny──────▶ denied
 *
 * A request leaves `pending` exactly once.  The transition and its audit
 * entry are written by one compare-and-set call on the store, so two
 * reviewers racing on the same request produce one transition, one log
 * entry and one ConflictError.
 */
export class EscalationManager {
  readonly #storage: StorageAdapter;
  readonly #logger: Logger;

  constructor(storage: StorageAdapter, logger: Logger = silentLogger()) {
    this.#storage = storage;
    this.#logger = logger;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /** Persists a new pending request.  Nothing is written to the audit log. */
  async escalate(
    target: EscalationTarget,
    reason: DecisionReason,
    trace: readonly TraceEntry[],
    createdAt: Date,
  ): Promise<PendingRequest> {
    const request: PendingRequest = {
      requestId: randomUUID(),
      agentId: target.agentId,
      action: target.action,
      resource: target.resource,
      reason,
      trace: [...trace],
      status: 'pending',
      createdAt: createdAt.toISOString(),
    };
    try {
      await this.#storage.createPendingRequest(request);
    } catch (error: unknown) {
      throw toSystemError('createPendingRequest', error);
    }
    this.#logger.warn(
      { requestId: request.requestId, agentId: request.agentId, reason },
      'request escalated for human review',
    );
    return request;
  }

  /**
   * Moves a pending request to its terminal status and appends the
   * human_override audit entry.
   *
   * @throws NotFoundError for an unknown request id.
   * @throws ConflictError when the request is no longer pending.
   */
  async resolve(input: ResolveInput): Promise<ResolvedEscalation> {
    const { requestId, humanId, decision, notes, resolvedAt } = input;
    const current = await this.get(requestId);
    if (current.status !== 'pending') {
      throw this.#conflict(current);
    }

    const timestamp = resolvedAt.toISOString();
    const status: DecisionOutcome = decision === 'approve' ? 'approved' : 'denied';
    const trace = [...current.trace, humanDecisionEntry(humanId, decision, notes)];
    const entry = createLogEntry({
      decisionId: requestId,
      agentId: current.agentId,
      action: current.action,
      resource: current.resource,
      result: status,
      reason: 'human_override',
      trace,
      timestamp,
      requestId,
      resolvedBy: humanId,
    });

    let outcome: ResolveOutcome;
    try {
      outcome = await this.#storage.resolvePendingRequest(
        requestId,
        {
          status,
          resolvedBy: humanId,
          resolvedAt: timestamp,
          ...(notes !== undefined && { notes }),
        },
        entry,
      );
    } catch (error: unknown) {
      throw toSystemError('resolvePendingRequest', error);
    }

    if (!outcome.resolved) {
      if (outcome.current === undefined) {
        throw new NotFoundError('pending_request', requestId);
      }
      throw this.#conflict(outcome.current);
    }

    this.#logger.info(
      { requestId, agentId: current.agentId, result: status, resolvedBy: humanId },
      'pending request resolved',
    );
    return { request: outcome.request, entry: outcome.entry };
  }

  /** Requests still awaiting a decision, oldest first. */
  async listPending(): Promise<readonly PendingRequest[]> {
    try {
      return await this.#storage.listPendingRequests();
    } catch (error: unknown) {
      throw toSystemError('listPendingRequests', error);
    }
  }

  /**
   * A request in any status.
   *
   * @throws NotFoundError for an unknown request id.
   */
  async get(requestId: string): Promise<PendingRequest> {
    let request: PendingRequest | undefined;
    try {
      request = await this.#storage.getPendingRequest(requestId);
    } catch (error: unknown) {
      throw toSystemError('getPendingRequest', error);
    }
    if (request === undefined) {
      throw new NotFoundError('pending_request', requestId);
    }
    return request;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  #conflict(request: PendingRequest): ConflictError {
    this.#logger.warn(
      { requestId: request.requestId, status: request.status, resolvedBy: request.resolvedBy },
      'pending request already resolved',
    );
    return new ConflictError(request.requestId, request.status, request.resolvedBy, request.resolvedAt);
  }
}
