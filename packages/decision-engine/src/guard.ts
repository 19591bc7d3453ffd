// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import type { DecisionEngine } from './engine.js';
import { DecisionEngineError, InvalidConfigError } from './errors.js';
import type { AgentStatusChange, DecisionResult } from './types.js';

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/** Thrown by AgentGuard when the engine denies an action. */
export class ActionDeniedError extends DecisionEngineError {
  readonly decision: DecisionResult;

  constructor(agentId: string, action: string, resource: string, decision: DecisionResult) {
    super('ACTION_DENIED', `Agent "${agentId}" may not ${action} on ${resource}: ${decision.message}`);
    this.name = 'ActionDeniedError';
    this.decision = decision;
  }
}

/**
 * Thrown by AgentGuard when the action awaits human review.  Poll
 * `DecisionEngine.getPendingRequest(requestId)` for the outcome.
 */
export class ActionPendingError extends DecisionEngineError {
  readonly decision: DecisionResult;
  readonly requestId: string;

  constructor(agentId: string, action: string, resource: string, decision: DecisionResult, requestId: string) {
    super(
      'ACTION_PENDING',
      `Agent "${agentId}" must wait for human review to ${action} on ${resource} (request ${requestId}).`,
    );
    this.name = 'ActionPendingError';
    this.decision = decision;
    this.requestId = requestId;
  }
}

// ---------------------------------------------------------------------------
// AgentGuard
// ---------------------------------------------------------------------------

export const AgentGuardConfigSchema = z.object({
  agentId: z.string().trim().min(1),
});

export type AgentGuardConfig = z.infer<typeof AgentGuardConfigSchema>;

/**
 * AgentGuard is the in-process client an agent uses to ask before acting.
 *
 * Usage:
 * ```ts
 * const guard = new AgentGuard(engine, { agentId: 'report-bot' });
 *
 * const rows = await guard.run('read', 'sales_db', () => db.query(sql));
 * ```
 */
export class AgentGuard {
  readonly #engine: DecisionEngine;
  readonly #agentId: string;

  constructor(engine: DecisionEngine, config: unknown) {
    const result = AgentGuardConfigSchema.safeParse(config);
    if (!result.success) {
      throw new InvalidConfigError(
        result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      );
    }
    this.#engine = engine;
    this.#agentId = result.data.agentId;
  }

  get agentId(): string {
    return this.#agentId;
  }

  /**
   * Resolves with the decision when the action is approved.
   *
   * @throws ActionDeniedError when the action is denied.
   * @throws ActionPendingError when the action was escalated.
   */
  async check(action: string, resource: string): Promise<DecisionResult> {
    const decision = await this.#engine.checkRequest(this.#agentId, action, resource);
    switch (decision.result) {
      case 'approved':
        return decision;
      case 'denied':
        throw new ActionDeniedError(this.#agentId, action, resource, decision);
      case 'pending':
        throw new ActionPendingError(this.#agentId, action, resource, decision, decision.requestId ?? '');
    }
  }

  /** Runs `fn` only after the action has been approved. */
  async run<T>(action: string, resource: string, fn: () => Promise<T> | T): Promise<T> {
    await this.check(action, resource);
    return fn();
  }

  /** Disables this agent.  Only its owner may do so. */
  async disable(ownerId: string): Promise<AgentStatusChange> {
    return this.#engine.setAgentEnabled(this.#agentId, ownerId, false);
  }

  async enable(ownerId: string): Promise<AgentStatusChange> {
    return this.#engine.setAgentEnabled(this.#agentId, ownerId, true);
  }
}
