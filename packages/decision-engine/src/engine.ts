// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Logger } from 'pino';
import { z } from 'zod';
import { AuditRecorder } from './audit/recorder.js';
import {
  AuthorizationError,
  NotFoundError,
  SystemError,
  ValidationError,
  toSystemError,
} from './errors.js';
import { EscalationManager } from './escalation/manager.js';
import {
  DecisionEventEmitter,
  EVENT_AGENT_STATUS_CHANGED,
  EVENT_DECISION_ESCALATED,
  EVENT_DECISION_RECORDED,
  EVENT_ESCALATION_RESOLVED,
  EVENT_KILLSWITCH_CHANGED,
} from './events.js';
import type { DecisionEventName, DecisionEventPayloadMap } from './events.js';
import { silentLogger } from './logger.js';
import { RulePipeline } from './pipeline/pipeline.js';
import type { StorageAdapter } from './storage/adapter.js';
import type { DecisionTracer } from './telemetry/otel.js';
import { Identifier } from './validation.js';
import type {
  AgentStatusChange,
  ChainVerificationResult,
  DecisionOutcome,
  DecisionReason,
  DecisionResult,
  HumanDecision,
  KillSwitchStatus,
  LogEntry,
  LogQuery,
  PendingRequest,
  SystemState,
} from './types.js';

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

const CheckRequestSchema = z.object({
  agentId: Identifier,
  action: Identifier,
  resource: Identifier,
});

const ResolveSchema = z.object({
  requestId: Identifier,
  humanId: Identifier,
  decision: z.enum(['approve', 'deny'], {
    errorMap: () => ({ message: 'must be "approve" or "deny"' }),
  }),
  notes: z.string().optional(),
});

const SetAgentEnabledSchema = z.object({
  agentId: Identifier,
  ownerId: Identifier,
  enabled: z.boolean({ required_error: 'is required', invalid_type_error: 'must be a boolean' }),
});

const KillSwitchSchema = z.object({
  enabled: z.boolean({ required_error: 'is required', invalid_type_error: 'must be a boolean' }),
  changedBy: Identifier.optional(),
});

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Messages
// ---------------------------------------------------------------------------

const AUTOMATIC_MESSAGES: Record<Exclude<DecisionReason, 'human_override'>, string> = {
  all_checks_passed: 'Action approved: all checks passed.',
  permission_rule_failed: 'Action denied: no permission allows this action.',
  agent_disabled: 'Action denied: the agent is disabled.',
  agent_not_found: 'Action denied: the agent is not registered.',
  system_kill_switch_enabled:
    'Action requires human approval: the system kill switch is enabled.',
};

function decisionMessage(reason: DecisionReason, result: DecisionOutcome): string {
  if (reason === 'human_override') {
    return result === 'approved'
      ? 'Action approved by a human reviewer.'
      : 'Action denied by a human reviewer.';
  }
  return AUTOMATIC_MESSAGES[reason];
}

function killSwitchStatus(state: SystemState, changed: boolean): KillSwitchStatus {
  const enabled = state.killSwitch === 'enabled';
  let message: string;
  if (changed) {
    message = enabled
      ? 'System kill switch enabled: new requests are escalated for human review.'
      : 'System kill switch disabled: normal evaluation resumed.';
  } else {
    message = enabled ? 'System kill switch is enabled.' : 'System kill switch is disabled.';
  }
  return { enabled, status: state.killSwitch, message };
}

// ---------------------------------------------------------------------------
// DecisionEngine
// ---------------------------------------------------------------------------

export interface DecisionEngineOptions {
  /** A connected store. */
  storage: StorageAdapter;
  /** IANA zone for time-of-day conditions. Defaults to "UTC". */
  timeZone?: string;
  logger?: Logger;
  events?: DecisionEventEmitter;
  tracer?: DecisionTracer;
  /** Clock for evaluation instants and timestamps. */
  now?: () => Date;
  /** Must match the store's `hashChain` setting. Defaults to true. */
  hashChain?: boolean;
}

/**
 * DecisionEngine is the single entry point for permission decisions.
 *
 * `checkRequest` runs the rule pipeline and then either records the verdict
 * in the audit log (approved / denied) or opens a pending request
 * (escalated).  Pending requests are finished by `resolvePending`, which
 * writes the one audit entry the decision gets.
 *
 * The engine holds no decision state of its own.  Several engines may share
 * one store; every coordination point goes through it.
 *
 * Public API:
 *   checkRequest()         evaluate an action
 *   resolvePending()       record a human verdict on an escalated request
 *   listPendingRequests()  requests awaiting review, oldest first
 *   getPendingRequest()    one request in any status
 *   setAgentEnabled()      owner-scoped agent kill switch
 *   setSystemKillSwitch()  system-wide kill switch
 *   getSystemKillSwitch()  read the system kill switch
 *   queryLogs()            read the audit log
 *   verifyAuditTrail()     check the audit hash chain
 */
export class DecisionEngine {
  readonly events: DecisionEventEmitter;

  readonly #storage: StorageAdapter;
  readonly #pipeline: RulePipeline;
  readonly #escalation: EscalationManager;
  readonly #audit: AuditRecorder;
  readonly #logger: Logger;
  readonly #tracer: DecisionTracer | undefined;
  readonly #now: () => Date;

  constructor(options: DecisionEngineOptions) {
    const logger = options.logger ?? silentLogger();

    this.events = options.events ?? new DecisionEventEmitter();
    this.#storage = options.storage;
    this.#logger = logger.child({ component: 'engine' });
    this.#tracer = options.tracer;
    this.#now = options.now ?? (() => new Date());
    this.#pipeline = new RulePipeline({
      storage: options.storage,
      logger: logger.child({ component: 'pipeline' }),
      ...(options.timeZone !== undefined && { timeZone: options.timeZone }),
      ...(options.tracer !== undefined && { tracer: options.tracer }),
    });
    this.#escalation = new EscalationManager(
      options.storage,
      logger.child({ component: 'escalation' }),
    );
    this.#audit = new AuditRecorder(
      options.storage,
      logger.child({ component: 'audit' }),
      options.hashChain ?? true,
    );
  }

  // ---------------------------------------------------------------------------
  // Decisions
  // ---------------------------------------------------------------------------

  /**
   * Evaluates whether `agentId` may perform `action` on `resource`.
   *
   * An unknown agent is a `denied/agent_not_found` decision, not an error.
   *
   * @throws ValidationError for blank or missing identifiers.
   * @throws SystemError when the store fails or the system state row is missing.
   */
  async checkRequest(agentId: string, action: string, resource: string): Promise<DecisionResult> {
    const input = validate(CheckRequestSchema, { agentId, action, resource });
    if (this.#tracer !== undefined) {
      return this.#tracer.traceCheck(input, () => this.#check(input));
    }
    return this.#check(input);
  }

  async #check(input: { agentId: string; action: string; resource: string }): Promise<DecisionResult> {
    const now = this.#now();
    this.#logger.debug(input, 'request received');

    const { verdict, reason, trace } = await this.#pipeline.evaluate({ ...input, now });

    if (verdict === 'escalated') {
      const request = await this.#escalation.escalate(input, reason, trace, now);
      this.#publish(EVENT_DECISION_ESCALATED, { request });
      return {
        result: 'pending',
        message: decisionMessage(reason, 'denied'),
        reason,
        trace,
        actionRequired: 'human_intervention',
        requestId: request.requestId,
      };
    }

    const entry = await this.#audit.record({
      ...input,
      result: verdict,
      reason,
      trace,
      timestamp: now.toISOString(),
    });
    this.#publish(EVENT_DECISION_RECORDED, { entry });
    this.#logger.info(
      { agentId: input.agentId, action: input.action, resource: input.resource, result: verdict, reason },
      'decision recorded',
    );

    return {
      result: verdict,
      message: decisionMessage(reason, verdict),
      reason,
      trace,
      actionRequired: null,
    };
  }

  /**
   * Applies a human verdict to an escalated request.
   *
   * @throws ValidationError for blank identifiers or an unknown decision value.
   * @throws NotFoundError for an unknown request id.
   * @throws ConflictError when the request was already resolved.
   */
  async resolvePending(
    requestId: string,
    humanId: string,
    decision: HumanDecision,
    notes?: string,
  ): Promise<DecisionResult> {
    const input = validate(ResolveSchema, { requestId, humanId, decision, notes });
    const { request, entry } = await this.#escalation.resolve({
      ...input,
      resolvedAt: this.#now(),
    });
    this.#publish(EVENT_ESCALATION_RESOLVED, { request, entry });

    return {
      result: entry.result,
      message: decisionMessage(entry.reason, entry.result),
      reason: entry.reason,
      trace: entry.trace,
      actionRequired: null,
      requestId: request.requestId,
    };
  }

  async listPendingRequests(): Promise<readonly PendingRequest[]> {
    return this.#escalation.listPending();
  }

  /**
   * @throws NotFoundError for an unknown request id.
   */
  async getPendingRequest(requestId: string): Promise<PendingRequest> {
    const input = validate(z.object({ requestId: Identifier }), { requestId });
    return this.#escalation.get(input.requestId);
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  /**
   * Enables or disables an agent on behalf of its owner.
   *
   * @throws NotFoundError for an unknown agent.
   * @throws AuthorizationError when `ownerId` is not the agent's owner.
   */
  async setAgentEnabled(agentId: string, ownerId: string, enabled: boolean): Promise<AgentStatusChange> {
    const input = validate(SetAgentEnabledSchema, { agentId, ownerId, enabled });

    const agent = await this.#store('getAgent', () => this.#storage.getAgent(input.agentId));
    if (agent === undefined) {
      throw new NotFoundError('agent', input.agentId);
    }
    if (agent.owner !== input.ownerId) {
      this.#logger.warn({ agentId: input.agentId, principal: input.ownerId }, 'agent status change refused');
      throw new AuthorizationError(input.agentId, input.ownerId);
    }

    const status = input.enabled ? 'active' : 'disabled';
    const updated = await this.#store('setAgentStatus', () =>
      this.#storage.setAgentStatus(input.agentId, status, this.#now().toISOString()),
    );
    if (updated === undefined) {
      throw new NotFoundError('agent', input.agentId);
    }

    this.#publish(EVENT_AGENT_STATUS_CHANGED, { agent: updated, changedBy: input.ownerId });
    this.#logger.warn({ agentId: input.agentId, status, changedBy: input.ownerId }, 'agent status changed');

    return {
      agentId: updated.id,
      status: updated.status,
      message: `Agent "${updated.id}" ${input.enabled ? 'enabled' : 'disabled'}.`,
    };
  }

  /**
   * Turns the system-wide kill switch on or off.  Applies to every
   * subsequent evaluation; past decisions and pending requests are untouched.
   */
  async setSystemKillSwitch(enabled: boolean, changedBy?: string): Promise<KillSwitchStatus> {
    const input = validate(KillSwitchSchema, { enabled, changedBy });

    const previous = await this.#store('getSystemState', () => this.#storage.getSystemState());
    const state: SystemState = {
      killSwitch: input.enabled ? 'enabled' : 'disabled',
      updatedAt: this.#now().toISOString(),
      ...(input.changedBy !== undefined && { updatedBy: input.changedBy }),
    };
    await this.#store('setSystemState', () => this.#storage.setSystemState(state));

    this.#publish(EVENT_KILLSWITCH_CHANGED, { state, previous: previous?.killSwitch });
    this.#logger.warn({ killSwitch: state.killSwitch, changedBy: input.changedBy }, 'system kill switch changed');

    return killSwitchStatus(state, true);
  }

  /**
   * @throws SystemError when the system state row is missing.
   */
  async getSystemKillSwitch(): Promise<KillSwitchStatus> {
    const state = await this.#store('getSystemState', () => this.#storage.getSystemState());
    if (state === undefined) {
      throw new SystemError('System state row is missing; the store has not been connected.');
    }
    return killSwitchStatus(state, false);
  }

  // ---------------------------------------------------------------------------
  // Audit
  // ---------------------------------------------------------------------------

  /**
   * Audit entries for completed decisions, oldest first.  Bounds are
   * inclusive ISO 8601 timestamps with an explicit offset.
   *
   * @throws ValidationError for malformed bounds or start after end.
   */
  async queryLogs(query: LogQuery = {}): Promise<readonly LogEntry[]> {
    return this.#audit.query(query);
  }

  async verifyAuditTrail(): Promise<ChainVerificationResult> {
    return this.#audit.verify();
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async isHealthy(): Promise<boolean> {
    return this.#storage.isHealthy();
  }

  /** Disconnects the underlying store. */
  async close(): Promise<void> {
    await this.#storage.disconnect();
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  async #store<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      const wrapped = toSystemError(operation, error);
      this.#logger.error({ err: wrapped, operation }, 'store operation failed');
      throw wrapped;
    }
  }

  /**
   * Listener failures are logged, not rethrown: the store write the event
   * describes has already happened.
   */
  #publish<E extends DecisionEventName>(event: E, payload: DecisionEventPayloadMap[E]): void {
    try {
      this.events.emit(event, payload);
    } catch (error: unknown) {
      this.#logger.error({ err: error, event }, 'event listener threw');
    }
  }
}
