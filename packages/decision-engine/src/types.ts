// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Shared type definitions for @agent-gate/decision-engine.
 *
 * Field names are camelCase throughout the library.  The snake_case wire
 * shape expected by HTTP callers is produced by `serializeDecision()` in
 * `./wire.ts`; nothing else in the package deals with it.
 */

// ---------------------------------------------------------------------------
// Primitive aliases
// ---------------------------------------------------------------------------

/** ISO 8601 timestamp string, e.g. "2026-01-01T00:00:00.000Z". */
export type Timestamp = string;

/** Stable identifier for an AI agent instance. */
export type AgentId = string;

// ---------------------------------------------------------------------------
// Administrative records (read by the engine, owned by management tooling)
// ---------------------------------------------------------------------------

export type AgentStatus = 'active' | 'disabled';

/** The identity under evaluation. */
export interface Agent {
  readonly id: AgentId;
  /** The only principal allowed to flip this agent's kill switch. */
  readonly owner: string;
  readonly status: AgentStatus;
  readonly name?: string;
  readonly createdAt: Timestamp;
  readonly updatedAt: Timestamp;
}

/** A standing grant for one (agent, action, resource) triple. */
export interface Permission {
  readonly id: string;
  readonly agentId: AgentId;
  readonly action: string;
  readonly resource: string;
  /** Optional qualifier, e.g. "time < 18:00". */
  readonly condition?: string;
  readonly createdAt: Timestamp;
}

export type KillSwitchState = 'enabled' | 'disabled';

/** Process-wide singleton persisted as a single store row. */
export interface SystemState {
  readonly killSwitch: KillSwitchState;
  readonly updatedAt: Timestamp;
  readonly updatedBy?: string;
}

// ---------------------------------------------------------------------------
// Decision trace
// ---------------------------------------------------------------------------

export type RuleName = 'kill_switch' | 'agent_status' | 'permission_rule' | 'human_decision';

export type RuleResult = 'passed' | 'failed';

/** One step of a decision trace. */
export interface TraceEntry {
  readonly ruleChecked: RuleName;
  readonly ruleResult: RuleResult;
  readonly notes: string;
}

// ---------------------------------------------------------------------------
// Verdicts and reasons
// ---------------------------------------------------------------------------

/** Internal pipeline verdict. */
export type Verdict = 'approved' | 'denied' | 'escalated';

/** Terminal outcome of a completed decision. */
export type DecisionOutcome = 'approved' | 'denied';

/** Caller-facing result; "pending" means a human has to decide. */
export type DecisionResultStatus = DecisionOutcome | 'pending';

export type DecisionReason =
  | 'all_checks_passed'
  | 'permission_rule_failed'
  | 'agent_disabled'
  | 'agent_not_found'
  | 'system_kill_switch_enabled'
  | 'human_override';

export type ActionRequired = 'human_intervention';

/** Returned by DecisionEngine.checkRequest() and resolvePending(). */
export interface DecisionResult {
  readonly result: DecisionResultStatus;
  readonly message: string;
  readonly reason: DecisionReason;
  readonly trace: readonly TraceEntry[];
  readonly actionRequired: ActionRequired | null;
  /** Present when the decision is (or was) routed through human review. */
  readonly requestId?: string;
}

// ---------------------------------------------------------------------------
// Escalation
// ---------------------------------------------------------------------------

export type PendingRequestStatus = 'pending' | 'approved' | 'denied';

export type HumanDecision = 'approve' | 'deny';

/** An escalated decision awaiting (or holding) a human verdict. */
export interface PendingRequest {
  readonly requestId: string;
  readonly agentId: AgentId;
  readonly action: string;
  readonly resource: string;
  /** Why the pipeline escalated. */
  readonly reason: DecisionReason;
  /** The trace computed up to the escalation point. */
  readonly trace: readonly TraceEntry[];
  readonly status: PendingRequestStatus;
  readonly createdAt: Timestamp;
  readonly resolvedBy?: string;
  readonly notes?: string;
  readonly resolvedAt?: Timestamp;
}

/** The terminal state written onto a pending request when a human decides. */
export interface Resolution {
  readonly status: DecisionOutcome;
  readonly resolvedBy: string;
  readonly notes?: string;
  readonly resolvedAt: Timestamp;
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

/** An immutable audit record of one completed decision. */
export interface LogEntry {
  readonly id: string;
  /**
   * Identity of the decision this entry completes.  Automatic decisions get a
   * fresh id per evaluation; human resolutions reuse the pending request id.
   */
  readonly decisionId: string;
  readonly agentId: AgentId;
  readonly action: string;
  readonly resource: string;
  readonly result: DecisionOutcome;
  readonly reason: DecisionReason;
  readonly trace: readonly TraceEntry[];
  readonly timestamp: Timestamp;
  /** Pending request this entry resolves, for human overrides. */
  readonly requestId?: string;
  /** Reviewer identity, for human overrides. */
  readonly resolvedBy?: string;
  /** Hash of the preceding entry ("" when hash chaining is off). */
  readonly previousHash: string;
  /** SHA-256 over this entry and `previousHash` ("" when hash chaining is off). */
  readonly entryHash: string;
}

/** A log entry before the store links it into the hash chain. */
export type UnsealedLogEntry = Omit<LogEntry, 'previousHash' | 'entryHash'>;

/** Filter accepted by queryLogs().  Bounds are inclusive. */
export interface LogQuery {
  agentId?: string;
  /** ISO 8601 timestamp with offset or "Z". */
  startTime?: string;
  /** ISO 8601 timestamp with offset or "Z". */
  endTime?: string;
}

/** Result of walking the audit hash chain. */
export interface ChainVerificationResult {
  readonly valid: boolean;
  readonly entryCount: number;
  /** Index of the first entry that failed verification. */
  readonly brokenAt?: number;
  readonly reason?: string;
}

// ---------------------------------------------------------------------------
// Administration results
// ---------------------------------------------------------------------------

export interface KillSwitchStatus {
  readonly enabled: boolean;
  readonly status: KillSwitchState;
  readonly message: string;
}

export interface AgentStatusChange {
  readonly agentId: AgentId;
  readonly status: AgentStatus;
  readonly message: string;
}
