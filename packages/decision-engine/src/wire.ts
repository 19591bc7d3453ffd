// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type {
  ActionRequired,
  DecisionReason,
  DecisionResult,
  DecisionResultStatus,
  RuleName,
  RuleResult,
} from './types.js';

export interface WireTraceEntry {
  rule_checked: RuleName;
  rule_result: RuleResult;
  notes: string;
}

/** The snake_case response body HTTP callers receive. */
export interface WireDecision {
  result: DecisionResultStatus;
  message: string;
  reason: DecisionReason;
  decision_trace: WireTraceEntry[];
  action_required: ActionRequired | null;
  request_id?: string;
}

export function serializeDecision(decision: DecisionResult): WireDecision {
  return {
    result: decision.result,
    message: decision.message,
    reason: decision.reason,
    decision_trace: decision.trace.map((entry) => ({
      rule_checked: entry.ruleChecked,
      rule_result: entry.ruleResult,
      notes: entry.notes,
    })),
    action_required: decision.actionRequired,
    ...(decision.requestId !== undefined && { request_id: decision.requestId }),
  };
}
