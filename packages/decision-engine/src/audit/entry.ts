// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import type {
  DecisionOutcome,
  DecisionReason,
  TraceEntry,
  UnsealedLogEntry,
} from '../types.js';

/** Everything needed to describe one completed decision. */
export interface LogEntryInput {
  /** Defaults to a fresh UUID. */
  decisionId?: string;
  agentId: string;
  action: string;
  resource: string;
  result: DecisionOutcome;
  reason: DecisionReason;
  trace: readonly TraceEntry[];
  timestamp: string;
  requestId?: string;
  resolvedBy?: string;
}

/**
 * Creates an unsealed log entry.  The store assigns the hash fields when it
 * appends it.
 *
 * Optional fields are omitted rather than set to undefined so that the
 * canonical form hashed by the chain matches what a durable store returns.
 */
export function createLogEntry(input: LogEntryInput): UnsealedLogEntry {
  return {
    id: randomUUID(),
    decisionId: input.decisionId ?? randomUUID(),
    agentId: input.agentId,
    action: input.action,
    resource: input.resource,
    result: input.result,
    reason: input.reason,
    trace: input.trace.map((entry) => ({ ...entry })),
    timestamp: input.timestamp,
    ...(input.requestId !== undefined && { requestId: input.requestId }),
    ...(input.resolvedBy !== undefined && { resolvedBy: input.resolvedBy }),
  };
}
