// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { SystemError } from '../errors.js';

/**
 * Zod schemas for persisted records.
 *
 * Durable adapters parse every row through these before handing it to the
 * engine, so a corrupted or hand-edited row surfaces as a SystemError
 * instead of flowing into a decision.
 */

export const TraceEntrySchema = z.object({
  ruleChecked: z.enum(['kill_switch', 'agent_status', 'permission_rule', 'human_decision']),
  ruleResult: z.enum(['passed', 'failed']),
  notes: z.string(),
});

export const DecisionReasonSchema = z.enum([
  'all_checks_passed',
  'permission_rule_failed',
  'agent_disabled',
  'agent_not_found',
  'system_kill_switch_enabled',
  'human_override',
]);

export const AgentSchema = z.object({
  id: z.string().min(1),
  owner: z.string().min(1),
  status: z.enum(['active', 'disabled']),
  name: z.string().optional(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const PermissionSchema = z.object({
  id: z.string().min(1),
  agentId: z.string().min(1),
  action: z.string().min(1),
  resource: z.string().min(1),
  condition: z.string().optional(),
  createdAt: z.string(),
});

export const SystemStateSchema = z.object({
  killSwitch: z.enum(['enabled', 'disabled']),
  updatedAt: z.string(),
  updatedBy: z.string().optional(),
});

export const PendingRequestSchema = z.object({
  requestId: z.string().min(1),
  agentId: z.string(),
  action: z.string(),
  resource: z.string(),
  reason: DecisionReasonSchema,
  trace: z.array(TraceEntrySchema),
  status: z.enum(['pending', 'approved', 'denied']),
  createdAt: z.string(),
  resolvedBy: z.string().optional(),
  notes: z.string().optional(),
  resolvedAt: z.string().optional(),
});

export const LogEntrySchema = z.object({
  id: z.string().min(1),
  decisionId: z.string().min(1),
  agentId: z.string(),
  action: z.string(),
  resource: z.string(),
  result: z.enum(['approved', 'denied']),
  reason: DecisionReasonSchema,
  trace: z.array(TraceEntrySchema),
  timestamp: z.string(),
  requestId: z.string().optional(),
  resolvedBy: z.string().optional(),
  previousHash: z.string(),
  entryHash: z.string(),
});

/**
 * Parses a JSON column value through a schema, raising SystemError when the
 * stored data does not match.
 */
export function parseStoredJson<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  label: string,
): z.infer<T> {
  if (typeof raw !== 'string') {
    throw new SystemError(`Stored ${label} row has no JSON payload.`);
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error: unknown) {
    throw new SystemError(`Stored ${label} row is not valid JSON.`, { cause: error });
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SystemError(`Stored ${label} row failed validation: ${issues.join('; ')}`);
  }
  return result.data;
}
