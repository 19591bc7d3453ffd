// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { ValidationError } from '../errors.js';
import type { LogEntryFilter } from '../storage/adapter.js';
import type { LogEntry, LogQuery } from '../types.js';
import { Identifier } from '../validation.js';

const BoundSchema = z.string().datetime({ offset: true });

const LogQuerySchema = z.object({
  agentId: Identifier.optional(),
  startTime: BoundSchema.optional(),
  endTime: BoundSchema.optional(),
});

/**
 * Validates a caller-supplied LogQuery and converts its bounds to the
 * normalised UTC form the stores compare against.
 *
 * Timestamps without an explicit offset are rejected: a naive local time
 * cannot be placed on the timeline without guessing.
 */
export function normalizeLogQuery(query: LogQuery = {}): LogEntryFilter {
  const result = LogQuerySchema.safeParse(query);
  if (!result.success) {
    throw new ValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const { agentId, startTime, endTime } = result.data;
  const since = startTime !== undefined ? new Date(startTime).toISOString() : undefined;
  const until = endTime !== undefined ? new Date(endTime).toISOString() : undefined;

  if (since !== undefined && until !== undefined && since > until) {
    throw new ValidationError([`startTime: ${startTime} is after endTime ${endTime}`]);
  }

  return {
    ...(agentId !== undefined && { agentId }),
    ...(since !== undefined && { since }),
    ...(until !== undefined && { until }),
  };
}

/**
 * Applies a LogEntryFilter to entries held in append order.
 *
 * Returns matching entries in ascending timestamp order; entries with equal
 * timestamps keep their append order.  Does not mutate the input.
 */
export function filterLogEntries(
  entries: readonly LogEntry[],
  filter: LogEntryFilter = {},
): LogEntry[] {
  const fromMs = filter.since !== undefined ? Date.parse(filter.since) : -Infinity;
  const toMs = filter.until !== undefined ? Date.parse(filter.until) : Infinity;

  const matched = entries.filter((entry) => {
    const entryMs = Date.parse(entry.timestamp);
    if (entryMs < fromMs) return false;
    if (entryMs > toMs) return false;
    if (filter.agentId !== undefined && entry.agentId !== filter.agentId) return false;
    return true;
  });

  // Array#sort is stable, so ties stay in append order.
  matched.sort((a, b) => Date.parse(a.timestamp) - Date.parse(b.timestamp));
  return matched;
}
