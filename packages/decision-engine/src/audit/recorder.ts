// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Logger } from 'pino';
import { toSystemError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { StorageAdapter } from '../storage/adapter.js';
import type { ChainVerificationResult, LogEntry, LogQuery } from '../types.js';
import { verifyChain } from './chain.js';
import { createLogEntry } from './entry.js';
import type { LogEntryInput } from './entry.js';
import { normalizeLogQuery } from './query.js';

/**
 * AuditRecorder writes completed decisions to the store's append-only log
 * and reads them back.
 *
 * There is no update or delete path.  Only terminal outcomes are recorded;
 * escalations are recorded when a human resolves them, through
 * `StorageAdapter.resolvePendingRequest` rather than this class.
 */
export class AuditRecorder {
  readonly #storage: StorageAdapter;
  readonly #logger: Logger;
  readonly #hashChain: boolean;

  /**
   * @param hashChain Whether the store seals entries.  Verification treats an
   *   unsealed entry as a break unless this is false.
   */
  constructor(storage: StorageAdapter, logger: Logger = silentLogger(), hashChain = true) {
    this.#storage = storage;
    this.#logger = logger;
    this.#hashChain = hashChain;
  }

  // ---------------------------------------------------------------------------
  // Public API
  // ---------------------------------------------------------------------------

  /**
   * Appends one entry for a completed automatic decision.
   *
   * @throws SystemError when the store rejects the write.
   */
  async record(input: LogEntryInput): Promise<LogEntry> {
    const unsealed = createLogEntry(input);
    let entry: LogEntry;
    try {
      entry = await this.#storage.appendLogEntry(unsealed);
    } catch (error: unknown) {
      throw toSystemError('appendLogEntry', error);
    }
    this.#logger.debug(
      { decisionId: entry.decisionId, agentId: entry.agentId, result: entry.result },
      'audit entry appended',
    );
    return entry;
  }

  /**
   * Entries matching the query, oldest first.
   *
   * @throws ValidationError for blank agent ids, naive or malformed
   *   timestamps, or a start bound after the end bound.
   */
  async query(query: LogQuery = {}): Promise<readonly LogEntry[]> {
    const filter = normalizeLogQuery(query);
    try {
      return await this.#storage.queryLogEntries(filter);
    } catch (error: unknown) {
      throw toSystemError('queryLogEntries', error);
    }
  }

  /** Re-derives the hash chain over the whole log. */
  async verify(): Promise<ChainVerificationResult> {
    let entries: readonly LogEntry[];
    try {
      entries = await this.#storage.listLogEntries();
    } catch (error: unknown) {
      throw toSystemError('listLogEntries', error);
    }
    const result = verifyChain(entries, this.#hashChain);
    if (!result.valid) {
      this.#logger.error({ brokenAt: result.brokenAt, reason: result.reason }, 'audit chain broken');
    }
    return result;
  }
}
