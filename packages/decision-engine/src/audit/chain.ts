// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { createHash } from 'node:crypto';
import { InvalidConfigError } from '../errors.js';
import type { ChainVerificationResult, LogEntry, UnsealedLogEntry } from '../types.js';

/**
 * The hash value that precedes the very first entry in any chain.
 */
export const GENESIS_HASH = '0'.repeat(64);

/**
 * Rebuilds `value` with object keys sorted at every depth so that two
 * structurally equal entries always serialise identically, whatever order
 * their keys were inserted or parsed in.
 */
function canonicalise(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(canonicalise);
  }
  if (value !== null && typeof value === 'object') {
    const ordered: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, nested] of entries) {
      ordered[key] = canonicalise(nested);
    }
    return ordered;
  }
  return value;
}

/**
 * SHA-256 over `<canonicalJSON>\n<previousHash>`.
 */
export function computeEntryHash(entry: UnsealedLogEntry, previousHash: string): string {
  const payload = JSON.stringify(canonicalise(entry)) + '\n' + previousHash;
  return createHash('sha256').update(payload, 'utf8').digest('hex');
}

/**
 * Links an entry to its predecessor.  With `chained` false the hash fields
 * are left empty.
 */
export function sealLogEntry(
  entry: UnsealedLogEntry,
  previousHash: string,
  chained = true,
): LogEntry {
  if (!chained) {
    return { ...entry, previousHash: '', entryHash: '' };
  }
  return { ...entry, previousHash, entryHash: computeEntryHash(entry, previousHash) };
}

function isSealed(entry: LogEntry): boolean {
  return entry.entryHash !== '' || entry.previousHash !== '';
}

/**
 * Hash to link the next entry against, given the current last entry.
 *
 * A log is either chained from its first entry or not at all, so appending
 * in the other mode throws.
 *
 * @throws InvalidConfigError when `chained` disagrees with the existing log.
 */
export function chainTip(last: LogEntry | undefined, chained = true): string {
  if (last === undefined) {
    return GENESIS_HASH;
  }
  if (isSealed(last) !== chained) {
    throw new InvalidConfigError([
      chained
        ? 'audit.hashChain: the audit log holds unchained entries and cannot start a hash chain'
        : 'audit.hashChain: the audit log is hash-chained and cannot take unchained entries',
    ]);
  }
  return chained ? last.entryHash : '';
}

/**
 * Walks `entries` in append order, re-deriving every hash.
 *
 * A failure at index `i` means entry `i` was altered, removed, reordered,
 * inserted or stripped of its hashes.  Only when `chained` is false may a log
 * consist entirely of unsealed entries.
 */
export function verifyChain(entries: readonly LogEntry[], chained = true): ChainVerificationResult {
  if (!chained && !entries.some(isSealed)) {
    return { valid: true, entryCount: entries.length };
  }

  let expectedPreviousHash = GENESIS_HASH;

  for (let index = 0; index < entries.length; index++) {
    const entry = entries[index];
    if (entry === undefined) break;

    if (entry.entryHash === '' || entry.previousHash === '') {
      return {
        valid: false,
        entryCount: entries.length,
        brokenAt: index,
        reason: `Entry at index ${index} (id="${entry.id}") carries no hash but the log is hash-chained.`,
      };
    }

    if (entry.previousHash !== expectedPreviousHash) {
      return {
        valid: false,
        entryCount: entries.length,
        brokenAt: index,
        reason: `Entry at index ${index} has previousHash "${entry.previousHash}" but expected "${expectedPreviousHash}".`,
      };
    }

    const { previousHash: _previous, entryHash: storedHash, ...unsealed } = entry;
    const expectedHash = computeEntryHash(unsealed, expectedPreviousHash);

    if (storedHash !== expectedHash) {
      return {
        valid: false,
        entryCount: entries.length,
        brokenAt: index,
        reason: `Entry at index ${index} (id="${entry.id}") has hash "${storedHash}" but recomputed hash is "${expectedHash}". Entry content may have been altered.`,
      };
    }

    expectedPreviousHash = storedHash;
  }

  return { valid: true, entryCount: entries.length };
}
