// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { AuditRecorder } from '../src/audit/recorder.js';
import { GENESIS_HASH, computeEntryHash, verifyChain } from '../src/audit/chain.js';
import { createLogEntry } from '../src/audit/entry.js';
import type { LogEntryInput } from '../src/audit/entry.js';
import { normalizeLogQuery } from '../src/audit/query.js';
import { ValidationError } from '../src/errors.js';
import { MemoryStorageAdapter } from '../src/storage/memory.js';
import type { LogEntry } from '../src/types.js';

function makeInput(overrides: Partial<LogEntryInput> = {}): LogEntryInput {
  return {
    agentId: 'a1',
    action: 'read',
    resource: 'db',
    result: 'approved',
    reason: 'all_checks_passed',
    trace: [{ ruleChecked: 'kill_switch', ruleResult: 'passed', notes: 'kill switch off' }],
    timestamp: '2026-03-02T10:00:00.000Z',
    ...overrides,
  };
}

async function makeRecorder(hashChain = true) {
  const storage = new MemoryStorageAdapter({ hashChain });
  await storage.connect();
  return { storage, recorder: new AuditRecorder(storage, undefined, hashChain) };
}

describe('createLogEntry', () => {
  it('omits absent optional fields', () => {
    const entry = createLogEntry(makeInput());
    expect('requestId' in entry).toBe(false);
    expect('resolvedBy' in entry).toBe(false);
  });

  it('uses the supplied decision id', () => {
    expect(createLogEntry(makeInput({ decisionId: 'd-1' })).decisionId).toBe('d-1');
  });
});

describe('computeEntryHash', () => {
  it('does not depend on key order', () => {
    const entry = createLogEntry(makeInput({ decisionId: 'd-1' }));
    const reordered = {
      timestamp: entry.timestamp,
      trace: entry.trace.map((t) => ({ notes: t.notes, ruleResult: t.ruleResult, ruleChecked: t.ruleChecked })),
      reason: entry.reason,
      result: entry.result,
      resource: entry.resource,
      action: entry.action,
      agentId: entry.agentId,
      decisionId: entry.decisionId,
      id: entry.id,
    };
    expect(computeEntryHash(reordered, GENESIS_HASH)).toBe(computeEntryHash(entry, GENESIS_HASH));
  });

  it('produces a 64-character hex digest', () => {
    expect(computeEntryHash(createLogEntry(makeInput()), GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('AuditRecorder', () => {
  describe('record', () => {
    it('links each entry to its predecessor', async () => {
      const { recorder } = await makeRecorder();
      const first = await recorder.record(makeInput());
      const second = await recorder.record(makeInput({ action: 'write', result: 'denied', reason: 'permission_rule_failed' }));

      expect(first.previousHash).toBe(GENESIS_HASH);
      expect(second.previousHash).toBe(first.entryHash);
      expect(await recorder.verify()).toEqual({ valid: true, entryCount: 2 });
    });

    it('is idempotent per decision id', async () => {
      const { storage, recorder } = await makeRecorder();
      const first = await recorder.record(makeInput({ decisionId: 'd-1' }));
      const again = await recorder.record(makeInput({ decisionId: 'd-1', result: 'denied' }));

      expect(again).toEqual(first);
      expect(await storage.listLogEntries()).toHaveLength(1);
    });

    it('leaves hash fields empty when chaining is off', async () => {
      const { recorder } = await makeRecorder(false);
      const entry = await recorder.record(makeInput());

      expect(entry.previousHash).toBe('');
      expect(entry.entryHash).toBe('');
      expect(await recorder.verify()).toEqual({ valid: true, entryCount: 1 });
    });
  });

  describe('verify', () => {
    it('reports the first altered entry', async () => {
      const { storage, recorder } = await makeRecorder();
      await recorder.record(makeInput());
      await recorder.record(makeInput({ result: 'denied', reason: 'permission_rule_failed' }));
      await recorder.record(makeInput({ action: 'list' }));

      const entries = [...(await storage.listLogEntries())];
      const original = entries[1];
      expect(original).toBeDefined();
      if (original === undefined) return;
      entries[1] = { ...original, result: 'approved', reason: 'all_checks_passed' };

      const result = verifyChain(entries);
      expect(result.valid).toBe(false);
      expect(result.brokenAt).toBe(1);
      expect(result.entryCount).toBe(3);
    });

    it('detects a removed entry', async () => {
      const { storage, recorder } = await makeRecorder();
      await recorder.record(makeInput());
      await recorder.record(makeInput({ action: 'write' }));
      await recorder.record(makeInput({ action: 'list' }));

      const entries = await storage.listLogEntries();
      const result = verifyChain([entries[0], entries[2]].filter((e): e is LogEntry => e !== undefined));
      expect(result).toMatchObject({ valid: false, brokenAt: 1 });
    });

    it('rejects a chained log whose hashes were blanked', async () => {
      const { storage } = await makeRecorder();
      const entry = await new AuditRecorder(storage).record(makeInput());
      const stripped = [{ ...entry, result: 'denied' as const, previousHash: '', entryHash: '' }];

      expect(verifyChain(stripped)).toEqual({
        valid: false,
        entryCount: 1,
        brokenAt: 0,
        reason: `Entry at index 0 (id="${entry.id}") carries no hash but the log is hash-chained.`,
      });
      expect(verifyChain(stripped, false)).toEqual({ valid: true, entryCount: 1 });
    });

    it('checks sealed entries even when chaining is off', async () => {
      const { storage, recorder } = await makeRecorder();
      await recorder.record(makeInput());
      const [entry] = await storage.listLogEntries();
      if (entry === undefined) throw new Error('expected an entry');

      expect(verifyChain([{ ...entry, action: 'delete' }], false)).toMatchObject({ valid: false, brokenAt: 0 });
    });

    it('treats an unchained log as broken when verified as chained', async () => {
      const { storage } = await makeRecorder(false);
      await new AuditRecorder(storage).record(makeInput());
      await expect(new AuditRecorder(storage).verify()).resolves.toMatchObject({ valid: false, brokenAt: 0 });
    });
  });

  describe('query', () => {
    it('orders by timestamp with ties in append order and inclusive bounds', async () => {
      const { recorder } = await makeRecorder();
      const late = await recorder.record(makeInput({ timestamp: '2026-03-02T10:10:00.000Z' }));
      const early = await recorder.record(makeInput({ timestamp: '2026-03-02T10:00:00.000Z' }));
      const tieA = await recorder.record(makeInput({ timestamp: '2026-03-02T10:05:00.000Z', action: 'a' }));
      const tieB = await recorder.record(makeInput({ timestamp: '2026-03-02T10:05:00.000Z', action: 'b' }));

      const all = await recorder.query();
      expect(all.map((e) => e.id)).toEqual([early.id, tieA.id, tieB.id, late.id]);

      const window = await recorder.query({
        startTime: '2026-03-02T12:05:00+02:00',
        endTime: '2026-03-02T10:10:00Z',
      });
      expect(window.map((e) => e.id)).toEqual([tieA.id, tieB.id, late.id]);
    });

    it('filters by agent', async () => {
      const { recorder } = await makeRecorder();
      await recorder.record(makeInput({ agentId: 'a1' }));
      const other = await recorder.record(makeInput({ agentId: 'a2' }));

      expect((await recorder.query({ agentId: 'a2' })).map((e) => e.id)).toEqual([other.id]);
    });

    it('rejects timestamps without an offset', async () => {
      const { recorder } = await makeRecorder();
      await expect(recorder.query({ startTime: '2026-03-02T10:00:00' })).rejects.toBeInstanceOf(ValidationError);
    });
  });
});

describe('normalizeLogQuery', () => {
  it('normalises bounds to UTC', () => {
    expect(normalizeLogQuery({ startTime: '2026-03-02T12:00:00+02:00', endTime: '2026-03-02T11:00:00Z' })).toEqual({
      since: '2026-03-02T10:00:00.000Z',
      until: '2026-03-02T11:00:00.000Z',
    });
  });

  it('rejects a start bound after the end bound', () => {
    expect(() =>
      normalizeLogQuery({ startTime: '2026-03-02T11:00:00Z', endTime: '2026-03-02T10:00:00Z' }),
    ).toThrow(ValidationError);
  });

  it('rejects blank agent ids', () => {
    expect(() => normalizeLogQuery({ agentId: '   ' })).toThrow(ValidationError);
  });

  it('keeps agent ids exactly as given', () => {
    expect(normalizeLogQuery({ agentId: ' a1 ' })).toEqual({ agentId: ' a1 ' });
  });

  it('does not match padded agent ids against stored ones', async () => {
    const { recorder } = await makeRecorder();
    await recorder.record(makeInput());

    expect(await recorder.query({ agentId: ' a1 ' })).toEqual([]);
    expect(await recorder.query({ agentId: 'a1' })).toHaveLength(1);
  });

  it('rejects free-form dates', () => {
    expect(() => normalizeLogQuery({ endTime: 'yesterday' })).toThrow(ValidationError);
  });
});
