// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { SQLiteStorageAdapter } from '../src/storage/sqlite.js';
import { seedStorage } from '../src/storage/seed.js';
import { DecisionEngine } from '../src/engine.js';
import { createLogEntry } from '../src/audit/entry.js';
import { GENESIS_HASH } from '../src/audit/chain.js';
import { ConflictError, InvalidConfigError, SystemError } from '../src/errors.js';
import type { PendingRequest } from '../src/types.js';
import { START, loadSeedFixture, makeClock } from './helpers.js';

function pendingRequest(requestId: string, createdAt: string): PendingRequest {
  return {
    requestId,
    agentId: 'a1',
    action: 'read',
    resource: 'db',
    reason: 'system_kill_switch_enabled',
    trace: [{ ruleChecked: 'kill_switch', ruleResult: 'failed', notes: 'system kill switch enabled' }],
    status: 'pending',
    createdAt,
  };
}

function entryFor(decisionId: string, timestamp: string, agentId = 'a1') {
  return createLogEntry({
    decisionId,
    agentId,
    action: 'read',
    resource: 'db',
    result: 'approved',
    reason: 'all_checks_passed',
    trace: [],
    timestamp,
  });
}

describe('SQLiteStorageAdapter', () => {
  let db: Database.Database;
  let storage: SQLiteStorageAdapter;

  beforeEach(async () => {
    db = new Database(':memory:');
    storage = new SQLiteStorageAdapter({ database: db, now: makeClock().now });
    await storage.connect();
  });

  afterEach(async () => {
    await storage.disconnect();
  });

  describe('connect', () => {
    it('creates the system state row as disabled', async () => {
      expect(await storage.getSystemState()).toEqual({ killSwitch: 'disabled', updatedAt: START });
    });

    it('never overwrites an existing system state row', async () => {
      await storage.setSystemState({ killSwitch: 'enabled', updatedAt: START, updatedBy: 'ops' });
      await storage.connect();
      expect((await storage.getSystemState())?.killSwitch).toBe('enabled');
    });

    it('rejects table prefixes that are not SQL identifiers', () => {
      expect(() => new SQLiteStorageAdapter({ database: db, tablePrefix: 'x; DROP' })).toThrow(InvalidConfigError);
    });
  });

  describe('agents and permissions', () => {
    it('round-trips seeded agents and returns grants in creation order', async () => {
      await seedStorage(storage, loadSeedFixture(), makeClock().now);
      await storage.addPermission({ id: 'p-2', agentId: 'a1', action: 'read', resource: 'db', condition: 'time < 18:00', createdAt: START });

      expect(await storage.getAgent('a1')).toEqual({
        id: 'a1',
        owner: 'owner-1',
        status: 'active',
        name: 'report-bot',
        createdAt: START,
        updatedAt: START,
      });
      expect(await storage.getAgent('missing')).toBeUndefined();

      const grants = await storage.findPermissions('a1', 'read', 'db');
      expect(grants.map((p) => p.condition)).toEqual([undefined, 'time < 18:00']);
    });

    it('updates agent status', async () => {
      await seedStorage(storage, loadSeedFixture());
      const updated = await storage.setAgentStatus('a1', 'disabled', '2026-03-02T11:00:00.000Z');

      expect(updated).toMatchObject({ status: 'disabled', updatedAt: '2026-03-02T11:00:00.000Z' });
      expect((await storage.getAgent('a1'))?.status).toBe('disabled');
      expect(await storage.setAgentStatus('missing', 'disabled', START)).toBeUndefined();
    });
  });

  describe('pending requests', () => {
    it('lists only pending requests, oldest first', async () => {
      await storage.createPendingRequest(pendingRequest('r-late', '2026-03-02T10:05:00.000Z'));
      await storage.createPendingRequest(pendingRequest('r-early', '2026-03-02T10:00:00.000Z'));

      expect((await storage.listPendingRequests()).map((r) => r.requestId)).toEqual(['r-early', 'r-late']);
    });

    it('resolves once and appends the entry in the same transaction', async () => {
      await storage.createPendingRequest(pendingRequest('r-1', START));
      const resolution = { status: 'approved' as const, resolvedBy: 'alice', resolvedAt: '2026-03-02T10:10:00.000Z' };

      const first = await storage.resolvePendingRequest('r-1', resolution, entryFor('r-1', '2026-03-02T10:10:00.000Z'));
      expect(first.resolved).toBe(true);

      const second = await storage.resolvePendingRequest(
        'r-1',
        { ...resolution, status: 'denied', resolvedBy: 'bob' },
        entryFor('r-1', '2026-03-02T10:11:00.000Z'),
      );
      expect(second).toEqual({
        resolved: false,
        current: { ...pendingRequest('r-1', START), status: 'approved', resolvedBy: 'alice', resolvedAt: '2026-03-02T10:10:00.000Z' },
      });
      expect(await storage.listLogEntries()).toHaveLength(1);
      expect(await storage.listPendingRequests()).toHaveLength(0);
    });

    it('reports unknown requests as unresolved with no current row', async () => {
      expect(
        await storage.resolvePendingRequest(
          'missing',
          { status: 'approved', resolvedBy: 'alice', resolvedAt: START },
          entryFor('missing', START),
        ),
      ).toEqual({ resolved: false, current: undefined });
    });
  });

  describe('audit log', () => {
    it('chains entries and ignores duplicate decision ids', async () => {
      const first = await storage.appendLogEntry(entryFor('d-1', '2026-03-02T10:00:00.000Z'));
      const second = await storage.appendLogEntry(entryFor('d-2', '2026-03-02T10:01:00.000Z'));
      const duplicate = await storage.appendLogEntry(entryFor('d-1', '2026-03-02T10:02:00.000Z'));

      expect(first.previousHash).toBe(GENESIS_HASH);
      expect(second.previousHash).toBe(first.entryHash);
      expect(duplicate).toEqual(first);
      expect(await storage.listLogEntries()).toHaveLength(2);
    });

    it('filters by agent and inclusive time bounds', async () => {
      await storage.appendLogEntry(entryFor('d-1', '2026-03-02T10:00:00.000Z'));
      await storage.appendLogEntry(entryFor('d-2', '2026-03-02T10:05:00.000Z', 'a2'));
      await storage.appendLogEntry(entryFor('d-3', '2026-03-02T10:10:00.000Z'));

      const rows = await storage.queryLogEntries({
        agentId: 'a1',
        since: '2026-03-02T10:00:00.000Z',
        until: '2026-03-02T10:10:00.000Z',
      });
      expect(rows.map((e) => e.decisionId)).toEqual(['d-1', 'd-3']);
    });

    it('refuses unchained appends to a hash-chained log', async () => {
      await storage.appendLogEntry(entryFor('d-1', START));
      const unchained = new SQLiteStorageAdapter({ database: db, hashChain: false });

      await expect(unchained.appendLogEntry(entryFor('d-2', START))).rejects.toBeInstanceOf(InvalidConfigError);
      expect((await storage.listLogEntries()).map((e) => e.decisionId)).toEqual(['d-1']);

      const last = await storage.appendLogEntry(entryFor('d-3', START));
      const [first] = await storage.listLogEntries();
      expect(last.previousHash).toBe(first?.entryHash);
    });

    it('refuses to start a chain on a log written without one', async () => {
      const other = new Database(':memory:');
      const unchained = new SQLiteStorageAdapter({ database: other, hashChain: false });
      await unchained.connect();
      await unchained.appendLogEntry(entryFor('d-1', START));

      const chained = new SQLiteStorageAdapter({ database: other });
      await expect(chained.appendLogEntry(entryFor('d-2', START))).rejects.toBeInstanceOf(InvalidConfigError);
      expect(await unchained.listLogEntries()).toHaveLength(1);
      await unchained.disconnect();
    });

    it('raises SystemError for a corrupted row', async () => {
      await storage.appendLogEntry(entryFor('d-1', START));
      db.prepare("UPDATE gate_audit_log SET data = '{\"id\":42}'").run();

      await expect(storage.listLogEntries()).rejects.toBeInstanceOf(SystemError);
    });
  });

  describe('lifecycle', () => {
    it('reports unhealthy after disconnect', async () => {
      expect(await storage.isHealthy()).toBe(true);
      await storage.disconnect();
      expect(await storage.isHealthy()).toBe(false);
    });
  });

  describe('with DecisionEngine', () => {
    it('runs the escalation flow and detects tampering with the stored log', async () => {
      await seedStorage(storage, loadSeedFixture());
      const clock = makeClock();
      const engine = new DecisionEngine({ storage, now: clock.now });

      await engine.checkRequest('a1', 'read', 'db');
      await engine.setSystemKillSwitch(true, 'ops');
      clock.advance(1000);
      const pending = await engine.checkRequest('a1', 'read', 'db');
      if (pending.requestId === undefined) throw new Error('expected a pending request');
      clock.advance(1000);
      await engine.resolvePending(pending.requestId, 'alice', 'approve');
      await expect(engine.resolvePending(pending.requestId, 'bob', 'deny')).rejects.toBeInstanceOf(ConflictError);

      const logs = await engine.queryLogs({ agentId: 'a1' });
      expect(logs.map((e) => e.reason)).toEqual(['all_checks_passed', 'human_override']);
      expect(await engine.verifyAuditTrail()).toEqual({ valid: true, entryCount: 2 });

      db.prepare("UPDATE gate_audit_log SET data = json_set(data, '$.result', 'denied') WHERE seq = 1").run();
      expect(await engine.verifyAuditTrail()).toMatchObject({ valid: false, brokenAt: 0 });
    });

    it('detects a rewritten log whose hashes were blanked', async () => {
      await seedStorage(storage, loadSeedFixture());
      const engine = new DecisionEngine({ storage, now: makeClock().now });

      expect((await engine.checkRequest('a1', 'write', 'db')).result).toBe('denied');
      expect((await engine.checkRequest('a1', 'read', 'db')).result).toBe('approved');

      db.prepare(
        "UPDATE gate_audit_log SET data = json_set(data, '$.result', 'approved', '$.entryHash', '', '$.previousHash', '')",
      ).run();

      expect((await engine.queryLogs()).map((e) => e.result)).toEqual(['approved', 'approved']);
      expect(await engine.verifyAuditTrail()).toMatchObject({ valid: false, entryCount: 2, brokenAt: 0 });
    });

    it('accepts an unchained log when the engine is configured without chaining', async () => {
      const other = new Database(':memory:');
      const unchained = new SQLiteStorageAdapter({ database: other, hashChain: false });
      await unchained.connect();
      await seedStorage(unchained, loadSeedFixture());
      const engine = new DecisionEngine({ storage: unchained, hashChain: false });

      await engine.checkRequest('a1', 'read', 'db');
      expect(await engine.verifyAuditTrail()).toEqual({ valid: true, entryCount: 1 });
      await engine.close();
    });
  });
});
