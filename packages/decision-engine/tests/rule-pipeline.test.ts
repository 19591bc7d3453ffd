// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import { RulePipeline } from '../src/pipeline/pipeline.js';
import { MemoryStorageAdapter } from '../src/storage/memory.js';
import { SystemError } from '../src/errors.js';
import type { Agent } from '../src/types.js';
import { START, seededStorage } from './helpers.js';

const request = (agentId: string, action: string, resource: string, iso: string = START) => ({
  agentId,
  action,
  resource,
  now: new Date(iso),
});

describe('RulePipeline', () => {
  describe('kill_switch', () => {
    it('escalates with a single trace entry when the kill switch is enabled', async () => {
      const storage = await seededStorage();
      await storage.setSystemState({ killSwitch: 'enabled', updatedAt: START });
      const pipeline = new RulePipeline({ storage });

      expect(await pipeline.evaluate(request('a1', 'read', 'db'))).toEqual({
        verdict: 'escalated',
        reason: 'system_kill_switch_enabled',
        trace: [{ ruleChecked: 'kill_switch', ruleResult: 'failed', notes: 'system kill switch enabled' }],
      });
    });

    it('escalates disabled and unknown agents too', async () => {
      const storage = await seededStorage();
      await storage.setSystemState({ killSwitch: 'enabled', updatedAt: START });
      const pipeline = new RulePipeline({ storage });

      expect((await pipeline.evaluate(request('a2', 'read', 'db'))).verdict).toBe('escalated');
      expect((await pipeline.evaluate(request('ghost', 'read', 'db'))).verdict).toBe('escalated');
    });

    it('raises SystemError when the system state row is missing', async () => {
      const storage = new MemoryStorageAdapter();
      const pipeline = new RulePipeline({ storage });

      await expect(pipeline.evaluate(request('a1', 'read', 'db'))).rejects.toBeInstanceOf(SystemError);
    });
  });

  describe('agent_status', () => {
    it('denies unknown agents after two steps', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage() });

      expect(await pipeline.evaluate(request('ghost', 'read', 'db'))).toEqual({
        verdict: 'denied',
        reason: 'agent_not_found',
        trace: [
          { ruleChecked: 'kill_switch', ruleResult: 'passed', notes: 'kill switch off' },
          { ruleChecked: 'agent_status', ruleResult: 'failed', notes: 'agent not found' },
        ],
      });
    });

    it('denies disabled agents even when a permission exists', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage() });

      expect(await pipeline.evaluate(request('a2', 'read', 'db'))).toEqual({
        verdict: 'denied',
        reason: 'agent_disabled',
        trace: [
          { ruleChecked: 'kill_switch', ruleResult: 'passed', notes: 'kill switch off' },
          { ruleChecked: 'agent_status', ruleResult: 'failed', notes: 'agent disabled' },
        ],
      });
    });
  });

  describe('permission_rule', () => {
    it('approves an unconditional grant after three steps', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage() });

      expect(await pipeline.evaluate(request('a1', 'read', 'db'))).toEqual({
        verdict: 'approved',
        reason: 'all_checks_passed',
        trace: [
          { ruleChecked: 'kill_switch', ruleResult: 'passed', notes: 'kill switch off' },
          { ruleChecked: 'agent_status', ruleResult: 'passed', notes: 'agent active' },
          { ruleChecked: 'permission_rule', ruleResult: 'passed', notes: 'permission granted for read on db' },
        ],
      });
    });

    it('denies when no grant exists for the triple', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage() });
      const result = await pipeline.evaluate(request('a1', 'write', 'db'));

      expect(result.verdict).toBe('denied');
      expect(result.reason).toBe('permission_rule_failed');
      expect(result.trace[2]).toEqual({
        ruleChecked: 'permission_rule',
        ruleResult: 'failed',
        notes: 'no permission for write on db',
      });
    });

    it('approves a conditional grant inside its window', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage() });
      const result = await pipeline.evaluate(request('a3', 'export', 'reports', '2026-03-02T12:00:00.000Z'));

      expect(result.verdict).toBe('approved');
    });

    it('denies a conditional grant outside its window and says why', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage() });
      const result = await pipeline.evaluate(request('a3', 'export', 'reports', '2026-03-02T19:00:00.000Z'));

      expect(result.verdict).toBe('denied');
      expect(result.reason).toBe('permission_rule_failed');
      expect(result.trace[2]?.notes).toBe(
        'permission for export on reports not granted: condition "time >= 09:00 && time < 18:00" not met at 19:00:00 UTC',
      );
    });

    it('names every unmet and malformed candidate', async () => {
      const storage = await seededStorage();
      await storage.addPermission({
        id: 'p-bad', agentId: 'a1', action: 'delete', resource: 'db', condition: 'day == friday', createdAt: START,
      });
      await storage.addPermission({
        id: 'p-late', agentId: 'a1', action: 'delete', resource: 'db', condition: 'time > 22:00', createdAt: START,
      });
      const pipeline = new RulePipeline({ storage });
      const result = await pipeline.evaluate(request('a1', 'delete', 'db'));

      expect(result.trace[2]?.notes).toBe(
        'permission for delete on db not granted: ' +
          'malformed condition "day == friday": unrecognised clause "day == friday"; ' +
          'condition "time > 22:00" not met at 10:00:00 UTC',
      );
    });

    it('grants on the first holding candidate in creation order', async () => {
      const storage = await seededStorage();
      await storage.addPermission({
        id: 'p-night', agentId: 'a1', action: 'sync', resource: 'crm', condition: 'time > 22:00', createdAt: START,
      });
      await storage.addPermission({
        id: 'p-any', agentId: 'a1', action: 'sync', resource: 'crm', createdAt: START,
      });
      const pipeline = new RulePipeline({ storage });

      expect((await pipeline.evaluate(request('a1', 'sync', 'crm'))).verdict).toBe('approved');
    });

    it('uses the configured time zone', async () => {
      const pipeline = new RulePipeline({ storage: await seededStorage(), timeZone: 'America/New_York' });
      // 13:00 UTC is 08:00 in New York (EST, UTC-5), before the 09:00 window opens.
      const result = await pipeline.evaluate(request('a3', 'export', 'reports', '2026-03-02T13:00:00.000Z'));

      expect(result.verdict).toBe('denied');
    });
  });

  describe('store failures', () => {
    class BrokenAgentStore extends MemoryStorageAdapter {
      override async getAgent(_agentId: string): Promise<Agent | undefined> {
        throw new Error('disk unavailable');
      }
    }

    it('raises SystemError carrying the cause instead of fabricating a verdict', async () => {
      const storage = new BrokenAgentStore();
      await storage.connect();
      const pipeline = new RulePipeline({ storage });

      const error = await pipeline.evaluate(request('a1', 'read', 'db')).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(SystemError);
      expect(error).toMatchObject({
        code: 'SYSTEM_ERROR',
        message: 'Storage failure during agent_status: disk unavailable',
      });
      expect(error instanceof SystemError && error.cause instanceof Error && error.cause.message).toBe(
        'disk unavailable',
      );
    });
  });
});
