// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * basic-decision.ts
 *
 * Walks through the decision flow end to end:
 *   1. Build an engine from configuration and seed a few agents.
 *   2. Evaluate requests and print their traces.
 *   3. Flip the system kill switch and resolve the escalation by hand.
 *   4. Read back and verify the audit trail.
 *
 * Run: npx tsx examples/basic-decision.ts
 */

import {
  AgentGuard,
  ActionPendingError,
  createDecisionEngine,
  seedStorage,
  serializeDecision,
  MemoryStorageAdapter,
} from '../src/index.js';

async function main(): Promise<void> {
  // --------------------------------------------------------------------------
  // 1. Engine and administrative records.
  // --------------------------------------------------------------------------
  const storage = new MemoryStorageAdapter();
  const engine = await createDecisionEngine(
    { logging: { level: 'info', pretty: true } },
    { storage },
  );

  await seedStorage(storage, {
    agents: [
      { id: 'report-bot', owner: 'dana', name: 'Quarterly report generator' },
      { id: 'cleanup-bot', owner: 'sam', status: 'disabled' },
    ],
    permissions: [
      { agentId: 'report-bot', action: 'read', resource: 'sales_db' },
      { agentId: 'report-bot', action: 'send', resource: 'email', condition: 'time >= 08:00 && time < 18:00' },
    ],
  });

  // --------------------------------------------------------------------------
  // 2. Automatic decisions.
  // --------------------------------------------------------------------------
  for (const [agentId, action, resource] of [
    ['report-bot', 'read', 'sales_db'],
    ['report-bot', 'delete', 'sales_db'],
    ['report-bot', 'send', 'email'],
    ['cleanup-bot', 'read', 'sales_db'],
  ] as const) {
    const decision = await engine.checkRequest(agentId, action, resource);
    console.log(`${agentId} ${action} ${resource}:`, JSON.stringify(serializeDecision(decision), null, 2));
  }

  // --------------------------------------------------------------------------
  // 3. Kill switch and human review.
  // --------------------------------------------------------------------------
  await engine.setSystemKillSwitch(true, 'on-call');

  const guard = new AgentGuard(engine, { agentId: 'report-bot' });
  try {
    await guard.run('read', 'sales_db', () => console.log('unreachable while the kill switch is on'));
  } catch (error: unknown) {
    if (!(error instanceof ActionPendingError)) throw error;
    console.log(`Escalated as ${error.requestId}; pending:`, (await engine.listPendingRequests()).length);

    const resolved = await engine.resolvePending(error.requestId, 'dana', 'approve', 'month-end run');
    console.log('Human verdict:', resolved.result, resolved.trace.at(-1)?.notes);
  }

  await engine.setSystemKillSwitch(false, 'on-call');

  // --------------------------------------------------------------------------
  // 4. Audit trail.
  // --------------------------------------------------------------------------
  const logs = await engine.queryLogs({ agentId: 'report-bot' });
  for (const entry of logs) {
    console.log(`${entry.timestamp} ${entry.action} ${entry.resource} → ${entry.result} (${entry.reason})`);
  }
  console.log('Audit chain:', await engine.verifyAuditTrail());

  await engine.close();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
