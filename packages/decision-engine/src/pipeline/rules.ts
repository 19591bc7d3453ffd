// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { evaluateCondition } from '../condition/evaluator.js';
import { SystemError } from '../errors.js';
import type { StorageAdapter } from '../storage/adapter.js';
import type { DecisionReason, RuleName, TraceEntry, Verdict } from '../types.js';

/** What every rule sees. */
export interface RuleContext {
  readonly agentId: string;
  readonly action: string;
  readonly resource: string;
  readonly storage: StorageAdapter;
  /** Evaluation instant, shared by every rule in one request. */
  readonly now: Date;
  /** IANA zone for time-of-day conditions. */
  readonly timeZone: string;
}

/** A rule's trace entry, plus the verdict when the rule ends the pipeline. */
export interface RuleOutcome {
  readonly entry: TraceEntry;
  readonly terminal?: { readonly verdict: Verdict; readonly reason: DecisionReason };
}

export interface Rule {
  readonly name: RuleName;
  evaluate(context: RuleContext): Promise<RuleOutcome>;
}

// ---------------------------------------------------------------------------
// kill_switch
// ---------------------------------------------------------------------------

export class KillSwitchRule implements Rule {
  readonly name = 'kill_switch';

  async evaluate({ storage }: RuleContext): Promise<RuleOutcome> {
    const state = await storage.getSystemState();
    if (state === undefined) {
      throw new SystemError(
        'System state row is missing; the store must be connected before requests are evaluated.',
      );
    }
    if (state.killSwitch === 'enabled') {
      return {
        entry: { ruleChecked: this.name, ruleResult: 'failed', notes: 'system kill switch enabled' },
        terminal: { verdict: 'escalated', reason: 'system_kill_switch_enabled' },
      };
    }
    return { entry: { ruleChecked: this.name, ruleResult: 'passed', notes: 'kill switch off' } };
  }
}

// ---------------------------------------------------------------------------
// agent_status
// ---------------------------------------------------------------------------

export class AgentStatusRule implements Rule {
  readonly name = 'agent_status';

  async evaluate({ storage, agentId }: RuleContext): Promise<RuleOutcome> {
    const agent = await storage.getAgent(agentId);
    if (agent === undefined) {
      return {
        entry: { ruleChecked: this.name, ruleResult: 'failed', notes: 'agent not found' },
        terminal: { verdict: 'denied', reason: 'agent_not_found' },
      };
    }
    if (agent.status === 'disabled') {
      return {
        entry: { ruleChecked: this.name, ruleResult: 'failed', notes: 'agent disabled' },
        terminal: { verdict: 'denied', reason: 'agent_disabled' },
      };
    }
    return { entry: { ruleChecked: this.name, ruleResult: 'passed', notes: 'agent active' } };
  }
}

// ---------------------------------------------------------------------------
// permission_rule
// ---------------------------------------------------------------------------

/**
 * Grants on the first candidate, in creation order, whose condition holds.
 * When candidates exist but none hold, the notes list why each one failed.
 */
export class PermissionRule implements Rule {
  readonly name = 'permission_rule';

  async evaluate(context: RuleContext): Promise<RuleOutcome> {
    const { storage, agentId, action, resource, now, timeZone } = context;
    const candidates = await storage.findPermissions(agentId, action, resource);

    if (candidates.length === 0) {
      return this.#deny(`no permission for ${action} on ${resource}`);
    }

    const unmet: string[] = [];
    for (const permission of candidates) {
      const evaluation = evaluateCondition(permission.condition, { now, timeZone });
      if (evaluation.holds) {
        return {
          entry: {
            ruleChecked: this.name,
            ruleResult: 'passed',
            notes: `permission granted for ${action} on ${resource}`,
          },
          terminal: { verdict: 'approved', reason: 'all_checks_passed' },
        };
      }
      unmet.push(evaluation.note);
    }

    return this.#deny(`permission for ${action} on ${resource} not granted: ${unmet.join('; ')}`);
  }

  #deny(notes: string): RuleOutcome {
    return {
      entry: { ruleChecked: this.name, ruleResult: 'failed', notes },
      terminal: { verdict: 'denied', reason: 'permission_rule_failed' },
    };
  }
}

/** The fixed evaluation order. */
export function defaultRules(): readonly Rule[] {
  return [new KillSwitchRule(), new AgentStatusRule(), new PermissionRule()];
}
