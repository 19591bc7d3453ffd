// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Logger } from 'pino';
import { SystemError, toSystemError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { StorageAdapter } from '../storage/adapter.js';
import type { DecisionTracer } from '../telemetry/otel.js';
import type { DecisionReason, TraceEntry, Verdict } from '../types.js';
import { defaultRules } from './rules.js';
import type { Rule, RuleContext, RuleOutcome } from './rules.js';

export interface PipelineRequest {
  readonly agentId: string;
  readonly action: string;
  readonly resource: string;
  readonly now: Date;
}

export interface PipelineResult {
  readonly verdict: Verdict;
  readonly reason: DecisionReason;
  /** Only the rules that ran, in order. */
  readonly trace: readonly TraceEntry[];
}

export interface RulePipelineOptions {
  storage: StorageAdapter;
  /** IANA zone for conditions. Defaults to "UTC". */
  timeZone?: string;
  logger?: Logger;
  tracer?: DecisionTracer;
}

/**
 * RulePipeline runs kill_switch, agent_status and permission_rule in that
 * order and stops at the first rule that returns a verdict.
 *
 * The pipeline only reads.  Store failures are raised as SystemError; they
 * never become a verdict.
 */
export class RulePipeline {
  readonly #rules: readonly Rule[] = defaultRules();
  readonly #storage: StorageAdapter;
  readonly #timeZone: string;
  readonly #logger: Logger;
  readonly #tracer: DecisionTracer | undefined;

  constructor(options: RulePipelineOptions) {
    this.#storage = options.storage;
    this.#timeZone = options.timeZone ?? 'UTC';
    this.#logger = options.logger ?? silentLogger();
    this.#tracer = options.tracer;
  }

  async evaluate(request: PipelineRequest): Promise<PipelineResult> {
    const context: RuleContext = {
      ...request,
      storage: this.#storage,
      timeZone: this.#timeZone,
    };
    const trace: TraceEntry[] = [];

    for (const rule of this.#rules) {
      const outcome = await this.#run(rule, context);
      trace.push(outcome.entry);
      this.#logger.trace(
        { agentId: request.agentId, rule: rule.name, result: outcome.entry.ruleResult },
        outcome.entry.notes,
      );
      if (outcome.terminal !== undefined) {
        return { verdict: outcome.terminal.verdict, reason: outcome.terminal.reason, trace };
      }
    }

    throw new SystemError('Rule pipeline completed without reaching a verdict.');
  }

  async #run(rule: Rule, context: RuleContext): Promise<RuleOutcome> {
    const execute = async (): Promise<RuleOutcome> => {
      try {
        return await rule.evaluate(context);
      } catch (error: unknown) {
        const wrapped = toSystemError(rule.name, error);
        this.#logger.error({ err: wrapped, rule: rule.name, agentId: context.agentId }, 'rule failed');
        throw wrapped;
      }
    };
    return this.#tracer !== undefined
      ? this.#tracer.traceRule(rule.name, context.agentId, execute)
      : execute();
  }
}
