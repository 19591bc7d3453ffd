// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { RulePipeline } from './pipeline.js';
export type { PipelineRequest, PipelineResult, RulePipelineOptions } from './pipeline.js';
export { AgentStatusRule, KillSwitchRule, PermissionRule, defaultRules } from './rules.js';
export type { Rule, RuleContext, RuleOutcome } from './rules.js';
