// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Permission decision engine for autonomous agents.
 *
 * Public API surface:
 *
 * Engine
 *   DecisionEngine        checkRequest, resolvePending, kill switches, audit queries
 *   createDecisionEngine  build an engine from EngineConfig
 *
 * Components (usable standalone)
 *   RulePipeline          kill_switch → agent_status → permission_rule
 *   EscalationManager     pending request state machine
 *   AuditRecorder         append-only, hash-chained decision log
 *   evaluateCondition     time-of-day permission conditions
 *
 * Storage
 *   StorageAdapter, MemoryStorageAdapter, SQLiteStorageAdapter, seedStorage
 *
 * Integrations
 *   AgentGuard, decisionMiddleware, DecisionTracer, DecisionEventEmitter
 */

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------
export { DecisionEngine } from './engine.js';
export type { DecisionEngineOptions } from './engine.js';
export { createDecisionEngine } from './factory.js';
export type { DecisionEngineOverrides } from './factory.js';
export { serializeDecision } from './wire.js';
export type { WireDecision, WireTraceEntry } from './wire.js';

// ---------------------------------------------------------------------------
// Components
// ---------------------------------------------------------------------------
export { RulePipeline, AgentStatusRule, KillSwitchRule, PermissionRule, defaultRules } from './pipeline/index.js';
export type {
  PipelineRequest,
  PipelineResult,
  RulePipelineOptions,
  Rule,
  RuleContext,
  RuleOutcome,
} from './pipeline/index.js';
export { EscalationManager, humanDecisionEntry } from './escalation/index.js';
export type { EscalationTarget, ResolveInput, ResolvedEscalation } from './escalation/index.js';
export {
  AuditRecorder,
  createLogEntry,
  filterLogEntries,
  normalizeLogQuery,
  GENESIS_HASH,
  chainTip,
  computeEntryHash,
  sealLogEntry,
  verifyChain,
} from './audit/index.js';
export type { LogEntryInput } from './audit/index.js';
export { evaluateCondition, holds, parseCondition } from './condition/evaluator.js';
export type {
  ComparisonOperator,
  ConditionContext,
  ConditionEvaluation,
  ParsedCondition,
  TimeComparison,
} from './condition/evaluator.js';

// ---------------------------------------------------------------------------
// Storage
// ---------------------------------------------------------------------------
export { MemoryStorageAdapter, SQLiteStorageAdapter, SeedSchema, seedStorage } from './storage/index.js';
export type {
  LogEntryFilter,
  ResolveOutcome,
  StorageAdapter,
  StorageAdapterOptions,
  SQLiteStorageConfig,
  SeedInput,
  SeedSummary,
} from './storage/index.js';

// ---------------------------------------------------------------------------
// Integrations
// ---------------------------------------------------------------------------
export { AgentGuard, AgentGuardConfigSchema, ActionDeniedError, ActionPendingError } from './guard.js';
export type { AgentGuardConfig } from './guard.js';
export { decisionMiddleware, defaultRequestTarget } from './integrations/express-middleware.js';
export type {
  DecisionMiddlewareConfig,
  ExpressNextFunction,
  ExpressRequest,
  ExpressResponse,
  RequestTarget,
} from './integrations/express-middleware.js';
export { DecisionTracer } from './telemetry/index.js';
export type { DecisionTracerConfig, OTelSpanLike, OTelTracerLike, TracedRequest } from './telemetry/index.js';
export {
  DecisionEventEmitter,
  EVENT_AGENT_STATUS_CHANGED,
  EVENT_DECISION_ESCALATED,
  EVENT_DECISION_RECORDED,
  EVENT_ESCALATION_RESOLVED,
  EVENT_KILLSWITCH_CHANGED,
} from './events.js';
export type {
  AgentStatusChangedEventPayload,
  DecisionEscalatedEventPayload,
  DecisionEventListener,
  DecisionEventName,
  DecisionEventPayloadMap,
  DecisionRecordedEventPayload,
  EscalationResolvedEventPayload,
  KillSwitchChangedEventPayload,
} from './events.js';

// ---------------------------------------------------------------------------
// Config, logging and errors
// ---------------------------------------------------------------------------
export {
  EngineConfigSchema,
  ConditionConfigSchema,
  AuditConfigSchema,
  LoggingConfigSchema,
  StorageConfigSchema,
  LOG_LEVELS,
  parseEngineConfig,
  parseLoggingConfig,
  loadConfigFromEnv,
} from './config.js';
export type {
  EngineConfig,
  EngineConfigInput,
  ConditionConfig,
  AuditConfig,
  LoggingConfig,
  StorageConfig,
} from './config.js';
export { createLogger, silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export {
  DecisionEngineError,
  ValidationError,
  NotFoundError,
  AuthorizationError,
  ConflictError,
  SystemError,
  InvalidConfigError,
  toSystemError,
} from './errors.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------
export type {
  Timestamp,
  AgentId,
  AgentStatus,
  Agent,
  Permission,
  KillSwitchState,
  SystemState,
  RuleName,
  RuleResult,
  TraceEntry,
  Verdict,
  DecisionOutcome,
  DecisionResultStatus,
  DecisionReason,
  ActionRequired,
  DecisionResult,
  PendingRequestStatus,
  HumanDecision,
  PendingRequest,
  Resolution,
  LogEntry,
  UnsealedLogEntry,
  LogQuery,
  ChainVerificationResult,
  KillSwitchStatus,
  AgentStatusChange,
} from './types.js';
