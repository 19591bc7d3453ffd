// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { PendingRequestStatus } from './types.js';

/**
 * Base class for all @agent-gate/decision-engine errors.
 *
 * Every engine error includes a machine-readable `code` that calling code can
 * switch on without parsing human-readable messages.
 */
export class DecisionEngineError extends Error {
  /** Machine-readable error code. Always a SCREAMING_SNAKE_CASE string. */
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecisionEngineError';
    this.code = code;
    // Maintain proper prototype chain for instanceof checks.
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when caller input is malformed (blank identifiers, unknown decision
 * values, ambiguous timestamps).  Raised before any rule runs, so nothing is
 * recorded.
 */
export class ValidationError extends DecisionEngineError {
  /** One entry per failed field, formatted as `field: message`. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('VALIDATION_FAILED', `Invalid input: ${details.join('; ')}`);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * Thrown when an operation targets a record that does not exist.
 *
 * An unknown agent during `checkRequest` is NOT an error; it produces a
 * `denied/agent_not_found` decision so every request still gets a trace.
 */
export class NotFoundError extends DecisionEngineError {
  /** The kind of record that was looked up. */
  readonly entity: 'agent' | 'pending_request';
  /** The identifier that was not found. */
  readonly id: string;

  constructor(entity: 'agent' | 'pending_request', id: string) {
    const label = entity === 'agent' ? 'Agent' : 'Pending request';
    super('NOT_FOUND', `${label} "${id}" not found.`);
    this.name = 'NotFoundError';
    this.entity = entity;
    this.id = id;
  }
}

/**
 * Thrown when a principal other than the recorded owner tries to enable or
 * disable an agent.
 */
export class AuthorizationError extends DecisionEngineError {
  readonly agentId: string;
  /** The principal that attempted the change. */
  readonly principal: string;

  constructor(agentId: string, principal: string) {
    super(
      'NOT_AUTHORIZED',
      `Principal "${principal}" is not the owner of agent "${agentId}" and cannot change its status.`,
    );
    this.name = 'AuthorizationError';
    this.agentId = agentId;
    this.principal = principal;
  }
}

/**
 * Thrown when a pending request has already been resolved.
 *
 * Carries the existing resolution so the caller learns what was decided,
 * by whom, and when.
 */
export class ConflictError extends DecisionEngineError {
  readonly requestId: string;
  readonly status: PendingRequestStatus;
  readonly resolvedBy: string | undefined;
  readonly resolvedAt: string | undefined;

  constructor(
    requestId: string,
    status: PendingRequestStatus,
    resolvedBy: string | undefined,
    resolvedAt: string | undefined,
  ) {
    const by = resolvedBy !== undefined ? ` by "${resolvedBy}"` : '';
    const at = resolvedAt !== undefined ? ` at ${resolvedAt}` : '';
    super(
      'ALREADY_RESOLVED',
      `Pending request "${requestId}" was already ${status}${by}${at}.`,
    );
    this.name = 'ConflictError';
    this.requestId = requestId;
    this.status = status;
    this.resolvedBy = resolvedBy;
    this.resolvedAt = resolvedAt;
  }
}

/**
 * Thrown when the store fails or holds inconsistent state.  The original
 * failure is preserved as `cause`.
 */
export class SystemError extends DecisionEngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SYSTEM_ERROR', message, options);
    this.name = 'SystemError';
  }
}

/**
 * Thrown when engine configuration is structurally or semantically invalid.
 *
 * The `details` array carries one entry per validation error, matching the
 * format produced from Zod's `ZodError.issues`.
 */
export class InvalidConfigError extends DecisionEngineError {
  /** Structured list of individual validation failures. */
  readonly details: readonly string[];

  constructor(details: readonly string[]) {
    super('INVALID_CONFIG', `Engine configuration is invalid: ${details.join('; ')}`);
    this.name = 'InvalidConfigError';
    this.details = details;
  }
}

/**
 * Wraps a storage-layer failure in a SystemError unless it is already one of
 * the engine's own errors.
 */
export function toSystemError(operation: string, error: unknown): DecisionEngineError {
  if (error instanceof DecisionEngineError) {
    return error;
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new SystemError(`Storage failure during ${operation}: ${detail}`, { cause: error });
}
