// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Express Decision Middleware
 *
 * `decisionMiddleware` gates a route on `DecisionEngine.checkRequest`.  It
 * works with Express and any framework sharing the `(req, res, next)`
 * signature, such as Connect.
 *
 *   approved → next(); the decision is left on `res.locals.decision`
 *   denied   → 403 with the serialized decision
 *   pending  → 202 with the serialized decision (carries `request_id`)
 *   error    → next(error)
 *
 * Usage:
 * ```ts
 * import express from 'express';
 *
 * const app = express();
 * app.post(
 *   '/tools/:tool',
 *   decisionMiddleware({
 *     engine,
 *     resolve: (req) => ({
 *       agentId: String(req.headers['x-agent-id'] ?? ''),
 *       action: 'invoke',
 *       resource: req.path,
 *     }),
 *   }),
 *   handler,
 * );
 * ```
 */

import type { DecisionEngine } from '../engine.js';
import { ValidationError } from '../errors.js';
import type { DecisionResult } from '../types.js';
import { serializeDecision } from '../wire.js';

// ---------------------------------------------------------------------------
// Structural interfaces (no hard dependency on `express` types)
// ---------------------------------------------------------------------------

export interface ExpressRequest {
  method: string;
  path: string;
  headers: Record<string, string | string[] | undefined>;
}

export interface ExpressResponse {
  status(code: number): ExpressResponse;
  json(body: unknown): unknown;
  locals?: Record<string, unknown>;
}

export type ExpressNextFunction = (error?: unknown) => void;

/** The triple a request is evaluated against. */
export interface RequestTarget {
  agentId: string;
  action: string;
  resource: string;
}

// ---------------------------------------------------------------------------
// Middleware config
// ---------------------------------------------------------------------------

export interface DecisionMiddlewareConfig {
  engine: Pick<DecisionEngine, 'checkRequest'>;
  /**
   * Maps a request to the triple to evaluate.  Return undefined when the
   * request does not identify an agent.  Defaults to
   * `defaultRequestTarget`.
   */
  resolve?: (req: ExpressRequest) => RequestTarget | undefined;
}

function headerValue(req: ExpressRequest, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Agent id from the `x-agent-id` header, action from the HTTP method
 * (lower-cased), resource from the request path.
 */
export function defaultRequestTarget(req: ExpressRequest): RequestTarget | undefined {
  const agentId = headerValue(req, 'x-agent-id');
  if (agentId === undefined || agentId.trim().length === 0) {
    return undefined;
  }
  return { agentId, action: req.method.toLowerCase(), resource: req.path };
}

// ---------------------------------------------------------------------------
// Middleware factory
// ---------------------------------------------------------------------------

export function decisionMiddleware(
  config: DecisionMiddlewareConfig,
): (req: ExpressRequest, res: ExpressResponse, next: ExpressNextFunction) => Promise<void> {
  const resolve = config.resolve ?? defaultRequestTarget;

  return async function expressDecisionMiddleware(
    req: ExpressRequest,
    res: ExpressResponse,
    next: ExpressNextFunction,
  ): Promise<void> {
    let decision: DecisionResult;
    try {
      const target = resolve(req);
      if (target === undefined) {
        throw new ValidationError(['agentId: request does not identify an agent']);
      }
      decision = await config.engine.checkRequest(target.agentId, target.action, target.resource);
    } catch (error: unknown) {
      next(error);
      return;
    }

    if (decision.result === 'approved') {
      if (res.locals !== undefined) {
        res.locals['decision'] = decision;
      }
      next();
      return;
    }

    res.status(decision.result === 'pending' ? 202 : 403).json(serializeDecision(decision));
  };
}
