// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { SpanStatusCode } from '@opentelemetry/api';
import type { DecisionResult } from '../types.js';

/**
 * The subset of an OpenTelemetry Span the tracer touches.  Spans returned by
 * `trace.getTracer(...)` from @opentelemetry/api satisfy it.
 */
export interface OTelSpanLike {
  setAttribute(key: string, value: string | number | boolean): this;
  setStatus(status: { code: SpanStatusCode; message?: string }): this;
  addEvent(name: string, attributes?: Record<string, string | number | boolean>): this;
  end(): void;
}

export interface OTelTracerLike {
  startSpan(name: string, options?: { attributes?: Record<string, string | number | boolean> }): OTelSpanLike;
}

export interface DecisionTracerConfig {
  tracer: OTelTracerLike;
  /** Service name attribute added to all spans. Defaults to "agent-gate". */
  serviceName?: string;
}

/** Identifies the request a span belongs to. */
export interface TracedRequest {
  agentId: string;
  action: string;
  resource: string;
}

/**
 * DecisionTracer wraps engine calls in OpenTelemetry spans.
 *
 * `checkRequest` gets one `agent_gate.check_request` span; each pipeline rule
 * gets a `agent_gate.rule.<name>` span.  Denied and pending results are not
 * span errors: the call itself succeeded.
 *
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const tracer = new DecisionTracer({ tracer: trace.getTracer('agent-gate') });
 * const engine = new DecisionEngine({ storage, tracer });
 * ```
 */
export class DecisionTracer {
  readonly #tracer: OTelTracerLike;
  readonly #serviceName: string;

  constructor(config: DecisionTracerConfig) {
    this.#tracer = config.tracer;
    this.#serviceName = config.serviceName ?? 'agent-gate';
  }

  async traceCheck(
    request: TracedRequest,
    checkFn: () => Promise<DecisionResult>,
  ): Promise<DecisionResult> {
    const span = this.#tracer.startSpan('agent_gate.check_request', {
      attributes: {
        'service.name': this.#serviceName,
        'agent_gate.agent_id': request.agentId,
        'agent_gate.action': request.action,
        'agent_gate.resource': request.resource,
      },
    });

    try {
      const result = await checkFn();

      span.setAttribute('agent_gate.result', result.result);
      span.setAttribute('agent_gate.reason', result.reason);
      span.setAttribute('agent_gate.trace_length', result.trace.length);
      if (result.requestId !== undefined) {
        span.setAttribute('agent_gate.request_id', result.requestId);
      }
      span.addEvent(`agent_gate.${result.result}`, { 'agent_gate.reason': result.reason });
      span.setStatus({ code: SpanStatusCode.OK });

      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      span.addEvent('agent_gate.error', { 'error.message': message });
      throw error;
    } finally {
      span.end();
    }
  }

  /**
   * Creates a span for a single pipeline rule.
   */
  async traceRule<T>(ruleName: string, agentId: string, executeFn: () => Promise<T>): Promise<T> {
    const span = this.#tracer.startSpan(`agent_gate.rule.${ruleName}`, {
      attributes: {
        'service.name': this.#serviceName,
        'agent_gate.agent_id': agentId,
        'agent_gate.rule': ruleName,
      },
    });

    try {
      const result = await executeFn();
      span.setStatus({ code: SpanStatusCode.OK });
      return result;
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : 'Unknown error';
      span.setStatus({ code: SpanStatusCode.ERROR, message });
      throw error;
    } finally {
      span.end();
    }
  }
}
