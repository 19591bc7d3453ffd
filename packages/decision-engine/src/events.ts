// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

/**
 * Decision Event Emitter
 *
 * `DecisionEventEmitter` is a typed publish-subscribe bus for decision
 * lifecycle events.  The engine emits each event only after the store write
 * it describes has succeeded.
 *
 * Usage:
 * ```ts
 * const events = new DecisionEventEmitter();
 *
 * events.on(EVENT_DECISION_ESCALATED, ({ request }) => {
 *   notifyReviewers(request.requestId);
 * });
 *
 * const engine = new DecisionEngine({ storage, events });
 * ```
 */

import type {
  Agent,
  KillSwitchState,
  LogEntry,
  PendingRequest,
  SystemState,
} from './types.js';

// ---------------------------------------------------------------------------
// Event type constants
// ---------------------------------------------------------------------------

/** Emitted after an automatic verdict has been written to the audit log. */
export const EVENT_DECISION_RECORDED = 'decision:recorded' as const;

/** Emitted after an escalated request has been persisted as pending. */
export const EVENT_DECISION_ESCALATED = 'decision:escalated' as const;

/** Emitted after a human resolution and its audit entry have been written. */
export const EVENT_ESCALATION_RESOLVED = 'escalation:resolved' as const;

/** Emitted after the system kill switch row has been updated. */
export const EVENT_KILLSWITCH_CHANGED = 'killswitch:changed' as const;

/** Emitted after an owner enabled or disabled an agent. */
export const EVENT_AGENT_STATUS_CHANGED = 'agent:status-changed' as const;

export type DecisionEventName =
  | typeof EVENT_DECISION_RECORDED
  | typeof EVENT_DECISION_ESCALATED
  | typeof EVENT_ESCALATION_RESOLVED
  | typeof EVENT_KILLSWITCH_CHANGED
  | typeof EVENT_AGENT_STATUS_CHANGED;

// ---------------------------------------------------------------------------
// Event payloads
// ---------------------------------------------------------------------------

export interface DecisionRecordedEventPayload {
  readonly entry: LogEntry;
}

export interface DecisionEscalatedEventPayload {
  readonly request: PendingRequest;
}

export interface EscalationResolvedEventPayload {
  /** The request in its terminal state. */
  readonly request: PendingRequest;
  readonly entry: LogEntry;
}

export interface KillSwitchChangedEventPayload {
  readonly state: SystemState;
  /** The value before the change; undefined when the row did not exist. */
  readonly previous: KillSwitchState | undefined;
}

export interface AgentStatusChangedEventPayload {
  readonly agent: Agent;
  readonly changedBy: string;
}

/**
 * Maps each event name to its payload.  Drives the generic signatures on
 * `on()`, `off()` and `emit()`.
 */
export interface DecisionEventPayloadMap {
  [EVENT_DECISION_RECORDED]: DecisionRecordedEventPayload;
  [EVENT_DECISION_ESCALATED]: DecisionEscalatedEventPayload;
  [EVENT_ESCALATION_RESOLVED]: EscalationResolvedEventPayload;
  [EVENT_KILLSWITCH_CHANGED]: KillSwitchChangedEventPayload;
  [EVENT_AGENT_STATUS_CHANGED]: AgentStatusChangedEventPayload;
}

export type DecisionEventListener<E extends DecisionEventName> = (
  payload: DecisionEventPayloadMap[E],
) => void;

interface ListenerEntry<E extends DecisionEventName> {
  readonly listener: DecisionEventListener<E>;
  readonly once: boolean;
}

type ListenerRegistry = {
  readonly [E in DecisionEventName]: ListenerEntry<E>[];
};

// ---------------------------------------------------------------------------
// DecisionEventEmitter
// ---------------------------------------------------------------------------

/**
 * Typed event emitter.  Listeners run synchronously in registration order.
 */
export class DecisionEventEmitter {
  readonly #registry: ListenerRegistry = {
    [EVENT_DECISION_RECORDED]: [],
    [EVENT_DECISION_ESCALATED]: [],
    [EVENT_ESCALATION_RESOLVED]: [],
    [EVENT_KILLSWITCH_CHANGED]: [],
    [EVENT_AGENT_STATUS_CHANGED]: [],
  };

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /** Registers a persistent listener. */
  on<E extends DecisionEventName>(event: E, listener: DecisionEventListener<E>): this {
    this.#entries(event).push({ listener, once: false });
    return this;
  }

  /** Registers a listener that is removed after its first invocation. */
  once<E extends DecisionEventName>(event: E, listener: DecisionEventListener<E>): this {
    this.#entries(event).push({ listener, once: true });
    return this;
  }

  /**
   * Removes the first registration of `listener` for `event`.
   */
  off<E extends DecisionEventName>(event: E, listener: DecisionEventListener<E>): this {
    const entries = this.#entries(event);
    const index = entries.findIndex((entry) => entry.listener === listener);
    if (index !== -1) {
      entries.splice(index, 1);
    }
    return this;
  }

  /**
   * Invokes every listener for `event` with `payload`.
   *
   * Once-listeners are removed before any listener runs, so a listener that
   * re-emits the same event cannot fire them twice.
   *
   * @returns true if at least one listener was invoked.
   */
  emit<E extends DecisionEventName>(event: E, payload: DecisionEventPayloadMap[E]): boolean {
    const entries = this.#entries(event);
    if (entries.length === 0) return false;

    const snapshot = [...entries];
    for (let index = entries.length - 1; index >= 0; index--) {
      if (entries[index]?.once === true) {
        entries.splice(index, 1);
      }
    }

    for (const { listener } of snapshot) {
      listener(payload);
    }
    return true;
  }

  /** Clears listeners for one event, or for all events. */
  removeAllListeners(event?: DecisionEventName): this {
    if (event !== undefined) {
      this.#entries(event).length = 0;
    } else {
      for (const entries of Object.values(this.#registry)) {
        entries.length = 0;
      }
    }
    return this;
  }

  listenerCount(event: DecisionEventName): number {
    return this.#entries(event).length;
  }

  // -------------------------------------------------------------------------
  // Private helpers
  // -------------------------------------------------------------------------

  #entries<E extends DecisionEventName>(event: E): ListenerEntry<E>[] {
    return this.#registry[event];
  }
}
