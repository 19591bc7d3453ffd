// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { describe, it, expect } from 'vitest';
import {
  DecisionEventEmitter,
  EVENT_DECISION_RECORDED,
  EVENT_KILLSWITCH_CHANGED,
} from '../src/events.js';
import type { KillSwitchChangedEventPayload } from '../src/events.js';

const payload: KillSwitchChangedEventPayload = {
  state: { killSwitch: 'enabled', updatedAt: '2026-03-02T10:00:00.000Z' },
  previous: 'disabled',
};

describe('DecisionEventEmitter', () => {
  it('invokes listeners in registration order', () => {
    const emitter = new DecisionEventEmitter();
    const calls: string[] = [];
    emitter.on(EVENT_KILLSWITCH_CHANGED, () => calls.push('first'));
    emitter.on(EVENT_KILLSWITCH_CHANGED, () => calls.push('second'));

    expect(emitter.emit(EVENT_KILLSWITCH_CHANGED, payload)).toBe(true);
    expect(calls).toEqual(['first', 'second']);
  });

  it('returns false when nobody is listening', () => {
    expect(new DecisionEventEmitter().emit(EVENT_KILLSWITCH_CHANGED, payload)).toBe(false);
  });

  it('fires once-listeners a single time', () => {
    const emitter = new DecisionEventEmitter();
    let count = 0;
    emitter.once(EVENT_KILLSWITCH_CHANGED, () => {
      count++;
    });

    emitter.emit(EVENT_KILLSWITCH_CHANGED, payload);
    emitter.emit(EVENT_KILLSWITCH_CHANGED, payload);
    expect(count).toBe(1);
    expect(emitter.listenerCount(EVENT_KILLSWITCH_CHANGED)).toBe(0);
  });

  it('does not re-fire a once-listener when it re-emits', () => {
    const emitter = new DecisionEventEmitter();
    let count = 0;
    emitter.once(EVENT_KILLSWITCH_CHANGED, (p) => {
      count++;
      emitter.emit(EVENT_KILLSWITCH_CHANGED, p);
    });

    emitter.emit(EVENT_KILLSWITCH_CHANGED, payload);
    expect(count).toBe(1);
  });

  it('removes listeners with off', () => {
    const emitter = new DecisionEventEmitter();
    const listener = (): void => {};
    emitter.on(EVENT_KILLSWITCH_CHANGED, listener);
    emitter.off(EVENT_KILLSWITCH_CHANGED, listener);

    expect(emitter.listenerCount(EVENT_KILLSWITCH_CHANGED)).toBe(0);
  });

  it('clears one event or all events', () => {
    const emitter = new DecisionEventEmitter();
    emitter.on(EVENT_KILLSWITCH_CHANGED, () => {});
    emitter.on(EVENT_DECISION_RECORDED, () => {});

    emitter.removeAllListeners(EVENT_KILLSWITCH_CHANGED);
    expect(emitter.listenerCount(EVENT_KILLSWITCH_CHANGED)).toBe(0);
    expect(emitter.listenerCount(EVENT_DECISION_RECORDED)).toBe(1);

    emitter.removeAllListeners();
    expect(emitter.listenerCount(EVENT_DECISION_RECORDED)).toBe(0);
  });
});
