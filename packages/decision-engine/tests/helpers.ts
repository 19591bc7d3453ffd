// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { readFileSync } from 'node:fs';
import type { StorageAdapter } from '../src/storage/adapter.js';
import { MemoryStorageAdapter } from '../src/storage/memory.js';
import { seedStorage } from '../src/storage/seed.js';
import { DecisionEngine } from '../src/engine.js';
import type { DecisionEngineOptions } from '../src/engine.js';

export const START = '2026-03-02T10:00:00.000Z';

/** A manually advanced clock. */
export interface TestClock {
  now: () => Date;
  set(iso: string): void;
  advance(ms: number): void;
}

export function makeClock(iso: string = START): TestClock {
  let current = Date.parse(iso);
  return {
    now: () => new Date(current),
    set(next: string) {
      current = Date.parse(next);
    },
    advance(ms: number) {
      current += ms;
    },
  };
}

export function loadSeedFixture(): unknown {
  return JSON.parse(readFileSync(new URL('./fixtures/seed.json', import.meta.url), 'utf8'));
}

/**
 * Connected memory store holding the fixture agents:
 *   a1 active,   read/db unconditional
 *   a2 disabled, read/db unconditional
 *   a3 active,   export/reports during 09:00–18:00 UTC
 */
export async function seededStorage(clock: TestClock = makeClock()): Promise<MemoryStorageAdapter> {
  const storage = new MemoryStorageAdapter({ now: clock.now });
  await storage.connect();
  await seedStorage(storage, loadSeedFixture(), clock.now);
  return storage;
}

export interface EngineHarness {
  engine: DecisionEngine;
  storage: StorageAdapter;
  clock: TestClock;
}

export async function seededEngine(
  options: Partial<DecisionEngineOptions> = {},
): Promise<EngineHarness> {
  const clock = makeClock();
  const storage = options.storage ?? (await seededStorage(clock));
  const engine = new DecisionEngine({ now: clock.now, ...options, storage });
  return { engine, storage, clock };
}
