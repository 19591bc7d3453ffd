// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import type { Logger } from 'pino';
import { parseEngineConfig } from './config.js';
import type { StorageConfig } from './config.js';
import { DecisionEngine } from './engine.js';
import { toSystemError } from './errors.js';
import type { DecisionEventEmitter } from './events.js';
import { createLogger } from './logger.js';
import type { StorageAdapter } from './storage/adapter.js';
import { MemoryStorageAdapter } from './storage/memory.js';
import { SQLiteStorageAdapter } from './storage/sqlite.js';
import type { DecisionTracer } from './telemetry/otel.js';

/** Collaborators that are not expressible as configuration. */
export interface DecisionEngineOverrides {
  /** Used instead of the store named by `config.storage`. */
  storage?: StorageAdapter;
  logger?: Logger;
  events?: DecisionEventEmitter;
  tracer?: DecisionTracer;
  now?: () => Date;
}

function createStorage(
  config: StorageConfig,
  hashChain: boolean,
  now: (() => Date) | undefined,
): StorageAdapter {
  const clock = now !== undefined ? { now } : {};
  switch (config.driver) {
    case 'memory':
      return new MemoryStorageAdapter({ hashChain, ...clock });
    case 'sqlite':
      return new SQLiteStorageAdapter({
        database: config.path,
        tablePrefix: config.tablePrefix,
        hashChain,
        ...clock,
      });
  }
}

/**
 * Builds a DecisionEngine from configuration: validates it, creates the
 * logger and the configured store, connects the store and wires everything
 * together.
 *
 * A store the factory built itself is closed again when it fails to
 * connect.
 *
 * @throws InvalidConfigError when `config` does not match EngineConfigSchema.
 * @throws SystemError when the store cannot be opened or connected.
 */
export async function createDecisionEngine(
  config: unknown = {},
  overrides: DecisionEngineOverrides = {},
): Promise<DecisionEngine> {
  const parsed = parseEngineConfig(config);
  const logger = overrides.logger ?? createLogger(parsed.logging);
  const owned = overrides.storage === undefined;

  let storage: StorageAdapter;
  try {
    storage = overrides.storage ?? createStorage(parsed.storage, parsed.audit.hashChain, overrides.now);
  } catch (error: unknown) {
    throw toSystemError('connect', error);
  }

  try {
    await storage.connect();
  } catch (error: unknown) {
    if (owned) {
      await storage.disconnect();
    }
    throw toSystemError('connect', error);
  }

  logger.info(
    { storage: owned ? parsed.storage.driver : 'custom', timeZone: parsed.conditions.timeZone },
    'decision engine ready',
  );

  return new DecisionEngine({
    storage,
    logger,
    timeZone: parsed.conditions.timeZone,
    hashChain: parsed.audit.hashChain,
    ...(overrides.events !== undefined && { events: overrides.events }),
    ...(overrides.tracer !== undefined && { tracer: overrides.tracer }),
    ...(overrides.now !== undefined && { now: overrides.now }),
  });
}
