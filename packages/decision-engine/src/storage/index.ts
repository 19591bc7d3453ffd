// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export type {
  LogEntryFilter,
  ResolveOutcome,
  StorageAdapter,
  StorageAdapterOptions,
} from './adapter.js';
export { MemoryStorageAdapter } from './memory.js';
export { SQLiteStorageAdapter } from './sqlite.js';
export type { SQLiteStorageConfig } from './sqlite.js';
export { SeedSchema, seedStorage } from './seed.js';
export type { SeedInput, SeedSummary } from './seed.js';
