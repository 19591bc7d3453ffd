// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { AuditRecorder } from './recorder.js';
export { createLogEntry } from './entry.js';
export type { LogEntryInput } from './entry.js';
export { filterLogEntries, normalizeLogQuery } from './query.js';
export { GENESIS_HASH, chainTip, computeEntryHash, sealLogEntry, verifyChain } from './chain.js';
