// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { EscalationManager, humanDecisionEntry } from './manager.js';
export type { EscalationTarget, ResolveInput, ResolvedEscalation } from './manager.js';
