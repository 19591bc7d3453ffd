// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

export { DecisionTracer } from './otel.js';
export type {
  DecisionTracerConfig,
  OTelSpanLike,
  OTelTracerLike,
  TracedRequest,
} from './otel.js';
