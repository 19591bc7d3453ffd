// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { pino } from 'pino';
import type { Logger } from 'pino';
import { parseLoggingConfig } from './config.js';

export type { Logger } from 'pino';

/**
 * Creates the engine's structured logger.
 *
 * Operator telemetry only: the audit trail lives in the store, never in log
 * output.
 */
export function createLogger(config: unknown = {}): Logger {
  const { level, pretty, name } = parseLoggingConfig(config);

  return pino({
    level,
    name,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
        },
      },
    }),
  });
}

/** A logger that discards everything; the default when none is supplied. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
