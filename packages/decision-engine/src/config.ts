// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';
import { InvalidConfigError } from './errors.js';

// ---------------------------------------------------------------------------
// Condition config
// ---------------------------------------------------------------------------

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Zod schema for ConditionConfig.
 *
 * `timeZone` selects the wall clock that `time` comparisons in permission
 * conditions are evaluated against.
 */
export const ConditionConfigSchema = z.object({
  timeZone: z
    .string()
    .min(1)
    .refine(isValidTimeZone, { message: 'must be a valid IANA time zone' })
    .default('UTC'),
});

export type ConditionConfig = z.infer<typeof ConditionConfigSchema>;

// ---------------------------------------------------------------------------
// Audit config
// ---------------------------------------------------------------------------

/**
 * Zod schema for AuditConfig.
 */
export const AuditConfigSchema = z.object({
  /**
   * Link every log entry to its predecessor with a SHA-256 hash.  Defaults
   * to true.  When false, entries carry empty hash fields.
   */
  hashChain: z.boolean().default(true),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

// ---------------------------------------------------------------------------
// Logging config
// ---------------------------------------------------------------------------

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Zod schema for LoggingConfig.
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  /** Route output through pino-pretty.  Intended for local development only. */
  pretty: z.boolean().default(false),
  name: z.string().min(1).default('agent-gate'),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

// ---------------------------------------------------------------------------
// Storage config
// ---------------------------------------------------------------------------

const MemoryStorageConfigSchema = z.object({
  driver: z.literal('memory'),
});

const SQLiteStorageConfigSchema = z.object({
  driver: z.literal('sqlite'),
  /** Database file path, or ":memory:". */
  path: z.string().min(1),
  tablePrefix: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid SQL identifier prefix')
    .default('gate_'),
});

/**
 * Zod schema for StorageConfig.  Defaults to the in-memory driver.
 */
export const StorageConfigSchema = z.discriminatedUnion('driver', [
  MemoryStorageConfigSchema,
  SQLiteStorageConfigSchema,
]);

export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// ---------------------------------------------------------------------------
// Root engine config
// ---------------------------------------------------------------------------

/**
 * Zod schema for the top-level EngineConfig.
 */
export const EngineConfigSchema = z.object({
  conditions: ConditionConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  storage: StorageConfigSchema.default({ driver: 'memory' }),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/** The shape accepted before defaults are applied. */
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

// ---------------------------------------------------------------------------
// Parsing helpers
// ---------------------------------------------------------------------------

function parseWith<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`,
    );
    throw new InvalidConfigError(messages);
  }
  return result.data;
}

/**
 * Parse and validate a raw config object, throwing InvalidConfigError on
 * failure.
 */
export function parseEngineConfig(raw: unknown = {}): EngineConfig {
  return parseWith(EngineConfigSchema, raw);
}

/**
 * Parse and validate a LoggingConfig, throwing InvalidConfigError on failure.
 */
export function parseLoggingConfig(raw: unknown = {}): LoggingConfig {
  return parseWith(LoggingConfigSchema, raw);
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

function readFlag(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;
  const normalised = value.trim().toLowerCase();
  if (normalised === 'true' || normalised === '1') return true;
  if (normalised === 'false' || normalised === '0') return false;
  throw new InvalidConfigError([`${name}: expected true/false, received "${value}"`]);
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Build an EngineConfig from environment variables.
 *
 *   AGENT_GATE_TIME_ZONE   conditions.timeZone
 *   AGENT_GATE_HASH_CHAIN  audit.hashChain          (true/false)
 *   AGENT_GATE_LOG_LEVEL   logging.level
 *   AGENT_GATE_LOG_PRETTY  logging.pretty           (true/false)
 *   AGENT_GATE_STORAGE     storage.driver           (memory/sqlite)
 *   AGENT_GATE_DB_PATH     storage.path             (sqlite only)
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const driver = readString(env, 'AGENT_GATE_STORAGE') ?? 'memory';

  return parseEngineConfig({
    conditions: { timeZone: readString(env, 'AGENT_GATE_TIME_ZONE') },
    audit: { hashChain: readFlag(env, 'AGENT_GATE_HASH_CHAIN') },
    logging: {
      level: readString(env, 'AGENT_GATE_LOG_LEVEL'),
      pretty: readFlag(env, 'AGENT_GATE_LOG_PRETTY'),
    },
    storage:
      driver === 'sqlite'
        ? { driver, path: readString(env, 'AGENT_GATE_DB_PATH') }
        : { driver },
  });
}
