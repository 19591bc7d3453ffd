// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { InvalidConfigError } from '../errors.js';
import type { StorageAdapter } from './adapter.js';

const SeedAgentSchema = z.object({
  id: z.string().trim().min(1),
  owner: z.string().trim().min(1),
  status: z.enum(['active', 'disabled']).default('active'),
  name: z.string().optional(),
});

const SeedPermissionSchema = z.object({
  id: z.string().min(1).optional(),
  agentId: z.string().trim().min(1),
  action: z.string().trim().min(1),
  resource: z.string().trim().min(1),
  condition: z.string().optional(),
});

/**
 * Zod schema for a seed document: the administrative records the engine
 * reads but never writes.
 */
export const SeedSchema = z.object({
  agents: z.array(SeedAgentSchema).default([]),
  permissions: z.array(SeedPermissionSchema).default([]),
  killSwitch: z.enum(['enabled', 'disabled']).optional(),
});

export type SeedInput = z.input<typeof SeedSchema>;

export interface SeedSummary {
  readonly agents: number;
  readonly permissions: number;
}

/**
 * Loads agents and permission grants into a connected store.
 *
 * Permissions are added in document order, which is the order the
 * permission rule sees them in.
 *
 * @throws InvalidConfigError when the document does not match SeedSchema.
 */
export async function seedStorage(
  storage: StorageAdapter,
  raw: unknown,
  now: () => Date = () => new Date(),
): Promise<SeedSummary> {
  const result = SeedSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  const seed = result.data;
  const timestamp = now().toISOString();

  for (const agent of seed.agents) {
    await storage.saveAgent({ ...agent, createdAt: timestamp, updatedAt: timestamp });
  }
  for (const permission of seed.permissions) {
    await storage.addPermission({
      ...permission,
      id: permission.id ?? randomUUID(),
      createdAt: timestamp,
    });
  }
  if (seed.killSwitch !== undefined) {
    await storage.setSystemState({ killSwitch: seed.killSwitch, updatedAt: timestamp, updatedBy: 'seed' });
  }

  return { agents: seed.agents.length, permissions: seed.permissions.length };
}
