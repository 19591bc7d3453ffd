// SPDX-License-Identifier: BSL-1.1
// Copyright (c) 2026 MuVeraAI Corporation

import { z } from 'zod';

/**
 * An agent, action, resource, request or human id.  Blank values are
 * rejected; the value itself is kept as given, so lookups match stored ids
 * exactly.
 */
export const Identifier = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
  .refine((value) => value.trim().length > 0, { message: 'must not be blank' });
