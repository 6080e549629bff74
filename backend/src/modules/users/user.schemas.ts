/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - List/count queries are built from caller input (controllers pass query
 *   strings through). Only enumerated sort fields and bounded pagination get
 *   as far as the query builder.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Email normalized to lowercase in the DAL, not here.
 */

import { z } from 'zod';
import { USER_ROLES, USER_SORT_FIELDS } from './user.types';

export const USER_LIST_DEFAULTS = {
  limit: 10,
  maxLimit: 100,
} as const;

export const userFilterSchema = z
  .object({
    role: z.enum(USER_ROLES).optional(),
    search: z.string().trim().min(1).max(100).optional(),
  })
  .strict();

export type UserFilterInput = z.input<typeof userFilterSchema>;

export const userListQuerySchema = z
  .object({
    filter: userFilterSchema.default({}),
    sort: z
      .object({
        field: z.enum(USER_SORT_FIELDS).default('id'),
        direction: z.enum(['asc', 'desc']).default('asc'),
      })
      .strict()
      .default({}),
    limit: z.coerce
      .number()
      .int()
      .min(1)
      .max(USER_LIST_DEFAULTS.maxLimit)
      .default(USER_LIST_DEFAULTS.limit),
    offset: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  })
  .strict();

export type UserListQueryInput = z.input<typeof userListQuerySchema>;
