/**
 * API Schemas with Zod validation
 *
 * Defines request schemas for HTTP endpoints with validation
 */

import { z } from 'zod';

export const SimilarRequestSchema = z.object({
  name: z.string().trim().min(1, 'name is required').max(500, 'name too long'),
  // 1-based index into the ranked candidates; bounds are checked by the resolver
  selection: z.union([z.number(), z.string()]).optional(),
  format: z.enum(['json', 'dot']).optional().default('json'),
});

export const ResolveQuerySchema = z.object({
  name: z.string().trim().min(1, 'Query parameter "name" is required'),
});
