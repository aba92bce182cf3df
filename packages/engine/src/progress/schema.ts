/**
 * Progress Schemas
 *
 * Validation of persisted progress read back from disk or the database.
 * Unknown keys pass through so older builds can read newer documents;
 * fields added later default when missing.
 */

import { z } from 'zod';

import { FAILURE_CATEGORIES } from '../workflows/types.js';
import type { JsonValue } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

export const StepCheckpointSchema = z.object({
  step_id: z.string(),
  data: z.record(JsonValueSchema),
});

export const ProgressErrorSchema = z.object({
  step_id: z.string(),
  category: z.enum(FAILURE_CATEGORIES),
  code: z.string(),
  message: z.string(),
  at: z.number(),
});

export const ProgressRecordSchema = z
  .object({
    workflow: z.string().min(1),
    counter: z.number().int().nonnegative(),
    crossed_thresholds: z.array(z.number().int().positive()).default([]),
    last_completed_step_id: z.string().nullable().default(null),
    completed: z.boolean().default(false),
    created_at: z.number().default(0),
    updated_at: z.number().default(0),
    checkpoint: StepCheckpointSchema.nullable().default(null),
    attributes: z.record(JsonValueSchema).default({}),
    last_error: ProgressErrorSchema.nullable().default(null),
  })
  .passthrough();

export const PROGRESS_DOCUMENT_VERSION = 1;

export const ProgressDocumentSchema = z
  .object({
    version: z.number().int().positive(),
    workflows: z.record(ProgressRecordSchema),
  })
  .passthrough();
