// Document Schemas
// Shapes of instructions.json, result.json and feedback.json; unknown keys are kept

import { z } from 'zod';

const nonEmptyString = z.string().min(1, 'must be a non-empty string');

export const instructionsSchema = z
  .object({
    instructions: nonEmptyString,
    output_path: nonEmptyString,
    pod_id: z.string().optional(),
    session_id: z.string().optional(),
    project_root: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough();

// `result` may hold any JSON value, including null, but the key itself is required
export const resultSchema = z
  .object({
    result: z.unknown(),
    worker_id: z.string().optional(),
    pod_id: z.string().optional(),
    session_id: z.string().optional(),
    timestamp: z.string().optional(),
  })
  .passthrough()
  .refine(doc => 'result' in doc, { message: 'Required', path: ['result'] });

export const passFeedbackSchema = z
  .object({
    status: z.literal('PASS'),
    result: z.unknown(),
    attempts: z.number().int().min(1),
    timestamp: nonEmptyString,
    pod_id: z.string(),
  })
  .passthrough()
  .refine(doc => 'result' in doc, { message: 'Required', path: ['result'] });

export const failFeedbackSchema = z
  .object({
    status: z.literal('FAIL'),
    gaps: z.array(z.string()).min(1, 'must list at least one gap'),
    attempt: z.number().int().min(1),
    timestamp: nonEmptyString,
    pod_id: z.string(),
  })
  .passthrough();
