// Workflow File Schema
// Steps a workflow JSON file may list; custom steps need code and are only built programmatically

import { z } from 'zod';

const stepOptions = {
  id: z.string().min(1).optional(),
  checkpoint: z.boolean().optional(),
};

const pathString = z.string().min(1, 'must be a non-empty path');

export const workflowStepSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('load_config'), configPath: pathString, ...stepOptions }),
  z.object({
    kind: z.literal('create_session'),
    agentName: z.string().optional(),
    projectRoot: z.string().optional(),
    ...stepOptions,
  }),
  z.object({ kind: z.literal('create_pod'), podName: z.string().min(1), ...stepOptions }),
  z.object({ kind: z.literal('create_worker'), workerId: z.string().min(1), ...stepOptions }),
  z.object({ kind: z.literal('write_instructions'), instructions: z.string().min(1), ...stepOptions }),
  z.object({ kind: z.literal('write_file'), path: pathString, data: z.unknown().optional(), ...stepOptions }),
  z.object({ kind: z.literal('create_file'), path: pathString, ...stepOptions }),
  z.object({ kind: z.literal('verify_files'), expectedCount: z.number().int().min(0), ...stepOptions }),
]);

export const workflowFileSchema = z.object({
  steps: z.array(workflowStepSchema).min(1, 'must list at least one step'),
});
