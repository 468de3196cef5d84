// Schema Validator
// Checks instructions, result and feedback documents before they are written
// Never throws: every problem comes back as a path-prefixed message

import { z } from 'zod';
import {
  failFeedbackSchema,
  instructionsSchema,
  passFeedbackSchema,
  resultSchema,
} from '../../domain/schemas/documents';
import { ValidationOutcome } from '../../domain/types/types';

function formatPath(issuePath: (string | number)[]): string {
  return issuePath.length > 0 ? issuePath.join('.') : 'root';
}

export function validate(doc: unknown, schema: z.ZodTypeAny): ValidationOutcome {
  const parsed = schema.safeParse(doc);
  if (parsed.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: parsed.error.issues.map(issue => `${formatPath(issue.path)}: ${issue.message}`),
  };
}

export function validateInstructions(doc: unknown): ValidationOutcome {
  return validate(doc, instructionsSchema);
}

export function validateResult(doc: unknown): ValidationOutcome {
  return validate(doc, resultSchema);
}

/**
 * Dispatches on `status`; anything other than PASS or FAIL is itself an error
 */
export function validateFeedback(doc: unknown): ValidationOutcome {
  if (typeof doc !== 'object' || doc === null || Array.isArray(doc)) {
    return { valid: false, errors: ['root: Expected object'] };
  }

  const status = 'status' in doc ? doc.status : undefined;
  if (status === 'PASS') {
    return validate(doc, passFeedbackSchema);
  }
  if (status === 'FAIL') {
    return validate(doc, failFeedbackSchema);
  }
  return {
    valid: false,
    errors: [`status: Invalid status '${String(status)}' (must be 'PASS' or 'FAIL')`],
  };
}
