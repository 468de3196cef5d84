// Prompt Builder - deterministic prompt construction for the worker
// Prompts are data, not instructions
// No summarization, no paraphrasing: gap text is carried over verbatim

import { FailFeedback, InstructionsDocument } from '../types/types';

export const FEEDBACK_HEADER = 'Previous attempt had these issues:';
export const FEEDBACK_FOOTER = 'Please address these issues.';

export function buildInitialPrompt(instructions: InstructionsDocument): string {
  return instructions.instructions;
}

/**
 * Original instructions, then one "- gap" line per gap, then a closing request
 */
export function buildFeedbackPrompt(instructions: InstructionsDocument, feedback: FailFeedback): string {
  const gapLines = feedback.gaps.map(gap => `- ${gap}`).join('\n');
  return `${instructions.instructions}\n\n${FEEDBACK_HEADER}\n${gapLines}\n\n${FEEDBACK_FOOTER}`;
}
