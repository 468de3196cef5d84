// Port: Worker
// What the feedback loop needs from whoever produces results

import { FailFeedback, InstructionsDocument } from '../types/types';

export interface WorkerPort {
  execute(instructions: InstructionsDocument): Promise<unknown>;
  executeWithFeedback(instructions: InstructionsDocument, feedback: FailFeedback): Promise<unknown>;
}
