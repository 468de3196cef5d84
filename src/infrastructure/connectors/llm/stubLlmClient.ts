// Offline LLM stand-in
// Replies from a fixed script; the last reply repeats once the script runs out

import { LlmConfig } from '../../../config/llmConfig';
import { LlmClientPort } from '../../../domain/ports/llmProvider';

export const DEFAULT_STUB_REPLIES: readonly string[] = ['PASS'];

export class StubLlmClient implements LlmClientPort {
  private prompts: string[] = [];

  constructor(private replies: readonly string[] = DEFAULT_STUB_REPLIES) {
    if (replies.length === 0) {
      throw new RangeError('StubLlmClient needs at least one reply');
    }
  }

  async call(prompt: string, _config: LlmConfig): Promise<string> {
    this.prompts.push(prompt);
    const index = Math.min(this.prompts.length, this.replies.length) - 1;
    return this.replies[index];
  }

  getPrompts(): string[] {
    return [...this.prompts];
  }
}
