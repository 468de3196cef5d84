export enum LlmProvider {
  OLLAMA = 'ollama',
  STUB = 'stub',
}
