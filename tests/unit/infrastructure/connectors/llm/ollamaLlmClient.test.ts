import { OllamaLlmClient, toLlmError } from '@/infrastructure/connectors/llm/ollamaLlmClient';
import { LlmConfig } from '@/config/llmConfig';
import { LlmProvider } from '@/domain/agents/enums/provider';
import { LlmError, LlmErrorKind } from '@/domain/types/errors';
import { createMockLogger } from '@mocks/adapters/logger.mock';

const mockChat = jest.fn();
const mockAbort = jest.fn();
const mockConstruct = jest.fn();

jest.mock('ollama', () => ({
  Ollama: jest.fn().mockImplementation((options: unknown) => {
    mockConstruct(options);
    return { chat: mockChat, abort: mockAbort };
  }),
}));

const CONFIG: LlmConfig = {
  provider: LlmProvider.OLLAMA,
  model: 'llama3',
  baseUrl: 'http://localhost:11434',
  timeoutMs: 5000,
};

function httpError(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { status_code: statusCode });
}

describe('OllamaLlmClient', () => {
  let client: OllamaLlmClient;

  beforeEach(() => {
    jest.clearAllMocks();
    client = new OllamaLlmClient(createMockLogger());
  });

  it('should send the prompt as a single user message', async () => {
    mockChat.mockResolvedValue({ message: { role: 'assistant', content: '4' }, eval_count: 3 });

    await expect(client.call('Compute 2+2', CONFIG)).resolves.toBe('4');

    expect(mockConstruct).toHaveBeenCalledWith({ host: 'http://localhost:11434', headers: undefined });
    expect(mockChat).toHaveBeenCalledWith({
      model: 'llama3',
      messages: [{ role: 'user', content: 'Compute 2+2' }],
      options: undefined,
    });
  });

  it('should pass the API key and temperature through', async () => {
    mockChat.mockResolvedValue({ message: { role: 'assistant', content: 'ok' }, eval_count: 1 });

    await client.call('hi', { ...CONFIG, apiKey: 'test-secret', temperature: 0.2 });

    expect(mockConstruct).toHaveBeenCalledWith({
      host: 'http://localhost:11434',
      headers: { Authorization: 'Bearer test-secret' },
    });
    expect(mockChat).toHaveBeenCalledWith(expect.objectContaining({ options: { temperature: 0.2 } }));
  });

  it('should map HTTP 429 to a rate limit error', async () => {
    mockChat.mockRejectedValue(httpError('too many requests', 429));

    await expect(client.call('hi', CONFIG)).rejects.toMatchObject({
      kind: LlmErrorKind.RATE_LIMIT,
      detail: 'too many requests',
    });
  });

  it('should map other failures to API errors', async () => {
    mockChat.mockRejectedValue(httpError('model not found', 404));

    await expect(client.call('hi', CONFIG)).rejects.toMatchObject({
      kind: LlmErrorKind.API,
      message: 'API: model not found',
    });
  });

  it('should abort the request and raise a timeout when no reply arrives', async () => {
    mockChat.mockReturnValue(new Promise(() => undefined));

    const error = await client.call('hi', { ...CONFIG, timeoutMs: 20 }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({ kind: LlmErrorKind.TIMEOUT, detail: 'no response from llama3 after 20ms' });
    expect(mockAbort).toHaveBeenCalledTimes(1);
  });
});

describe('toLlmError', () => {
  it('should keep existing LLM errors', () => {
    const error = new LlmError(LlmErrorKind.TIMEOUT, 'slow');

    expect(toLlmError(error)).toBe(error);
  });

  it('should wrap non-error values', () => {
    expect(toLlmError('socket hang up')).toMatchObject({ kind: LlmErrorKind.API, detail: 'socket hang up' });
  });
});
