import Ajv from 'ajv';
import { estimateCostUsd, parseModelJson, RoutedInferenceService } from '../../src/llm/inference-service';
import { CompletionBackend, LLMCompletionRequest, LLMCompletionResponse } from '../../src/llm/types';

interface Verdict {
  decision: string;
}

const validateVerdict = new Ajv().compile<Verdict>({
  type: 'object',
  properties: { decision: { type: 'string' } },
  required: ['decision'],
});

function response(content: string, overrides: Partial<LLMCompletionResponse> = {}): LLMCompletionResponse {
  return {
    content,
    finishReason: 'stop',
    model: 'gpt-4.1-mini',
    provider: 'openai',
    usage: { promptTokens: 1000, completionTokens: 500, totalTokens: 1500 },
    latencyMs: 10,
    ...overrides,
  };
}

describe('RoutedInferenceService', () => {
  let complete: jest.Mock<Promise<LLMCompletionResponse>, [LLMCompletionRequest, string | undefined]>;
  let service: RoutedInferenceService;

  const infer = (signal?: AbortSignal, timeoutMs = 1000) =>
    service.infer({
      purpose: 'judge',
      messages: [{ role: 'user', content: 'Evaluate this reply' }],
      validate: validateVerdict,
      timeoutMs,
      provider: 'anthropic',
      signal,
    });

  beforeEach(() => {
    complete = jest.fn<Promise<LLMCompletionResponse>, [LLMCompletionRequest, string | undefined]>();
    const backend: CompletionBackend = {
      complete: (request, preferred) => complete(request, preferred),
      healthCheck: async () => ({}),
    };
    service = new RoutedInferenceService(backend, { temperature: 0.2, maxTokens: 400 });
  });

  it('should return validated data with cost metadata', async () => {
    complete.mockResolvedValue(response('{"decision":"send"}'));

    const result = await infer();

    expect(result.ok && result.data).toEqual({ decision: 'send' });
    expect(result.meta).toMatchObject({ provider: 'openai', model: 'gpt-4.1-mini' });
    expect(result.meta.costUsd).toBeCloseTo(0.0012, 10);
    expect(complete).toHaveBeenCalledWith(
      expect.objectContaining({ temperature: 0.2, maxTokens: 400, jsonMode: true }),
      'anthropic',
    );
  });

  it('should accept JSON wrapped in a code fence', async () => {
    complete.mockResolvedValue(response('```json\n{"decision":"draft"}\n```'));

    const result = await infer();

    expect(result.ok && result.data).toEqual({ decision: 'draft' });
  });

  it('should report unparsable output as malformed', async () => {
    complete.mockResolvedValue(response('Sure! Here is my verdict.'));

    const result = await infer();

    expect(!result.ok && result.error.kind).toBe('malformed');
  });

  it('should report a schema mismatch as malformed', async () => {
    complete.mockResolvedValue(response('{"verdict":"send"}'));

    const result = await infer();

    expect(!result.ok && result.error.message).toMatch(/^Schema mismatch/);
  });

  it('should report output cut off at the token limit as malformed', async () => {
    complete.mockResolvedValue(response('{"decision":"se', { finishReason: 'length' }));

    const result = await infer();

    expect(!result.ok && result.error).toEqual({ kind: 'malformed', message: 'Output truncated at 400 tokens' });
    expect(result.meta.costUsd).toBeCloseTo(0.0012, 10);
  });

  it('should report a provider failure as a service error', async () => {
    complete.mockRejectedValue(new Error('All LLM providers failed. Last error: overloaded'));

    const result = await infer();

    expect(!result.ok && result.error.kind).toBe('service');
  });

  it('should time out a slow call', async () => {
    complete.mockImplementation(() => new Promise<LLMCompletionResponse>(() => undefined));

    const result = await infer(undefined, 20);

    expect(!result.ok && result.error.kind).toBe('timeout');
  });

  it('should not call the backend once the caller has aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await infer(controller.signal);

    expect(!result.ok && result.error.kind).toBe('aborted');
    expect(complete).not.toHaveBeenCalled();
  });
});

describe('inference helpers', () => {
  it('should price known models by prefix and unknown ones at zero', () => {
    const usage = { promptTokens: 2000, completionTokens: 1000, totalTokens: 3000 };

    expect(estimateCostUsd('gemini-2.0-flash-001', usage)).toBeCloseTo(0.0006, 10);
    expect(estimateCostUsd('local-model', usage)).toBe(0);
  });

  it('should strip a bare code fence', () => {
    expect(parseModelJson('```\n{"a":1}\n```')).toEqual({ a: 1 });
  });
});
