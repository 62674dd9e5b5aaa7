import { ModelRouter, ProviderBreaker } from '../../src/llm/model-router';
import { LLMCompletionRequest, LLMCompletionResponse, LLMProvider, LLMProviderName } from '../../src/llm/types';

class StubProvider implements LLMProvider {
  readonly requests: LLMCompletionRequest[] = [];
  failWith?: Error;

  constructor(
    readonly name: LLMProviderName,
    readonly model: string,
  ) {}

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    this.requests.push(request);
    if (this.failWith) throw this.failWith;
    return {
      content: '{}',
      finishReason: 'stop',
      model: request.model ?? this.model,
      provider: this.name,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      latencyMs: 1,
    };
  }

  async healthCheck(): Promise<boolean> {
    return !this.failWith;
  }
}

const REQUEST: LLMCompletionRequest = {
  messages: [{ role: 'user', content: 'hello' }],
  temperature: 0,
  maxTokens: 100,
  jsonMode: true,
};

describe('ModelRouter', () => {
  let openai: StubProvider;
  let anthropic: StubProvider;
  let router: ModelRouter;

  beforeEach(() => {
    openai = new StubProvider('openai', 'gpt-4.1-mini');
    anthropic = new StubProvider('anthropic', 'claude-sonnet-4-5');
    router = new ModelRouter(
      { primaryProvider: 'openai', secondaryProvider: 'anthropic' },
      new Map<LLMProviderName, LLMProvider>([
        ['openai', openai],
        ['anthropic', anthropic],
      ]),
    );
  });

  it('should use the primary provider', async () => {
    const response = await router.complete(REQUEST);

    expect(response.provider).toBe('openai');
    expect(anthropic.requests).toHaveLength(0);
  });

  it('should honour a preferred provider', async () => {
    const response = await router.complete({ ...REQUEST, model: 'claude-haiku-4-5' }, 'anthropic');

    expect(response).toMatchObject({ provider: 'anthropic', model: 'claude-haiku-4-5' });
  });

  it('should fail over and drop a model override meant for another provider', async () => {
    anthropic.failWith = new Error('overloaded');

    const response = await router.complete({ ...REQUEST, model: 'claude-haiku-4-5' }, 'anthropic');

    expect(response).toMatchObject({ provider: 'openai', model: 'gpt-4.1-mini' });
    expect(openai.requests[0].model).toBeUndefined();
  });

  it('should open the circuit after repeated failures', async () => {
    openai.failWith = new Error('rate limited');

    for (let i = 0; i < 5; i++) {
      await router.complete(REQUEST);
    }
    await router.complete(REQUEST);

    expect(openai.requests).toHaveLength(5);
    expect(anthropic.requests).toHaveLength(6);
  });

  it('should throw when every provider fails', async () => {
    openai.failWith = new Error('rate limited');
    anthropic.failWith = new Error('overloaded');

    await expect(router.complete(REQUEST)).rejects.toThrow('All LLM providers failed. Last error: overloaded');
  });

  it('should rethrow a caller abort without failing over', async () => {
    const controller = new AbortController();
    controller.abort();
    openai.failWith = new Error('aborted');

    await expect(router.complete({ ...REQUEST, signal: controller.signal })).rejects.toThrow('aborted');
    expect(anthropic.requests).toHaveLength(0);
  });

  it('should refuse a missing primary provider', () => {
    expect(() => new ModelRouter({ primaryProvider: 'gemini' }, new Map<LLMProviderName, LLMProvider>([['openai', openai]]))).toThrow(
      /Primary provider "gemini" not available/,
    );
  });

  it('should report provider health', async () => {
    anthropic.failWith = new Error('down');

    const health = await router.healthCheck();

    expect(health.openai.status).toBe('ok');
    expect(health.anthropic.status).toBe('error');
  });
});

describe('ProviderBreaker', () => {
  it('should open after the threshold and allow one trial after the window', () => {
    const breaker = new ProviderBreaker({ threshold: 2, resetMs: 1000 });

    expect(breaker.recordFailure(0)).toBe(false);
    expect(breaker.recordFailure(0)).toBe(true);
    expect(breaker.isOpen(999)).toBe(true);
    expect(breaker.isOpen(1000)).toBe(false);

    expect(breaker.recordFailure(1000)).toBe(true);
    expect(breaker.isOpen(1500)).toBe(true);
  });

  it('should close again after a success', () => {
    const breaker = new ProviderBreaker({ threshold: 1, resetMs: 1000 });
    breaker.recordFailure(0);

    breaker.recordSuccess();

    expect(breaker.isOpen(1)).toBe(false);
    expect(breaker.recordFailure(1)).toBe(true);
  });

  it('should route back to a provider once its window has passed', async () => {
    let clock = 0;
    const primary = new StubProvider('openai', 'gpt-4.1-mini');
    const backup = new StubProvider('gemini', 'gemini-2.0-flash');
    const router = new ModelRouter(
      { primaryProvider: 'openai', secondaryProvider: 'gemini' },
      new Map<LLMProviderName, LLMProvider>([
        ['openai', primary],
        ['gemini', backup],
      ]),
      { threshold: 1, resetMs: 1000 },
      () => clock,
    );

    primary.failWith = new Error('rate limited');
    await router.complete(REQUEST);
    await router.complete(REQUEST);
    expect(primary.requests).toHaveLength(1);

    primary.failWith = undefined;
    clock = 1000;
    const response = await router.complete(REQUEST);

    expect(response.provider).toBe('openai');
    expect(primary.requests).toHaveLength(2);
  });
});
