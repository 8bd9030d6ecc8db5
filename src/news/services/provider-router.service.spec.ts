import { ProviderError } from '../errors/news.errors';
import { LlmProvider } from '../providers/llm-provider';
import { OpenAiCompatibleProvider } from '../providers/openai-compatible.provider';
import { ProviderName } from '../types/news.types';
import { ProviderRouterService } from './provider-router.service';

const fakeProvider = (
  name: ProviderName,
  complete: jest.Mock,
): LlmProvider => ({ name, model: `${name}-model`, complete });

const failing = (name: ProviderName, reason: string): jest.Mock =>
  jest.fn().mockRejectedValue(new ProviderError(name, reason));

describe('ProviderRouterService', () => {
  const messages = [{ role: 'user' as const, content: 'hello' }];

  it('returns the first success without calling later providers', async () => {
    const local = jest.fn().mockResolvedValue('from local');
    const cloud = jest.fn().mockResolvedValue('from cloud');
    const router = new ProviderRouterService([
      fakeProvider('local', local),
      fakeProvider('cloudPrimary', cloud),
    ]);

    await expect(router.invoke(messages)).resolves.toBe('from local');
    expect(cloud).not.toHaveBeenCalled();
  });

  it('falls back to the next provider and records one failure', async () => {
    const router = new ProviderRouterService([
      fakeProvider('local', failing('local', 'connect ECONNREFUSED')),
      fakeProvider('cloudPrimary', jest.fn().mockResolvedValue('from cloud')),
    ]);

    const result = await router.invokeDetailed(messages, { maxTokens: 5 });

    expect(result).toEqual({
      text: 'from cloud',
      provider: 'cloudPrimary',
      attempts: [{ provider: 'local', error: 'connect ECONNREFUSED' }],
    });
  });

  it('calls each provider exactly once with the given options', async () => {
    const local = failing('local', 'timed out after 30000ms');
    const cloud = jest.fn().mockResolvedValue('ok');
    const router = new ProviderRouterService([
      fakeProvider('local', local),
      fakeProvider('cloudPrimary', cloud),
    ]);

    await router.invoke(messages, { temperature: 0 });

    expect(local).toHaveBeenCalledTimes(1);
    expect(cloud).toHaveBeenCalledTimes(1);
    expect(cloud).toHaveBeenCalledWith(messages, { temperature: 0 });
  });

  it('lists one attempt per provider in priority order when all fail', async () => {
    const router = new ProviderRouterService([
      fakeProvider('local', failing('local', 'down')),
      fakeProvider('cloudPrimary', failing('cloudPrimary', '401 unauthorized')),
      fakeProvider('cloudSecondary', failing('cloudSecondary', '503 busy')),
    ]);

    await expect(router.invoke(messages)).rejects.toMatchObject({
      name: 'AllProvidersFailedError',
      attempts: [
        { provider: 'local', error: 'down' },
        { provider: 'cloudPrimary', error: '401 unauthorized' },
        { provider: 'cloudSecondary', error: '503 busy' },
      ],
    });
  });

  it('fails with no attempts when no provider is enabled', async () => {
    const router = new ProviderRouterService([]);

    await expect(router.invoke(messages)).rejects.toMatchObject({
      name: 'AllProvidersFailedError',
      attempts: [],
      message: 'no enabled LLM provider',
    });
  });

  describe('with a hung local server', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('times out the local call and falls through to the cloud', async () => {
      jest
        .spyOn(global, 'fetch')
        .mockImplementation(
          (_input, init) =>
            new Promise<Response>((_resolve, reject) => {
              init?.signal?.addEventListener('abort', () =>
                reject(new DOMException('This operation was aborted', 'AbortError')),
              );
            }),
        );
      const local = new OpenAiCompatibleProvider({
        name: 'local',
        protocol: 'openai',
        baseUrl: 'http://localhost:11434/v1',
        apiKey: '',
        model: 'llama3.1',
        enabled: true,
        timeoutMs: 10,
      });
      const router = new ProviderRouterService([
        local,
        fakeProvider('cloudPrimary', jest.fn().mockResolvedValue('from cloud')),
      ]);

      const result = await router.invokeDetailed(messages);

      expect(result).toEqual({
        text: 'from cloud',
        provider: 'cloudPrimary',
        attempts: [{ provider: 'local', error: 'timed out after 10ms' }],
      });
    });
  });
});
