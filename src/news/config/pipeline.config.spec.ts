import { loadPipelineConfig, resolveProviderChain } from './pipeline.config';

describe('loadPipelineConfig', () => {
  it('applies defaults when the environment is empty', () => {
    const config = loadPipelineConfig({});

    expect(config.maxNewsCount).toBe(15);
    expect(config.summaryHeadlineLimit).toBe(10);
    expect(config.recencyWindow).toBe('when:1d');
    expect(config.feedTimeoutMs).toBe(12000);
    expect(config.llmMode).toBe('auto');
    expect(config.defaultRegionCode).toBe('us');
    expect(config.regions).toHaveLength(19);
    expect(config.providers.map((provider) => provider.name)).toEqual([
      'local',
      'cloudPrimary',
      'cloudSecondary',
    ]);
  });

  it('enables cloud providers only with a real api key', () => {
    const config = loadPipelineConfig({
      OPENAI_API_KEY: 'your-openai-api-key-here',
      GEMINI_API_KEY: 'test-gemini-key',
    });

    const enabled = Object.fromEntries(
      config.providers.map((provider) => [provider.name, provider.enabled]),
    );
    expect(enabled).toEqual({
      local: true,
      cloudPrimary: false,
      cloudSecondary: true,
    });
  });

  it('falls back to defaults for invalid numbers and normalizes urls', () => {
    const config = loadPipelineConfig({
      NEWS_MAX_ITEMS: 'abc',
      LLM_TIMEOUT_SEC: '-3',
      FEED_RECENCY_WINDOW: '12h',
      LOCAL_LLM_BASE_URL: 'http://127.0.0.1:1234/v1/',
    });

    expect(config.maxNewsCount).toBe(15);
    expect(config.recencyWindow).toBe('when:12h');
    expect(config.providers[0].baseUrl).toBe('http://127.0.0.1:1234/v1');
    expect(config.providers[0].timeoutMs).toBe(30000);
  });

  it('is frozen', () => {
    const config = loadPipelineConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.providers[0])).toBe(true);
    expect(Object.isFrozen(config.regions[0])).toBe(true);
  });
});

describe('resolveProviderChain', () => {
  it('walks enabled providers local-first in auto mode', () => {
    const config = loadPipelineConfig({
      OPENAI_API_KEY: 'test-openai-key',
      GEMINI_API_KEY: 'test-gemini-key',
    });

    expect(resolveProviderChain(config).map((p) => p.name)).toEqual([
      'local',
      'cloudPrimary',
      'cloudSecondary',
    ]);
  });

  it('skips disabled providers', () => {
    const config = loadPipelineConfig({
      LOCAL_LLM_ENABLED: 'false',
      GEMINI_API_KEY: 'test-gemini-key',
    });

    expect(resolveProviderChain(config).map((p) => p.name)).toEqual([
      'cloudSecondary',
    ]);
  });

  it('pins a single provider when one is selected', () => {
    const config = loadPipelineConfig({
      LLM_PROVIDER: 'openai',
      OPENAI_API_KEY: 'test-openai-key',
      GEMINI_API_KEY: 'test-gemini-key',
    });

    expect(config.llmMode).toBe('cloudPrimary');
    expect(resolveProviderChain(config).map((p) => p.name)).toEqual([
      'cloudPrimary',
    ]);
  });

  it('yields an empty chain when the pinned provider is not configured', () => {
    const config = loadPipelineConfig({ LLM_PROVIDER: 'gemini' });

    expect(resolveProviderChain(config)).toEqual([]);
  });
});
