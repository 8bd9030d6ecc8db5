import { AllProvidersFailedError } from '../errors/news.errors';
import { TopicExpanderService } from './topic-expander.service';

describe('TopicExpanderService', () => {
  const router = {
    invoke: jest.fn(),
  };
  const expander = new TopicExpanderService(router as never);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('does not call the LLM for Latin-script topics', async () => {
    await expect(expander.maybeExpand('taiwan stocks')).resolves.toBeNull();
    expect(router.invoke).not.toHaveBeenCalled();
  });

  it('asks once for English keywords when the topic is CJK', async () => {
    router.invoke.mockResolvedValue('Taiwan stocks');

    await expect(expander.maybeExpand('台股')).resolves.toBe('Taiwan stocks');
    expect(router.invoke).toHaveBeenCalledTimes(1);
  });

  it('keeps only the first line of the reply without quotes or labels', async () => {
    router.invoke.mockResolvedValue('Keywords: "TSMC, Taiwan Semiconductor"\nThese are...');

    await expect(expander.maybeExpand('台積電')).resolves.toBe(
      'TSMC, Taiwan Semiconductor',
    );
  });

  it('degrades to no expansion when every provider fails', async () => {
    router.invoke.mockRejectedValue(
      new AllProvidersFailedError([{ provider: 'local', error: 'down' }]),
    );

    await expect(expander.maybeExpand('半導體')).resolves.toBeNull();
  });
});
