import { PolitenessDelay, sleep } from '../politeness';

describe('PolitenessDelay', () => {
  const create = (random: () => number) => {
    const sleepFn = jest.fn(async (_ms: number) => undefined);
    const delay = new PolitenessDelay({
      baseDelayMs: 1500,
      jitterMs: 1000,
      backoffUnitMs: 2000,
      random,
      sleep: sleepFn,
    });
    return { delay, sleepFn };
  };

  it('adds up to one jitter span on top of the base delay', () => {
    expect(create(() => 0).delay.nextInterval()).toBe(1500);
    expect(create(() => 0.5).delay.nextInterval()).toBe(2000);
    expect(create(() => 0.999).delay.nextInterval()).toBe(2499);
  });

  it('adds the extra jitter when requested', () => {
    expect(create(() => 0.5).delay.nextInterval(1000)).toBe(2500);
  });

  it('grows the backoff linearly with the attempt number', () => {
    const { delay } = create(() => 0);
    expect(delay.backoffInterval(1)).toBe(2000);
    expect(delay.backoffInterval(3)).toBe(6000);
    expect(delay.backoffInterval(0)).toBe(0);
  });

  it('sleeps for the computed interval', async () => {
    const { delay, sleepFn } = create(() => 0.5);

    await expect(delay.wait()).resolves.toBe(2000);
    await expect(delay.backoff(2)).resolves.toBe(4000);
    await delay.settle(750);

    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([2000, 4000, 750]);
  });
});

describe('sleep', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves after the given time', async () => {
    jest.useFakeTimers();
    const done = jest.fn();
    const pending = sleep(1000).then(done);

    jest.advanceTimersByTime(999);
    await Promise.resolve();
    expect(done).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    await pending;
    expect(done).toHaveBeenCalledTimes(1);
  });
});
