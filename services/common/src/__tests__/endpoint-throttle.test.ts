import { describe, expect, it } from 'vitest';

import { EndpointThrottle } from '../endpoint-throttle.js';

function fakeClock() {
  let now = 1_000;
  const sleeps: number[] = [];
  return {
    now: () => now,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      now += ms;
    },
    advance: (ms: number) => {
      now += ms;
    },
    sleeps
  };
}

describe('EndpointThrottle', () => {
  it('spaces consecutive calls to one endpoint by the minimum interval', async () => {
    const clock = fakeClock();
    const throttle = new EndpointThrottle({ minIntervalMs: 4_000, now: clock.now, sleep: clock.sleep });
    const startedAt: number[] = [];

    await Promise.all(
      [1, 2, 3].map((value) =>
        throttle.schedule('people', async () => {
          startedAt.push(clock.now());
          return value;
        })
      )
    );

    expect(startedAt).toEqual([1_000, 5_000, 9_000]);
    expect(clock.sleeps).toEqual([4_000, 4_000]);
  });

  it('only waits for the remainder of the interval', async () => {
    const clock = fakeClock();
    const throttle = new EndpointThrottle({ minIntervalMs: 4_000, now: clock.now, sleep: clock.sleep });

    await throttle.schedule('people', async () => 'first');
    clock.advance(3_000);
    await throttle.schedule('people', async () => 'second');

    expect(clock.sleeps).toEqual([1_000]);
  });

  it('does not make different endpoints wait on each other', async () => {
    const clock = fakeClock();
    const throttle = new EndpointThrottle({ minIntervalMs: 4_000, now: clock.now, sleep: clock.sleep });

    await throttle.schedule('people', async () => 'a');
    await throttle.schedule('companies', async () => 'b');

    expect(clock.sleeps).toEqual([]);
  });

  it('keeps the chain alive after a failed task', async () => {
    const clock = fakeClock();
    const throttle = new EndpointThrottle({ minIntervalMs: 0, now: clock.now, sleep: clock.sleep });

    await expect(
      throttle.schedule('people', async () => {
        throw new Error('backend down');
      })
    ).rejects.toThrow('backend down');
    await expect(throttle.schedule('people', async () => 'recovered')).resolves.toBe('recovered');
  });
});
