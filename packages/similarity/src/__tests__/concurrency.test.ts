import { describe, test, expect } from 'vitest';
import { mapWithConcurrency } from '../concurrency';

describe('mapWithConcurrency', () => {
  test('should keep input order', async () => {
    const delays = [30, 5, 20, 1];

    const results = await mapWithConcurrency(delays, 2, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
  });

  test('should never exceed the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;

    await mapWithConcurrency(Array.from({ length: 10 }, (_, i) => i), 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, 5));
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  test('should handle an empty list', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });

  test('should reject when any call fails and stop claiming items', async () => {
    const started: number[] = [];

    await expect(
      mapWithConcurrency([0, 1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 1) throw new Error('boom');
        return item;
      })
    ).rejects.toThrow('boom');
    expect(started).toEqual([0, 1]);
  });
});
