import { describe, it, expect } from 'vitest';
import { createRandom } from '../src/domain/random.js';

function take(seed: number, count: number): number[] {
  const random = createRandom(seed);
  return Array.from({ length: count }, () => random.next());
}

describe('createRandom()', () => {
  it('repeats the stream for the same seed', () => {
    expect(take(42, 20)).toEqual(take(42, 20));
    expect(take(42, 20)).not.toEqual(take(43, 20));
  });

  it('draws floats in [0, 1)', () => {
    for (const value of take(9, 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('restarts the stream on reseed', () => {
    const random = createRandom(1);
    random.next();
    random.next();

    random.reseed(42);

    expect([random.next(), random.next(), random.next()]).toEqual(take(42, 3));
  });

  it('consumes one draw per pick and chance', () => {
    const expected = take(5, 3);
    const random = createRandom(5);
    const items = ['a', 'b', 'c', 'd'];

    expect(random.pick(items)).toBe(items[Math.floor(expected[0] * items.length)]);
    expect(random.chance(0.5)).toBe(expected[1] < 0.5);
    expect(random.next()).toBe(expected[2]);
  });

  it('honors certain and impossible chances', () => {
    const random = createRandom(3);
    for (let i = 0; i < 100; i++) {
      expect(random.chance(0)).toBe(false);
      expect(random.chance(1)).toBe(true);
    }
  });

  it('refuses to pick from an empty list', () => {
    expect(() => createRandom(1).pick([])).toThrow(RangeError);
  });
});
