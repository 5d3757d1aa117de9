import { randomInt } from 'crypto';

// Returns an integer in [0, maxExclusive)
export type RandomSource = (maxExclusive: number) => number;

/**
 * Fisher-Yates permutation of [0..hostCount). crypto.randomInt draws from the
 * OS entropy pool, so concurrent commands share no shuffle state and orders
 * differ between runs.
 */
export function shuffledHostOrder(hostCount: number, random: RandomSource = max => randomInt(max)): number[] {
  const order = Array.from({ length: hostCount }, (_, i) => i);

  for (let i = order.length - 1; i > 0; i--) {
    const j = random(i + 1);
    if (!Number.isInteger(j) || j < 0 || j > i) {
      throw new RangeError(`Random source returned ${j}, expected an integer in [0, ${i}]`);
    }
    [order[i], order[j]] = [order[j], order[i]];
  }

  return order;
}
