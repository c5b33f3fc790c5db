/**
 * Transfer amount selection
 * @module amount
 */

import { randomBytes } from 'crypto';
import { InvalidAmountError } from './errors.js';

/** Largest lamport value a u64 can hold */
export const MAX_LAMPORTS = (1n << 64n) - 1n;

export const LAMPORTS_PER_SOL = 1_000_000_000n;

/**
 * Source of uniformly distributed integers
 */
export interface RandomSource {
  /**
   * Return an integer in `[0, bound)`. `bound` is always positive.
   */
  nextBelow(bound: bigint): bigint;
}

/**
 * OS-backed CSPRNG source.
 *
 * Draws just enough random bytes to cover `bound`, masks off the excess high
 * bits and rejects out-of-range draws, so every value stays equally likely.
 */
export const secureRandom: RandomSource = {
  nextBelow(bound: bigint): bigint {
    if (bound <= 0n) {
      throw new RangeError(`Random bound must be positive, got ${bound}`);
    }

    const bits = bound.toString(2).length;
    const byteLength = Math.ceil(bits / 8);
    const mask = (1n << BigInt(bits)) - 1n;

    for (;;) {
      const draw = BigInt(`0x${randomBytes(byteLength).toString('hex')}`) & mask;
      if (draw < bound) {
        return draw;
      }
    }
  },
};

/**
 * Pick a lamport amount uniformly from `[0, balance / 2)`.
 *
 * Balances below 2 leave an empty range and yield 0.
 */
export function selectTransferAmount(
  balance: bigint,
  random: RandomSource = secureRandom
): bigint {
  if (balance < 0n) {
    throw new InvalidAmountError(`Balance cannot be negative: ${balance}`);
  }

  const upper = balance / 2n;
  if (upper === 0n) {
    return 0n;
  }

  return random.nextBelow(upper);
}

/**
 * Format lamports as SOL, e.g. `◎0.000500000`
 */
export function formatSol(lamports: bigint): string {
  const whole = lamports / LAMPORTS_PER_SOL;
  const fraction = (lamports % LAMPORTS_PER_SOL).toString().padStart(9, '0');
  return `◎${whole}.${fraction}`;
}
