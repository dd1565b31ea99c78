/**
 * Splits a total into integer minor-unit shares that sum exactly to the total
 */

import { InvalidSplitError } from './errors.js';

export interface SplitWeight<P> {
  participant: P;
  weight: number;
}

/**
 * Round-half-up of total * weight / sum, in exact integer arithmetic
 */
function roundedShare(total: bigint, weight: bigint, sum: bigint): bigint {
  return (2n * total * weight + sum) / (2n * sum);
}

function validate<P>(total: number, weights: readonly SplitWeight<P>[]): void {
  if (!Number.isSafeInteger(total) || total < 0) {
    throw new InvalidSplitError(`Total must be a non-negative integer, got ${total}`);
  }

  const seen = new Set<P>();
  for (const { participant, weight } of weights) {
    if (!Number.isSafeInteger(weight) || weight < 0) {
      throw new InvalidSplitError(`Weight must be a non-negative integer, got ${weight}`);
    }
    if (seen.has(participant)) {
      throw new InvalidSplitError(`Participant listed twice: ${String(participant)}`);
    }
    seen.add(participant);
  }
}

/**
 * Splits `total` minor units across participants in proportion to their weights.
 *
 * Each share is rounded half-up on its own; the difference between the total
 * and the rounded sum goes to one absorber: `preferredAbsorber` (the payer)
 * when it is a participant with a positive weight, otherwise the first
 * participant in input order with a positive weight. If the absorber cannot
 * take a deficit without going below zero it is clamped at zero and the rest
 * is taken, one unit each, from the other rounded-up participants in input order.
 */
export function splitAmount<P>(
  total: number,
  weights: readonly SplitWeight<P>[],
  preferredAbsorber?: P,
): Map<P, number> {
  validate(total, weights);

  const result = new Map<P, number>();
  const weightSum = weights.reduce((sum, { weight }) => sum + BigInt(weight), 0n);

  if (weightSum === 0n) {
    if (total > 0) {
      throw new InvalidSplitError('Weights sum to zero, cannot split a positive total');
    }
    for (const { participant } of weights) {
      result.set(participant, 0);
    }
    return result;
  }

  const bigTotal = BigInt(total);
  const roundedUp = new Set<P>();
  let roundedSum = 0n;

  for (const { participant, weight } of weights) {
    const share = roundedShare(bigTotal, BigInt(weight), weightSum);
    // share * sum > total * weight means the ideal share was rounded up
    if (share * weightSum > bigTotal * BigInt(weight)) {
      roundedUp.add(participant);
    }
    result.set(participant, Number(share));
    roundedSum += share;
  }

  let surplus = total - Number(roundedSum);
  if (surplus === 0) {
    return result;
  }

  const absorber = pickAbsorber(weights, preferredAbsorber);
  const absorberShare = result.get(absorber) ?? 0;

  if (absorberShare + surplus >= 0) {
    result.set(absorber, absorberShare + surplus);
    return result;
  }

  result.set(absorber, 0);
  surplus += absorberShare;

  for (const { participant } of weights) {
    if (surplus === 0) break;
    if (participant === absorber || !roundedUp.has(participant)) continue;
    result.set(participant, (result.get(participant) ?? 0) - 1);
    surplus += 1;
  }

  return result;
}

function pickAbsorber<P>(weights: readonly SplitWeight<P>[], preferred: P | undefined): P {
  const positive = weights.filter(({ weight }) => weight > 0);
  const preferredEntry = positive.find(({ participant }) => participant === preferred);
  const chosen = preferredEntry ?? positive[0];
  if (chosen === undefined) {
    // unreachable once the weight sum is positive
    throw new InvalidSplitError('No participant with a positive weight');
  }
  return chosen.participant;
}
