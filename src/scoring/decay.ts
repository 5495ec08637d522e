const SECONDS_PER_DAY = 86_400;

/**
 * Exponential decay: a feedback `halfLifeDays` old counts half as much
 * as a fresh one. Ages below zero (clock skew) count as fresh.
 */
export function decayWeight(ageDays: number, halfLifeDays: number): number {
  if (!(halfLifeDays > 0)) {
    throw new RangeError(`halfLifeDays must be positive, got ${halfLifeDays}`);
  }
  const age = Math.max(0, ageDays);
  return Math.pow(2, -age / halfLifeDays);
}

/** Age in days at which the weight drops to `minWeight`. */
export function effectiveWindow(minWeight: number, halfLifeDays: number): number {
  if (!(minWeight > 0 && minWeight < 1)) {
    throw new RangeError(`minWeight must be in (0, 1), got ${minWeight}`);
  }
  return -halfLifeDays * Math.log2(minWeight);
}

export class TimeDecay {
  constructor(readonly halfLifeDays: number) {
    if (!(halfLifeDays > 0)) {
      throw new RangeError(`halfLifeDays must be positive, got ${halfLifeDays}`);
    }
  }

  /** Both times in unix seconds */
  weight(feedbackTime: number, referenceTime: number): number {
    return this.weightFromDays((referenceTime - feedbackTime) / SECONDS_PER_DAY);
  }

  weightFromDays(days: number): number {
    return decayWeight(days, this.halfLifeDays);
  }

  effectiveWindow(minWeight = 0.01): number {
    return effectiveWindow(minWeight, this.halfLifeDays);
  }
}
