import { describe, it, expect } from 'vitest';
import { decayWeight, effectiveWindow, TimeDecay } from '../src/scoring/decay';

const DAY = 86_400;

describe('decayWeight', () => {
  it('should give full weight to fresh feedback', () => {
    expect(Math.abs(decayWeight(0, 90) - 1)).toBeLessThan(1e-9);
  });

  it('should halve at each half-life', () => {
    expect(decayWeight(90, 90)).toBeCloseTo(0.5, 3);
    expect(decayWeight(180, 90)).toBeCloseTo(0.25, 3);
  });

  it('should treat negative ages as fresh', () => {
    expect(decayWeight(-10, 90)).toBe(1);
  });

  it('should reject a non-positive half-life', () => {
    expect(() => decayWeight(1, 0)).toThrow(RangeError);
  });
});

describe('effectiveWindow', () => {
  it('should return the age at which weight reaches the floor', () => {
    // 90 * log2(100)
    expect(effectiveWindow(0.01, 90)).toBeCloseTo(597.95, 1);
    expect(effectiveWindow(0.5, 90)).toBeCloseTo(90, 9);
  });

  it('should reject floors outside (0, 1)', () => {
    expect(() => effectiveWindow(0, 90)).toThrow(RangeError);
    expect(() => effectiveWindow(1, 90)).toThrow(RangeError);
  });
});

describe('TimeDecay', () => {
  const decay = new TimeDecay(90);

  it('should weigh by the distance between feedback and reference time', () => {
    const t0 = 1_700_000_000;
    expect(decay.weight(t0, t0)).toBe(1);
    expect(decay.weight(t0, t0 + 90 * DAY)).toBeCloseTo(0.5, 9);
    expect(decay.weight(t0 + DAY, t0)).toBe(1);
  });

  it('should match the free function for day ages', () => {
    expect(decay.weightFromDays(45)).toBe(decayWeight(45, 90));
  });

  it('should use a 1% floor for the default window', () => {
    expect(decay.effectiveWindow()).toBe(effectiveWindow(0.01, 90));
  });
});
