/**
 * Bounded power-law variates via inverse-transform sampling.
 */
import type { Random } from './random';

/** Below this |1 - tau| the closed-form inverse degenerates; sample uniformly instead. */
export const DEGENERATE_EXPONENT = 1e-10;

/**
 * Draw an integer from p(x) ∝ x^-tau on [lo, hi].
 * The continuous inverse is rounded half-up and clamped into range.
 */
export function samplePowerLaw(lo: number, hi: number, tau: number, random: Random): number {
  const exponent = 1 - tau;
  if (Math.abs(exponent) < DEGENERATE_EXPONENT) {
    return lo + random.int(hi - lo + 1);
  }
  return invertPowerLaw(lo, hi, exponent, random.next());
}

/** Pure inverse CDF for a uniform draw u in [0, 1). */
export function invertPowerLaw(lo: number, hi: number, exponent: number, u: number): number {
  const minPow = Math.pow(lo, exponent);
  const maxPow = Math.pow(hi, exponent);
  const x = minPow + u * (maxPow - minPow);
  const value = Math.round(Math.pow(x, 1 / exponent));
  return Math.max(lo, Math.min(hi, value));
}
