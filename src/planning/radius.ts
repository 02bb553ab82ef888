/**
 * @module planning/radius
 * @description Rewiring-radius schedules for RRT*
 *
 * Asymptotic optimality (Karaman & Frazzoli, 2011) holds when the neighbour
 * radius shrinks as
 *
 *     r(n) = min(γ · (ln n / n)^(1/d), η)
 *
 * with η > 0 the steering bound (or any fixed cap) and
 *
 *     γ > γ* = 2 · (1 + 1/d)^(1/d) · (μ(X_free) / ζ_d)^(1/d)
 *
 * where μ(X_free) is the Lebesgue measure of the free space and ζ_d the volume
 * of the unit d-ball. Using the bounding-box volume for μ(X_free) over-estimates
 * it, which only makes γ larger and keeps the condition satisfied.
 */

import { ConfigurationError } from '../core/errors';
import type { RewireRadiusSchedule } from './types';

/**
 * Volume of the unit ball in `d` dimensions
 */
export function unitBallVolume(d: number): number {
    if (!Number.isInteger(d) || d < 1) {
        throw new ConfigurationError(`Dimension must be a positive integer, got ${d}`);
    }
    // ζ_d = π^(d/2) / Γ(d/2 + 1), via the two-step recurrence ζ_d = 2π/d · ζ_(d-2)
    let volume = d % 2 === 0 ? 1 : 2;
    for (let k = d % 2 === 0 ? 2 : 3; k <= d; k += 2) {
        volume *= (2 * Math.PI) / k;
    }
    return volume;
}

/**
 * Smallest γ above the optimality threshold, scaled up by `margin`
 */
export function optimalGamma(freeVolume: number, dimension: number, margin: number = 0.1): number {
    if (!(freeVolume > 0) || !Number.isFinite(freeVolume)) {
        throw new ConfigurationError(`Free-space volume must be positive and finite, got ${freeVolume}`);
    }
    if (!(margin > 0)) {
        throw new ConfigurationError(`margin must be > 0 for a strict inequality, got ${margin}`);
    }
    const d = dimension;
    const threshold = 2 * Math.pow(1 + 1 / d, 1 / d) * Math.pow(freeVolume / unitBallVolume(d), 1 / d);
    return (1 + margin) * threshold;
}

export interface RrtStarRadiusOptions {
    gamma: number;
    dimension: number;
    /** Cap on the radius (η) */
    maxRadius: number;
}

/**
 * Shrinking schedule min(γ (ln n / n)^(1/d), maxRadius).
 * For n < 2 the log term vanishes, so the cap is returned instead.
 */
export function rrtStarRadius(options: RrtStarRadiusOptions): RewireRadiusSchedule {
    const { gamma, dimension, maxRadius } = options;
    if (!(gamma > 0) || !(maxRadius > 0)) {
        throw new ConfigurationError('gamma and maxRadius must be positive');
    }
    if (!Number.isInteger(dimension) || dimension < 1) {
        throw new ConfigurationError(`Dimension must be a positive integer, got ${dimension}`);
    }
    return (n: number) => {
        if (n < 2) return maxRadius;
        return Math.min(gamma * Math.pow(Math.log(n) / n, 1 / dimension), maxRadius);
    };
}

/**
 * Fixed radius. Does not preserve asymptotic optimality.
 */
export function constantRadius(radius: number): RewireRadiusSchedule {
    if (!(radius >= 0) || !Number.isFinite(radius)) {
        throw new ConfigurationError(`Radius must be a finite number >= 0, got ${radius}`);
    }
    return () => radius;
}
