/**
 * @module core/space
 * @description Box-bounded configuration spaces
 *
 * A BoxSpace declares per-dimension bounds for a planning space. It is what
 * the uniform sampler draws from and what reference oracles treat as the
 * outer boundary.
 */

import type { ValidationResult } from './repro';

// ==================== Space Types ====================

/**
 * Box space - n-dimensional continuous space with closed bounds
 */
export interface BoxSpace {
    readonly kind: 'box';
    /** Lower bound per dimension */
    readonly low: readonly number[];
    /** Upper bound per dimension */
    readonly high: readonly number[];
}

// ==================== Space Factories ====================

/**
 * Create a box space. A scalar bound is broadcast to `dimension` entries.
 */
export function box(
    low: number | readonly number[],
    high: number | readonly number[],
    dimension?: number
): BoxSpace {
    const dim = dimension
        ?? (typeof low !== 'number' ? low.length : typeof high !== 'number' ? high.length : 1);
    const expand = (bound: number | readonly number[]): number[] =>
        typeof bound === 'number' ? Array<number>(dim).fill(bound) : [...bound];
    const space: BoxSpace = {
        kind: 'box',
        low: Object.freeze(expand(low)),
        high: Object.freeze(expand(high)),
    };
    return Object.freeze(space);
}

// ==================== Space Operations ====================

/**
 * Validate a box space
 */
export function validateBox(space: BoxSpace): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (space.low.length === 0) {
        errors.push('box must have at least one dimension');
    }
    if (space.low.length !== space.high.length) {
        errors.push(`low has ${space.low.length} entries but high has ${space.high.length}`);
    }

    const n = Math.min(space.low.length, space.high.length);
    for (let i = 0; i < n; i++) {
        const lo = space.low[i];
        const hi = space.high[i];
        if (!Number.isFinite(lo) || !Number.isFinite(hi)) {
            errors.push(`bounds of dimension ${i} must be finite`);
        } else if (lo > hi) {
            errors.push(`low[${i}] (${lo}) exceeds high[${i}] (${hi})`);
        } else if (lo === hi) {
            warnings.push(`dimension ${i} is degenerate (low == high == ${lo})`);
        }
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

/**
 * Number of dimensions of a box space
 */
export function dimensionOf(space: BoxSpace): number {
    return space.low.length;
}

/**
 * Sample a uniformly random point from a box space
 * Uses provided random function for reproducibility
 */
export function sampleBox(space: BoxSpace, random: () => number = Math.random): number[] {
    const result: number[] = [];
    for (let i = 0; i < space.low.length; i++) {
        const lo = space.low[i];
        const hi = space.high[i];
        result.push(lo + random() * (hi - lo));
    }
    return result;
}

/**
 * Check if a value lies within the closed bounds of a box space
 */
export function containsBox(space: BoxSpace, value: readonly number[]): boolean {
    if (value.length !== space.low.length) return false;
    return value.every((v, i) => v >= space.low[i] && v <= space.high[i]);
}

/**
 * Clamp a point into the box
 */
export function clampToBox(space: BoxSpace, value: readonly number[]): number[] {
    return value.map((v, i) => Math.max(space.low[i], Math.min(space.high[i], v)));
}

/**
 * Lebesgue measure (area, volume, ...) of the box
 */
export function boxVolume(space: BoxSpace): number {
    return space.low.reduce((vol, lo, i) => vol * (space.high[i] - lo), 1);
}
