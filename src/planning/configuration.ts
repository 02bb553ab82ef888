/**
 * @module planning/configuration
 * @description Configurations (points in the planning space) and distance metrics
 */

import { ConfigurationError, ErrorCodes } from '../core/errors';

// ==================== Types ====================

/**
 * An ordered tuple of real coordinates. Immutable once created.
 */
export type Configuration = readonly number[];

/**
 * Distance between two configurations of equal dimension.
 *
 * `axisScale[i]` is a lower bound on how much a unit difference along axis `i`
 * contributes: `axisScale[i] * |a[i] - b[i]| <= metric(a, b)`. The k-d tree
 * prunes with it and takes 1 for a metric that leaves it out, which is right
 * for Euclidean distance and every Minkowski norm.
 */
export interface DistanceMetric {
    (a: Configuration, b: Configuration): number;
    readonly axisScale?: readonly number[];
}

/** Default tolerance for goal and duplicate checks */
export const DEFAULT_TOLERANCE = 1e-9;

// ==================== Construction ====================

/**
 * Copy and freeze a coordinate list, rejecting non-finite entries
 * and (when given) a wrong dimension.
 */
export function createConfiguration(coords: readonly number[], dimension?: number): Configuration {
    if (dimension !== undefined && coords.length !== dimension) {
        throw new ConfigurationError(
            `Configuration has ${coords.length} coordinates, expected ${dimension}`,
            ErrorCodes.DIMENSION_MISMATCH,
            [],
            { expected: dimension, actual: coords.length }
        );
    }
    for (let i = 0; i < coords.length; i++) {
        if (typeof coords[i] !== 'number' || !Number.isFinite(coords[i])) {
            throw new ConfigurationError(
                `Coordinate ${i} is not a finite number: ${String(coords[i])}`,
                ErrorCodes.INVALID_CONFIG
            );
        }
    }
    return Object.freeze([...coords]);
}

/**
 * Throw DIMENSION_MISMATCH unless `config` has `dimension` coordinates
 */
export function assertDimension(config: Configuration, dimension: number, what = 'configuration'): void {
    if (config.length !== dimension) {
        throw new ConfigurationError(
            `${what} has ${config.length} coordinates, expected ${dimension}`,
            ErrorCodes.DIMENSION_MISMATCH,
            [],
            { expected: dimension, actual: config.length }
        );
    }
}

// ==================== Metrics ====================

export function distanceSquared(a: Configuration, b: Configuration): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        const d = a[i] - b[i];
        sum += d * d;
    }
    return sum;
}

/**
 * Euclidean (L2) distance
 */
export const euclidean: DistanceMetric = (a, b) => Math.sqrt(distanceSquared(a, b));

/**
 * Per-axis weighted Euclidean distance, `sqrt(sum((w_i * (a_i - b_i))^2))`.
 * Weights are its axis scales.
 *
 * @throws ConfigurationError when a weight is negative or not finite, and
 * (from the metric) DIMENSION_MISMATCH for configurations of another length
 */
export function weightedEuclidean(weights: readonly number[]): DistanceMetric {
    if (weights.length === 0) {
        throw new ConfigurationError('weightedEuclidean needs at least one weight');
    }
    const errors = weights
        .map((w, i) => (Number.isFinite(w) && w >= 0 ? null : `weight ${i} must be a finite non-negative number, got ${w}`))
        .filter((e): e is string => e !== null);
    if (errors.length > 0) {
        throw new ConfigurationError(`Invalid metric weights: ${errors.join('; ')}`, ErrorCodes.INVALID_CONFIG, errors);
    }
    const axisScale = Object.freeze([...weights]);

    const metric = (a: Configuration, b: Configuration): number => {
        assertDimension(a, axisScale.length, 'weightedEuclidean argument');
        let sum = 0;
        for (let i = 0; i < a.length; i++) {
            const d = (a[i] - b[i]) * axisScale[i];
            sum += d * d;
        }
        return Math.sqrt(sum);
    };
    return Object.assign(metric, { axisScale });
}

// ==================== Helpers ====================

/**
 * Value equality within a tolerance. Never used for node identity.
 */
export function configurationsEqual(
    a: Configuration,
    b: Configuration,
    tolerance: number = DEFAULT_TOLERANCE
): boolean {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
        if (Math.abs(a[i] - b[i]) > tolerance) return false;
    }
    return true;
}

/**
 * Point at fraction `t` along the segment a→b
 */
export function interpolate(a: Configuration, b: Configuration, t: number): Configuration {
    return Object.freeze(a.map((v, i) => v + (b[i] - v) * t));
}
