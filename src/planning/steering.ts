/**
 * @module planning/steering
 * @description Bounded-step steering between configurations
 */

import { euclidean, type Configuration, type DistanceMetric } from './configuration';

export interface SteerResult {
    /** Reached configuration, at most `maxStep` from the origin */
    config: Configuration;
    /** Metric cost of the motion from origin to `config` */
    cost: number;
}

/**
 * Produces a reachable intermediate configuration. Must be deterministic;
 * randomness belongs to the sampler only.
 */
export interface SteeringFunction {
    /** The metric used for both edge costs and nearest-neighbour queries */
    readonly distance: DistanceMetric;
    steer(from: Configuration, toward: Configuration, maxStep: number): SteerResult;
}

/**
 * Straight-line steering for holonomic spaces.
 *
 * Moves along the segment from→toward. When the target lies within `maxStep`
 * it is returned as-is with its exact distance as cost. Otherwise the motion is
 * scaled so that metric(from, result) equals `maxStep`; this holds for any
 * metric that is a norm (homogeneous under scaling).
 */
export function straightLineSteering(metric: DistanceMetric = euclidean): SteeringFunction {
    return {
        distance: metric,
        steer(from, toward, maxStep) {
            const dist = metric(from, toward);
            if (dist <= maxStep) {
                return { config: toward, cost: dist };
            }
            const scale = maxStep / dist;
            const config = Object.freeze(from.map((v, i) => v + (toward[i] - v) * scale));
            return { config, cost: metric(from, config) };
        },
    };
}

/**
 * Convenience wrapper around the default straight-line steering
 */
export function steer(
    from: Configuration,
    toward: Configuration,
    maxStep: number,
    metric: DistanceMetric = euclidean
): SteerResult {
    return straightLineSteering(metric).steer(from, toward, maxStep);
}
