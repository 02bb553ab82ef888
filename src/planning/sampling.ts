/**
 * @module planning/sampling
 * @description Injectable sampling strategies
 *
 * The planner only ever calls `sampler.sample(rng)`; swapping heuristics means
 * passing a different Sampler, never touching the loop.
 */

import { ConfigurationError, ErrorCodes } from '../core/errors';
import type { SeededRandom } from '../core/repro';
import { sampleBox, validateBox, type BoxSpace } from '../core/space';
import type { Configuration } from './configuration';
import type { GoalRegion, Sampler, ValidityOracle } from './types';

/**
 * Uniform over the box bounds
 */
export function uniformSampler(bounds: BoxSpace): Sampler {
    const check = validateBox(bounds);
    if (!check.valid) {
        throw new ConfigurationError('Invalid sampling bounds', ErrorCodes.INVALID_CONFIG, check.errors);
    }
    return {
        dimension: bounds.low.length,
        sample: (rng) => Object.freeze(sampleBox(bounds, () => rng.random())),
    };
}

/**
 * Rejection sampling over the free part of the bounds. After `maxAttempts`
 * rejected draws the last draw is returned and left to the planner's checks.
 */
export function freeSpaceSampler(bounds: BoxSpace, oracle: ValidityOracle, maxAttempts: number = 100): Sampler {
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
        throw new ConfigurationError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
    }
    const base = uniformSampler(bounds);
    return {
        dimension: base.dimension,
        sample(rng) {
            let candidate = base.sample(rng);
            for (let attempt = 1; attempt < maxAttempts && !oracle.isValidConfiguration(candidate); attempt++) {
                candidate = base.sample(rng);
            }
            return candidate;
        },
    };
}

/**
 * With probability `bias` draw from the goal region, otherwise from `base`.
 * One rng draw decides the branch, so the stream stays reproducible.
 */
export function goalBiasedSampler(base: Sampler, goal: GoalRegion, bias: number): Sampler {
    if (!(bias >= 0 && bias <= 1)) {
        throw new ConfigurationError(`goalBias must lie in [0, 1], got ${bias}`);
    }
    if (goal.dimension !== base.dimension) {
        throw new ConfigurationError(
            `Goal has dimension ${goal.dimension}, sampler has ${base.dimension}`,
            ErrorCodes.DIMENSION_MISMATCH
        );
    }
    return {
        dimension: base.dimension,
        sample(rng: SeededRandom): Configuration {
            return rng.random() < bias ? goal.sample(rng) : base.sample(rng);
        },
    };
}
