/**
 * @module planning/goals
 * @description Goal regions: membership tests plus sampling for goal bias
 */

import { ConfigurationError, ErrorCodes } from '../core/errors';
import type { SeededRandom } from '../core/repro';
import { box, containsBox, sampleBox, validateBox, type BoxSpace } from '../core/space';
import { createConfiguration, euclidean, type Configuration } from './configuration';
import type { GoalRegion } from './types';

/**
 * Axis-aligned box goal (closed)
 */
export class BoxGoal implements GoalRegion {
    readonly bounds: BoxSpace;

    constructor(low: readonly number[], high: readonly number[]) {
        this.bounds = box(low, high);
        const check = validateBox(this.bounds);
        if (!check.valid) {
            throw new ConfigurationError('Invalid box goal', ErrorCodes.INVALID_CONFIG, check.errors);
        }
    }

    get dimension(): number {
        return this.bounds.low.length;
    }

    contains(config: Configuration): boolean {
        return containsBox(this.bounds, config);
    }

    sample(rng: SeededRandom): Configuration {
        return Object.freeze(sampleBox(this.bounds, () => rng.random()));
    }
}

/**
 * Closed ball (disk in 2-D) goal under the Euclidean metric
 */
export class BallGoal implements GoalRegion {
    readonly center: Configuration;
    readonly radius: number;

    constructor(center: readonly number[], radius: number) {
        if (!Number.isFinite(radius) || radius < 0) {
            throw new ConfigurationError(`Ball goal radius must be >= 0, got ${radius}`);
        }
        this.center = createConfiguration(center);
        this.radius = radius;
    }

    get dimension(): number {
        return this.center.length;
    }

    contains(config: Configuration): boolean {
        return config.length === this.center.length && euclidean(config, this.center) <= this.radius;
    }

    /**
     * Uniform in the ball: Gaussian direction, radius scaled by u^(1/d)
     */
    sample(rng: SeededRandom): Configuration {
        const d = this.center.length;
        if (this.radius === 0) return this.center;

        const direction = this.center.map(() => rng.normal());
        const norm = Math.sqrt(direction.reduce((s, v) => s + v * v, 0));
        if (norm === 0) return this.center;

        const r = this.radius * Math.pow(rng.random(), 1 / d);
        return Object.freeze(this.center.map((c, i) => c + (direction[i] / norm) * r));
    }
}

/**
 * A single target configuration with a tolerance
 */
export class PointGoal implements GoalRegion {
    readonly point: Configuration;
    readonly tolerance: number;

    constructor(point: readonly number[], tolerance: number = 1e-6) {
        if (!Number.isFinite(tolerance) || tolerance < 0) {
            throw new ConfigurationError(`Point goal tolerance must be >= 0, got ${tolerance}`);
        }
        this.point = createConfiguration(point);
        this.tolerance = tolerance;
    }

    get dimension(): number {
        return this.point.length;
    }

    contains(config: Configuration): boolean {
        return config.length === this.point.length && euclidean(config, this.point) <= this.tolerance;
    }

    sample(_rng: SeededRandom): Configuration {
        return this.point;
    }
}

/**
 * Several goals; reached when any member is reached
 */
export class GoalUnion implements GoalRegion {
    readonly goals: readonly GoalRegion[];

    constructor(goals: readonly GoalRegion[]) {
        if (goals.length === 0) {
            throw new ConfigurationError('Goal union needs at least one goal');
        }
        const dim = goals[0].dimension;
        if (goals.some(g => g.dimension !== dim)) {
            throw new ConfigurationError('All goals in a union must share a dimension', ErrorCodes.DIMENSION_MISMATCH);
        }
        this.goals = [...goals];
    }

    get dimension(): number {
        return this.goals[0].dimension;
    }

    contains(config: Configuration): boolean {
        return this.goals.some(g => g.contains(config));
    }

    sample(rng: SeededRandom): Configuration {
        return this.goals[rng.randint(0, this.goals.length)].sample(rng);
    }
}
