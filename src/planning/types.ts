/**
 * @module planning/types
 * @description Contracts consumed by the planner from external collaborators
 */

import type { SeededRandom } from '../core/repro';
import type { Configuration } from './configuration';

/**
 * Obstacle / constraint checker. Must be deterministic and side-effect free
 * from the planner's perspective.
 */
export interface ValidityOracle {
    isValidConfiguration(config: Configuration): boolean;
    isValidMotion(from: Configuration, to: Configuration): boolean;
}

/**
 * Goal region: membership test plus a way to draw a point from it
 */
export interface GoalRegion {
    readonly dimension: number;
    contains(config: Configuration): boolean;
    sample(rng: SeededRandom): Configuration;
}

/**
 * Draws candidate target configurations
 */
export interface Sampler {
    readonly dimension: number;
    sample(rng: SeededRandom): Configuration;
}

/**
 * Rewiring radius as a function of the current tree size
 */
export type RewireRadiusSchedule = (treeSize: number) => number;
