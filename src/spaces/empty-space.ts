/**
 * @module spaces/empty-space
 * @description Obstacle-free rectangular space
 */

import { ConfigurationError, ErrorCodes } from '../core/errors';
import { validateBox, type BoxSpace } from '../core/space';
import { euclidean, type Configuration } from '../planning/configuration';
import type { ValidityOracle } from '../planning/types';
import { pointInBox } from './geometry';

/**
 * Every configuration inside the closed bounds is free. The box is convex,
 * so a motion is free when both endpoints are.
 */
export class EmptySpace implements ValidityOracle {
    readonly bounds: BoxSpace;

    constructor(bounds: BoxSpace) {
        const check = validateBox(bounds);
        if (!check.valid) {
            throw new ConfigurationError('Invalid space bounds', ErrorCodes.INVALID_CONFIG, check.errors);
        }
        this.bounds = bounds;
    }

    get dimension(): number {
        return this.bounds.low.length;
    }

    isValidConfiguration(config: Configuration): boolean {
        return pointInBox(this.bounds, config);
    }

    isValidMotion(from: Configuration, to: Configuration): boolean {
        return this.isValidConfiguration(from) && this.isValidConfiguration(to);
    }

    /**
     * Euclidean length of a free motion, Infinity when it is blocked
     */
    motionCost(from: Configuration, to: Configuration): number {
        return this.isValidMotion(from, to) ? euclidean(from, to) : Infinity;
    }
}
