/**
 * Configuration and Steering Tests
 */

import { describe, it, expect } from 'vitest';
import {
    createConfiguration,
    assertDimension,
    distanceSquared,
    euclidean,
    weightedEuclidean,
    configurationsEqual,
    interpolate,
    straightLineSteering,
    steer,
} from '../src/planning';
import { ConfigurationError, ErrorCodes } from '../src/core';
import { thrown } from './test-utils';

// ==================== Configuration ====================

describe('Configuration', () => {
    describe('createConfiguration', () => {
        it('should copy and freeze the coordinates', () => {
            const coords = [1, 2, 3];
            const config = createConfiguration(coords);
            coords[0] = 99;

            expect(config).toEqual([1, 2, 3]);
            expect(Object.isFrozen(config)).toBe(true);
        });

        it('should reject non-finite coordinates', () => {
            expect(() => createConfiguration([0, NaN])).toThrow(ConfigurationError);
            expect(() => createConfiguration([Infinity])).toThrow('Coordinate 0 is not a finite number');
        });

        it('should reject a wrong dimension', () => {
            const error = thrown(() => createConfiguration([1, 2], 3));
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).toMatchObject({ code: ErrorCodes.DIMENSION_MISMATCH });
        });
    });

    describe('assertDimension', () => {
        it('should name the offending value', () => {
            expect(() => assertDimension([1, 2, 3], 2, 'sample')).toThrow('sample has 3 coordinates, expected 2');
            expect(() => assertDimension([1, 2], 2)).not.toThrow();
        });
    });

    describe('metrics', () => {
        it('should compute Euclidean distance', () => {
            expect(distanceSquared([0, 0], [3, 4])).toBe(25);
            expect(euclidean([0, 0], [3, 4])).toBe(5);
            expect(euclidean([1, 1, 1], [1, 1, 1])).toBe(0);
        });

        it('should weight each axis', () => {
            const metric = weightedEuclidean([2, 1]);
            expect(metric([0, 0], [3, 4])).toBe(Math.sqrt(36 + 16));
        });

        it('should expose weights as axis scales', () => {
            expect(weightedEuclidean([0.5, 2]).axisScale).toEqual([0.5, 2]);
            expect(euclidean.axisScale).toBeUndefined();
        });

        it('should reject invalid weights', () => {
            const error = thrown(() => weightedEuclidean([1, -2, NaN]));
            expect(error).toBeInstanceOf(ConfigurationError);
            expect(error).toMatchObject({
                code: ErrorCodes.INVALID_CONFIG,
                errors: [
                    'weight 1 must be a finite non-negative number, got -2',
                    'weight 2 must be a finite non-negative number, got NaN',
                ],
            });
            expect(() => weightedEuclidean([])).toThrow('weightedEuclidean needs at least one weight');
        });

        it('should reject configurations of another dimension', () => {
            const metric = weightedEuclidean([1, 1]);
            expect(thrown(() => metric([0, 0, 0], [1, 1, 1]))).toMatchObject({
                code: ErrorCodes.DIMENSION_MISMATCH,
                message: 'weightedEuclidean argument has 3 coordinates, expected 2',
            });
        });
    });

    describe('configurationsEqual', () => {
        it('should compare within tolerance', () => {
            expect(configurationsEqual([1, 2], [1, 2 + 1e-12])).toBe(true);
            expect(configurationsEqual([1, 2], [1, 2.1])).toBe(false);
            expect(configurationsEqual([1, 2], [1, 2.1], 0.2)).toBe(true);
            expect(configurationsEqual([1, 2], [1, 2, 3])).toBe(false);
        });
    });

    describe('interpolate', () => {
        it('should return points along the segment', () => {
            expect(interpolate([0, 0], [10, 20], 0)).toEqual([0, 0]);
            expect(interpolate([0, 0], [10, 20], 0.5)).toEqual([5, 10]);
            expect(interpolate([0, 0], [10, 20], 1)).toEqual([10, 20]);
        });
    });
});

// ==================== Steering ====================

describe('Steering', () => {
    const steering = straightLineSteering();

    it('should return the target when it is within the step', () => {
        const target = createConfiguration([3, 4]);
        const result = steering.steer([0, 0], target, 5);
        expect(result.config).toBe(target);
        expect(result.cost).toBe(5);
    });

    it('should stop at maxStep along the segment', () => {
        const result = steering.steer([0, 0], [30, 40], 25);
        expect(result.config).toEqual([15, 20]);
        expect(result.cost).toBe(25);
    });

    it('should never move further than maxStep', () => {
        const targets = [[100, -3], [-7, 0.5], [0.1, 0.1], [12, 12]];
        for (const maxStep of [0.5, 1, 2.5]) {
            for (const target of targets) {
                const { config, cost } = steering.steer([1, 1], target, maxStep);
                expect(euclidean([1, 1], config)).toBeLessThanOrEqual(maxStep + 1e-12);
                expect(cost).toBeCloseTo(euclidean([1, 1], config), 12);
            }
        }
    });

    it('should be deterministic', () => {
        const a = steer([0, 0, 0], [9, 9, 9], 2);
        const b = steer([0, 0, 0], [9, 9, 9], 2);
        expect(a).toEqual(b);
    });

    it('should use the given metric for distance and cost', () => {
        const metric = weightedEuclidean([2, 2]);
        const weighted = straightLineSteering(metric);
        expect(weighted.distance).toBe(metric);

        // metric distance to [3, 4] is 10, so a step of 5 lands half way
        const result = weighted.steer([0, 0], [3, 4], 5);
        expect(result.config).toEqual([1.5, 2]);
        expect(result.cost).toBe(5);
    });
});
