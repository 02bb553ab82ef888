/**
 * Spatial Index Tests
 * k-d tree against the linear scan, ties and rebuilds
 */

import { describe, it, expect } from 'vitest';
import {
    KdTreeSpatialIndex,
    LinearSpatialIndex,
    createSpatialIndex,
    euclidean,
    weightedEuclidean,
    type Configuration,
    type SpatialIndex,
} from '../src/planning';
import { createRng, ErrorCodes, InvariantViolationError } from '../src/core';
import { thrown } from './test-utils';

interface Item {
    id: number;
    config: Configuration;
}

function fill(index: SpatialIndex<Item>, points: number[][]): void {
    points.forEach((config, id) => index.insert({ id, config }));
}

function randomPoints(count: number, dimension: number, seed: number): number[][] {
    const rng = createRng(seed);
    return Array.from({ length: count }, () =>
        Array.from({ length: dimension }, () => rng.uniform(-50, 50))
    );
}

describe('SpatialIndex', () => {
    describe('empty index', () => {
        it('should throw EMPTY_INDEX from nearest()', () => {
            for (const index of [new LinearSpatialIndex<Item>(), new KdTreeSpatialIndex<Item>()]) {
                const error = thrown(() => index.nearest([0, 0]));
                expect(error).toBeInstanceOf(InvariantViolationError);
                expect(error).toMatchObject({ code: ErrorCodes.EMPTY_INDEX });
            }
        });

        it('should return nothing from near()', () => {
            expect(new KdTreeSpatialIndex<Item>().near([0, 0], 10)).toEqual([]);
            expect(new LinearSpatialIndex<Item>().near([0, 0], 10)).toEqual([]);
        });
    });

    describe('LinearSpatialIndex', () => {
        it('should find nearest and radius neighbours', () => {
            const index = new LinearSpatialIndex<Item>();
            fill(index, [[0, 0], [5, 0], [0, 3], [10, 10]]);

            expect(index.size).toBe(4);
            expect(index.nearest([4, 1]).id).toBe(1);
            expect(index.near([0, 0], 5).map(i => i.id)).toEqual([0, 1, 2]);
        });

        it('should include items exactly on the radius', () => {
            const index = new LinearSpatialIndex<Item>();
            fill(index, [[3, 4]]);
            expect(index.near([0, 0], 5)).toHaveLength(1);
            expect(index.near([0, 0], 4.999)).toHaveLength(0);
        });

        it('should break nearest ties by insertion order', () => {
            const index = new LinearSpatialIndex<Item>();
            fill(index, [[1, 0], [-1, 0], [0, 1]]);
            expect(index.nearest([0, 0]).id).toBe(0);
        });
    });

    describe('KdTreeSpatialIndex', () => {
        it('should agree with the linear scan on random data', () => {
            for (const dimension of [1, 2, 3, 5]) {
                const points = randomPoints(300, dimension, 11 * dimension);
                const kd = new KdTreeSpatialIndex<Item>(euclidean, 16);
                const linear = new LinearSpatialIndex<Item>(euclidean);
                fill(kd, points);
                fill(linear, points);

                for (const query of randomPoints(50, dimension, 7 * dimension)) {
                    expect(kd.nearest(query).id).toBe(linear.nearest(query).id);
                    expect(kd.near(query, 20).map(i => i.id)).toEqual(linear.near(query, 20).map(i => i.id));
                }
            }
        });

        it('should agree with the linear scan on duplicated coordinates', () => {
            // Integer grid with repeats: many equal keys and equal distances
            const points: number[][] = [];
            for (let round = 0; round < 3; round++) {
                for (let x = 0; x < 6; x++) {
                    for (let y = 0; y < 6; y++) {
                        points.push([x, y]);
                    }
                }
            }
            const kd = new KdTreeSpatialIndex<Item>(euclidean, 8);
            const linear = new LinearSpatialIndex<Item>(euclidean);
            fill(kd, points);
            fill(linear, points);

            const queries = [[2.5, 2.5], [0, 0], [3, 2], [5.5, -1], [1.5, 4], [2, 2.5]];
            for (const query of queries) {
                expect(kd.nearest(query).id).toBe(linear.nearest(query).id);
                expect(kd.near(query, 1.5).map(i => i.id)).toEqual(linear.near(query, 1.5).map(i => i.id));
            }
            // [3, 2] first appears at id 3 * 6 + 2
            expect(kd.nearest([3, 2]).id).toBe(20);
        });

        it('should agree with the linear scan under a weighted metric', () => {
            for (const weights of [[0.1, 1], [1, 0.05], [3, 0.5], [0, 1]]) {
                const metric = weightedEuclidean(weights);
                const points = randomPoints(500, 2, 21);
                const kd = new KdTreeSpatialIndex<Item>(metric);
                const linear = new LinearSpatialIndex<Item>(metric);
                fill(kd, points);
                fill(linear, points);

                for (const query of randomPoints(200, 2, 22)) {
                    expect(kd.nearest(query).id).toBe(linear.nearest(query).id);
                    expect(kd.near(query, 4).map(i => i.id)).toEqual(linear.near(query, 4).map(i => i.id));
                }
            }
        });

        it('should stay balanced after a rebuild', () => {
            const kd = new KdTreeSpatialIndex<Item>();
            fill(kd, randomPoints(1000, 2, 3));
            kd.rebuild();

            expect(kd.size).toBe(1000);
            expect(kd.height).toBeLessThanOrEqual(10);
        });

        it('should keep answers unchanged across a rebuild', () => {
            const kd = new KdTreeSpatialIndex<Item>(euclidean, 1000);
            fill(kd, randomPoints(200, 3, 5));
            const query = [1, 2, 3];
            const before = { nearest: kd.nearest(query).id, near: kd.near(query, 30).map(i => i.id) };

            kd.rebuild();
            expect(kd.nearest(query).id).toBe(before.nearest);
            expect(kd.near(query, 30).map(i => i.id)).toEqual(before.near);
        });

        it('should return near() results in insertion order', () => {
            const kd = new KdTreeSpatialIndex<Item>();
            fill(kd, [[5, 5], [1, 1], [3, 3], [2, 2], [9, 9]]);
            expect(kd.near([2, 2], 3).map(i => i.id)).toEqual([1, 2, 3]);
            expect(kd.items().map(i => i.id)).toEqual([0, 1, 2, 3, 4]);
        });
    });

    describe('createSpatialIndex', () => {
        it('should create an index by kind', () => {
            expect(createSpatialIndex<Item>('linear')).toBeInstanceOf(LinearSpatialIndex);
            expect(createSpatialIndex<Item>('kdtree')).toBeInstanceOf(KdTreeSpatialIndex);
            expect(createSpatialIndex<Item>()).toBeInstanceOf(KdTreeSpatialIndex);
        });

        it('should call a custom factory with the metric', () => {
            let received: unknown = null;
            const index = createSpatialIndex<Item>(<T extends { config: Configuration }>(metric: typeof euclidean) => {
                received = metric;
                return new LinearSpatialIndex<T>(metric);
            }, euclidean);

            expect(received).toBe(euclidean);
            expect(index).toBeInstanceOf(LinearSpatialIndex);
        });
    });
});
