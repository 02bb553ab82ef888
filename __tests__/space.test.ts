/**
 * Core Space and Reproducibility Tests
 * Box bounds, seeded RNG, config hashing and manifests
 */

import { describe, it, expect } from 'vitest';
import {
    box,
    validateBox,
    dimensionOf,
    sampleBox,
    containsBox,
    clampToBox,
    boxVolume,
    SeededRandom,
    createRng,
    createHash,
    computeConfigHash,
    createRunManifest,
    CORE_VERSION,
} from '../src/core';
import { VERSION } from '../index';

// ==================== Box Spaces ====================

describe('Box spaces', () => {
    it('should create frozen boxes', () => {
        const space = box([0, -1], [2, 1]);
        expect(space.kind).toBe('box');
        expect(space.low).toEqual([0, -1]);
        expect(Object.isFrozen(space)).toBe(true);
        expect(Object.isFrozen(space.low)).toBe(true);
    });

    it('should broadcast scalar bounds', () => {
        const space = box(0, 10, 3);
        expect(space.low).toEqual([0, 0, 0]);
        expect(space.high).toEqual([10, 10, 10]);
        expect(box([1, 2], 5).high).toEqual([5, 5]);
        expect(dimensionOf(space)).toBe(3);
    });

    it('should validate bounds', () => {
        expect(validateBox(box([0, 0], [1, 1]))).toEqual({ valid: true, errors: [], warnings: [] });
        expect(validateBox(box([], [])).errors).toEqual(['box must have at least one dimension']);
        expect(validateBox(box([0, Infinity], [1, 2])).errors).toEqual(['bounds of dimension 1 must be finite']);
        expect(validateBox(box([2], [1])).errors).toEqual(['low[0] (2) exceeds high[0] (1)']);
    });

    it('should warn about degenerate dimensions', () => {
        const result = validateBox(box([0, 3], [1, 3]));
        expect(result.valid).toBe(true);
        expect(result.warnings).toEqual(['dimension 1 is degenerate (low == high == 3)']);
    });

    it('should sample within bounds', () => {
        const space = box([-5, 10], [5, 20]);
        const rng = createRng(42);
        for (let i = 0; i < 100; i++) {
            expect(containsBox(space, sampleBox(space, () => rng.random()))).toBe(true);
        }
        expect(sampleBox(space, () => 0)).toEqual([-5, 10]);
        expect(sampleBox(space, () => 0.5)).toEqual([0, 15]);
    });

    it('should test containment on the closed box', () => {
        const space = box([0, 0], [1, 1]);
        expect(containsBox(space, [1, 0])).toBe(true);
        expect(containsBox(space, [1.0001, 0])).toBe(false);
        expect(containsBox(space, [0.5])).toBe(false);
    });

    it('should clamp and measure', () => {
        const space = box([0, 0, 0], [2, 3, 4]);
        expect(clampToBox(space, [-1, 1, 9])).toEqual([0, 1, 4]);
        expect(boxVolume(space)).toBe(24);
        expect(boxVolume(box([0, 1], [5, 1]))).toBe(0);
    });
});

// ==================== Seeded Random ====================

describe('SeededRandom', () => {
    it('should replay the same stream for the same seed', () => {
        const a = new SeededRandom(123);
        const b = createRng(123);
        for (let i = 0; i < 50; i++) {
            expect(a.random()).toBe(b.random());
        }
    });

    it('should differ across seeds', () => {
        expect(createRng(1).random()).not.toBe(createRng(2).random());
    });

    it('should stay in range', () => {
        const rng = createRng(7);
        for (let i = 0; i < 500; i++) {
            const x = rng.random();
            expect(x).toBeGreaterThanOrEqual(0);
            expect(x).toBeLessThan(1);

            const k = rng.randint(3, 6);
            expect(Number.isInteger(k)).toBe(true);
            expect(k).toBeGreaterThanOrEqual(3);
            expect(k).toBeLessThan(6);

            const u = rng.uniform(-2, 2);
            expect(u).toBeGreaterThanOrEqual(-2);
            expect(u).toBeLessThan(2);
        }
    });

    it('should produce roughly standard normal samples', () => {
        const rng = createRng(99);
        const samples = Array.from({ length: 5000 }, () => rng.normal());
        const mean = samples.reduce((a, b) => a + b, 0) / samples.length;
        const variance = samples.reduce((a, b) => a + (b - mean) ** 2, 0) / samples.length;

        expect(Math.abs(mean)).toBeLessThan(0.1);
        expect(variance).toBeGreaterThan(0.9);
        expect(variance).toBeLessThan(1.1);
        expect(samples.every(Number.isFinite)).toBe(true);
    });

    it('should shuffle into a permutation', () => {
        const shuffled = createRng(5).shuffle([1, 2, 3, 4, 5, 6]);
        expect([...shuffled].sort()).toEqual([1, 2, 3, 4, 5, 6]);
    });

    it('should restore a saved state', () => {
        const rng = createRng(11);
        rng.random();
        const state = rng.getState();
        const next = [rng.random(), rng.random()];

        rng.setState(state);
        expect([rng.random(), rng.random()]).toEqual(next);
    });
});

// ==================== Hashing and Manifests ====================

describe('Config hashing', () => {
    it('should produce 32 hex characters', () => {
        expect(createHash('rrt')).toMatch(/^[0-9a-f]{32}$/);
        expect(createHash('rrt')).toBe(createHash('rrt'));
        expect(createHash('rrt')).not.toBe(createHash('rrt*'));
    });

    it('should ignore key order', () => {
        expect(computeConfigHash({ a: 1, b: { c: 2, d: [1, 2] } }))
            .toBe(computeConfigHash({ b: { d: [1, 2], c: 2 }, a: 1 }));
    });

    it('should distinguish Infinity from null and drop undefined', () => {
        expect(computeConfigHash({ budget: Infinity })).not.toBe(computeConfigHash({ budget: null }));
        expect(computeConfigHash({ a: 1, b: undefined })).toBe(computeConfigHash({ a: 1 }));
    });

    it('should hash functions by name', () => {
        function euclidean(): number {
            return 0;
        }
        function manhattan(): number {
            return 0;
        }
        expect(computeConfigHash({ metric: euclidean })).not.toBe(computeConfigHash({ metric: manhattan }));
    });

    it('should build run manifests', () => {
        const manifest = createRunManifest({ label: 'open-field', seed: 3, hyperparams: { z: 1, a: Infinity } });

        expect(manifest.label).toBe('open-field');
        expect(manifest.seed).toBe(3);
        expect(manifest.hyperparams).toEqual({ a: 'Infinity', z: 1 });
        expect(Object.keys(manifest.hyperparams)).toEqual(['a', 'z']);
        expect(manifest.libraryVersion).toBe(CORE_VERSION);
        expect(manifest.configHash).toBe(computeConfigHash({
            label: 'open-field',
            seed: 3,
            hyperparams: { z: 1, a: Infinity },
        }));
    });

    it('should keep the library version in step with the package', () => {
        expect(CORE_VERSION).toBe(VERSION);
    });
});
