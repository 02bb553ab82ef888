/**
 * Tree Tests
 * Parent/cost bookkeeping, rewiring and well-formedness
 */

import { describe, it, expect } from 'vitest';
import { Tree, ROOT_ID, euclidean } from '../src/planning';
import { ConfigurationError, ErrorCodes, InvariantViolationError, createRng } from '../src/core';
import { thrown, treeProblems } from './test-utils';

/**
 *        0 (0,0)
 *       / \
 *  1 (1,0) 3 (0,1)
 *     |
 *  2 (2,0)
 */
function smallTree(): Tree {
    const tree = new Tree([0, 0]);
    tree.addNode(0, [1, 0], 1);
    tree.addNode(1, [2, 0], 1);
    tree.addNode(0, [0, 1], 1);
    return tree;
}

describe('Tree', () => {
    describe('construction', () => {
        it('should create a root with cost 0 and no parent', () => {
            const tree = new Tree([1, 2, 3]);
            expect(tree.size).toBe(1);
            expect(tree.dimension).toBe(3);
            expect(tree.root.id).toBe(ROOT_ID);
            expect(tree.root.parent).toBeNull();
            expect(tree.root.cost).toBe(0);
            expect(tree.root.config).toEqual([1, 2, 3]);
        });

        it('should reject a non-finite root', () => {
            expect(() => new Tree([0, NaN])).toThrow(ConfigurationError);
        });
    });

    describe('addNode', () => {
        it('should accumulate cost and derive children', () => {
            const tree = smallTree();
            expect(tree.size).toBe(4);
            expect(tree.node(2).cost).toBe(2);
            expect(tree.node(2).parent).toBe(1);
            expect(tree.root.children).toEqual([1, 3]);
            expect(tree.node(1).children).toEqual([2]);
        });

        it('should reject a dangling parent', () => {
            const tree = smallTree();
            expect(() => tree.addNode(42, [5, 5], 1)).toThrow(InvariantViolationError);
        });

        it('should reject non-positive or non-finite edge costs', () => {
            const tree = smallTree();
            expect(() => tree.addNode(0, [5, 5], 0)).toThrow(ConfigurationError);
            expect(() => tree.addNode(0, [5, 5], -1)).toThrow(ConfigurationError);
            expect(() => tree.addNode(0, [5, 5], Infinity)).toThrow(ConfigurationError);
            expect(tree.size).toBe(4);
        });

        it('should reject a configuration of the wrong dimension', () => {
            const tree = smallTree();
            expect(thrown(() => tree.addNode(0, [5, 5, 5], 1))).toMatchObject({
                code: ErrorCodes.DIMENSION_MISMATCH,
            });
        });

        it('should make new nodes visible to nearest and near', () => {
            const tree = smallTree();
            expect(tree.nearest([2.2, 0.1]).id).toBe(2);
            expect(tree.near([0, 0], 1).map(n => n.id)).toEqual([0, 1, 3]);
        });
    });

    describe('rewire', () => {
        it('should move the child and propagate cost to descendants', () => {
            const tree = smallTree();
            const delta = tree.rewire(1, 3, Math.SQRT2);

            expect(delta).toBeCloseTo(Math.SQRT2, 12);
            expect(tree.node(1).parent).toBe(3);
            expect(tree.node(1).cost).toBeCloseTo(1 + Math.SQRT2, 12);
            expect(tree.node(2).cost).toBeCloseTo(2 + Math.SQRT2, 12);
            expect(tree.root.children).toEqual([3]);
            expect(tree.node(3).children).toEqual([1]);
            expect(treeProblems(tree)).toEqual([]);
        });

        it('should update only the edge cost when the parent is unchanged', () => {
            const tree = smallTree();
            const delta = tree.rewire(2, 1, 0.5);
            expect(delta).toBe(-0.5);
            expect(tree.node(2).cost).toBe(1.5);
            expect(tree.node(1).children).toEqual([2]);
        });

        it('should reject rewiring the root', () => {
            const tree = smallTree();
            expect(() => tree.rewire(0, 1, 1)).toThrow('Cannot rewire the root node');
        });

        it('should reject cycles and leave the tree untouched', () => {
            const tree = smallTree();
            expect(() => tree.rewire(1, 2, 1)).toThrow(InvariantViolationError);
            expect(() => tree.rewire(1, 1, 1)).toThrow(InvariantViolationError);

            expect(tree.node(1).parent).toBe(0);
            expect(tree.node(2).parent).toBe(1);
            expect(treeProblems(tree)).toEqual([]);
        });

        it('should reject invalid edge costs before mutating', () => {
            const tree = smallTree();
            expect(() => tree.rewire(1, 3, 0)).toThrow(ConfigurationError);
            expect(tree.node(1).parent).toBe(0);
        });

        it('should stay well-formed under random extend/rewire sequences', () => {
            const rng = createRng(2024);
            const tree = new Tree([0, 0, 0]);

            for (let step = 0; step < 400; step++) {
                if (tree.size < 3 || rng.random() < 0.6) {
                    const parent = rng.randint(0, tree.size);
                    const config = [rng.uniform(0, 10), rng.uniform(0, 10), rng.uniform(0, 10)];
                    tree.addNode(parent, config, euclidean(tree.node(parent).config, config) + 1e-3);
                } else {
                    const child = rng.randint(1, tree.size);
                    const excluded = new Set([child, ...tree.descendants(child)]);
                    const candidates = tree.nodes().filter(n => !excluded.has(n.id));
                    const parent = candidates[rng.randint(0, candidates.length)];
                    tree.rewire(child, parent.id, euclidean(parent.config, tree.node(child).config) + 1e-3);
                }
            }

            expect(treeProblems(tree)).toEqual([]);
            expect(() => tree.validate()).not.toThrow();
        });
    });

    describe('structure queries', () => {
        it('should report ancestors, descendants, depth and leaves', () => {
            const tree = smallTree();
            expect(tree.ancestors(2)).toEqual([1, 0]);
            expect(tree.ancestors(0)).toEqual([]);
            expect(tree.descendants(0)).toEqual([1, 3, 2]);
            expect(tree.depth(2)).toBe(2);
            expect(tree.leaves().map(n => n.id)).toEqual([2, 3]);
            expect(tree.isAncestor(0, 2)).toBe(true);
            expect(tree.isAncestor(3, 2)).toBe(false);
            expect(tree.isAncestor(2, 2)).toBe(false);
        });

        it('should throw for unknown ids', () => {
            const tree = smallTree();
            expect(tree.has(3)).toBe(true);
            expect(tree.has(4)).toBe(false);
            expect(tree.has(-1)).toBe(false);
            expect(() => tree.node(4)).toThrow('Unknown node id 4');
        });
    });

    describe('goal nodes', () => {
        it('should pick the cheapest goal node, lowest id on ties', () => {
            const tree = smallTree();
            expect(tree.bestGoalNode()).toBeNull();

            tree.markGoal(2);
            tree.markGoal(3);
            expect(tree.goalNodes().map(n => n.id)).toEqual([2, 3]);
            expect(tree.bestGoalNode()?.id).toBe(3);

            tree.markGoal(1);
            tree.markGoal(3, false);
            expect(tree.bestGoalNode()?.id).toBe(1);
        });

        it('should follow cost changes from rewiring', () => {
            const tree = smallTree();
            tree.markGoal(2);
            tree.markGoal(3);
            tree.rewire(3, 2, 1);
            // node 3 now costs 3, node 2 still 2
            expect(tree.bestGoalNode()?.id).toBe(2);
        });
    });

    describe('validate', () => {
        it('should pass on a sound tree', () => {
            expect(() => smallTree().validate()).not.toThrow();
        });
    });
});
