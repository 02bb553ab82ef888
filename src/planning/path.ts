/**
 * @module planning/path
 * @description Path extraction and post-processing
 */

import { InvariantViolationError } from '../core/errors';
import { euclidean, type Configuration, type DistanceMetric } from './configuration';
import type { Tree } from './tree';
import type { ValidityOracle } from './types';

/**
 * Walk parent links from `goalNodeId` to the root and reverse.
 * The first element is the root configuration.
 */
export function extractPath(tree: Tree, goalNodeId: number): Configuration[] {
    if (!tree.has(goalNodeId)) {
        throw new InvariantViolationError(`Goal node ${goalNodeId} is not in the tree`, { goalNodeId });
    }

    const reversed: Configuration[] = [];
    let current: number | null = goalNodeId;
    while (current !== null) {
        if (reversed.length > tree.size) {
            throw new InvariantViolationError(`Node ${goalNodeId} does not reach the root`, { goalNodeId });
        }
        const node = tree.node(current);
        reversed.push(node.config);
        current = node.parent;
    }

    if (reversed[reversed.length - 1] !== tree.root.config) {
        throw new InvariantViolationError(`Node ${goalNodeId} does not reach the root`, { goalNodeId });
    }
    return reversed.reverse();
}

/**
 * Sum of metric distances between consecutive configurations
 */
export function pathLength(path: readonly Configuration[], metric: DistanceMetric = euclidean): number {
    let total = 0;
    for (let i = 1; i < path.length; i++) {
        total += metric(path[i - 1], path[i]);
    }
    return total;
}

/**
 * Every configuration and every consecutive motion passes the oracle
 */
export function validatePath(path: readonly Configuration[], oracle: ValidityOracle): boolean {
    for (let i = 0; i < path.length; i++) {
        if (!oracle.isValidConfiguration(path[i])) return false;
        if (i > 0 && !oracle.isValidMotion(path[i - 1], path[i])) return false;
    }
    return true;
}

/**
 * Greedy shortcutting: from each kept waypoint jump to the farthest later
 * waypoint with a valid straight motion. Endpoints are preserved and, under
 * the triangle inequality, the length never grows.
 */
export function shortcutPath(path: readonly Configuration[], oracle: ValidityOracle): Configuration[] {
    if (path.length <= 2) return [...path];

    const result: Configuration[] = [path[0]];
    let i = 0;
    while (i < path.length - 1) {
        let j = path.length - 1;
        while (j > i + 1 && !oracle.isValidMotion(path[i], path[j])) {
            j--;
        }
        result.push(path[j]);
        i = j;
    }
    return result;
}
