/**
 * @module planning/tree
 * @description Arena-backed search tree with parent/cost bookkeeping
 *
 * Nodes live in an array and refer to each other by stable integer id, so
 * rewiring never creates reference cycles. The parent id is authoritative;
 * child lists are derived and kept in sync by addNode() and rewire().
 *
 * Invariants at every observable point:
 * - node 0 is the root, with no parent and cost 0
 * - every other node has exactly one parent and reaches the root
 * - cost(node) === cost(parent) + edgeCost(node), edgeCost > 0
 */

import { ConfigurationError, ErrorCodes, InvariantViolationError } from '../core/errors';
import { createConfiguration, euclidean, type Configuration, type DistanceMetric } from './configuration';
import { createSpatialIndex, type SpatialIndex, type SpatialIndexFactory, type SpatialIndexKind } from './spatial-index';

// ==================== Types ====================

/**
 * Read-only view of a tree node
 */
export interface TreeNode {
    readonly id: number;
    readonly config: Configuration;
    /** Parent id; null only for the root */
    readonly parent: number | null;
    /** Accumulated cost from the root */
    readonly cost: number;
    /** Cost of the edge from the parent (0 for the root) */
    readonly edgeCost: number;
    /** Derived child ids */
    readonly children: readonly number[];
    /** Whether the node lies inside the goal region */
    readonly isGoal: boolean;
}

interface NodeRecord {
    id: number;
    config: Configuration;
    parent: number | null;
    cost: number;
    edgeCost: number;
    children: number[];
    isGoal: boolean;
}

export interface TreeOptions {
    /** Metric for the default index */
    metric?: DistanceMetric;
    /** Index implementation (default 'kdtree') */
    spatialIndex?: SpatialIndexKind | SpatialIndexFactory;
}

export const ROOT_ID = 0;

// ==================== Tree ====================

export class Tree {
    readonly dimension: number;
    private readonly records: NodeRecord[] = [];
    private readonly index: SpatialIndex<TreeNode>;

    constructor(root: Configuration, options: TreeOptions = {}) {
        const config = createConfiguration(root);
        this.dimension = config.length;
        this.index = createSpatialIndex<TreeNode>(options.spatialIndex ?? 'kdtree', options.metric ?? euclidean);

        const record: NodeRecord = {
            id: ROOT_ID,
            config,
            parent: null,
            cost: 0,
            edgeCost: 0,
            children: [],
            isGoal: false,
        };
        this.records.push(record);
        this.index.insert(record);
    }

    // ==================== Accessors ====================

    get size(): number {
        return this.records.length;
    }

    get root(): TreeNode {
        return this.records[ROOT_ID];
    }

    has(id: number): boolean {
        return Number.isInteger(id) && id >= 0 && id < this.records.length;
    }

    node(id: number): TreeNode {
        return this.record(id);
    }

    /** All nodes in id order */
    nodes(): readonly TreeNode[] {
        return this.records;
    }

    nearest(query: Configuration): TreeNode {
        return this.index.nearest(query);
    }

    near(query: Configuration, radius: number): TreeNode[] {
        return this.index.near(query, radius);
    }

    // ==================== Mutation ====================

    /**
     * Attach a new node under `parentId`
     */
    addNode(parentId: number, config: Configuration, edgeCost: number): TreeNode {
        const parent = this.record(parentId);
        if (config.length !== this.dimension) {
            throw new ConfigurationError(
                `Node configuration has ${config.length} coordinates, tree has ${this.dimension}`,
                ErrorCodes.DIMENSION_MISMATCH
            );
        }
        assertEdgeCost(edgeCost);

        const record: NodeRecord = {
            id: this.records.length,
            config: createConfiguration(config),
            parent: parent.id,
            cost: parent.cost + edgeCost,
            edgeCost,
            children: [],
            isGoal: false,
        };
        this.records.push(record);
        parent.children.push(record.id);
        this.index.insert(record);
        return record;
    }

    /**
     * Reassign `childId` to `newParentId` and propagate the new cost down its
     * subtree. All checks run before anything is mutated.
     *
     * @returns the cost change applied to the child and each descendant
     */
    rewire(childId: number, newParentId: number, newEdgeCost: number): number {
        const child = this.record(childId);
        const newParent = this.record(newParentId);

        if (child.parent === null) {
            throw new InvariantViolationError('Cannot rewire the root node', { childId });
        }
        if (childId === newParentId || this.isAncestor(childId, newParentId)) {
            throw new InvariantViolationError(
                `Rewiring node ${childId} under ${newParentId} would create a cycle`,
                { childId, newParentId }
            );
        }
        assertEdgeCost(newEdgeCost);

        const oldCost = child.cost;
        if (child.parent !== newParentId) {
            const oldParent = this.record(child.parent);
            const at = oldParent.children.indexOf(childId);
            if (at < 0) {
                throw new InvariantViolationError(
                    `Node ${childId} missing from child list of its parent ${oldParent.id}`,
                    { childId, parentId: oldParent.id }
                );
            }
            oldParent.children.splice(at, 1);
            newParent.children.push(childId);
            child.parent = newParentId;
        }
        child.edgeCost = newEdgeCost;

        // Recompute rather than add the delta so cost === parent.cost + edgeCost holds exactly
        const stack = [childId];
        while (stack.length > 0) {
            const current = this.record(stack.pop() ?? ROOT_ID);
            const parent = this.record(current.parent ?? ROOT_ID);
            current.cost = parent.cost + current.edgeCost;
            stack.push(...current.children);
        }

        return child.cost - oldCost;
    }

    markGoal(id: number, isGoal: boolean = true): void {
        this.record(id).isGoal = isGoal;
    }

    // ==================== Structure Queries ====================

    /**
     * Whether `ancestorId` lies strictly above `id` on its root path
     */
    isAncestor(ancestorId: number, id: number): boolean {
        let current = this.record(id).parent;
        let steps = 0;
        while (current !== null) {
            if (current === ancestorId) return true;
            if (++steps > this.records.length) {
                throw new InvariantViolationError(`Cycle detected above node ${id}`, { id });
            }
            current = this.record(current).parent;
        }
        return false;
    }

    /**
     * Ids from the parent of `id` up to the root
     */
    ancestors(id: number): number[] {
        const result: number[] = [];
        let current = this.record(id).parent;
        while (current !== null) {
            result.push(current);
            if (result.length > this.records.length) {
                throw new InvariantViolationError(`Cycle detected above node ${id}`, { id });
            }
            current = this.record(current).parent;
        }
        return result;
    }

    /**
     * Ids of every node below `id`, breadth first
     */
    descendants(id: number): number[] {
        const result: number[] = [];
        const queue = [...this.record(id).children];
        for (let i = 0; i < queue.length; i++) {
            result.push(queue[i]);
            queue.push(...this.record(queue[i]).children);
        }
        return result;
    }

    depth(id: number): number {
        return this.ancestors(id).length;
    }

    /** Nodes without children */
    leaves(): TreeNode[] {
        return this.records.filter(r => r.children.length === 0);
    }

    goalNodes(): TreeNode[] {
        return this.records.filter(r => r.isGoal);
    }

    /**
     * Goal node with the lowest current cost (lowest id on ties)
     */
    bestGoalNode(): TreeNode | null {
        let best: TreeNode | null = null;
        for (const r of this.records) {
            if (r.isGoal && (best === null || r.cost < best.cost)) {
                best = r;
            }
        }
        return best;
    }

    // ==================== Validation ====================

    /**
     * Re-check every structural invariant. Throws InvariantViolationError.
     */
    validate(tolerance: number = 1e-9): void {
        const root = this.records[ROOT_ID];
        if (root.parent !== null || root.cost !== 0) {
            throw new InvariantViolationError('Root must have no parent and cost 0');
        }

        let childLinks = 0;
        for (const r of this.records) {
            childLinks += r.children.length;
            for (const c of r.children) {
                if (!this.has(c) || this.records[c].parent !== r.id) {
                    throw new InvariantViolationError(
                        `Child list of node ${r.id} disagrees with parent of ${c}`,
                        { id: r.id, child: c }
                    );
                }
            }
            if (r.id === ROOT_ID) continue;

            if (r.parent === null) {
                throw new InvariantViolationError(`Node ${r.id} has no parent`, { id: r.id });
            }
            if (!this.has(r.parent)) {
                throw new InvariantViolationError(`Node ${r.id} has dangling parent ${r.parent}`, { id: r.id });
            }
            if (!(r.edgeCost > 0)) {
                throw new InvariantViolationError(`Node ${r.id} has non-positive edge cost`, { id: r.id });
            }
            const expected = this.records[r.parent].cost + r.edgeCost;
            if (Math.abs(expected - r.cost) > tolerance * Math.max(1, expected)) {
                throw new InvariantViolationError(
                    `Node ${r.id} cost ${r.cost} differs from path cost ${expected}`,
                    { id: r.id, cost: r.cost, expected }
                );
            }
            // Reaches the root (throws on a cycle)
            this.ancestors(r.id);
        }

        if (childLinks !== this.records.length - 1) {
            throw new InvariantViolationError(
                `Tree has ${childLinks} child links for ${this.records.length} nodes`
            );
        }
    }

    private record(id: number): NodeRecord {
        if (!this.has(id)) {
            throw new InvariantViolationError(`Unknown node id ${id}`, { id });
        }
        return this.records[id];
    }
}

function assertEdgeCost(edgeCost: number): void {
    if (!Number.isFinite(edgeCost) || edgeCost <= 0) {
        throw new ConfigurationError(
            `Edge cost must be a positive finite number, got ${edgeCost}`,
            ErrorCodes.INVALID_CONFIG
        );
    }
}
