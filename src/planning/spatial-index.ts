/**
 * @module planning/spatial-index
 * @description Nearest / radius-neighbour queries over planned nodes
 *
 * Two interchangeable implementations:
 * - LinearSpatialIndex: O(n) scan per query, no build cost. Fine for small trees.
 * - KdTreeSpatialIndex: incremental k-d tree, rebuilt balanced whenever its size
 *   doubles, giving O(log n) amortized insertion and typical O(log n) queries.
 *
 * Both return identical answers: nearest ties go to the earliest inserted item
 * and `near` results come back in insertion order.
 */

import { InvariantViolationError, ErrorCodes } from '../core/errors';
import { euclidean, type Configuration, type DistanceMetric } from './configuration';

// ==================== Types ====================

/**
 * Anything with a configuration can be indexed
 */
export interface Locatable {
    readonly config: Configuration;
}

export interface SpatialIndex<T extends Locatable> {
    /** Number of indexed items */
    readonly size: number;
    /** Add an item. There is no removal. */
    insert(item: T): void;
    /** Item minimizing the metric to `query`. Throws on an empty index. */
    nearest(query: Configuration): T;
    /** All items within `radius` (inclusive), in insertion order */
    near(query: Configuration, radius: number): T[];
    /** All items in insertion order */
    items(): readonly T[];
}

export type SpatialIndexKind = 'kdtree' | 'linear';

export type SpatialIndexFactory = <T extends Locatable>(metric: DistanceMetric) => SpatialIndex<T>;

function emptyIndexError(): InvariantViolationError {
    return new InvariantViolationError(
        'nearest() called on an empty spatial index',
        undefined,
        ErrorCodes.EMPTY_INDEX
    );
}

// ==================== Linear Index ====================

/**
 * Brute-force index
 */
export class LinearSpatialIndex<T extends Locatable> implements SpatialIndex<T> {
    private readonly entries: T[] = [];

    constructor(private readonly metric: DistanceMetric = euclidean) { }

    get size(): number {
        return this.entries.length;
    }

    insert(item: T): void {
        this.entries.push(item);
    }

    nearest(query: Configuration): T {
        let best: T | undefined;
        let bestDist = Infinity;
        for (const item of this.entries) {
            const d = this.metric(query, item.config);
            if (best === undefined || d < bestDist) {
                best = item;
                bestDist = d;
            }
        }
        if (best === undefined) {
            throw emptyIndexError();
        }
        return best;
    }

    near(query: Configuration, radius: number): T[] {
        return this.entries.filter(item => this.metric(query, item.config) <= radius);
    }

    items(): readonly T[] {
        return this.entries;
    }
}

// ==================== K-D Tree Index ====================

interface KdNode<T> {
    item: T;
    /** Insertion sequence number */
    seq: number;
    axis: number;
    left: KdNode<T> | null;
    right: KdNode<T> | null;
}

/**
 * Incremental k-d tree.
 *
 * A subtree is skipped only when the split-axis gap, scaled by the metric's
 * `axisScale`, already exceeds the search distance.
 */
export class KdTreeSpatialIndex<T extends Locatable> implements SpatialIndex<T> {
    private root: KdNode<T> | null = null;
    private readonly entries: T[] = [];
    private dimension = 0;
    private rebuildAt: number;

    constructor(
        private readonly metric: DistanceMetric = euclidean,
        private readonly minRebuildSize: number = 32
    ) {
        this.rebuildAt = minRebuildSize;
    }

    get size(): number {
        return this.entries.length;
    }

    /** Current height of the tree (0 when empty) */
    get height(): number {
        const walk = (node: KdNode<T> | null): number =>
            node === null ? 0 : 1 + Math.max(walk(node.left), walk(node.right));
        return walk(this.root);
    }

    insert(item: T): void {
        const seq = this.entries.length;
        this.entries.push(item);

        if (this.root === null) {
            this.dimension = item.config.length;
            this.root = { item, seq, axis: 0, left: null, right: null };
            return;
        }

        let node = this.root;
        for (; ;) {
            const goLeft = item.config[node.axis] < node.item.config[node.axis];
            const next = goLeft ? node.left : node.right;
            if (next === null) {
                const leaf: KdNode<T> = {
                    item,
                    seq,
                    axis: (node.axis + 1) % this.dimension,
                    left: null,
                    right: null,
                };
                if (goLeft) node.left = leaf;
                else node.right = leaf;
                break;
            }
            node = next;
        }

        if (this.entries.length >= this.rebuildAt) {
            this.rebuild();
            this.rebuildAt = this.entries.length * 2;
        }
    }

    /**
     * Rebuild a balanced tree by median splits
     */
    rebuild(): void {
        const seqs = this.entries.map((_, i) => i);
        this.root = this.build(seqs, 0);
    }

    nearest(query: Configuration): T {
        if (this.root === null) {
            throw emptyIndexError();
        }
        const best = { node: this.root, dist: this.metric(query, this.root.item.config) };
        this.searchNearest(this.root, query, best);
        return best.node.item;
    }

    near(query: Configuration, radius: number): T[] {
        const found: KdNode<T>[] = [];
        this.searchRadius(this.root, query, radius, found);
        found.sort((a, b) => a.seq - b.seq);
        return found.map(n => n.item);
    }

    items(): readonly T[] {
        return this.entries;
    }

    private build(seqs: number[], depth: number): KdNode<T> | null {
        if (seqs.length === 0) return null;
        const axis = depth % this.dimension;
        seqs.sort((a, b) =>
            this.entries[a].config[axis] - this.entries[b].config[axis] || a - b
        );
        let mid = Math.floor(seqs.length / 2);
        // Equal keys must go right so that insert() can keep descending consistently
        while (mid > 0 && this.entries[seqs[mid - 1]].config[axis] === this.entries[seqs[mid]].config[axis]) {
            mid--;
        }
        const seq = seqs[mid];
        return {
            item: this.entries[seq],
            seq,
            axis,
            left: this.build(seqs.slice(0, mid), depth + 1),
            right: this.build(seqs.slice(mid + 1), depth + 1),
        };
    }

    private searchNearest(
        node: KdNode<T> | null,
        query: Configuration,
        best: { node: KdNode<T>; dist: number }
    ): void {
        if (node === null) return;

        const d = this.metric(query, node.item.config);
        if (d < best.dist || (d === best.dist && node.seq < best.node.seq)) {
            best.node = node;
            best.dist = d;
        }

        const diff = query[node.axis] - node.item.config[node.axis];
        const near = diff < 0 ? node.left : node.right;
        const far = diff < 0 ? node.right : node.left;

        this.searchNearest(near, query, best);
        // <= keeps equal-distance candidates reachable for the tie-break
        if (Math.abs(diff) * this.axisScale(node.axis) <= best.dist) {
            this.searchNearest(far, query, best);
        }
    }

    private searchRadius(
        node: KdNode<T> | null,
        query: Configuration,
        radius: number,
        found: KdNode<T>[]
    ): void {
        if (node === null) return;

        if (this.metric(query, node.item.config) <= radius) {
            found.push(node);
        }

        const diff = query[node.axis] - node.item.config[node.axis];
        const gap = Math.abs(diff) * this.axisScale(node.axis);
        if (diff < 0) {
            this.searchRadius(node.left, query, radius, found);
            if (gap <= radius) this.searchRadius(node.right, query, radius, found);
        } else {
            this.searchRadius(node.right, query, radius, found);
            if (gap <= radius) this.searchRadius(node.left, query, radius, found);
        }
    }

    private axisScale(axis: number): number {
        return this.metric.axisScale?.[axis] ?? 1;
    }
}

// ==================== Factory ====================

/**
 * Create a spatial index by kind, or through a custom factory
 */
export function createSpatialIndex<T extends Locatable>(
    kind: SpatialIndexKind | SpatialIndexFactory = 'kdtree',
    metric: DistanceMetric = euclidean
): SpatialIndex<T> {
    if (typeof kind === 'function') {
        return kind<T>(metric);
    }
    switch (kind) {
        case 'kdtree':
            return new KdTreeSpatialIndex<T>(metric);
        case 'linear':
            return new LinearSpatialIndex<T>(metric);
    }
}
