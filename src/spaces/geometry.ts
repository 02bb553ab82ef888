/**
 * @module spaces/geometry
 * @description Axis-aligned box geometry in n dimensions
 */

import { box, type BoxSpace } from '../core/space';

/**
 * Point inside or on the boundary of the box
 */
export function pointInBox(region: BoxSpace, point: readonly number[]): boolean {
    if (point.length !== region.low.length) return false;
    for (let i = 0; i < point.length; i++) {
        if (point[i] < region.low[i] || point[i] > region.high[i]) return false;
    }
    return true;
}

/**
 * Whether the closed segment a→b touches the closed box (slab test)
 */
export function segmentIntersectsBox(a: readonly number[], b: readonly number[], region: BoxSpace): boolean {
    let tMin = 0;
    let tMax = 1;

    for (let i = 0; i < region.low.length; i++) {
        const d = b[i] - a[i];
        if (d === 0) {
            // Parallel to this slab: must already lie within it
            if (a[i] < region.low[i] || a[i] > region.high[i]) return false;
            continue;
        }
        let t1 = (region.low[i] - a[i]) / d;
        let t2 = (region.high[i] - a[i]) / d;
        if (t1 > t2) [t1, t2] = [t2, t1];
        tMin = Math.max(tMin, t1);
        tMax = Math.min(tMax, t2);
        if (tMin > tMax) return false;
    }
    return true;
}

/**
 * Grow the box by `margin` on every side
 */
export function inflateBox(region: BoxSpace, margin: number): BoxSpace {
    if (margin === 0) return region;
    return box(
        region.low.map(v => v - margin),
        region.high.map(v => v + margin)
    );
}

/**
 * Two closed boxes share at least one point
 */
export function boxesOverlap(a: BoxSpace, b: BoxSpace): boolean {
    for (let i = 0; i < a.low.length; i++) {
        if (a.high[i] < b.low[i] || b.high[i] < a.low[i]) return false;
    }
    return true;
}
