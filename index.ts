/**
 * @packageDocumentation
 * @module rrtkit
 *
 * rrtkit: sampling-based motion planning (RRT and RRT*)
 *
 * Grows a tree from a start configuration toward a goal region under an
 * injected validity oracle. Works in any number of dimensions; metric,
 * steering, sampler, spatial index and rewiring radius are all pluggable.
 *
 * ## Modules
 * - `planning` - Configurations, spatial index, tree, planner, path, export
 * - `spaces` - Reference validity oracles (empty / walled boxes), scenario loader
 * - `core` - Errors, logging, seeded RNG, batch trials
 *
 * ## Usage Example
 * ```typescript
 * import { core, planning, spaces } from 'rrtkit';
 *
 * const bounds = core.box([0, 0], [100, 100]);
 * const result = planning.plan({
 *     start: [0, 0],
 *     goal: new planning.BallGoal([100, 100], 5),
 *     oracle: new spaces.EmptySpace(bounds),
 *     bounds,
 *     maxStep: 5,
 *     goalBias: 0.1,
 *     iterationBudget: 5000,
 *     optimal: true,
 *     seed: 42,
 * });
 * ```
 *
 * @license MIT
 */

export * as core from './src/core';
export * as planning from './src/planning';
export * as spaces from './src/spaces';

// ==================== Version ====================
export const VERSION = '0.3.0';
