/**
 * @module planning
 * @description Sampling-based motion planning: RRT and RRT*
 *
 * ## Modules
 * - `configuration`: points in configuration space and distance metrics
 * - `spatial-index`: nearest / radius queries (k-d tree, linear scan)
 * - `steering`: bounded extension toward a sample
 * - `tree`: arena tree with parent/cost bookkeeping and rewiring
 * - `sampling`, `goals`, `radius`: pluggable heuristics
 * - `planner`: the tree-growth loop
 * - `path`, `serialization`: results and export
 */

// ==================== Configuration ====================

export type { Configuration, DistanceMetric } from './configuration';

export {
    DEFAULT_TOLERANCE,
    createConfiguration,
    assertDimension,
    distanceSquared,
    euclidean,
    weightedEuclidean,
    configurationsEqual,
    interpolate,
} from './configuration';

// ==================== Collaborators ====================

export type { ValidityOracle, GoalRegion, Sampler, RewireRadiusSchedule } from './types';

// ==================== Spatial Index ====================

export type { Locatable, SpatialIndex, SpatialIndexKind, SpatialIndexFactory } from './spatial-index';

export { LinearSpatialIndex, KdTreeSpatialIndex, createSpatialIndex } from './spatial-index';

// ==================== Steering ====================

export type { SteerResult, SteeringFunction } from './steering';

export { straightLineSteering, steer } from './steering';

// ==================== Tree ====================

export type { TreeNode, TreeOptions } from './tree';

export { Tree, ROOT_ID } from './tree';

// ==================== Path ====================

export { extractPath, pathLength, validatePath, shortcutPath } from './path';

// ==================== Heuristics ====================

export { BoxGoal, BallGoal, PointGoal, GoalUnion } from './goals';

export { uniformSampler, freeSpaceSampler, goalBiasedSampler } from './sampling';

export type { RrtStarRadiusOptions } from './radius';

export { unitBallVolume, optimalGamma, rrtStarRadius, constantRadius } from './radius';

// ==================== Planner ====================

export type {
    PlanStatus,
    PlannerState,
    PlannerOptions,
    IterationResult,
    PlanResult,
} from './planner';

export {
    DEFAULT_GOAL_BIAS,
    DEFAULT_DUPLICATE_TOLERANCE,
    DEFAULT_RADIUS_FACTOR,
    Planner,
    validatePlannerOptions,
    createPlanner,
    plan,
    rejectedQueryResult,
} from './planner';

// ==================== Serialization ====================

export type { TreeRecord, ExportedResult } from './serialization';

export {
    serializeTree,
    deserializeTree,
    treeToJSONL,
    parseTreeJSONL,
    exportResult,
} from './serialization';
