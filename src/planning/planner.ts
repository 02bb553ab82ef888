/**
 * @module planning/planner
 * @description RRT / RRT* tree-growth engine
 *
 * State machine:
 *
 *     initialized → running → succeeded | exhausted | cancelled
 *                          ↘ failed (ConfigurationError / InvariantViolationError)
 *
 * Each iteration samples a target, extends the nearest node toward it by at
 * most `maxStep`, checks the new configuration and motion with the validity
 * oracle, and (RRT*) picks the cheapest parent in the rewiring radius before
 * rerouting neighbours through the new node. Rejected samples are dropped
 * silently. Cancellation, budgets and the plain-RRT early exit are evaluated
 * only at the top of an iteration, never while a rewire is in progress.
 *
 * @example
 * ```typescript
 * const planner = new Planner({
 *     start: [0, 0],
 *     goal: new BallGoal([100, 100], 5),
 *     oracle: new EmptySpace(box([0, 0], [100, 100])),
 *     bounds: box([0, 0], [100, 100]),
 *     maxStep: 5,
 *     goalBias: 0.1,
 *     iterationBudget: 5000,
 *     seed: 42,
 * });
 * const result = planner.run();
 * ```
 */

import {
    ConfigurationError,
    ErrorCodes,
    NotRunningError,
    PlanningError,
    wrapError,
} from '../core/errors';
import type { IterationOutcome, Logger } from '../core/logging';
import { createRng, type SeededRandom, type ValidationResult } from '../core/repro';
import { boxVolume, validateBox, type BoxSpace } from '../core/space';
import {
    assertDimension,
    configurationsEqual,
    createConfiguration,
    euclidean,
    type Configuration,
    type DistanceMetric,
} from './configuration';
import { extractPath } from './path';
import { constantRadius, optimalGamma, rrtStarRadius } from './radius';
import { goalBiasedSampler, uniformSampler } from './sampling';
import type { SpatialIndexFactory, SpatialIndexKind } from './spatial-index';
import { straightLineSteering, type SteeringFunction } from './steering';
import { Tree, ROOT_ID, type TreeNode } from './tree';
import type { GoalRegion, RewireRadiusSchedule, Sampler, ValidityOracle } from './types';

// ==================== Types ====================

export type PlanStatus = 'succeeded' | 'exhausted' | 'cancelled' | 'failed';

export type PlannerState = 'initialized' | 'running' | PlanStatus;

export interface PlannerOptions {
    /** Root of the tree */
    start: readonly number[];
    /** Goal region; also sampled under goal bias */
    goal: GoalRegion;
    /** Obstacle / constraint checker */
    oracle: ValidityOracle;
    /** Step bound per extension */
    maxStep: number;
    /** Per-dimension sampling bounds (required unless `sampler` is given) */
    bounds?: BoxSpace;
    /** Base sampler; goal bias is applied on top of it */
    sampler?: Sampler;
    /** Probability of sampling the goal region (default 0.05) */
    goalBias?: number;
    /** Maximum number of extension attempts */
    iterationBudget?: number;
    /** Wall-clock budget in milliseconds */
    timeBudgetMs?: number;
    /** RRT* (true) or plain RRT (false, default) */
    optimal?: boolean;
    /** Neighbour radius for RRT* as a function of tree size */
    rewireRadius?: RewireRadiusSchedule;
    /** Steering (default straight line under `metric`) */
    steering?: SteeringFunction;
    /** Metric for the default steering (default Euclidean) */
    metric?: DistanceMetric;
    /** Spatial index implementation (default 'kdtree') */
    spatialIndex?: SpatialIndexKind | SpatialIndexFactory;
    /** Random seed (default 0) */
    seed?: number;
    /** Extensions with cost at or below this are treated as duplicates */
    duplicateTolerance?: number;
    /** External cancellation */
    signal?: AbortSignal;
    /** Clock in milliseconds (default Date.now) */
    now?: () => number;
    loggers?: Logger[];
    /** Emit one log entry per iteration */
    logIterations?: boolean;
    /** Label used in log entries */
    label?: string;
}

export interface IterationResult {
    iteration: number;
    outcome: IterationOutcome;
    /** Id of the node added, null when the sample was discarded */
    nodeId: number | null;
    /** Neighbours rerouted through the new node */
    rewired: number;
    goalReached: boolean;
}

export interface PlanResult {
    status: PlanStatus;
    /** Start → goal configurations; empty when no path was found */
    path: Configuration[];
    /** Path cost; Infinity when no path was found */
    cost: number;
    goalNodeId: number | null;
    /** Extension attempts performed */
    iterations: number;
    treeSize: number;
    elapsedMs: number;
    /** Set when status is 'failed' */
    error?: PlanningError;
}

export const DEFAULT_GOAL_BIAS = 0.05;
export const DEFAULT_DUPLICATE_TOLERANCE = 1e-9;
/** Default neighbourhood cap, as a multiple of maxStep */
export const DEFAULT_RADIUS_FACTOR = 3;

// ==================== Validation ====================

/**
 * Check option values that do not depend on dimensions
 */
export function validatePlannerOptions(options: PlannerOptions): ValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    if (!Array.isArray(options.start) || options.start.length === 0) {
        errors.push('start must be a non-empty array of coordinates');
    }
    if (!(options.maxStep > 0) || !Number.isFinite(options.maxStep)) {
        errors.push(`maxStep must be a positive finite number, got ${options.maxStep}`);
    }
    const goalBias = options.goalBias ?? DEFAULT_GOAL_BIAS;
    if (!(goalBias >= 0 && goalBias <= 1)) {
        errors.push(`goalBias must lie in [0, 1], got ${goalBias}`);
    }
    if (options.iterationBudget === undefined && options.timeBudgetMs === undefined) {
        errors.push('one of iterationBudget or timeBudgetMs is required');
    }
    if (options.iterationBudget !== undefined
        && (!Number.isInteger(options.iterationBudget) || options.iterationBudget < 0)) {
        errors.push(`iterationBudget must be a non-negative integer, got ${options.iterationBudget}`);
    }
    if (options.timeBudgetMs !== undefined && !(options.timeBudgetMs >= 0)) {
        errors.push(`timeBudgetMs must be >= 0, got ${options.timeBudgetMs}`);
    }
    if (options.bounds === undefined && options.sampler === undefined) {
        errors.push('bounds are required when no sampler is given');
    }
    if (options.bounds !== undefined) {
        const check = validateBox(options.bounds);
        errors.push(...check.errors.map(e => `bounds: ${e}`));
        warnings.push(...check.warnings.map(w => `bounds: ${w}`));
    }
    if (options.duplicateTolerance !== undefined && !(options.duplicateTolerance >= 0)) {
        errors.push(`duplicateTolerance must be >= 0, got ${options.duplicateTolerance}`);
    }
    if (typeof options.oracle?.isValidConfiguration !== 'function'
        || typeof options.oracle?.isValidMotion !== 'function') {
        errors.push('oracle must implement isValidConfiguration and isValidMotion');
    }
    if (typeof options.goal?.contains !== 'function' || typeof options.goal?.sample !== 'function') {
        errors.push('goal must implement contains and sample');
    }
    if (options.optimal && options.rewireRadius === undefined && options.bounds === undefined) {
        warnings.push(`no rewireRadius or bounds: RRT* falls back to a constant radius of ${DEFAULT_RADIUS_FACTOR}·maxStep`);
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings,
    };
}

// ==================== Planner ====================

export class Planner {
    readonly dimension: number;
    readonly optimal: boolean;
    readonly seed: number;
    readonly label: string;

    private readonly goal: GoalRegion;
    private readonly oracle: ValidityOracle;
    private readonly maxStep: number;
    private readonly sampler: Sampler;
    private readonly steering: SteeringFunction;
    private readonly rewireRadius: RewireRadiusSchedule;
    private readonly iterationBudget: number;
    private readonly timeBudgetMs: number;
    private readonly duplicateTolerance: number;
    private readonly signal?: AbortSignal;
    private readonly now: () => number;
    private readonly loggers: Logger[];
    private readonly logIterations: boolean;
    private readonly rng: SeededRandom;
    private readonly tree: Tree;

    private currentState: PlannerState = 'initialized';
    private iterations = 0;
    private startedAt = 0;
    private finishedAt = 0;
    private cancelRequested = false;
    private asyncSignal?: AbortSignal;
    private error?: PlanningError;
    private finalResult: PlanResult | null = null;

    /**
     * @throws ConfigurationError on invalid options, mismatched dimensions or an invalid start
     */
    constructor(options: PlannerOptions) {
        const check = validatePlannerOptions(options);
        if (!check.valid) {
            throw new ConfigurationError(
                `Invalid planner options: ${check.errors.join('; ')}`,
                ErrorCodes.INVALID_CONFIG,
                check.errors
            );
        }

        const start = createConfiguration(options.start);
        this.dimension = start.length;
        if (options.bounds !== undefined) {
            assertDimension(options.bounds.low, this.dimension, 'bounds');
        }

        this.goal = options.goal;
        this.oracle = options.oracle;
        this.maxStep = options.maxStep;
        this.optimal = options.optimal ?? false;
        this.seed = options.seed ?? 0;
        this.label = options.label ?? (this.optimal ? 'rrt-star' : 'rrt');
        this.iterationBudget = options.iterationBudget ?? Infinity;
        this.timeBudgetMs = options.timeBudgetMs ?? Infinity;
        this.duplicateTolerance = options.duplicateTolerance ?? DEFAULT_DUPLICATE_TOLERANCE;
        this.signal = options.signal;
        this.now = options.now ?? Date.now;
        this.loggers = options.loggers ?? [];
        this.logIterations = options.logIterations ?? false;
        this.rng = createRng(this.seed);

        this.steering = options.steering ?? straightLineSteering(options.metric ?? euclidean);

        const base = options.sampler ?? uniformSampler(requireBounds(options.bounds));
        if (base.dimension !== this.dimension) {
            throw new ConfigurationError(
                `Sampler has dimension ${base.dimension}, start has ${this.dimension}`,
                ErrorCodes.DIMENSION_MISMATCH
            );
        }
        if (this.goal.dimension !== this.dimension) {
            throw new ConfigurationError(
                `Goal has dimension ${this.goal.dimension}, start has ${this.dimension}`,
                ErrorCodes.DIMENSION_MISMATCH
            );
        }
        this.sampler = goalBiasedSampler(base, this.goal, options.goalBias ?? DEFAULT_GOAL_BIAS);
        this.rewireRadius = options.rewireRadius ?? defaultRewireRadius(options.bounds, this.dimension, this.maxStep);

        if (!this.checkConfiguration(start)) {
            throw new ConfigurationError(
                'Start configuration is rejected by the validity oracle',
                ErrorCodes.INVALID_START,
                [],
                { start }
            );
        }

        this.tree = new Tree(start, {
            metric: this.steering.distance,
            spatialIndex: options.spatialIndex,
        });
        if (this.goal.contains(start)) {
            this.tree.markGoal(ROOT_ID);
        }
    }

    // ==================== Public API ====================

    get state(): PlannerState {
        return this.currentState;
    }

    get iterationCount(): number {
        return this.iterations;
    }

    /**
     * The search tree, or null once the query failed (its invariants can no
     * longer be trusted).
     */
    getTree(): Tree | null {
        return this.currentState === 'failed' ? null : this.tree;
    }

    /**
     * Request cooperative cancellation. Takes effect at the top of the next iteration.
     */
    cancel(): void {
        this.cancelRequested = true;
    }

    /**
     * Run one iteration, after evaluating termination conditions.
     *
     * @returns the iteration outcome, or null if the planner reached a terminal state
     * @throws NotRunningError when called after a terminal state
     */
    step(): IterationResult | null {
        if (this.currentState === 'initialized') {
            this.currentState = 'running';
            this.startedAt = this.now();
        }
        if (this.currentState !== 'running') {
            throw new NotRunningError(this.currentState);
        }

        const terminal = this.terminalState();
        if (terminal !== null) {
            this.finish(terminal);
            return null;
        }

        try {
            return this.iterate();
        } catch (error) {
            this.error = wrapError(error);
            this.finish('failed');
            return null;
        }
    }

    /**
     * Run to completion synchronously
     */
    run(): PlanResult {
        while (this.step() !== null) {
            // keep iterating
        }
        return this.requireResult();
    }

    /**
     * Run to completion, yielding to the event loop every `yieldEvery`
     * iterations so an external abort can land.
     */
    async runAsync(options: { yieldEvery?: number; signal?: AbortSignal } = {}): Promise<PlanResult> {
        const yieldEvery = Math.max(1, options.yieldEvery ?? 256);
        this.asyncSignal = options.signal;
        let sinceYield = 0;
        while (this.step() !== null) {
            if (++sinceYield >= yieldEvery) {
                sinceYield = 0;
                await new Promise<void>(resolve => setTimeout(resolve, 0));
            }
        }
        return this.requireResult();
    }

    /**
     * Final result, or null while the query is still open
     */
    result(): PlanResult | null {
        return this.finalResult;
    }

    // ==================== Loop ====================

    private terminalState(): PlanStatus | null {
        if (this.cancelRequested || this.signal?.aborted || this.asyncSignal?.aborted) {
            return 'cancelled';
        }
        const solved = this.tree.bestGoalNode() !== null;
        if (this.tree.root.isGoal || (solved && !this.optimal)) {
            return 'succeeded';
        }
        if (this.iterations >= this.iterationBudget || this.now() - this.startedAt >= this.timeBudgetMs) {
            return solved ? 'succeeded' : 'exhausted';
        }
        return null;
    }

    private iterate(): IterationResult {
        const iteration = ++this.iterations;

        const target = this.sampler.sample(this.rng);
        assertDimension(target, this.dimension, 'sampled configuration');

        const nearest = this.tree.nearest(target);
        const { config, cost } = this.steering.steer(nearest.config, target, this.maxStep);
        assertDimension(config, this.dimension, 'steered configuration');
        if (Number.isNaN(cost) || cost < 0 || cost === Infinity) {
            throw new ConfigurationError(`Steering returned an invalid cost: ${cost}`);
        }

        if (cost <= this.duplicateTolerance) {
            return this.record({ iteration, outcome: 'duplicate', nodeId: null, rewired: 0, goalReached: false });
        }
        if (!this.checkConfiguration(config) || !this.checkMotion(nearest.config, config)) {
            return this.record({ iteration, outcome: 'rejected', nodeId: null, rewired: 0, goalReached: false });
        }

        const node = this.tree.addNode(nearest.id, config, cost);
        const rewired = this.optimal ? this.improve(node) : 0;

        const goalReached = this.goal.contains(node.config);
        if (goalReached) {
            this.tree.markGoal(node.id);
        }

        return this.record({ iteration, outcome: 'extended', nodeId: node.id, rewired, goalReached });
    }

    /**
     * RRT* choose-parent and rewire around a freshly added node.
     * `node` and the neighbour views are live, so costs read here are current.
     */
    private improve(node: TreeNode): number {
        const radius = this.rewireRadius(this.tree.size);
        const neighbours = this.tree.near(node.config, radius).filter(n => n.id !== node.id);

        let bestParent: TreeNode | null = null;
        let bestEdge = node.edgeCost;
        let bestCost = node.cost;
        for (const candidate of neighbours) {
            if (candidate.id === node.parent) continue;
            const edge = this.connectionCost(candidate.config, node.config);
            if (edge === null || candidate.cost + edge >= bestCost) continue;
            if (this.checkMotion(candidate.config, node.config)) {
                bestParent = candidate;
                bestEdge = edge;
                bestCost = candidate.cost + edge;
            }
        }
        if (bestParent !== null) {
            this.tree.rewire(node.id, bestParent.id, bestEdge);
        }

        let rewired = 0;
        for (const neighbour of neighbours) {
            if (neighbour.parent === null || neighbour.id === node.parent) continue;
            const edge = this.connectionCost(node.config, neighbour.config);
            if (edge === null || node.cost + edge >= neighbour.cost) continue;
            if (this.checkMotion(node.config, neighbour.config)) {
                this.tree.rewire(neighbour.id, node.id, edge);
                rewired++;
            }
        }
        return rewired;
    }

    /**
     * Cost of connecting two existing configurations exactly, or null when
     * the steering function cannot reach `to` from `from` within one step.
     * Edges created by choose-parent and rewiring are thus bounded by maxStep.
     */
    private connectionCost(from: Configuration, to: Configuration): number | null {
        const { config, cost } = this.steering.steer(from, to, this.maxStep);
        if (!configurationsEqual(config, to) || !(cost > this.duplicateTolerance) || !Number.isFinite(cost)) {
            return null;
        }
        return cost;
    }

    // ==================== Oracle ====================

    private checkConfiguration(config: Configuration): boolean {
        return expectBoolean(this.oracle.isValidConfiguration(config), 'isValidConfiguration');
    }

    private checkMotion(from: Configuration, to: Configuration): boolean {
        return expectBoolean(this.oracle.isValidMotion(from, to), 'isValidMotion');
    }

    // ==================== Results ====================

    private record(result: IterationResult): IterationResult {
        if (this.logIterations) {
            const node = result.nodeId !== null ? this.tree.node(result.nodeId) : undefined;
            for (const logger of this.loggers) {
                logger.logIteration({
                    label: this.label,
                    seed: this.seed,
                    iteration: result.iteration,
                    outcome: result.outcome,
                    nodeId: node?.id,
                    cost: node?.cost,
                    rewired: result.rewired,
                    goalReached: result.goalReached,
                });
            }
        }
        return result;
    }

    private finish(status: PlanStatus): void {
        this.currentState = status;
        this.finishedAt = this.now();

        const goalNode = status === 'failed' ? null : this.tree.bestGoalNode();
        const path = goalNode !== null ? extractPath(this.tree, goalNode.id) : [];
        this.finalResult = {
            status,
            path,
            cost: goalNode !== null ? goalNode.cost : Infinity,
            goalNodeId: goalNode !== null ? goalNode.id : null,
            iterations: this.iterations,
            treeSize: this.tree.size,
            elapsedMs: this.finishedAt - this.startedAt,
            ...(this.error !== undefined ? { error: this.error } : {}),
        };

        for (const logger of this.loggers) {
            logger.logQuery({
                label: this.label,
                seed: this.seed,
                status,
                iterations: this.iterations,
                treeSize: this.tree.size,
                pathCost: goalNode !== null ? goalNode.cost : null,
                pathLength: path.length,
                elapsedMs: this.finalResult.elapsedMs,
                optimal: this.optimal,
                errorCode: this.error?.code,
            });
        }
    }

    private requireResult(): PlanResult {
        if (this.finalResult === null) {
            throw new NotRunningError(this.currentState);
        }
        return this.finalResult;
    }
}

// ==================== Helpers ====================

function requireBounds(bounds: BoxSpace | undefined): BoxSpace {
    if (bounds === undefined) {
        throw new ConfigurationError('bounds are required when no sampler is given');
    }
    return bounds;
}

function expectBoolean(value: unknown, method: string): boolean {
    if (typeof value !== 'boolean') {
        throw new ConfigurationError(
            `ValidityOracle.${method} returned ${typeof value}, expected boolean`,
            ErrorCodes.INVALID_ORACLE_RESPONSE
        );
    }
    return value;
}

/**
 * min(γ (ln n / n)^(1/d), 3·maxStep) with γ just above the optimality
 * threshold for the bounding-box volume; constant 3·maxStep without bounds.
 */
function defaultRewireRadius(bounds: BoxSpace | undefined, dimension: number, maxStep: number): RewireRadiusSchedule {
    const cap = DEFAULT_RADIUS_FACTOR * maxStep;
    const volume = bounds !== undefined ? boxVolume(bounds) : 0;
    if (!(volume > 0)) {
        return constantRadius(cap);
    }
    return rrtStarRadius({ gamma: optimalGamma(volume, dimension), dimension, maxRadius: cap });
}

// ==================== Factory Functions ====================

/**
 * Create a planner
 */
export function createPlanner(options: PlannerOptions): Planner {
    return new Planner(options);
}

/**
 * The `failed` result of a query whose options were rejected before a
 * planner existed. The failure is logged to the query's loggers.
 */
export function rejectedQueryResult(options: PlannerOptions, error: ConfigurationError): PlanResult {
    for (const logger of options.loggers ?? []) {
        logger.logQuery({
            label: options.label ?? (options.optimal ? 'rrt-star' : 'rrt'),
            seed: options.seed ?? 0,
            status: 'failed',
            iterations: 0,
            treeSize: 0,
            pathCost: null,
            pathLength: 0,
            elapsedMs: 0,
            optimal: options.optimal ?? false,
            errorCode: error.code,
        });
    }
    return {
        status: 'failed',
        path: [],
        cost: Infinity,
        goalNodeId: null,
        iterations: 0,
        treeSize: 0,
        elapsedMs: 0,
        error,
    };
}

/**
 * Construct and run a planner. Configuration errors raised during
 * construction come back as a `failed` result instead of being thrown.
 */
export function plan(options: PlannerOptions): PlanResult {
    let planner: Planner;
    try {
        planner = new Planner(options);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            return rejectedQueryResult(options, error);
        }
        throw error;
    }
    return planner.run();
}
