/**
 * @module spaces/scenario
 * @description Load a planning scenario (bounds, start, goals, walls) from JSON
 *
 * Goals that are present in the layout but not wanted for a query
 * (`active: false`) are turned into walls, so the planner routes around them.
 * Walls and box goals are grown by `agentRadius`, which lets a point
 * planner stand in for a round agent.
 *
 * @example
 * ```json
 * {
 *     "bounds": { "low": [0, 0], "high": [100, 100] },
 *     "start": [10, 50],
 *     "goals": [{ "kind": "box", "low": [90, 40], "high": [100, 60] }],
 *     "walls": [{ "low": [45, 0], "high": [55, 80] }],
 *     "agentRadius": 1
 * }
 * ```
 */

import { ValidationError } from '../core/errors';
import { box, validateBox, type BoxSpace } from '../core/space';
import { createConfiguration, type Configuration } from '../planning/configuration';
import { BallGoal, BoxGoal, GoalUnion, PointGoal } from '../planning/goals';
import type { GoalRegion } from '../planning/types';
import { inflateBox } from './geometry';
import { WallSpace } from './wall-space';

// ==================== Types ====================

export interface BoxSpec {
    low: number[];
    high: number[];
}

export type GoalSpec =
    | { kind: 'box'; low: number[]; high: number[]; active: boolean }
    | { kind: 'ball'; center: number[]; radius: number }
    | { kind: 'point'; point: number[]; tolerance?: number };

export interface ScenarioSpec {
    bounds: BoxSpec;
    start: number[];
    goals: GoalSpec[];
    walls: BoxSpec[];
    agentRadius: number;
}

export interface Scenario {
    space: WallSpace;
    goal: GoalRegion;
    start: Configuration;
    bounds: BoxSpace;
}

// ==================== Parsing ====================

/**
 * Check the shape of a scenario document.
 *
 * @throws ValidationError listing every problem found
 */
export function parseScenario(json: unknown): ScenarioSpec {
    const errors: string[] = [];
    if (!isRecord(json)) {
        throw new ValidationError('Invalid scenario', ['scenario must be an object']);
    }

    const bounds = readBox(json.bounds, 'bounds', errors);
    const start = readNumbers(json.start, 'start', errors);
    const dimension = bounds?.low.length;

    if (start !== null && dimension !== undefined && start.length !== dimension) {
        errors.push(`start: dimension ${start.length}, expected ${dimension}`);
    }

    const goals: GoalSpec[] = [];
    if (!Array.isArray(json.goals) || json.goals.length === 0) {
        errors.push('goals: must be a non-empty array');
    } else {
        json.goals.forEach((raw: unknown, i: number) => {
            const goal = readGoal(raw, `goals[${i}]`, errors);
            if (goal === null) return;
            const dim = goalDimension(goal);
            if (dimension !== undefined && dim !== dimension) {
                errors.push(`goals[${i}]: dimension ${dim}, expected ${dimension}`);
            }
            goals.push(goal);
        });
        if (goals.length > 0 && goals.every(g => g.kind === 'box' && !g.active)) {
            errors.push('goals: at least one goal must be active');
        }
    }

    const walls: BoxSpec[] = [];
    if (json.walls !== undefined) {
        if (!Array.isArray(json.walls)) {
            errors.push('walls: must be an array');
        } else {
            json.walls.forEach((raw: unknown, i: number) => {
                const wall = readBox(raw, `walls[${i}]`, errors);
                if (wall === null) return;
                if (dimension !== undefined && wall.low.length !== dimension) {
                    errors.push(`walls[${i}]: dimension ${wall.low.length}, expected ${dimension}`);
                }
                walls.push(wall);
            });
        }
    }

    let agentRadius = 0;
    if (json.agentRadius !== undefined) {
        if (typeof json.agentRadius !== 'number' || !(json.agentRadius >= 0) || !Number.isFinite(json.agentRadius)) {
            errors.push('agentRadius: must be a finite number >= 0');
        } else {
            agentRadius = json.agentRadius;
        }
    }

    if (errors.length > 0 || bounds === null || start === null) {
        throw new ValidationError('Invalid scenario', errors);
    }
    return { bounds, start, goals, walls, agentRadius };
}

// ==================== Building ====================

/**
 * Turn a parsed scenario into a validity oracle, goal region and start
 */
export function buildScenario(spec: ScenarioSpec): Scenario {
    const bounds = box(spec.bounds.low, spec.bounds.high);
    const inflate = (b: BoxSpec): BoxSpace => inflateBox(box(b.low, b.high), spec.agentRadius);

    const walls = spec.walls.map(inflate);
    const goals: GoalRegion[] = [];
    for (const goal of spec.goals) {
        switch (goal.kind) {
            case 'box': {
                const region = inflate(goal);
                if (goal.active) {
                    goals.push(new BoxGoal(region.low, region.high));
                } else {
                    walls.push(region);
                }
                break;
            }
            case 'ball':
                goals.push(new BallGoal(goal.center, goal.radius + spec.agentRadius));
                break;
            case 'point':
                goals.push(new PointGoal(goal.point, goal.tolerance));
                break;
        }
    }

    return {
        space: new WallSpace(bounds, walls),
        goal: goals.length === 1 ? goals[0] : new GoalUnion(goals),
        start: createConfiguration(spec.start, bounds.low.length),
        bounds,
    };
}

/**
 * parseScenario + buildScenario
 */
export function loadScenario(json: unknown): Scenario {
    return buildScenario(parseScenario(json));
}

// ==================== Helpers ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readNumbers(value: unknown, path: string, errors: string[]): number[] | null {
    if (!Array.isArray(value) || value.length === 0) {
        errors.push(`${path}: must be a non-empty array of numbers`);
        return null;
    }
    const out: number[] = [];
    for (const v of value) {
        if (typeof v !== 'number' || !Number.isFinite(v)) {
            errors.push(`${path}: must contain only finite numbers`);
            return null;
        }
        out.push(v);
    }
    return out;
}

function readBox(value: unknown, path: string, errors: string[]): BoxSpec | null {
    if (!isRecord(value)) {
        errors.push(`${path}: must be an object with low and high`);
        return null;
    }
    const low = readNumbers(value.low, `${path}.low`, errors);
    const high = readNumbers(value.high, `${path}.high`, errors);
    if (low === null || high === null) return null;

    const check = validateBox(box(low, high));
    if (!check.valid) {
        errors.push(...check.errors.map(e => `${path}: ${e}`));
        return null;
    }
    return { low, high };
}

function readGoal(value: unknown, path: string, errors: string[]): GoalSpec | null {
    if (!isRecord(value)) {
        errors.push(`${path}: must be an object`);
        return null;
    }
    switch (value.kind) {
        case 'box': {
            const region = readBox(value, path, errors);
            const active = value.active === undefined ? true : value.active;
            if (typeof active !== 'boolean') {
                errors.push(`${path}.active: must be a boolean`);
                return null;
            }
            if (region === null) return null;
            return { kind: 'box', low: region.low, high: region.high, active };
        }
        case 'ball': {
            const center = readNumbers(value.center, `${path}.center`, errors);
            const radius = value.radius;
            if (typeof radius !== 'number' || !(radius >= 0) || !Number.isFinite(radius)) {
                errors.push(`${path}.radius: must be a finite number >= 0`);
                return null;
            }
            if (value.active === false) {
                errors.push(`${path}: ball goals cannot be inactive`);
                return null;
            }
            return center !== null ? { kind: 'ball', center, radius } : null;
        }
        case 'point': {
            const point = readNumbers(value.point, `${path}.point`, errors);
            const tolerance = value.tolerance;
            if (tolerance !== undefined && (typeof tolerance !== 'number' || !(tolerance >= 0))) {
                errors.push(`${path}.tolerance: must be a number >= 0`);
                return null;
            }
            if (point === null) return null;
            return tolerance !== undefined ? { kind: 'point', point, tolerance } : { kind: 'point', point };
        }
        default:
            errors.push(`${path}.kind: must be one of box, ball, point`);
            return null;
    }
}

function goalDimension(goal: GoalSpec): number {
    switch (goal.kind) {
        case 'box':
            return goal.low.length;
        case 'ball':
            return goal.center.length;
        case 'point':
            return goal.point.length;
    }
}
