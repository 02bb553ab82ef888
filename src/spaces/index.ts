/**
 * @module spaces
 * @description Reference validity oracles and scenario loading
 */

export { pointInBox, segmentIntersectsBox, inflateBox, boxesOverlap } from './geometry';

export { EmptySpace } from './empty-space';

export { WallSpace } from './wall-space';

export type { BoxSpec, GoalSpec, ScenarioSpec, Scenario } from './scenario';

export { parseScenario, buildScenario, loadScenario } from './scenario';
