/**
 * Serialization Tests
 * Tree records, JSONL streams and exported results
 */

import { describe, it, expect } from 'vitest';
import {
    Planner,
    Tree,
    BallGoal,
    serializeTree,
    deserializeTree,
    treeToJSONL,
    parseTreeJSONL,
    exportResult,
    type TreeRecord,
} from '../src/planning';
import { ValidationError, box } from '../src/core';
import { EmptySpace } from '../src/spaces';
import { thrown, treeProblems } from './test-utils';

function rewiredTree(): Tree {
    const tree = new Tree([0, 0]);
    tree.addNode(0, [1, 0], 1);
    tree.addNode(1, [2, 0], 1);
    tree.addNode(0, [0, 1], 1);
    tree.rewire(1, 3, Math.SQRT2);
    tree.markGoal(2);
    return tree;
}

describe('Serialization', () => {
    describe('serializeTree', () => {
        it('should emit breadth-first records with parents first', () => {
            const records = serializeTree(rewiredTree());

            expect(records).toEqual([
                { index: 0, config: [0, 0], parent: null, cost: 0, goal: false },
                { index: 1, config: [0, 1], parent: 0, cost: 1, goal: false },
                { index: 2, config: [1, 0], parent: 1, cost: 1 + Math.SQRT2, goal: false },
                { index: 3, config: [2, 0], parent: 2, cost: 2 + Math.SQRT2, goal: true },
            ]);
        });

        it('should emit only the root for a fresh tree', () => {
            expect(serializeTree(new Tree([5]))).toEqual([
                { index: 0, config: [5], parent: null, cost: 0, goal: false },
            ]);
        });
    });

    describe('deserializeTree', () => {
        it('should rebuild the same structure', () => {
            const records = serializeTree(rewiredTree());
            const tree = deserializeTree(records);

            expect(tree.size).toBe(4);
            expect(tree.node(3).parent).toBe(2);
            expect(tree.node(3).cost).toBeCloseTo(2 + Math.SQRT2, 12);
            expect(tree.bestGoalNode()?.id).toBe(3);
            expect(treeProblems(tree)).toEqual([]);
        });

        it('should list every malformed record', () => {
            const records: TreeRecord[] = [
                { index: 0, config: [0, 0], parent: 0, cost: 1, goal: false },
                { index: 1, config: [1, 0, 0], parent: 0, cost: 2, goal: false },
                { index: 5, config: [2, 0], parent: 3, cost: 3, goal: false },
                { index: 3, config: [3, 0], parent: 0, cost: 0.5, goal: false },
            ];
            const error = thrown(() => deserializeTree(records));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                message: 'Invalid tree records',
                errors: [
                    'record 0: root must have parent null',
                    'record 0: root cost must be 0',
                    'record 1: dimension 3, expected 2',
                    'record 2: index 5 out of order',
                    'record 2: parent 3 must be an earlier record',
                    'record 3: cost 0.5 is not above parent cost 1',
                ],
            });
        });

        it('should reject an empty stream', () => {
            expect(thrown(() => deserializeTree([]))).toMatchObject({ errors: ['tree stream is empty'] });
        });
    });

    describe('JSONL', () => {
        it('should write one record per line and read it back', () => {
            const records = serializeTree(rewiredTree());
            const text = treeToJSONL(records);

            expect(text.split('\n')).toHaveLength(4);
            expect(text.split('\n')[0]).toBe('{"index":0,"config":[0,0],"parent":null,"cost":0,"goal":false}');
            expect(parseTreeJSONL(text)).toEqual(records);
        });

        it('should skip blank lines and default goal to false', () => {
            const text = '\n{"index":0,"config":[1,2],"parent":null,"cost":0}\n\n';
            expect(parseTreeJSONL(text)).toEqual([
                { index: 0, config: [1, 2], parent: null, cost: 0, goal: false },
            ]);
        });

        it('should report bad lines by number', () => {
            const text = [
                '{"index":0,"config":[0],"parent":null,"cost":0}',
                '{"index":1,"config":["a"],"parent":0,"cost":1}',
                '[1, 2]',
            ].join('\n');
            const error = thrown(() => parseTreeJSONL(text));

            expect(error).toBeInstanceOf(ValidationError);
            expect(error).toMatchObject({
                message: 'Invalid tree stream',
                errors: ['line 2: not a tree record', 'line 3: not a tree record'],
            });
        });

        it('should report unparseable lines', () => {
            const error = thrown(() => parseTreeJSONL('{"index":0,'));
            expect(error).toMatchObject({ message: 'Invalid tree stream' });
            if (error instanceof ValidationError) {
                expect(error.errors).toHaveLength(1);
                expect(error.errors[0].startsWith('line 1: ')).toBe(true);
            }
        });
    });

    describe('exportResult', () => {
        const field = box([0, 0], [100, 100]);

        it('should return null before the planner finishes', () => {
            const planner = new Planner({
                start: [0, 0],
                goal: new BallGoal([100, 100], 5),
                oracle: new EmptySpace(field),
                bounds: field,
                maxStep: 5,
                iterationBudget: 10,
            });
            expect(exportResult(planner)).toBeNull();
            planner.step();
            expect(exportResult(planner)).toBeNull();
        });

        it('should export a trivial success', () => {
            const planner = new Planner({
                start: [98, 98],
                goal: new BallGoal([100, 100], 5),
                oracle: new EmptySpace(field),
                bounds: field,
                maxStep: 5,
                iterationBudget: 10,
            });
            planner.run();

            expect(exportResult(planner)).toEqual({
                status: 'succeeded',
                path: [[98, 98]],
                cost: 0,
                tree: [{ index: 0, config: [98, 98], parent: null, cost: 0, goal: true }],
            });
        });

        it('should use a null cost when nothing was found', () => {
            const planner = new Planner({
                start: [0, 0],
                goal: new BallGoal([100, 100], 5),
                oracle: new EmptySpace(field),
                bounds: field,
                maxStep: 5,
                iterationBudget: 0,
            });
            planner.run();

            const exported = exportResult(planner);
            expect(exported?.status).toBe('exhausted');
            expect(exported?.cost).toBeNull();
            expect(exported?.path).toEqual([]);
            expect(exported?.tree).toHaveLength(1);
        });
    });
});
