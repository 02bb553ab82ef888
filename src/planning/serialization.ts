/**
 * @module planning/serialization
 * @description Tree and result export for external renderers
 *
 * A tree is streamed as records in breadth-first order: the root first, and
 * every record's parent index strictly smaller than its own. Node ids are
 * renumbered on the way out, so the stream stays ordered after rewiring.
 */

import { ValidationError } from '../core/errors';
import type { Configuration } from './configuration';
import type { Planner, PlanStatus } from './planner';
import { ROOT_ID, Tree, type TreeOptions } from './tree';

// ==================== Types ====================

export interface TreeRecord {
    index: number;
    config: number[];
    parent: number | null;
    cost: number;
    goal: boolean;
}

export interface ExportedResult {
    status: PlanStatus;
    path: number[][];
    /** null when no path was found (JSON has no Infinity) */
    cost: number | null;
    tree: TreeRecord[] | null;
}

// ==================== Tree Records ====================

/**
 * Flatten a tree into parent-before-child records
 */
export function serializeTree(tree: Tree): TreeRecord[] {
    const indexOf = new Map<number, number>();
    const records: TreeRecord[] = [];
    const queue: number[] = [ROOT_ID];

    for (let head = 0; head < queue.length; head++) {
        const node = tree.node(queue[head]);
        const index = records.length;
        indexOf.set(node.id, index);

        const parentIndex = node.parent !== null ? indexOf.get(node.parent) : undefined;
        records.push({
            index,
            config: [...node.config],
            parent: parentIndex ?? null,
            cost: node.cost,
            goal: node.isGoal,
        });
        queue.push(...node.children);
    }
    return records;
}

/**
 * Rebuild a tree from records produced by `serializeTree`.
 *
 * @throws ValidationError listing every malformed record
 */
export function deserializeTree(records: readonly TreeRecord[], options: TreeOptions = {}, tolerance: number = 1e-9): Tree {
    const errors = checkRecords(records, tolerance);
    if (errors.length > 0) {
        throw new ValidationError('Invalid tree records', errors);
    }

    const tree = new Tree(records[0].config, options);
    if (records[0].goal) tree.markGoal(ROOT_ID);

    // Ids match indices: nodes are added in record order
    for (let i = 1; i < records.length; i++) {
        const record = records[i];
        const parent = record.parent ?? ROOT_ID;
        const node = tree.addNode(parent, record.config, record.cost - tree.node(parent).cost);
        if (record.goal) tree.markGoal(node.id);
    }
    return tree;
}

function checkRecords(records: readonly TreeRecord[], tolerance: number): string[] {
    if (records.length === 0) {
        return ['tree stream is empty'];
    }

    const errors: string[] = [];
    const dimension = records[0].config.length;
    if (dimension === 0) errors.push('record 0: empty configuration');
    if (records[0].parent !== null) errors.push('record 0: root must have parent null');
    if (records[0].cost !== 0) errors.push('record 0: root cost must be 0');

    records.forEach((record, i) => {
        if (record.index !== i) {
            errors.push(`record ${i}: index ${record.index} out of order`);
        }
        if (record.config.length !== dimension) {
            errors.push(`record ${i}: dimension ${record.config.length}, expected ${dimension}`);
        }
        if (!record.config.every(Number.isFinite)) {
            errors.push(`record ${i}: non-finite coordinate`);
        }
        if (i === 0) return;

        const parent = record.parent;
        if (parent === null || !Number.isInteger(parent) || parent < 0 || parent >= i) {
            errors.push(`record ${i}: parent ${parent} must be an earlier record`);
            return;
        }
        const edge = record.cost - records[parent].cost;
        if (!Number.isFinite(record.cost) || !(edge > tolerance)) {
            errors.push(`record ${i}: cost ${record.cost} is not above parent cost ${records[parent].cost}`);
        }
    });
    return errors;
}

// ==================== JSONL ====================

/**
 * One JSON record per line
 */
export function treeToJSONL(records: readonly TreeRecord[]): string {
    return records.map(r => JSON.stringify(r)).join('\n');
}

/**
 * Parse a JSONL tree stream. Blank lines are skipped.
 *
 * @throws ValidationError on unparseable or mistyped lines
 */
export function parseTreeJSONL(text: string): TreeRecord[] {
    const records: TreeRecord[] = [];
    const errors: string[] = [];

    text.split('\n').forEach((line, i) => {
        if (line.trim() === '') return;
        let value: unknown;
        try {
            value = JSON.parse(line);
        } catch (error) {
            errors.push(`line ${i + 1}: ${error instanceof Error ? error.message : String(error)}`);
            return;
        }
        const record = toTreeRecord(value);
        if (record === null) {
            errors.push(`line ${i + 1}: not a tree record`);
        } else {
            records.push(record);
        }
    });

    if (errors.length > 0) {
        throw new ValidationError('Invalid tree stream', errors);
    }
    return records;
}

function toTreeRecord(value: unknown): TreeRecord | null {
    if (typeof value !== 'object' || value === null) return null;
    if (!('index' in value && 'config' in value && 'parent' in value && 'cost' in value)) return null;

    const { index, config, parent, cost } = value;
    const goal = 'goal' in value ? value.goal : false;
    if (typeof index !== 'number' || typeof cost !== 'number' || typeof goal !== 'boolean') return null;
    if (parent !== null && typeof parent !== 'number') return null;
    if (!Array.isArray(config)) return null;

    const coords: number[] = [];
    for (const c of config) {
        if (typeof c !== 'number') return null;
        coords.push(c);
    }
    return { index, config: coords, parent, cost, goal };
}

// ==================== Results ====================

/**
 * Path, status, cost and tree of a finished planner; null while it is still running
 */
export function exportResult(planner: Planner): ExportedResult | null {
    const result = planner.result();
    if (result === null) return null;

    const tree = planner.getTree();
    return {
        status: result.status,
        path: result.path.map(toArray),
        cost: Number.isFinite(result.cost) ? result.cost : null,
        tree: tree !== null ? serializeTree(tree) : null,
    };
}

function toArray(config: Configuration): number[] {
    return [...config];
}
