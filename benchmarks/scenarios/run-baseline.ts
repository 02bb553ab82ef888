#!/usr/bin/env npx tsx
/**
 * @module benchmarks/scenarios/run-baseline
 * @description Compare RRT and RRT* on the scenario files in ./configs
 *
 * Usage:
 *   npx tsx benchmarks/scenarios/run-baseline.ts --config=wall-gap.json --planner=rrt-star
 *   npx tsx benchmarks/scenarios/run-baseline.ts --config=open-field.json --all --trials=20
 */

import * as fs from 'fs';
import * as path from 'path';

import { core, planning, spaces } from '../../index';
import { JsonlLogger } from '../../node';

type PlannerName = 'rrt' | 'rrt-star';

const PLANNERS: PlannerName[] = ['rrt', 'rrt-star'];

// ==================== CLI Parsing ====================

interface CliArgs {
    config: string;
    planner: PlannerName;
    all: boolean;
    trials: number;
    iterations: number;
    maxStep: number;
    output: string;
    seed: number;
}

function parseArgs(): CliArgs {
    const args = process.argv.slice(2);
    const result: CliArgs = {
        config: 'wall-gap.json',
        planner: 'rrt-star',
        all: false,
        trials: 10,
        iterations: 5000,
        maxStep: 5,
        output: 'benchmarks/scenarios/results',
        seed: 42,
    };

    for (const arg of args) {
        const [key, value] = arg.split('=');
        if (key === '--config') {
            result.config = value;
        } else if (key === '--planner') {
            const planner = PLANNERS.find(p => p === value);
            if (planner === undefined) {
                throw new core.ConfigurationError(`Unknown planner "${value}", expected one of ${PLANNERS.join(', ')}`);
            }
            result.planner = planner;
        } else if (arg === '--all') {
            result.all = true;
        } else if (key === '--trials') {
            result.trials = parseInt(value, 10);
        } else if (key === '--iterations') {
            result.iterations = parseInt(value, 10);
        } else if (key === '--max-step') {
            result.maxStep = parseFloat(value);
        } else if (key === '--output') {
            result.output = value;
        } else if (key === '--seed') {
            result.seed = parseInt(value, 10);
        }
    }

    return result;
}

// ==================== Benchmark Runner ====================

async function runBenchmark(args: CliArgs, plannerName: PlannerName): Promise<core.TrialReport> {
    const configFile = path.join('benchmarks/scenarios/configs', args.config);
    const scenario = spaces.loadScenario(JSON.parse(fs.readFileSync(configFile, 'utf-8')));
    const label = `${plannerName}_${args.config.replace('.json', '')}`;

    const query = (): planning.PlannerOptions => ({
        start: scenario.start,
        goal: scenario.goal,
        oracle: scenario.space,
        bounds: scenario.bounds,
        maxStep: args.maxStep,
        iterationBudget: args.iterations,
        optimal: plannerName === 'rrt-star',
    });

    console.log(`\n Running ${plannerName} on ${args.config} for ${args.trials} trials...`);

    const report = await core.runTrials({
        label,
        seed: args.seed,
        trials: args.trials,
        createQuery: query,
        hyperparams: { planner: plannerName, scenario: args.config, maxStep: args.maxStep, iterations: args.iterations },
        loggers: [
            new core.ConsoleLogger('info'),
            new JsonlLogger({ outputDir: args.output, label, seed: args.seed }),
        ],
    });

    // Tree of the first trial, for plotting
    const first = new planning.Planner({ ...query(), seed: args.seed });
    first.run();
    const tree = first.getTree();
    if (tree !== null) {
        fs.writeFileSync(path.join(args.output, `${label}_tree.jsonl`), planning.treeToJSONL(planning.serializeTree(tree)) + '\n');
    }
    fs.writeFileSync(path.join(args.output, `${label}_report.json`), JSON.stringify({
        manifest: report.manifest,
        successRate: report.successRate,
        avgIterations: report.avgIterations,
        avgTreeSize: report.avgTreeSize,
        avgPathCost: report.avgPathCost,
        result: planning.exportResult(first),
    }, null, 2));

    return report;
}

function comparisonTable(reports: core.TrialReport[]): string {
    const rows = reports.map(r => {
        const cost = r.avgPathCost !== null ? r.avgPathCost.toFixed(2) : '-';
        return `| ${r.manifest.label} | ${(r.successRate * 100).toFixed(1)}% | ${r.avgIterations.toFixed(0)} | ${r.avgTreeSize.toFixed(0)} | ${cost} |`;
    });
    return [
        '| Run | Success | Iterations | Tree size | Path cost |',
        '|-----|---------|------------|-----------|-----------|',
        ...rows,
    ].join('\n');
}

// ==================== Main ====================

async function main(): Promise<void> {
    const args = parseArgs();
    fs.mkdirSync(args.output, { recursive: true });

    console.log('================================================');
    console.log('        RRT / RRT* Scenario Benchmark           ');
    console.log('================================================');

    const reports: core.TrialReport[] = [];
    for (const planner of args.all ? PLANNERS : [args.planner]) {
        reports.push(await runBenchmark(args, planner));
    }

    console.log('\n Comparison Table:');
    console.log(comparisonTable(reports));
    console.log(`\n Results saved to ${args.output}/`);
}

main().catch(error => {
    console.error(error);
    process.exitCode = 1;
});
