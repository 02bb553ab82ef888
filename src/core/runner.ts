/**
 * @module core/runner
 * @description Batch runner for repeated planning queries
 *
 * Runs independent trials of the same query family with seeds
 * `seed, seed + 1, ...`. Every trial gets its own Planner and Tree; nothing
 * mutable is shared between trials, so a batch is reproducible from its
 * manifest alone.
 */

import { ConfigurationError, ErrorCodes } from './errors';
import type { Logger, ReportLogInput } from './logging';
import { createRunManifest, type RunManifest } from './repro';
import { Planner, rejectedQueryResult, type PlannerOptions, type PlanResult } from '../planning/planner';

// ==================== Runner Configuration ====================

/**
 * Trial runner configuration
 */
export interface TrialRunnerConfig {
    /** Batch label (log entries, file names) */
    label: string;
    /** Base seed; trial `i` runs with `seed + i` */
    seed: number;
    /** Number of trials */
    trials: number;
    /** Build the query for one trial. `seed` and `loggers` are filled in by the runner. */
    createQuery: (seed: number, trial: number) => PlannerOptions;
    /** Hyperparameters recorded in the manifest and report */
    hyperparams?: Record<string, unknown>;
    /** Logger(s) for output */
    loggers?: Logger[];
    /** Cancels the running trial and skips the rest */
    signal?: AbortSignal;
    /** Iterations between event-loop yields inside a trial */
    yieldEvery?: number;
}

/**
 * Aggregate of a batch
 */
export interface TrialReport {
    manifest: RunManifest;
    trials: number;
    successRate: number;
    avgIterations: number;
    avgTreeSize: number;
    /** Mean cost over successful trials, null when none succeeded */
    avgPathCost: number | null;
    results: PlanResult[];
}

// ==================== Runner Class ====================

export class TrialRunner {
    private readonly config: TrialRunnerConfig;
    private readonly loggers: Logger[];
    readonly manifest: RunManifest;

    constructor(config: TrialRunnerConfig) {
        if (!Number.isInteger(config.trials) || config.trials < 1) {
            throw new ConfigurationError(
                `trials must be a positive integer, got ${config.trials}`,
                ErrorCodes.INVALID_CONFIG
            );
        }
        this.config = config;
        this.loggers = config.loggers ?? [];
        this.manifest = createRunManifest({
            label: config.label,
            seed: config.seed,
            hyperparams: { trials: config.trials, ...config.hyperparams },
        });
    }

    /**
     * Run a single trial
     */
    async runTrial(trial: number): Promise<PlanResult> {
        const seed = this.config.seed + trial;
        const query = this.config.createQuery(seed, trial);
        const options: PlannerOptions = {
            ...query,
            seed,
            label: query.label ?? this.config.label,
            loggers: [...(query.loggers ?? []), ...this.loggers],
        };

        let planner: Planner;
        try {
            planner = new Planner(options);
        } catch (error) {
            if (error instanceof ConfigurationError) {
                // Reported as a failed query rather than aborting the batch
                return rejectedQueryResult(options, error);
            }
            throw error;
        }
        return planner.runAsync({ yieldEvery: this.config.yieldEvery, signal: this.config.signal });
    }

    /**
     * Run every trial in order and log the batch report
     */
    async run(): Promise<TrialReport> {
        const results: PlanResult[] = [];
        for (let trial = 0; trial < this.config.trials; trial++) {
            if (this.config.signal?.aborted) break;
            results.push(await this.runTrial(trial));
        }

        const report = summarize(this.manifest, results);
        for (const logger of this.loggers) {
            const logEntry: ReportLogInput = {
                label: this.config.label,
                seed: this.config.seed,
                totalQueries: report.trials,
                successRate: report.successRate,
                avgIterations: report.avgIterations,
                avgTreeSize: report.avgTreeSize,
                avgPathCost: report.avgPathCost,
                configHash: this.manifest.configHash,
                config: this.manifest.hyperparams,
            };
            logger.logReport(logEntry);
            logger.flush();
        }
        return report;
    }

    /**
     * Close all loggers
     */
    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

function summarize(manifest: RunManifest, results: PlanResult[]): TrialReport {
    const n = results.length;
    const mean = (values: number[]): number =>
        values.length > 0 ? values.reduce((a, b) => a + b, 0) / values.length : 0;
    const solved = results.filter(r => r.status === 'succeeded');

    return {
        manifest,
        trials: n,
        successRate: n > 0 ? solved.length / n : 0,
        avgIterations: mean(results.map(r => r.iterations)),
        avgTreeSize: mean(results.map(r => r.treeSize)),
        avgPathCost: solved.length > 0 ? mean(solved.map(r => r.cost)) : null,
        results,
    };
}

// ==================== Factory Functions ====================

/**
 * Run a batch and close its loggers
 */
export async function runTrials(config: TrialRunnerConfig): Promise<TrialReport> {
    const runner = new TrialRunner(config);
    try {
        return await runner.run();
    } finally {
        runner.close();
    }
}
