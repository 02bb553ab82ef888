/**
 * @module core/logging
 * @description Structured logging for planning queries
 *
 * Provides loggers with fixed field schemas (versioned, append-only).
 * Supports iteration-level, query-level, and report-level structured export.
 *
 * Browser-compatible: ConsoleLogger and MemoryLogger work in all environments.
 * Node.js only: Use `src/core/logging-node` for the file-based logger.
 */

// ==================== Types ====================

/**
 * Log level for console output
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Base log entry structure (all logs must include these fields)
 */
export interface BaseLogEntry {
    /** Schema version for compatibility */
    schemaVersion: string;
    /** Query or batch label */
    label: string;
    /** Random seed for reproducibility */
    seed: number;
    /** Timestamp in milliseconds */
    timestamp: number;
}

/**
 * Outcome of a single planner iteration
 */
export type IterationOutcome = 'extended' | 'rejected' | 'duplicate';

/**
 * Iteration-level log entry
 */
export interface IterationLogEntry extends BaseLogEntry {
    logType: 'iteration';
    iteration: number;
    outcome: IterationOutcome;
    /** Id of the node added this iteration */
    nodeId?: number;
    /** Cost-from-root of the added node after parent selection */
    cost?: number;
    /** Neighbours rerouted through the new node (RRT* only) */
    rewired: number;
    goalReached: boolean;
}

/**
 * Query-level summary log entry
 */
export interface QueryLogEntry extends BaseLogEntry {
    logType: 'query';
    status: string;
    iterations: number;
    treeSize: number;
    /** Path cost, null when no path was found */
    pathCost: number | null;
    /** Number of configurations in the path */
    pathLength: number;
    elapsedMs: number;
    optimal: boolean;
    errorCode?: string;
}

/**
 * Report-level log entry (batch summary)
 */
export interface ReportLogEntry extends BaseLogEntry {
    logType: 'report';
    totalQueries: number;
    successRate: number;
    avgIterations: number;
    avgTreeSize: number;
    avgPathCost: number | null;
    configHash: string;
    config: Record<string, unknown>;
}

/**
 * Union of all log entry types
 */
export type LogEntry = IterationLogEntry | QueryLogEntry | ReportLogEntry;

export type IterationLogInput = Omit<IterationLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;
export type QueryLogInput = Omit<QueryLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;
export type ReportLogInput = Omit<ReportLogEntry, 'logType' | 'schemaVersion' | 'timestamp'>;

/**
 * Logger interface
 */
export interface Logger {
    /** Log one planner iteration */
    logIteration(entry: IterationLogInput): void;
    /** Log a finished query */
    logQuery(entry: QueryLogInput): void;
    /** Log a batch report */
    logReport(entry: ReportLogInput): void;
    /** Flush pending writes */
    flush(): void;
    /** Close the logger */
    close(): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    /** Output directory (Node.js only) */
    outputDir?: string;
    /** Label (used for file naming) */
    label: string;
    /** Random seed */
    seed: number;
    /** Schema version */
    schemaVersion?: string;
    /** Whether to keep iteration-level logs (can be verbose) */
    logIterations?: boolean;
    /** Buffer size before flushing */
    bufferSize?: number;
}

// ==================== Constants ====================

export const DEFAULT_SCHEMA_VERSION = '1.0.0';

// ==================== Console Logger (Browser-compatible) ====================

/**
 * Console Logger: Print to console (for debugging)
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(level: LogLevel = 'info') {
        this.level = level;
    }

    logIteration(entry: IterationLogInput): void {
        if (this.level === 'debug') {
            const cost = entry.cost !== undefined ? ` cost=${entry.cost.toFixed(3)}` : '';
            console.log(`[ITER] ${entry.label} #${entry.iteration}: ${entry.outcome}${cost} rewired=${entry.rewired}`);
        }
    }

    logQuery(entry: QueryLogInput): void {
        if (this.level === 'debug' || this.level === 'info') {
            const cost = entry.pathCost !== null ? entry.pathCost.toFixed(3) : '-';
            console.log(
                `[QUERY] ${entry.label}: status=${entry.status}, iterations=${entry.iterations}, ` +
                `nodes=${entry.treeSize}, cost=${cost}`
            );
        }
    }

    logReport(entry: ReportLogInput): void {
        console.log(
            `[REPORT] ${entry.label}: queries=${entry.totalQueries}, ` +
            `SuccessRate=${(entry.successRate * 100).toFixed(1)}%, ` +
            `AvgIterations=${entry.avgIterations.toFixed(1)}`
        );
    }

    flush(): void { /* no-op */ }
    close(): void { /* no-op */ }
}

// ==================== Memory Logger (Browser-compatible) ====================

/**
 * Memory Logger: Store logs in memory.
 * Useful for testing and browser-based applications.
 */
export class MemoryLogger implements Logger {
    private schemaVersion: string;
    public iterations: IterationLogEntry[] = [];
    public queries: QueryLogEntry[] = [];
    public reports: ReportLogEntry[] = [];

    constructor(config: Pick<LoggerConfig, 'schemaVersion'> = {}) {
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
    }

    logIteration(entry: IterationLogInput): void {
        this.iterations.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'iteration',
            ...entry,
        });
    }

    logQuery(entry: QueryLogInput): void {
        this.queries.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'query',
            ...entry,
        });
    }

    logReport(entry: ReportLogInput): void {
        this.reports.push({
            schemaVersion: this.schemaVersion,
            timestamp: Date.now(),
            logType: 'report',
            ...entry,
        });
    }

    /** Get all logs */
    getAllLogs(): LogEntry[] {
        return [...this.iterations, ...this.queries, ...this.reports];
    }

    /** Export to JSON string */
    toJSON(): string {
        return JSON.stringify({
            iterations: this.iterations,
            queries: this.queries,
            reports: this.reports,
        }, null, 2);
    }

    /** Export to JSONL string */
    toJSONL(): string {
        return this.getAllLogs().map(entry => JSON.stringify(entry)).join('\n');
    }

    clear(): void {
        this.iterations = [];
        this.queries = [];
        this.reports = [];
    }

    flush(): void { /* no-op for memory logger */ }
    close(): void { /* no-op for memory logger */ }
}

// ==================== Multi-Logger (Browser-compatible) ====================

/**
 * Multi-Logger: Write to multiple loggers simultaneously
 */
export class MultiLogger implements Logger {
    private loggers: Logger[];

    constructor(loggers: Logger[]) {
        this.loggers = loggers;
    }

    logIteration(entry: IterationLogInput): void {
        for (const logger of this.loggers) {
            logger.logIteration(entry);
        }
    }

    logQuery(entry: QueryLogInput): void {
        for (const logger of this.loggers) {
            logger.logQuery(entry);
        }
    }

    logReport(entry: ReportLogInput): void {
        for (const logger of this.loggers) {
            logger.logReport(entry);
        }
    }

    flush(): void {
        for (const logger of this.loggers) {
            logger.flush();
        }
    }

    close(): void {
        for (const logger of this.loggers) {
            logger.close();
        }
    }
}

// ==================== Factory Functions ====================

/**
 * Create a logger based on format (browser-compatible)
 */
export function createLogger(
    format: 'console' | 'memory',
    config: LoggerConfig
): Logger {
    switch (format) {
        case 'console':
            return new ConsoleLogger(config.logIterations ? 'debug' : 'info');
        case 'memory':
            return new MemoryLogger(config);
    }
}

/**
 * Memory + console logger pair
 */
export function createDefaultLogger(config: LoggerConfig): Logger {
    return new MultiLogger([
        new MemoryLogger(config),
        new ConsoleLogger('info'),
    ]);
}
