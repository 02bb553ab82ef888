/**
 * @module core/logging-node
 * @description File-backed JSONL logger (Node.js only)
 */

import * as fs from 'fs';
import * as path from 'path';
import { PlanningError, ErrorCodes } from './errors';
import {
    DEFAULT_SCHEMA_VERSION,
    type Logger,
    type LoggerConfig,
    type LogEntry,
    type IterationLogInput,
    type QueryLogInput,
    type ReportLogInput,
} from './logging';

/**
 * Appends one JSON object per line to `<outputDir>/<label>_<seed>.jsonl`.
 * Entries are buffered and written once `bufferSize` is reached or on flush().
 */
export class JsonlLogger implements Logger {
    readonly filePath: string;
    private schemaVersion: string;
    private logIterations: boolean;
    private bufferSize: number;
    private buffer: string[] = [];
    private closed = false;

    constructor(config: LoggerConfig) {
        const outputDir = config.outputDir ?? process.cwd();
        fs.mkdirSync(outputDir, { recursive: true });
        this.filePath = path.join(outputDir, `${config.label}_${config.seed}.jsonl`);
        this.schemaVersion = config.schemaVersion ?? DEFAULT_SCHEMA_VERSION;
        this.logIterations = config.logIterations ?? false;
        this.bufferSize = config.bufferSize ?? 100;
    }

    logIteration(entry: IterationLogInput): void {
        if (!this.logIterations) return;
        this.write({ ...this.header(), logType: 'iteration', ...entry });
    }

    logQuery(entry: QueryLogInput): void {
        this.write({ ...this.header(), logType: 'query', ...entry });
    }

    logReport(entry: ReportLogInput): void {
        this.write({ ...this.header(), logType: 'report', ...entry });
    }

    flush(): void {
        if (this.buffer.length === 0) return;
        fs.appendFileSync(this.filePath, this.buffer.join('\n') + '\n', 'utf8');
        this.buffer = [];
    }

    close(): void {
        if (this.closed) return;
        this.flush();
        this.closed = true;
    }

    private header(): { schemaVersion: string; timestamp: number } {
        return { schemaVersion: this.schemaVersion, timestamp: Date.now() };
    }

    private write(entry: LogEntry): void {
        if (this.closed) {
            throw new PlanningError(ErrorCodes.LOGGER_CLOSED, `JsonlLogger for ${this.filePath} is closed`, {
                filePath: this.filePath,
            });
        }
        this.buffer.push(JSON.stringify(entry));
        if (this.buffer.length >= this.bufferSize) {
            this.flush();
        }
    }
}

/**
 * Create a JSONL file logger
 */
export function createJsonlLogger(config: LoggerConfig): JsonlLogger {
    return new JsonlLogger(config);
}
