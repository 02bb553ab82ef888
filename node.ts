/**
 * @packageDocumentation
 * @module rrtkit/node
 *
 * Node.js entry point. Everything from the main entry plus the file-backed
 * JSONL logger, which needs `fs`.
 *
 * ```typescript
 * import { planning, JsonlLogger } from 'rrtkit/node';
 *
 * const logger = new JsonlLogger({ outputDir: './logs', label: 'rrt-star', seed: 42 });
 * planning.plan({ ...options, loggers: [logger] });
 * logger.close();
 * ```
 *
 * @license MIT
 */

// Re-export everything from the main index
export * from './index';

export { JsonlLogger, createJsonlLogger } from './src/core/logging-node';
