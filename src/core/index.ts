/**
 * @module core
 * @description Shared infrastructure for planning queries
 *
 * ## Modules
 * - `space`: box bounds for sampling and obstacles
 * - `runner`: batch trials with per-trial seeds
 * - `logging`: structured iteration / query / report logs
 * - `repro`: seeded RNG, config hashing, run manifests
 * - `errors`: unified error types and codes
 *
 * The file-backed JsonlLogger lives in `logging-node` and is exported from
 * the Node entry point only.
 */

// ==================== Space ====================

export type { BoxSpace } from './space';

export {
    box,
    validateBox,
    dimensionOf,
    sampleBox,
    containsBox,
    clampToBox,
    boxVolume,
} from './space';

// ==================== Runner ====================

export type { TrialRunnerConfig, TrialReport } from './runner';

export { TrialRunner, runTrials } from './runner';

// ==================== Logging ====================

export type {
    LogLevel,
    BaseLogEntry,
    IterationOutcome,
    IterationLogEntry,
    QueryLogEntry,
    ReportLogEntry,
    LogEntry,
    IterationLogInput,
    QueryLogInput,
    ReportLogInput,
    Logger,
    LoggerConfig,
} from './logging';

export {
    DEFAULT_SCHEMA_VERSION,
    ConsoleLogger,
    MemoryLogger,
    MultiLogger,
    createLogger,
    createDefaultLogger,
} from './logging';

// ==================== Reproducibility ====================

export type { RunManifest, RunManifestInput, ValidationResult } from './repro';

export {
    CORE_VERSION,
    createHash,
    computeConfigHash,
    createRunManifest,
    SeededRandom,
    createRng,
} from './repro';

// ==================== Errors ====================

export type { ErrorCode, ConfigurationErrorCode } from './errors';

export {
    ErrorCodes,
    PlanningError,
    ConfigurationError,
    InvariantViolationError,
    ValidationError,
    NotRunningError,
    isPlanningError,
    hasErrorCode,
    isFatalPlanningError,
    wrapError,
} from './errors';
