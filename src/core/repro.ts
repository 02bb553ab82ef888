/**
 * @module core/repro
 * @description Reproducibility guarantees for planning queries
 *
 * Provides the seeded RNG that all sampling flows through, plus canonical
 * config hashing and run manifests so a batch of queries can be replayed.
 */

// Core version - should match package.json
export const CORE_VERSION = '0.3.0';

// ==================== Hashing Primitives ====================

/**
 * djb2 (xor variant) as 8 hex digits
 */
function djb2(str: string): string {
    let hash = 5381;
    for (let i = 0; i < str.length; i++) {
        hash = ((hash << 5) + hash) ^ str.charCodeAt(i);
    }
    return (hash >>> 0).toString(16).padStart(8, '0');
}

/**
 * 32 hex digits from four chained djb2 rounds. Not cryptographic; only used
 * to tell configurations apart in logs and manifests.
 */
export function createHash(data: string): string {
    const h1 = djb2(data);
    const h2 = djb2(data + h1);
    const h3 = djb2(h1 + data);
    return h1 + h2 + h3 + djb2(h2 + h3);
}

// ==================== Types ====================

/**
 * Record of a batch of planning queries
 */
export interface RunManifest {
    /** Batch label */
    label: string;
    /** Base random seed */
    seed: number;
    /** Planner hyperparameters (canonicalised) */
    hyperparams: Record<string, unknown>;
    /** Hash of label + seed + hyperparams */
    configHash: string;
    /** Library version */
    libraryVersion: string;
    /** Timestamp when the manifest was created */
    createdAt: number;
}

export interface RunManifestInput {
    label: string;
    seed: number;
    hyperparams: Record<string, unknown>;
}

/**
 * Validation result with errors and warnings
 */
export interface ValidationResult {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

// ==================== Hashing ====================

/**
 * Compute a stable hash of a configuration record.
 *
 * Keys are sorted recursively; functions hash by name and non-finite numbers
 * by their string form so `Infinity` budgets do not collapse to `null`.
 */
export function computeConfigHash(record: Record<string, unknown>): string {
    return createHash(JSON.stringify(canonicalize(record)));
}

/**
 * Create a run manifest
 */
export function createRunManifest(input: RunManifestInput): RunManifest {
    const hyperparams = canonicalize(input.hyperparams);
    return {
        label: input.label,
        seed: input.seed,
        hyperparams: isRecord(hyperparams) ? hyperparams : {},
        configHash: computeConfigHash({
            label: input.label,
            seed: input.seed,
            hyperparams: input.hyperparams,
        }),
        libraryVersion: CORE_VERSION,
        createdAt: Date.now(),
    };
}

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 *
 * Use this instead of Math.random() for reproducibility.
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random integer in [min, max)
     */
    randint(min: number, max: number): number {
        return Math.floor(this.random() * (max - min)) + min;
    }

    /**
     * Generate a random float in [min, max)
     */
    uniform(min: number, max: number): number {
        return this.random() * (max - min) + min;
    }

    /**
     * Generate a random sample from a normal distribution
     */
    normal(mean: number = 0, std: number = 1): number {
        // Box-Muller transform; 1 - u keeps the log argument in (0, 1]
        const u1 = 1 - this.random();
        const u2 = this.random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + std * z;
    }

    /**
     * Shuffle an array in place
     */
    shuffle<T>(array: T[]): T[] {
        for (let i = array.length - 1; i > 0; i--) {
            const j = this.randint(0, i + 1);
            [array[i], array[j]] = [array[j], array[i]];
        }
        return array;
    }

    /**
     * Get the current state (for saving/restoring)
     */
    getState(): number {
        return this.state;
    }

    /**
     * Set the state (for restoring)
     */
    setState(state: number): void {
        this.state = state >>> 0;
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}

// ==================== Utility Functions ====================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Sort object keys recursively for deterministic serialization
 */
function canonicalize(value: unknown): unknown {
    if (typeof value === 'function') {
        return `[function ${value.name || 'anonymous'}]`;
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
        return String(value);
    }
    if (value === null || typeof value !== 'object') {
        return value;
    }

    if (Array.isArray(value)) {
        return value.map(canonicalize);
    }

    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
        const entry: unknown = Reflect.get(value, key);
        if (entry !== undefined) {
            sorted[key] = canonicalize(entry);
        }
    }
    return sorted;
}
