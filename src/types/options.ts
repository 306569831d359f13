import type { RandomSource } from '../utils/random.js';

export interface SolverOptions {
    /** Repair steps for min-conflicts */
    maxSteps?: number;
    /** Seed for the default random source */
    seed?: number;
    /** Explicit random source (takes precedence over seed) */
    random?: RandomSource;
}

export interface CliOptions extends SolverOptions {
    solver?: string;
    trace?: boolean;
}

export const DEFAULTS = {
    maxSteps: 50,
    solver: 'backtracking',
} as const;

/**
 * Resolve options from the environment, falling back to DEFAULTS.
 */
export function optionsFromEnv(env: NodeJS.ProcessEnv = process.env): CliOptions {
    const options: CliOptions = {
        solver: env.CSP_SOLVER || DEFAULTS.solver,
        maxSteps: DEFAULTS.maxSteps,
    };

    const maxSteps = parseInteger(env.CSP_MAX_STEPS);
    if (maxSteps !== undefined) options.maxSteps = maxSteps;

    const seed = parseInteger(env.CSP_SEED);
    if (seed !== undefined) options.seed = seed;

    return options;
}

export function parseInteger(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isInteger(value) ? value : undefined;
}
