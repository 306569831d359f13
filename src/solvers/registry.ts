import { FlexibleBacktrackingSolver } from './backtracking.js';
import { MinConflictsSolver } from './minConflicts.js';
import { TreeCspSolver } from './tree.js';
import { CspSolver } from './solver.js';
import { deg, lcv, mrvDeg } from './heuristics.js';
import { ForwardCheckingStrategy } from './inference/forwardChecking.js';
import { AC3Strategy } from './inference/ac3.js';
import { createUnknownSolverError } from '../types/errors.js';
import { DEFAULTS, type SolverOptions } from '../types/options.js';

export interface SolverEntry {
    description: string;
    factory: <VAL>(options: SolverOptions) => CspSolver<VAL>;
}

/**
 * Named solver configurations.
 */
export class SolverRegistry {
    private registry: Map<string, SolverEntry> = new Map();

    constructor() {
        this.registerSolvers();
    }

    private registerSolvers() {
        this.register('backtracking', {
            description: 'Backtracking',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>(),
        });
        this.register('backtracking-deg', {
            description: 'Backtracking + DEG',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>().set(deg<VAL>()),
        });
        this.register('backtracking-fc', {
            description: 'Backtracking + Forward Checking',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>().set(new ForwardCheckingStrategy<VAL>()),
        });
        this.register('backtracking-fc-mrv', {
            description: 'Backtracking + Forward Checking + MRV',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>().set(mrvDeg<VAL>(), new ForwardCheckingStrategy<VAL>()),
        });
        this.register('backtracking-fc-lcv', {
            description: 'Backtracking + Forward Checking + LCV',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>().set(lcv<VAL>(), new ForwardCheckingStrategy<VAL>()),
        });
        this.register('backtracking-ac3', {
            description: 'Backtracking + AC3',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>().set(new AC3Strategy<VAL>()),
        });
        this.register('backtracking-all', {
            description: 'Backtracking + AC3 + MRV & DEG + LCV',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>().setAll(),
        });
        this.register('min-conflicts', {
            description: 'Min-Conflicts',
            factory: <VAL>(options: SolverOptions) =>
                new MinConflictsSolver<VAL>(options.maxSteps ?? DEFAULTS.maxSteps, options),
        });
        this.register('tree', {
            description: 'Tree-CSP-Solver',
            factory: <VAL>(options: SolverOptions) => new TreeCspSolver<VAL>(options),
        });
        this.register('tree-random', {
            description: 'Tree-CSP-Solver with Random Root',
            factory: <VAL>(options: SolverOptions) => new TreeCspSolver<VAL>(options).useRandom(true),
        });
    }

    register(name: string, entry: SolverEntry): void {
        this.registry.set(name, entry);
    }

    has(name: string): boolean {
        return this.registry.has(name);
    }

    getNames(): string[] {
        return Array.from(this.registry.keys());
    }

    getEntries(): [string, SolverEntry][] {
        return Array.from(this.registry.entries());
    }

    /**
     * Create a fresh solver for the given name.
     */
    createSolver<VAL>(name: string, options: SolverOptions = {}): CspSolver<VAL> {
        const entry = this.registry.get(name);
        if (!entry) {
            throw createUnknownSolverError(name, this.getNames());
        }
        return entry.factory<VAL>(options);
    }
}

export function createSolverRegistry(): SolverRegistry {
    return new SolverRegistry();
}
