/**
 * Tests for the solver registry
 */

import { SolverRegistry, createSolverRegistry } from '../src/solvers/registry.js';
import { FlexibleBacktrackingSolver } from '../src/solvers/backtracking.js';
import { MinConflictsSolver } from '../src/solvers/minConflicts.js';
import { TreeCspSolver } from '../src/solvers/tree.js';
import { CspException } from '../src/types/errors.js';
import { createAustraliaCsp, createTreeCsp } from '../src/problems/mapColoring.js';

const BACKTRACKING = [
    'backtracking',
    'backtracking-deg',
    'backtracking-fc',
    'backtracking-fc-mrv',
    'backtracking-fc-lcv',
    'backtracking-ac3',
    'backtracking-all',
];

describe('SolverRegistry', () => {
    let registry: SolverRegistry;

    beforeEach(() => {
        registry = createSolverRegistry();
    });

    test('registers the canonical configurations in order', () => {
        expect(registry.getNames()).toEqual([...BACKTRACKING, 'min-conflicts', 'tree', 'tree-random']);
        expect(registry.has('tree')).toBe(true);
        expect(registry.has('tree-dfs')).toBe(false);
    });

    test('describes every configuration', () => {
        const descriptions = Object.fromEntries(registry.getEntries().map(([name, entry]) => [name, entry.description]));
        expect(descriptions['backtracking-deg']).toBe('Backtracking + DEG');
        expect(descriptions['backtracking-all']).toBe('Backtracking + AC3 + MRV & DEG + LCV');
        expect(descriptions['tree-random']).toBe('Tree-CSP-Solver with Random Root');
    });

    test.each(BACKTRACKING)('%s solves the map of Australia', name => {
        const solver = registry.createSolver<string>(name);
        expect(solver).toBeInstanceOf(FlexibleBacktrackingSolver);
        const csp = createAustraliaCsp();
        expect(solver.solve(csp)?.isSolution(csp)).toBe(true);
    });

    test('installs the named strategies', () => {
        const strategies = (name: string): string[] => {
            const solver = registry.createSolver<string>(name);
            return solver instanceof FlexibleBacktrackingSolver ? solver.getStrategies().map(s => s.name) : [];
        };
        expect(strategies('backtracking')).toEqual([]);
        expect(strategies('backtracking-fc-mrv')).toEqual(['mrv', 'deg', 'forward-checking']);
        expect(strategies('backtracking-fc-lcv')).toEqual(['lcv', 'forward-checking']);
        expect(strategies('backtracking-all')).toEqual(['mrv', 'deg', 'lcv', 'ac3']);
    });

    test('min-conflicts takes its step budget from the options', () => {
        const configured = registry.createSolver<string>('min-conflicts', { maxSteps: 7, seed: 1 });
        const defaulted = registry.createSolver<string>('min-conflicts');
        expect(configured).toBeInstanceOf(MinConflictsSolver);
        expect(configured instanceof MinConflictsSolver && configured.getMaxSteps()).toBe(7);
        expect(defaulted instanceof MinConflictsSolver && defaulted.getMaxSteps()).toBe(50);
    });

    test.each(['tree', 'tree-random'])('%s solves the tree problem', name => {
        const solver = registry.createSolver<string>(name, { seed: 11 });
        expect(solver).toBeInstanceOf(TreeCspSolver);
        const csp = createTreeCsp();
        expect(solver.solve(csp)?.isSolution(csp)).toBe(true);
    });

    test('every call returns a fresh solver', () => {
        expect(registry.createSolver('backtracking')).not.toBe(registry.createSolver('backtracking'));
    });

    test('rejects unknown names', () => {
        expect(() => registry.createSolver('magic')).toThrow(CspException);
        expect(() => registry.createSolver('magic')).toThrow("Solver 'magic' is not registered");
    });

    test('accepts additional configurations', () => {
        registry.register('plain', {
            description: 'Plain backtracking',
            factory: <VAL>() => new FlexibleBacktrackingSolver<VAL>(),
        });
        expect(registry.getNames()).toContain('plain');
        expect(registry.createSolver('plain')).toBeInstanceOf(FlexibleBacktrackingSolver);
    });
});
