/**
 * Min-Conflicts local search
 *
 * Incomplete: failing within the step budget proves nothing about
 * satisfiability.
 */

import type { Variable } from '../csp/variable.js';
import { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import { createInvalidConfigError } from '../types/errors.js';
import { DEFAULTS } from '../types/options.js';
import { pickRandom, resolveRandom, type RandomSource } from '../utils/random.js';
import { CspSolver } from './solver.js';
import type { SolveOutcome } from './interface.js';

export interface MinConflictsOptions {
    seed?: number;
    random?: RandomSource;
}

export class MinConflictsSolver<VAL> extends CspSolver<VAL> {
    private readonly random: RandomSource;

    constructor(
        private readonly maxSteps: number = DEFAULTS.maxSteps,
        options?: MinConflictsOptions
    ) {
        super();
        if (!Number.isInteger(maxSteps) || maxSteps < 0) {
            throw createInvalidConfigError(`maxSteps must be a non-negative integer, got ${maxSteps}`, { maxSteps });
        }
        this.random = resolveRandom(options);
    }

    getMaxSteps(): number {
        return this.maxSteps;
    }

    protected search(csp: CSP<VAL>): Omit<SolveOutcome<VAL>, 'statistics'> {
        if (csp.getVariables().some(v => csp.getDomain(v).isEmpty())) {
            return { status: 'exhausted' };
        }

        const current = new Assignment<VAL>();
        for (const variable of csp.getVariables()) {
            current.add(variable, this.getMinConflictValueFor(variable, current, csp));
            this.fireStateChanged(csp, variable, current);
        }

        for (let step = 0; step <= this.maxSteps; step++) {
            if (current.isSolution(csp)) {
                this.fireStateChanged(csp, undefined, current);
                return { status: 'solved', assignment: current };
            }
            if (step === this.maxSteps) break;
            const variable = pickRandom(this.getConflictedVariables(current, csp), this.random);
            current.add(variable, this.getMinConflictValueFor(variable, current, csp));
            this.fireStateChanged(csp, variable, current);
        }

        return {
            status: 'exhausted',
            bestEffort: current,
            conflicts: current.getConflictCount(csp.getConstraints()),
        };
    }

    /**
     * Variables in the scope of at least one violated constraint, in
     * declaration order.
     */
    getConflictedVariables(assignment: Assignment<VAL>, csp: CSP<VAL>): Variable[] {
        const conflicted = new Set<Variable>();
        for (const constraint of csp.getConstraints()) {
            if (!constraint.isSatisfiedWith(assignment)) {
                constraint.scope.forEach(v => conflicted.add(v));
            }
        }
        return csp.getVariables().filter(v => conflicted.has(v));
    }

    /**
     * A value of the variable's domain minimising violated constraints,
     * ties broken at random. Leaves the variable's previous value in place.
     */
    private getMinConflictValueFor(variable: Variable, assignment: Assignment<VAL>, csp: CSP<VAL>): VAL {
        const constraints = csp.getConstraints(variable);
        const scratch = assignment.clone();
        let best: VAL[] = [];
        let minConflicts = Infinity;
        for (const value of csp.getDomain(variable)) {
            scratch.add(variable, value);
            const conflicts = scratch.getConflictCount(constraints);
            if (conflicts < minConflicts) {
                best = [value];
                minConflicts = conflicts;
            } else if (conflicts === minConflicts) {
                best.push(value);
            }
        }
        return pickRandom(best, this.random);
    }
}
