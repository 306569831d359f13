/**
 * Tree-CSP Solver
 *
 * Solves problems whose constraint graph is a forest of binary constraints
 * without backtracking: directional arc consistency from the leaves up,
 * then a single assignment pass from the roots down. Unary constraints are
 * applied to the domains first.
 */

import type { Variable } from '../csp/variable.js';
import { Assignment } from '../csp/assignment.js';
import type { Constraint } from '../csp/constraint.js';
import type { CSP } from '../csp/csp.js';
import { createEngineError, createNotATreeError } from '../types/errors.js';
import { pickRandom, resolveRandom, type RandomSource } from '../utils/random.js';
import { CspSolver } from './solver.js';
import type { SolveOutcome } from './interface.js';
import { InferenceLog } from './inference/log.js';
import { enforceNodeConsistency, revise } from './inference/revise.js';

export interface TreeCspOptions {
    seed?: number;
    random?: RandomSource;
}

interface TreeOrder<VAL> {
    /** Parents always precede their children */
    ordered: Variable[];
    /** Constraint linking a non-root variable to its parent */
    parentConstraints: Map<Variable, Constraint<VAL>>;
}

export class TreeCspSolver<VAL> extends CspSolver<VAL> {
    private random: RandomSource;
    private randomRoot = false;

    constructor(options?: TreeCspOptions) {
        super();
        this.random = resolveRandom(options);
    }

    /**
     * Pick the first root at random instead of taking the first variable.
     */
    useRandom(enabled: boolean, random?: RandomSource): this {
        this.randomRoot = enabled;
        if (random) this.random = random;
        return this;
    }

    protected search(csp: CSP<VAL>): Omit<SolveOutcome<VAL>, 'statistics'> {
        const variables = csp.getVariables();
        if (variables.length === 0) {
            const empty = new Assignment<VAL>();
            this.fireStateChanged(csp, undefined, empty);
            return { status: 'solved', assignment: empty };
        }

        const root = this.randomRoot ? pickRandom(variables, this.random) : variables[0];
        const { ordered, parentConstraints } = this.topologicalSort(csp, root);

        const unary = new InferenceLog<VAL>();
        enforceNodeConsistency(csp, new Assignment<VAL>(), unary);
        if (!unary.isEmpty()) {
            this.fireStateChanged(csp, undefined, undefined);
        }
        if (variables.some(v => csp.getDomain(v).isEmpty())) {
            return { status: 'exhausted' };
        }

        // Leaves toward roots: every remaining parent value has a supporting child value
        const empty = new Assignment<VAL>();
        for (let i = ordered.length - 1; i > 0; i--) {
            const child = ordered[i];
            const constraint = parentConstraints.get(child);
            if (!constraint) continue;
            const parent = this.parentOf(csp, child, constraint);
            if (revise(parent, constraint, csp, empty, new InferenceLog<VAL>())) {
                this.fireStateChanged(csp, parent, undefined);
                if (csp.getDomain(parent).isEmpty()) {
                    return { status: 'exhausted' };
                }
            }
        }

        // Roots toward leaves: the first value consistent with the parent always exists
        const assignment = new Assignment<VAL>();
        for (const variable of ordered) {
            const value = csp.getDomain(variable).toArray().find(candidate => {
                assignment.add(variable, candidate);
                return assignment.isConsistent(csp.getConstraints(variable));
            });
            if (value === undefined) {
                throw createEngineError(`No consistent value left for ${variable.name} after arc consistency`);
            }
            assignment.add(variable, value);
            this.fireStateChanged(csp, variable, assignment);
        }

        this.fireStateChanged(csp, undefined, assignment);
        return { status: 'solved', assignment };
    }

    /**
     * Breadth-first order over every component, starting with `root`.
     * Throws NOT_A_TREE for non-binary constraints and cycles.
     */
    private topologicalSort(csp: CSP<VAL>, root: Variable): TreeOrder<VAL> {
        const ordered: Variable[] = [];
        const parentConstraints = new Map<Variable, Constraint<VAL>>();
        const visited = new Set<Variable>();

        for (const constraint of csp.getConstraints()) {
            if (constraint.scope.length > 2 || (constraint.scope.length === 2 && constraint.scope[0] === constraint.scope[1])) {
                throw createNotATreeError(`Constraint ${constraint.toString()} is not binary`, { constraint: constraint.toString() });
            }
        }

        const roots = [root, ...csp.getVariables().filter(v => v !== root)];
        for (const start of roots) {
            if (visited.has(start)) continue;
            visited.add(start);
            ordered.push(start);

            for (let current = ordered.length - 1; current < ordered.length; current++) {
                const parent = ordered[current];
                let arcsPointingUpwards = 0;
                for (const constraint of csp.getConstraints(parent)) {
                    const neighbor = csp.getNeighbor(parent, constraint);
                    if (neighbor === undefined) continue; // unary
                    if (visited.has(neighbor)) {
                        arcsPointingUpwards++;
                        if (arcsPointingUpwards > 1) {
                            throw createNotATreeError('CSP is not tree-structured: the constraint graph contains a cycle', {
                                variable: parent.name,
                            });
                        }
                    } else {
                        visited.add(neighbor);
                        ordered.push(neighbor);
                        parentConstraints.set(neighbor, constraint);
                    }
                }
            }
        }

        return { ordered, parentConstraints };
    }

    private parentOf(csp: CSP<VAL>, child: Variable, constraint: Constraint<VAL>): Variable {
        const parent = csp.getNeighbor(child, constraint);
        if (parent === undefined) {
            throw createEngineError(`Parent constraint of ${child.name} is not binary`);
        }
        return parent;
    }
}
