/**
 * Variable and value ordering heuristics for backtracking search.
 */

import type { Variable } from '../csp/variable.js';
import type { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import { hasSupport } from '../csp/constraint.js';
import type { ValueOrderingStrategy, VariableSelectionStrategy } from './interface.js';

/**
 * Keep the items with the best score (lowest when minimize, highest otherwise).
 */
function keepBest<T>(items: T[], score: (item: T) => number, minimize: boolean): T[] {
    let best: T[] = [];
    let bestScore = minimize ? Infinity : -Infinity;
    for (const item of items) {
        const s = score(item);
        if (minimize ? s < bestScore : s > bestScore) {
            best = [item];
            bestScore = s;
        } else if (s === bestScore) {
            best.push(item);
        }
    }
    return best;
}

/**
 * Number of constraints linking the variable to another unassigned variable.
 */
export function degree<VAL>(variable: Variable, csp: CSP<VAL>, assignment: Assignment<VAL>): number {
    let count = 0;
    for (const constraint of csp.getConstraints(variable)) {
        if (constraint.scope.some(v => v !== variable && !assignment.contains(v))) count++;
    }
    return count;
}

/**
 * Minimum remaining values: prefer variables with the smallest domain.
 */
export function mrv<VAL>(): VariableSelectionStrategy<VAL> {
    return {
        kind: 'variable-selection',
        name: 'mrv',
        rank: 0,
        filter: (candidates, csp) => keepBest(candidates, v => csp.getDomain(v).size, true),
    };
}

/**
 * Degree heuristic: prefer variables involved in the most constraints on
 * other unassigned variables.
 */
export function deg<VAL>(): VariableSelectionStrategy<VAL> {
    return {
        kind: 'variable-selection',
        name: 'deg',
        rank: 1,
        filter: (candidates, csp, assignment) => keepBest(candidates, v => degree(v, csp, assignment), false),
    };
}

/**
 * MRV with DEG as tie-breaker.
 */
export function mrvDeg<VAL>(): VariableSelectionStrategy<VAL>[] {
    return [mrv<VAL>(), deg<VAL>()];
}

/**
 * Number of neighbour values that lose all support if `variable = value`.
 */
export function countLostValues<VAL>(
    variable: Variable,
    value: VAL,
    csp: CSP<VAL>,
    assignment: Assignment<VAL>
): number {
    const extended = assignment.clone().add(variable, value);
    // a value ruled out by several constraints is still one lost value
    const lost = new Map<Variable, Set<VAL>>();
    for (const constraint of csp.getConstraints(variable)) {
        for (const neighbor of constraint.scope) {
            if (neighbor === variable || extended.contains(neighbor)) continue;
            const lostForNeighbor = lost.get(neighbor) ?? new Set<VAL>();
            for (const neighborValue of csp.getDomain(neighbor)) {
                if (!hasSupport(constraint, csp, extended, neighbor, neighborValue)) lostForNeighbor.add(neighborValue);
            }
            lost.set(neighbor, lostForNeighbor);
        }
    }
    let count = 0;
    for (const values of lost.values()) count += values.size;
    return count;
}

/**
 * Least constraining value: try values that rule out the fewest neighbour
 * values first. Ties keep domain order.
 */
export function lcv<VAL>(): ValueOrderingStrategy<VAL> {
    return {
        kind: 'value-ordering',
        name: 'lcv',
        rank: 0,
        order: (variable, values, csp, assignment) => values
            .map((value, index) => ({ value, index, lost: countLostValues(variable, value, csp, assignment) }))
            .sort((a, b) => a.lost - b.lost || a.index - b.index)
            .map(entry => entry.value),
    };
}
