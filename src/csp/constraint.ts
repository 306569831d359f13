import type { Variable } from './variable.js';
import type { Assignment } from './assignment.js';
import type { CSP } from './csp.js';

/**
 * A relation over an ordered scope of variables.
 *
 * Implementations must be pure: `isSatisfiedWith` returns true whenever a
 * scope variable is unassigned, otherwise it evaluates the relation.
 */
export interface Constraint<VAL> {
    readonly scope: readonly Variable[];
    isSatisfiedWith(assignment: Assignment<VAL>): boolean;
    toString(): string;
}

export class NotEqualConstraint<VAL> implements Constraint<VAL> {
    readonly scope: readonly Variable[];

    constructor(readonly var1: Variable, readonly var2: Variable) {
        this.scope = [var1, var2];
    }

    isSatisfiedWith(assignment: Assignment<VAL>): boolean {
        const values = assignment.valuesOf(this.scope);
        return values === undefined || values[0] !== values[1];
    }

    toString(): string {
        return `${this.var1.name} != ${this.var2.name}`;
    }
}

/**
 * Generic n-ary constraint defined by a predicate over the scope's values.
 */
export class PredicateConstraint<VAL> implements Constraint<VAL> {
    readonly scope: readonly Variable[];

    constructor(
        scope: readonly Variable[],
        private readonly predicate: (values: VAL[]) => boolean,
        private readonly label: string = 'predicate'
    ) {
        this.scope = [...scope];
    }

    isSatisfiedWith(assignment: Assignment<VAL>): boolean {
        const values = assignment.valuesOf(this.scope);
        return values === undefined || this.predicate(values);
    }

    toString(): string {
        return `${this.label}(${this.scope.map(v => v.name).join(', ')})`;
    }
}

/**
 * All assigned scope variables take pairwise distinct values. Unlike the
 * other kinds this one already rejects partial assignments with a repeat.
 */
export class AllDifferentConstraint<VAL> implements Constraint<VAL> {
    readonly scope: readonly Variable[];

    constructor(scope: readonly Variable[]) {
        this.scope = [...scope];
    }

    isSatisfiedWith(assignment: Assignment<VAL>): boolean {
        const seen = new Set<VAL>();
        for (const variable of this.scope) {
            const values = assignment.valuesOf([variable]);
            if (values === undefined) continue;
            if (seen.has(values[0])) return false;
            seen.add(values[0]);
        }
        return true;
    }

    toString(): string {
        return `allDifferent(${this.scope.map(v => v.name).join(', ')})`;
    }
}

/**
 * Whether `variable = value` can be completed to satisfy `constraint`, given the
 * values already in `assignment` and the current domains of the other,
 * still unassigned, scope variables.
 */
export function hasSupport<VAL>(
    constraint: Constraint<VAL>,
    csp: CSP<VAL>,
    assignment: Assignment<VAL>,
    variable: Variable,
    value: VAL
): boolean {
    const scratch = assignment.clone();
    scratch.add(variable, value);
    const open = constraint.scope.filter(v => !scratch.contains(v));

    const extend = (index: number): boolean => {
        if (!constraint.isSatisfiedWith(scratch)) return false;
        if (index === open.length) return true;
        const next = open[index];
        for (const candidate of csp.getDomain(next)) {
            scratch.add(next, candidate);
            if (extend(index + 1)) return true;
        }
        scratch.remove(next);
        return false;
    };

    return extend(0);
}
