/**
 * Shared test fixtures: problem generators and a brute-force oracle.
 */
import {
    Variable,
    CSP,
    Assignment,
    NotEqualConstraint,
    PredicateConstraint,
    AllDifferentConstraint,
    type Constraint,
} from '../src/csp/index.js';
import { createSeededRandom } from '../src/utils/random.js';

export type ConstraintSpec =
    | { type: 'not-equal'; scope: [number, number] }
    | { type: 'less-than'; scope: [number, number] }
    | { type: 'sum-not'; scope: [number, number, number]; total: number }
    | { type: 'all-different'; scope: number[] };

export interface ProblemSpec {
    size: number;
    values: number[];
    domains: Record<number, number[]>;
    constraints: ConstraintSpec[];
}

/**
 * Build a fresh CSP from a description, so every solver run starts clean.
 */
export function buildCsp(spec: ProblemSpec): CSP<number> {
    const vars = Array.from({ length: spec.size }, (_, i) => new Variable(`X${i}`));
    const csp = new CSP<number>(vars, spec.values);
    for (const [index, values] of Object.entries(spec.domains)) {
        const variable = vars[Number(index)];
        for (const value of spec.values) {
            if (!values.includes(value)) csp.removeValueFromDomain(variable, value);
        }
    }
    for (const c of spec.constraints) {
        csp.addConstraint(toConstraint(c, vars));
    }
    return csp;
}

function toConstraint(spec: ConstraintSpec, vars: Variable[]): Constraint<number> {
    switch (spec.type) {
        case 'not-equal':
            return new NotEqualConstraint(vars[spec.scope[0]], vars[spec.scope[1]]);
        case 'less-than':
            return new PredicateConstraint(spec.scope.map(i => vars[i]), ([a, b]) => a < b, 'lessThan');
        case 'sum-not':
            return new PredicateConstraint(
                spec.scope.map(i => vars[i]),
                values => values.reduce((sum, v) => sum + v, 0) !== spec.total,
                'sumNot'
            );
        case 'all-different':
            return new AllDifferentConstraint(spec.scope.map(i => vars[i]));
    }
}

/**
 * Random small problem mixing binary and n-ary constraints.
 */
export function randomProblem(seed: number): ProblemSpec {
    const random = createSeededRandom(seed);
    const int = (n: number) => Math.floor(random() * n);
    const size = 4 + int(3);
    const values = [1, 2, 3];
    const constraints: ConstraintSpec[] = [];
    const pairs = 3 + int(size + 2);
    for (let i = 0; i < pairs; i++) {
        const a = int(size);
        let b = int(size);
        if (a === b) b = (b + 1) % size;
        constraints.push(random() < 0.7 ? { type: 'not-equal', scope: [a, b] } : { type: 'less-than', scope: [a, b] });
    }
    if (random() < 0.5) {
        constraints.push({ type: 'sum-not', scope: [0, 1, 2], total: 6 });
    }
    if (random() < 0.3) {
        constraints.push({ type: 'all-different', scope: [size - 3, size - 2, size - 1] });
    }
    const domains: Record<number, number[]> = {};
    if (random() < 0.5) {
        domains[int(size)] = [values[int(values.length)]];
    }
    return { size, values, domains, constraints };
}

/**
 * Random forest of binary constraints: each variable after the first links
 * to an earlier one (or starts a new tree), by not-equal or an ordering in
 * either direction. Some leaves get a single value.
 */
export function randomTreeProblem(seed: number): ProblemSpec {
    const random = createSeededRandom(seed);
    const int = (n: number) => Math.floor(random() * n);
    const size = 2 + int(7);
    const values = [1, 2, 3];
    const constraints: ConstraintSpec[] = [];
    const hasChild = new Set<number>();
    for (let i = 1; i < size; i++) {
        if (random() < 0.15) continue;
        const parent = int(i);
        hasChild.add(parent);
        const roll = random();
        if (roll < 0.5) constraints.push({ type: 'not-equal', scope: [parent, i] });
        else if (roll < 0.75) constraints.push({ type: 'less-than', scope: [parent, i] });
        else constraints.push({ type: 'less-than', scope: [i, parent] });
    }
    const domains: Record<number, number[]> = {};
    for (let i = 0; i < size; i++) {
        if (!hasChild.has(i) && random() < 0.4) domains[i] = [values[int(values.length)]];
    }
    return { size, values, domains, constraints };
}

/**
 * Exhaustive search over the current domains; true if any solution exists.
 */
export function bruteForceSatisfiable<VAL>(csp: CSP<VAL>): boolean {
    const vars = csp.getVariables();
    const assignment = new Assignment<VAL>();
    const extend = (index: number): boolean => {
        if (index === vars.length) return assignment.isSolution(csp);
        for (const value of csp.getDomain(vars[index])) {
            assignment.add(vars[index], value);
            if (assignment.isConsistent(csp.getConstraints(vars[index])) && extend(index + 1)) return true;
        }
        assignment.remove(vars[index]);
        return false;
    };
    return extend(0);
}

/**
 * Domains of all variables as plain arrays, in declaration order.
 */
export function domainSnapshot<VAL>(csp: CSP<VAL>): VAL[][] {
    return csp.getVariables().map(v => csp.getDomain(v).toArray());
}

/**
 * Complete graph on n variables with not-equal constraints.
 */
export function cliqueCsp(n: number, colors: string[]): CSP<string> {
    const vars = Array.from({ length: n }, (_, i) => new Variable(`K${i}`));
    const csp = new CSP<string>(vars, colors);
    for (let i = 0; i < n; i++) {
        for (let j = i + 1; j < n; j++) {
            csp.addConstraint(new NotEqualConstraint(vars[i], vars[j]));
        }
    }
    return csp;
}

/**
 * Path X0 - X1 - ... - X(n-1) with not-equal constraints.
 */
export function pathCsp(n: number, colors: string[]): CSP<string> {
    const vars = Array.from({ length: n }, (_, i) => new Variable(`P${i}`));
    const csp = new CSP<string>(vars, colors);
    for (let i = 0; i + 1 < n; i++) {
        csp.addConstraint(new NotEqualConstraint(vars[i], vars[i + 1]));
    }
    return csp;
}
