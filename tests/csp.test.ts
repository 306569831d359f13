/**
 * Data model tests: variables, domains, constraints, assignments, problems.
 */

import {
    Variable,
    Domain,
    CSP,
    Assignment,
    NotEqualConstraint,
    PredicateConstraint,
    AllDifferentConstraint,
    hasSupport,
} from '../src/csp/index.js';
import { CspException } from '../src/types/errors.js';
import { createAustraliaCsp, WA, NT, SA, Q, NSW, V, T, RED, GREEN, BLUE } from '../src/problems/mapColoring.js';

function codeOf(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (e) {
        return e instanceof CspException ? e.code : 'not a CspException';
    }
    return undefined;
}

describe('Variable', () => {
    test('compares by identity, not by name', () => {
        const a = new Variable('X');
        const b = new Variable('X');
        const csp = new CSP<number>([a, b], [1]);
        expect(csp.indexOf(a)).toBe(0);
        expect(csp.indexOf(b)).toBe(1);
        expect(a.toString()).toBe('X');
    });
});

describe('Domain', () => {
    test('rejects duplicate values', () => {
        expect(codeOf(() => Domain.of(1, 2, 1))).toBe('MALFORMED_PROBLEM');
    });

    test('removes in place and keeps order', () => {
        const domain = Domain.of(RED, GREEN, BLUE);
        expect(domain.remove(GREEN)).toBe(true);
        expect(domain.remove(GREEN)).toBe(false);
        expect(domain.toArray()).toEqual([RED, BLUE]);
        expect(domain.size).toBe(2);
    });

    test('empty domain is a valid state', () => {
        const domain = Domain.of(RED);
        domain.remove(RED);
        expect(domain.isEmpty()).toBe(true);
        expect(domain.toString()).toBe('{}');
    });

    test('restrictTo reduces to a single value', () => {
        const domain = Domain.of(RED, GREEN, BLUE);
        expect(domain.restrictTo(BLUE)).toBe(true);
        expect(domain.toArray()).toEqual([BLUE]);
        expect(domain.restrictTo(BLUE)).toBe(false);
    });

    test('copy is independent', () => {
        const domain = Domain.of(1, 2, 3);
        const copy = domain.copy();
        domain.remove(2);
        expect(copy.toArray()).toEqual([1, 2, 3]);
    });
});

describe('CSP', () => {
    test('rejects a variable declared twice', () => {
        const x = new Variable('X');
        expect(codeOf(() => new CSP<number>([x, x]))).toBe('MALFORMED_PROBLEM');
    });

    test('rejects constraints on foreign variables', () => {
        const x = new Variable('X');
        const csp = new CSP<number>([x], [1, 2]);
        expect(codeOf(() => csp.addConstraint(new NotEqualConstraint(x, new Variable('Y'))))).toBe('MALFORMED_PROBLEM');
        expect(csp.getConstraints()).toHaveLength(0);
    });

    test('rejects domains for foreign variables', () => {
        const csp = new CSP<number>([new Variable('X')], [1]);
        expect(codeOf(() => csp.setDomain(new Variable('X'), Domain.of(1)))).toBe('MALFORMED_PROBLEM');
    });

    test('indexes constraints per variable', () => {
        const csp = createAustraliaCsp();
        expect(csp.getConstraints()).toHaveLength(9);
        expect(csp.getConstraints(SA)).toHaveLength(5);
        expect(csp.getConstraints(T)).toHaveLength(0);
        expect(csp.getNeighbors(SA)).toEqual([WA, NT, Q, NSW, V]);
    });

    test('getNeighbor returns the other end of a binary constraint', () => {
        const csp = createAustraliaCsp();
        const [first] = csp.getConstraints(WA);
        expect(csp.getNeighbor(WA, first)).toBe(NT);
        expect(csp.getNeighbor(NT, first)).toBe(WA);
        expect(csp.getNeighbor(SA, first)).toBeUndefined();
    });

    test('setDomain replaces a domain wholesale', () => {
        const csp = createAustraliaCsp();
        csp.setDomain(NSW, Domain.of(BLUE));
        expect(csp.getDomain(NSW).toArray()).toEqual([BLUE]);
        expect(csp.getDomain(V).toArray()).toEqual([RED, GREEN, BLUE]);
    });

    test('copyDomains shares constraints but not domains', () => {
        const csp = createAustraliaCsp();
        const copy = csp.copyDomains();
        copy.removeValueFromDomain(WA, RED);
        expect(csp.getDomain(WA).toArray()).toEqual([RED, GREEN, BLUE]);
        expect(copy.getDomain(WA).toArray()).toEqual([GREEN, BLUE]);
        expect(copy.getConstraints()).toEqual(csp.getConstraints());
    });
});

describe('Assignment', () => {
    test('keeps insertion order', () => {
        const assignment = new Assignment<string>().add(SA, BLUE).add(WA, RED);
        expect(assignment.toString()).toBe('{SA=BLUE, WA=RED}');
        assignment.add(SA, GREEN);
        expect(assignment.getVariables()).toEqual([SA, WA]);
        expect(assignment.toRecord()).toEqual({ SA: GREEN, WA: RED });
    });

    test('isSolution requires completeness and consistency', () => {
        const csp = createAustraliaCsp();
        const assignment = new Assignment<string>()
            .add(WA, RED).add(NT, GREEN).add(SA, BLUE).add(Q, RED)
            .add(NSW, GREEN).add(V, RED);
        expect(assignment.isSolution(csp)).toBe(false);
        assignment.add(T, RED);
        expect(assignment.isSolution(csp)).toBe(true);
        assignment.add(V, BLUE);
        expect(assignment.isSolution(csp)).toBe(false);
    });

    test('counts violated constraints', () => {
        const csp = createAustraliaCsp();
        const allRed = new Assignment<string>();
        csp.getVariables().forEach(v => allRed.add(v, RED));
        expect(allRed.getConflictCount(csp.getConstraints())).toBe(9);
        expect(allRed.getConflictCount(csp.getConstraints(SA))).toBe(5);
    });
});

describe('Constraints', () => {
    const x = new Variable('x');
    const y = new Variable('y');
    const z = new Variable('z');

    test('are satisfied while a scope variable is unassigned', () => {
        const assignment = new Assignment<number>().add(x, 1);
        expect(new NotEqualConstraint<number>(x, y).isSatisfiedWith(assignment)).toBe(true);
        expect(new PredicateConstraint<number>([x, y], () => false).isSatisfiedWith(assignment)).toBe(true);
    });

    test('predicate constraints receive values in scope order', () => {
        const ordered = new PredicateConstraint<number>([x, y, z], ([a, b, c]) => a < b && b < c, 'increasing');
        const assignment = new Assignment<number>().add(z, 3).add(x, 1).add(y, 2);
        expect(ordered.isSatisfiedWith(assignment)).toBe(true);
        assignment.add(y, 4);
        expect(ordered.isSatisfiedWith(assignment)).toBe(false);
        expect(ordered.toString()).toBe('increasing(x, y, z)');
    });

    test('all-different rejects partial repeats', () => {
        const constraint = new AllDifferentConstraint<number>([x, y, z]);
        expect(constraint.isSatisfiedWith(new Assignment<number>().add(x, 1).add(z, 1))).toBe(false);
        expect(constraint.isSatisfiedWith(new Assignment<number>().add(x, 1).add(z, 2))).toBe(true);
    });

    test('hasSupport looks for a completion in the current domains', () => {
        const csp = new CSP<number>([x, y, z], [1, 2]);
        const constraint = new AllDifferentConstraint<number>([x, y, z]);
        csp.addConstraint(constraint);
        // three variables, two values: nothing can be completed
        expect(hasSupport(constraint, csp, new Assignment<number>(), x, 1)).toBe(false);
        csp.setDomain(z, Domain.of(1, 2, 3));
        expect(hasSupport(constraint, csp, new Assignment<number>(), x, 1)).toBe(true);
        expect(hasSupport(constraint, csp, new Assignment<number>().add(y, 1), x, 1)).toBe(false);
    });

    test('hasSupport leaves the given assignment untouched', () => {
        const csp = createAustraliaCsp();
        const assignment = new Assignment<string>().add(WA, RED);
        const [constraint] = csp.getConstraints(WA);
        expect(hasSupport(constraint, csp, assignment, NT, RED)).toBe(false);
        expect(hasSupport(constraint, csp, assignment, NT, GREEN)).toBe(true);
        expect(assignment.toString()).toBe('{WA=RED}');
    });
});
