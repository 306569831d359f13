/**
 * Map-colouring problems used for demos and tests.
 */

import { Variable } from '../csp/variable.js';
import { Domain } from '../csp/domain.js';
import { NotEqualConstraint } from '../csp/constraint.js';
import { CSP } from '../csp/csp.js';

export const RED = 'RED';
export const GREEN = 'GREEN';
export const BLUE = 'BLUE';
export const MAP_COLORS = [RED, GREEN, BLUE] as const;

export type MapColor = typeof MAP_COLORS[number];

export const WA = new Variable('WA');
export const NT = new Variable('NT');
export const SA = new Variable('SA');
export const Q = new Variable('Q');
export const NSW = new Variable('NSW');
export const V = new Variable('V');
export const T = new Variable('T');

/**
 * The states and territories of Australia, three colours, neighbours must
 * differ. Tasmania has no neighbours.
 */
export function createAustraliaCsp(): CSP<string> {
    const csp = new CSP<string>([WA, NT, SA, Q, NSW, V, T], MAP_COLORS);
    const borders: Array<[Variable, Variable]> = [
        [WA, NT], [WA, SA], [NT, SA], [NT, Q], [SA, Q],
        [SA, NSW], [SA, V], [Q, NSW], [NSW, V],
    ];
    for (const [a, b] of borders) {
        csp.addConstraint(new NotEqualConstraint(a, b));
    }
    return csp;
}

/**
 * Eight variables connected as a tree, with single-colour domains at
 * V2, V4, V6 and V7.
 */
export function createTreeCsp(): CSP<string> {
    const vars = Array.from({ length: 8 }, (_, i) => new Variable(`V${i}`));
    const csp = new CSP<string>(vars, MAP_COLORS);

    csp.setDomain(vars[2], Domain.of(RED));
    csp.setDomain(vars[4], Domain.of(GREEN));
    csp.setDomain(vars[6], Domain.of(RED));
    csp.setDomain(vars[7], Domain.of(BLUE));

    const edges: Array<[number, number]> = [[0, 1], [1, 2], [1, 3], [1, 4], [3, 5], [5, 6], [5, 7]];
    for (const [a, b] of edges) {
        csp.addConstraint(new NotEqualConstraint(vars[a], vars[b]));
    }
    return csp;
}

export type DemoProblem = 'australia' | 'australia-nsw-blue' | 'australia-wa-red' | 'tree';

export const DEMO_PROBLEMS: readonly DemoProblem[] = ['australia', 'australia-nsw-blue', 'australia-wa-red', 'tree'];

export function createDemoProblem(name: DemoProblem): CSP<string> {
    switch (name) {
        case 'australia':
            return createAustraliaCsp();
        case 'australia-nsw-blue': {
            const csp = createAustraliaCsp();
            csp.setDomain(NSW, Domain.of(BLUE));
            return csp;
        }
        case 'australia-wa-red': {
            const csp = createAustraliaCsp();
            csp.setDomain(WA, Domain.of(RED));
            return csp;
        }
        case 'tree':
            return createTreeCsp();
    }
}
