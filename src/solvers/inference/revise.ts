import type { Variable } from '../../csp/variable.js';
import type { Assignment } from '../../csp/assignment.js';
import type { CSP } from '../../csp/csp.js';
import { hasSupport, type Constraint } from '../../csp/constraint.js';
import type { InferenceLog } from './log.js';

/**
 * Remove every value of `variable` that has no support under `constraint`.
 * Returns true if the domain changed.
 */
export function revise<VAL>(
    variable: Variable,
    constraint: Constraint<VAL>,
    csp: CSP<VAL>,
    assignment: Assignment<VAL>,
    log: InferenceLog<VAL>
): boolean {
    const domain = csp.getDomain(variable);
    let revised = false;
    for (const value of domain.toArray()) {
        if (!hasSupport(constraint, csp, assignment, variable, value)) {
            log.storeDomainFor(variable, domain);
            domain.remove(value);
            revised = true;
        }
    }
    return revised;
}

/**
 * Prune values violating unary constraints.
 */
export function enforceNodeConsistency<VAL>(
    csp: CSP<VAL>,
    assignment: Assignment<VAL>,
    log: InferenceLog<VAL>
): void {
    for (const constraint of csp.getConstraints()) {
        if (constraint.scope.length !== 1) continue;
        const [variable] = constraint.scope;
        if (assignment.contains(variable)) continue;
        revise(variable, constraint, csp, assignment, log);
        if (csp.getDomain(variable).isEmpty()) {
            log.setEmptyDomainFound();
            return;
        }
    }
}
