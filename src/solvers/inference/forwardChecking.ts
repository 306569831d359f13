import type { Variable } from '../../csp/variable.js';
import { Assignment } from '../../csp/assignment.js';
import type { CSP } from '../../csp/csp.js';
import type { InferenceStrategy } from '../interface.js';
import { InferenceLog } from './log.js';
import { enforceNodeConsistency, revise } from './revise.js';

/**
 * Forward checking: after an assignment, prune the domains of the unassigned
 * variables that share a constraint with the assigned one. Nothing further
 * is propagated.
 */
export class ForwardCheckingStrategy<VAL> implements InferenceStrategy<VAL> {
    readonly kind = 'inference';
    readonly name = 'forward-checking';
    readonly rank = 0;

    apply(csp: CSP<VAL>): InferenceLog<VAL> {
        const log = new InferenceLog<VAL>();
        enforceNodeConsistency(csp, new Assignment<VAL>(), log);
        return log;
    }

    applyAfterAssignment(csp: CSP<VAL>, assignment: Assignment<VAL>, variable: Variable): InferenceLog<VAL> {
        const log = new InferenceLog<VAL>();
        for (const constraint of csp.getConstraints(variable)) {
            for (const neighbor of constraint.scope) {
                if (neighbor === variable || assignment.contains(neighbor)) continue;
                if (revise(neighbor, constraint, csp, assignment, log) && csp.getDomain(neighbor).isEmpty()) {
                    log.setEmptyDomainFound();
                    return log;
                }
            }
        }
        return log;
    }
}
