import type { Variable } from '../../csp/variable.js';
import { Assignment } from '../../csp/assignment.js';
import type { Constraint } from '../../csp/constraint.js';
import type { CSP } from '../../csp/csp.js';
import type { InferenceStrategy } from '../interface.js';
import { InferenceLog } from './log.js';
import { revise } from './revise.js';

/**
 * FIFO queue of arcs (variable, constraint) without duplicates.
 */
class ArcQueue<VAL> {
    private readonly arcs: Array<[Variable, Constraint<VAL>]> = [];
    private readonly queued = new Map<Constraint<VAL>, Set<Variable>>();

    add(variable: Variable, constraint: Constraint<VAL>): void {
        let vars = this.queued.get(constraint);
        if (!vars) {
            vars = new Set();
            this.queued.set(constraint, vars);
        }
        if (vars.has(variable)) return;
        vars.add(variable);
        this.arcs.push([variable, constraint]);
    }

    poll(): [Variable, Constraint<VAL>] | undefined {
        const arc = this.arcs.shift();
        if (arc) this.queued.get(arc[1])?.delete(arc[0]);
        return arc;
    }
}

/**
 * Arc consistency (AC-3, generalised to n-ary scopes). Revised variables put
 * their other arcs back on the queue until a fixpoint or an empty domain.
 */
export class AC3Strategy<VAL> implements InferenceStrategy<VAL> {
    readonly kind = 'inference';
    readonly name = 'ac3';
    readonly rank = 1;

    /**
     * Make the whole problem arc consistent.
     */
    apply(csp: CSP<VAL>): InferenceLog<VAL> {
        const log = new InferenceLog<VAL>();
        const queue = new ArcQueue<VAL>();
        for (const variable of csp.getVariables()) {
            for (const constraint of csp.getConstraints(variable)) {
                queue.add(variable, constraint);
            }
        }
        this.reduceDomains(queue, csp, new Assignment<VAL>(), log);
        return log;
    }

    /**
     * Reduce the assigned variable's domain to its value, then propagate
     * from its neighbours.
     */
    applyAfterAssignment(csp: CSP<VAL>, assignment: Assignment<VAL>, variable: Variable): InferenceLog<VAL> {
        const log = new InferenceLog<VAL>();
        const domain = csp.getDomain(variable);
        const values = assignment.valuesOf([variable]);
        if (values === undefined || !domain.contains(values[0])) {
            log.setEmptyDomainFound();
            return log;
        }
        if (domain.size > 1) {
            log.storeDomainFor(variable, domain);
            domain.restrictTo(values[0]);
        }

        const queue = new ArcQueue<VAL>();
        for (const constraint of csp.getConstraints(variable)) {
            for (const neighbor of constraint.scope) {
                if (neighbor !== variable && !assignment.contains(neighbor)) {
                    queue.add(neighbor, constraint);
                }
            }
        }
        this.reduceDomains(queue, csp, assignment, log);
        return log;
    }

    private reduceDomains(queue: ArcQueue<VAL>, csp: CSP<VAL>, assignment: Assignment<VAL>, log: InferenceLog<VAL>): void {
        let arc = queue.poll();
        while (arc) {
            const [variable, constraint] = arc;
            if (revise(variable, constraint, csp, assignment, log)) {
                if (csp.getDomain(variable).isEmpty()) {
                    log.setEmptyDomainFound();
                    return;
                }
                for (const other of csp.getConstraints(variable)) {
                    // a binary arc never needs re-checking against the variable that just shrank
                    if (other === constraint && other.scope.length === 2) continue;
                    for (const neighbor of other.scope) {
                        if (neighbor !== variable && !assignment.contains(neighbor)) {
                            queue.add(neighbor, other);
                        }
                    }
                }
            }
            arc = queue.poll();
        }
    }
}
