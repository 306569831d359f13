/**
 * Flexible Backtracking Solver
 *
 * Chronological backtracking whose variable selection, value ordering and
 * inference are supplied by installed strategies. With nothing installed it
 * is plain backtracking in declaration order.
 */

import type { Variable } from '../csp/variable.js';
import { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import { CspSolver } from './solver.js';
import type {
    InferenceStrategy,
    SolveOutcome,
    SolverStrategy,
    ValueOrderingStrategy,
    VariableSelectionStrategy,
} from './interface.js';
import { deg, lcv, mrv } from './heuristics.js';
import { AC3Strategy } from './inference/ac3.js';
import { InferenceLog } from './inference/log.js';

const KIND_ORDER: Record<SolverStrategy<unknown>['kind'], number> = {
    'variable-selection': 0,
    'value-ordering': 1,
    'inference': 2,
};

export class FlexibleBacktrackingSolver<VAL> extends CspSolver<VAL> {
    private readonly strategies: SolverStrategy<VAL>[] = [];

    /**
     * Install strategies. Installing a strategy whose name is already present
     * does nothing; call order is irrelevant because strategies of each kind
     * run by rank.
     */
    set(...strategies: Array<SolverStrategy<VAL> | SolverStrategy<VAL>[]>): this {
        for (const strategy of strategies.flat()) {
            if (this.strategies.some(s => s.name === strategy.name)) continue;
            this.strategies.push(strategy);
        }
        this.strategies.sort((a, b) => KIND_ORDER[a.kind] - KIND_ORDER[b.kind] || a.rank - b.rank);
        return this;
    }

    /**
     * MRV with DEG tie-breaking, LCV and AC-3.
     */
    setAll(): this {
        return this.set(mrv<VAL>(), deg<VAL>(), lcv<VAL>(), new AC3Strategy<VAL>());
    }

    getStrategies(): readonly SolverStrategy<VAL>[] {
        return this.strategies;
    }

    protected search(csp: CSP<VAL>): Omit<SolveOutcome<VAL>, 'statistics'> {
        const log = new InferenceLog<VAL>();
        for (const strategy of this.inferenceStrategies()) {
            log.merge(strategy.apply(csp));
            if (log.inconsistencyFound()) break;
        }
        if (!log.isEmpty()) {
            this.fireStateChanged(csp, undefined, undefined);
            if (log.inconsistencyFound()) return { status: 'exhausted' };
        }

        const result = this.backtrack(csp, new Assignment<VAL>());
        return result ? { status: 'solved', assignment: result } : { status: 'exhausted' };
    }

    private backtrack(csp: CSP<VAL>, assignment: Assignment<VAL>): Assignment<VAL> | undefined {
        const variable = this.selectUnassignedVariable(csp, assignment);
        if (variable === undefined) {
            this.fireStateChanged(csp, undefined, assignment);
            return assignment;
        }

        for (const value of this.orderDomainValues(variable, csp, assignment)) {
            assignment.add(variable, value);
            this.fireStateChanged(csp, variable, assignment);
            if (assignment.isConsistent(csp.getConstraints(variable))) {
                const log = this.inference(csp, assignment, variable);
                if (!log.inconsistencyFound()) {
                    if (!log.isEmpty()) this.fireStateChanged(csp, undefined, undefined);
                    const result = this.backtrack(csp, assignment);
                    if (result) return result;
                }
                log.undo(csp);
            }
            assignment.remove(variable);
        }
        return undefined;
    }

    private selectUnassignedVariable(csp: CSP<VAL>, assignment: Assignment<VAL>): Variable | undefined {
        let candidates = csp.getVariables().filter(v => !assignment.contains(v));
        for (const strategy of this.variableSelectionStrategies()) {
            if (candidates.length <= 1) break;
            candidates = strategy.filter(candidates, csp, assignment);
        }
        return candidates[0];
    }

    private orderDomainValues(variable: Variable, csp: CSP<VAL>, assignment: Assignment<VAL>): VAL[] {
        let values = csp.getDomain(variable).toArray();
        for (const strategy of this.valueOrderingStrategies()) {
            values = strategy.order(variable, values, csp, assignment);
        }
        return values;
    }

    private inference(csp: CSP<VAL>, assignment: Assignment<VAL>, variable: Variable): InferenceLog<VAL> {
        const log = new InferenceLog<VAL>();
        for (const strategy of this.inferenceStrategies()) {
            log.merge(strategy.applyAfterAssignment(csp, assignment, variable));
            if (log.inconsistencyFound()) break;
        }
        return log;
    }

    private variableSelectionStrategies(): VariableSelectionStrategy<VAL>[] {
        return this.strategies.filter((s): s is VariableSelectionStrategy<VAL> => s.kind === 'variable-selection');
    }

    private valueOrderingStrategies(): ValueOrderingStrategy<VAL>[] {
        return this.strategies.filter((s): s is ValueOrderingStrategy<VAL> => s.kind === 'value-ordering');
    }

    private inferenceStrategies(): InferenceStrategy<VAL>[] {
        return this.strategies.filter((s): s is InferenceStrategy<VAL> => s.kind === 'inference');
    }
}
