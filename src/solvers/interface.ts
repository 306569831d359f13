/**
 * Solver Interfaces
 *
 * Listener channel, outcomes and the strategy capabilities that can be
 * installed on the backtracking solver.
 */

import type { Variable } from '../csp/variable.js';
import type { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import type { InferenceLog } from './inference/log.js';

/**
 * Progress callback. `assignment` is undefined for domain-reduction events;
 * `variable` names the variable just (re)assigned, if any.
 *
 * Listeners run synchronously on the solver's call stack and receive live
 * objects: copy what must outlive the call.
 */
export type CspListener<VAL> = (
    csp: CSP<VAL>,
    variable: Variable | undefined,
    assignment: Assignment<VAL> | undefined
) => void;

/** 'invalid': the run ended with an error, e.g. a structural precondition */
export type SolverState = 'unstarted' | 'searching' | 'solved' | 'exhausted' | 'cancelled' | 'invalid';

export type SolveStatus = 'solved' | 'exhausted' | 'cancelled';

export interface SolveOutcome<VAL> {
    status: SolveStatus;
    /** Present iff status is 'solved' */
    assignment?: Assignment<VAL>;
    /** Best assignment reached by local search when not solved */
    bestEffort?: Assignment<VAL>;
    /** Violated constraints in bestEffort */
    conflicts?: number;
    statistics: {
        /** Events emitted */
        steps: number;
        timeMs: number;
    };
}

/**
 * Common shape of installable strategies. Strategies of one kind run in
 * ascending `rank`; `name` identifies a strategy for idempotent installation.
 */
interface StrategyBase {
    readonly name: string;
    readonly rank: number;
}

export interface VariableSelectionStrategy<VAL> extends StrategyBase {
    readonly kind: 'variable-selection';
    /** Narrow the unassigned candidates; must keep at least one if given any */
    filter(candidates: Variable[], csp: CSP<VAL>, assignment: Assignment<VAL>): Variable[];
}

export interface ValueOrderingStrategy<VAL> extends StrategyBase {
    readonly kind: 'value-ordering';
    order(variable: Variable, values: VAL[], csp: CSP<VAL>, assignment: Assignment<VAL>): VAL[];
}

export interface InferenceStrategy<VAL> extends StrategyBase {
    readonly kind: 'inference';
    /** Preprocessing before any assignment */
    apply(csp: CSP<VAL>): InferenceLog<VAL>;
    /** Propagate the value just assigned to `variable` */
    applyAfterAssignment(csp: CSP<VAL>, assignment: Assignment<VAL>, variable: Variable): InferenceLog<VAL>;
}

export type SolverStrategy<VAL> =
    | VariableSelectionStrategy<VAL>
    | ValueOrderingStrategy<VAL>
    | InferenceStrategy<VAL>;
