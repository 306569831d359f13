/**
 * Formatting utilities for progress events and results
 */
import type { Variable } from '../csp/variable.js';
import type { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import type { SolveOutcome } from '../solvers/interface.js';
import { CspException } from '../types/errors.js';

/**
 * Status line for one progress event, e.g. "Step 3: Assignment changed: SA=BLUE".
 */
export function describeStep<VAL>(
    step: number,
    csp: CSP<VAL>,
    variable: Variable | undefined,
    assignment: Assignment<VAL> | undefined
): string {
    let text: string;
    if (assignment) {
        text = variable
            ? `Assignment changed: ${variable.name}=${String(assignment.getValue(variable))}`
            : `Assignment changed: ${assignment.toString()}`;
        if (assignment.isSolution(csp)) text += ' (Solution)';
    } else {
        text = 'Domain reduced' + (variable ? ` at ${variable.name}` : '');
    }
    return `Step ${step}: ${text}`;
}

/**
 * Lines describing how a run ended.
 */
export function describeOutcome<VAL>(outcome: SolveOutcome<VAL>): string[] {
    const lines: string[] = [];
    switch (outcome.status) {
        case 'solved':
            lines.push(`Solution: ${outcome.assignment?.toString() ?? '{}'}`);
            break;
        case 'exhausted':
            if (outcome.bestEffort) {
                lines.push(`No solution within the step budget (${outcome.conflicts ?? 0} conflicts remaining)`);
                lines.push(`Best effort: ${outcome.bestEffort.toString()}`);
            } else {
                lines.push('No solution exists');
            }
            break;
        case 'cancelled':
            lines.push('Search cancelled');
            break;
    }
    lines.push(`Steps: ${outcome.statistics.steps}, time: ${outcome.statistics.timeMs}ms`);
    return lines;
}

/**
 * One-line description of an error raised while solving.
 */
export function describeError(e: unknown): string {
    if (e instanceof CspException) {
        const suggestion = e.error.suggestion ? ` (${e.error.suggestion})` : '';
        return `${e.code}: ${e.message}${suggestion}`;
    }
    return e instanceof Error ? e.message : String(e);
}
