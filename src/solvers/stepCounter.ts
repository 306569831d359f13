import type { Variable } from '../csp/variable.js';
import type { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import type { CspListener } from './interface.js';

export interface StepCounts {
    assignmentChanges: number;
    domainChanges: number;
}

/**
 * Listener counting assignment events and domain-reduction events.
 */
export class StepCounter<VAL> {
    private assignmentChanges = 0;
    private domainChanges = 0;

    readonly listener: CspListener<VAL> = (
        _csp: CSP<VAL>,
        _variable: Variable | undefined,
        assignment: Assignment<VAL> | undefined
    ) => {
        if (assignment) this.assignmentChanges++;
        else this.domainChanges++;
    };

    reset(): void {
        this.assignmentChanges = 0;
        this.domainChanges = 0;
    }

    getResults(): StepCounts {
        return {
            assignmentChanges: this.assignmentChanges,
            domainChanges: this.domainChanges,
        };
    }
}
