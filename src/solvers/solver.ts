import type { Variable } from '../csp/variable.js';
import type { Assignment } from '../csp/assignment.js';
import type { CSP } from '../csp/csp.js';
import type { CspListener, SolveOutcome, SolverState } from './interface.js';

/**
 * Thrown out of the search when a stop was requested; never leaves run().
 */
class StopRequested extends Error {
    constructor() {
        super('Stop requested');
        this.name = 'StopRequested';
    }
}

/**
 * Base class of all solvers: listener registration, lifecycle state and
 * cooperative cancellation.
 *
 * Subclasses implement search() and report progress through
 * fireStateChanged(). Solving is synchronous; listeners are called inline in
 * registration order.
 */
export abstract class CspSolver<VAL> {
    private readonly listeners: CspListener<VAL>[] = [];
    private state: SolverState = 'unstarted';
    private stopRequested = false;
    private steps = 0;

    addCspListener(listener: CspListener<VAL>): this {
        this.listeners.push(listener);
        return this;
    }

    removeCspListener(listener: CspListener<VAL>): boolean {
        const index = this.listeners.indexOf(listener);
        if (index < 0) return false;
        this.listeners.splice(index, 1);
        return true;
    }

    getState(): SolverState {
        return this.state;
    }

    /**
     * Ask a running solve to end after the current step. Typically called
     * from a listener.
     */
    requestStop(): void {
        this.stopRequested = true;
    }

    /**
     * Solve and return the solution, or undefined if none was found.
     */
    solve(csp: CSP<VAL>): Assignment<VAL> | undefined {
        return this.run(csp).assignment;
    }

    /**
     * Solve and report how the run ended.
     */
    run(csp: CSP<VAL>): SolveOutcome<VAL> {
        const startTime = Date.now();
        this.state = 'searching';
        this.stopRequested = false;
        this.steps = 0;

        try {
            const outcome = this.search(csp);
            this.state = outcome.status;
            return {
                ...outcome,
                statistics: { steps: this.steps, timeMs: Date.now() - startTime },
            };
        } catch (e) {
            if (e instanceof StopRequested) {
                this.state = 'cancelled';
                return {
                    status: 'cancelled',
                    statistics: { steps: this.steps, timeMs: Date.now() - startTime },
                };
            }
            this.state = 'invalid';
            throw e;
        }
    }

    protected abstract search(csp: CSP<VAL>): Omit<SolveOutcome<VAL>, 'statistics'>;

    /**
     * Notify listeners, then honour a pending stop request.
     */
    protected fireStateChanged(csp: CSP<VAL>, variable: Variable | undefined, assignment: Assignment<VAL> | undefined): void {
        this.steps++;
        for (const listener of [...this.listeners]) {
            listener(csp, variable, assignment);
        }
        if (this.stopRequested) {
            throw new StopRequested();
        }
    }
}
