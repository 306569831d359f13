import type { Variable } from '../../csp/variable.js';
import type { Domain } from '../../csp/domain.js';
import type { CSP } from '../../csp/csp.js';

/**
 * Records the domains an inference step changed so it can be undone.
 * Only the first snapshot per variable is kept, so undo restores the
 * exact domain (values and order) from before the step.
 */
export class InferenceLog<VAL> {
    private readonly saved = new Map<Variable, Domain<VAL>>();
    private emptyDomainFound = false;

    /**
     * Call before the first change to a variable's domain.
     */
    storeDomainFor(variable: Variable, domain: Domain<VAL>): void {
        if (!this.saved.has(variable)) {
            this.saved.set(variable, domain.copy());
        }
    }

    setEmptyDomainFound(): void {
        this.emptyDomainFound = true;
    }

    inconsistencyFound(): boolean {
        return this.emptyDomainFound;
    }

    isEmpty(): boolean {
        return this.saved.size === 0 && !this.emptyDomainFound;
    }

    getChangedVariables(): Variable[] {
        return [...this.saved.keys()];
    }

    /**
     * Merge another log into this one. Snapshots already held win, since
     * they are older.
     */
    merge(other: InferenceLog<VAL>): this {
        for (const [variable, domain] of other.saved) {
            if (!this.saved.has(variable)) this.saved.set(variable, domain);
        }
        if (other.emptyDomainFound) this.emptyDomainFound = true;
        return this;
    }

    undo(csp: CSP<VAL>): void {
        for (const [variable, domain] of this.saved) {
            csp.setDomain(variable, domain.copy());
        }
    }
}
