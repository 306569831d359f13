import type { Variable } from './variable.js';
import type { Constraint } from './constraint.js';
import type { CSP } from './csp.js';

/**
 * Partial or total mapping from variables to values. Insertion order is kept
 * so traces list assignments in the order they were made.
 */
export class Assignment<VAL> {
    private readonly values = new Map<Variable, { value: VAL }>();

    getVariables(): Variable[] {
        return Array.from(this.values.keys());
    }

    getValue(variable: Variable): VAL | undefined {
        return this.values.get(variable)?.value;
    }

    /**
     * Values of the given variables in order, or undefined if any is unassigned.
     */
    valuesOf(variables: readonly Variable[]): VAL[] | undefined {
        const result: VAL[] = [];
        for (const variable of variables) {
            const entry = this.values.get(variable);
            if (!entry) return undefined;
            result.push(entry.value);
        }
        return result;
    }

    /**
     * Assign a value. Reassigning keeps the variable's original position.
     */
    add(variable: Variable, value: VAL): this {
        this.values.set(variable, { value });
        return this;
    }

    remove(variable: Variable): boolean {
        return this.values.delete(variable);
    }

    contains(variable: Variable): boolean {
        return this.values.has(variable);
    }

    get size(): number {
        return this.values.size;
    }

    /**
     * True if no constraint in the list is violated. Constraints with
     * unassigned scope variables count as satisfied.
     */
    isConsistent(constraints: readonly Constraint<VAL>[]): boolean {
        return constraints.every(c => c.isSatisfiedWith(this));
    }

    isComplete(variables: readonly Variable[]): boolean {
        return variables.every(v => this.values.has(v));
    }

    isSolution(csp: CSP<VAL>): boolean {
        return this.isComplete(csp.getVariables()) && this.isConsistent(csp.getConstraints());
    }

    /**
     * Number of violated constraints in the list.
     */
    getConflictCount(constraints: readonly Constraint<VAL>[]): number {
        let count = 0;
        for (const constraint of constraints) {
            if (!constraint.isSatisfiedWith(this)) count++;
        }
        return count;
    }

    clone(): Assignment<VAL> {
        const copy = new Assignment<VAL>();
        for (const [variable, entry] of this.values) {
            copy.add(variable, entry.value);
        }
        return copy;
    }

    /**
     * Plain object keyed by variable name.
     */
    toRecord(): Record<string, VAL> {
        const record: Record<string, VAL> = {};
        for (const [variable, entry] of this.values) {
            record[variable.name] = entry.value;
        }
        return record;
    }

    toString(): string {
        const parts = Array.from(this.values, ([variable, entry]) => `${variable.name}=${String(entry.value)}`);
        return `{${parts.join(', ')}}`;
    }
}
