import { createMalformedProblemError } from '../types/errors.js';

/**
 * Ordered set of candidate values for one variable.
 *
 * Values can be removed in place during search; restoring is done by putting
 * back a copy taken earlier (see InferenceLog), so order is preserved.
 */
export class Domain<VAL> implements Iterable<VAL> {
    private readonly values: VAL[];

    constructor(values: Iterable<VAL>) {
        this.values = [...values];
        if (new Set(this.values).size !== this.values.length) {
            throw createMalformedProblemError(
                `Domain contains duplicate values: [${this.values.join(', ')}]`,
                { values: this.values }
            );
        }
    }

    static of<VAL>(...values: VAL[]): Domain<VAL> {
        return new Domain(values);
    }

    get size(): number {
        return this.values.length;
    }

    isEmpty(): boolean {
        return this.values.length === 0;
    }

    contains(value: VAL): boolean {
        return this.values.includes(value);
    }

    get(index: number): VAL {
        return this.values[index];
    }

    /**
     * Remove a value. Returns false if it was not present.
     */
    remove(value: VAL): boolean {
        const index = this.values.indexOf(value);
        if (index < 0) return false;
        this.values.splice(index, 1);
        return true;
    }

    /**
     * Reduce the domain to the single given value (or to nothing if absent).
     * Returns true if the domain changed.
     */
    restrictTo(value: VAL): boolean {
        const before = this.values.length;
        const keep = this.values.includes(value);
        this.values.length = 0;
        if (keep) this.values.push(value);
        return this.values.length !== before;
    }

    toArray(): VAL[] {
        return [...this.values];
    }

    copy(): Domain<VAL> {
        return new Domain(this.values);
    }

    [Symbol.iterator](): Iterator<VAL> {
        return this.values[Symbol.iterator]();
    }

    toString(): string {
        return `{${this.values.join(', ')}}`;
    }
}
