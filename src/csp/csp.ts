import { Variable } from './variable.js';
import { Domain } from './domain.js';
import type { Constraint } from './constraint.js';
import { createMalformedProblemError } from '../types/errors.js';

/**
 * A constraint satisfaction problem: a fixed list of variables, a domain per
 * variable and a growing list of constraints.
 *
 * Solvers use the instance as scratch space while solving; see the solver
 * classes for what state they leave behind.
 */
export class CSP<VAL> {
    private readonly variables: Variable[];
    private readonly indexByVariable = new Map<Variable, number>();
    private domains: Domain<VAL>[];
    private readonly constraints: Constraint<VAL>[] = [];
    // variable index -> constraints whose scope contains it
    private readonly constraintIndex: Constraint<VAL>[][];

    constructor(variables: readonly Variable[], domain?: Iterable<VAL>) {
        this.variables = [...variables];
        this.variables.forEach((variable, i) => {
            if (this.indexByVariable.has(variable)) {
                throw createMalformedProblemError(`Variable ${variable.name} is declared twice`, { variable: variable.name });
            }
            this.indexByVariable.set(variable, i);
        });
        const initial = domain ? [...domain] : [];
        this.domains = this.variables.map(() => new Domain(initial));
        this.constraintIndex = this.variables.map(() => []);
    }

    getVariables(): readonly Variable[] {
        return this.variables;
    }

    getVariable(name: string): Variable | undefined {
        return this.variables.find(v => v.name === name);
    }

    indexOf(variable: Variable): number {
        return this.indexByVariable.get(variable) ?? -1;
    }

    contains(variable: Variable): boolean {
        return this.indexByVariable.has(variable);
    }

    getDomain(variable: Variable): Domain<VAL> {
        return this.domains[this.requireIndex(variable)];
    }

    setDomain(variable: Variable, domain: Domain<VAL>): void {
        this.domains[this.requireIndex(variable)] = domain;
    }

    /**
     * Returns true if the value was present.
     */
    removeValueFromDomain(variable: Variable, value: VAL): boolean {
        return this.getDomain(variable).remove(value);
    }

    addConstraint(constraint: Constraint<VAL>): void {
        if (constraint.scope.length === 0) {
            throw createMalformedProblemError(`Constraint ${constraint.toString()} has an empty scope`);
        }
        const indices = constraint.scope.map(variable => {
            const index = this.indexByVariable.get(variable);
            if (index === undefined) {
                throw createMalformedProblemError(
                    `Constraint ${constraint.toString()} references ${variable.name}, which is not part of the problem`,
                    { variable: variable.name }
                );
            }
            return index;
        });
        this.constraints.push(constraint);
        for (const index of new Set(indices)) {
            this.constraintIndex[index].push(constraint);
        }
    }

    /**
     * All constraints, or those whose scope includes the given variable.
     */
    getConstraints(variable?: Variable): readonly Constraint<VAL>[] {
        if (variable === undefined) return this.constraints;
        return this.constraintIndex[this.requireIndex(variable)];
    }

    /**
     * The other variable of a binary constraint, or undefined for other arities.
     */
    getNeighbor(variable: Variable, constraint: Constraint<VAL>): Variable | undefined {
        const scope = constraint.scope;
        if (scope.length !== 2) return undefined;
        if (scope[0] === variable) return scope[1];
        if (scope[1] === variable) return scope[0];
        return undefined;
    }

    /**
     * Distinct variables sharing at least one constraint with the given one.
     */
    getNeighbors(variable: Variable): Variable[] {
        const result = new Set<Variable>();
        for (const constraint of this.getConstraints(variable)) {
            for (const other of constraint.scope) {
                if (other !== variable) result.add(other);
            }
        }
        return [...result];
    }

    /**
     * Copy with fresh domain objects; variables and constraints are shared.
     */
    copyDomains(): CSP<VAL> {
        const copy = new CSP<VAL>(this.variables);
        copy.domains = this.domains.map(d => d.copy());
        for (const constraint of this.constraints) {
            copy.addConstraint(constraint);
        }
        return copy;
    }

    toString(): string {
        const lines = this.variables.map((v, i) => `${v.name}: ${this.domains[i].toString()}`);
        lines.push(...this.constraints.map(c => c.toString()));
        return lines.join('\n');
    }

    private requireIndex(variable: Variable): number {
        const index = this.indexByVariable.get(variable);
        if (index === undefined) {
            throw createMalformedProblemError(`Variable ${variable.name} is not part of the problem`, { variable: variable.name });
        }
        return index;
    }
}
