/**
 * Problem files
 *
 * JSON description of a CSP:
 *
 *   {
 *     "variables": ["WA", "NT", "SA"],
 *     "defaultDomain": ["RED", "GREEN", "BLUE"],
 *     "domains": { "WA": ["RED"] },
 *     "constraints": [{ "type": "not-equal", "scope": ["WA", "NT"] }]
 *   }
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import { Variable } from '../csp/variable.js';
import { Domain } from '../csp/domain.js';
import { AllDifferentConstraint, NotEqualConstraint, type Constraint } from '../csp/constraint.js';
import { CSP } from '../csp/csp.js';
import { createMalformedProblemError, createProblemFileError } from '../types/errors.js';

export type ProblemValue = string | number;

const valueSchema = z.union([z.string(), z.number()]);

const constraintSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('not-equal'),
        scope: z.tuple([z.string(), z.string()]),
    }),
    z.object({
        type: z.literal('all-different'),
        scope: z.array(z.string()).min(1),
    }),
]);

export const problemSchema = z.object({
    variables: z.array(z.string().min(1)).min(1),
    defaultDomain: z.array(valueSchema).default([]),
    domains: z.record(z.string(), z.array(valueSchema)).default({}),
    constraints: z.array(constraintSchema).default([]),
});

export type ProblemDefinition = z.infer<typeof problemSchema>;

/**
 * Build a CSP from an already parsed JSON value.
 */
export function parseProblem(input: unknown, source?: string): CSP<ProblemValue> {
    const parsed = problemSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw createProblemFileError(`Invalid problem definition: ${issues.join('; ')}`, source, { issues });
    }
    return buildProblem(parsed.data);
}

export function buildProblem(definition: ProblemDefinition): CSP<ProblemValue> {
    const variables = definition.variables.map(name => new Variable(name));
    const byName = new Map<string, Variable>();
    for (const variable of variables) {
        if (byName.has(variable.name)) {
            throw createMalformedProblemError(`Variable ${variable.name} is declared twice`, { variable: variable.name });
        }
        byName.set(variable.name, variable);
    }

    const lookup = (name: string): Variable => {
        const variable = byName.get(name);
        if (!variable) {
            throw createMalformedProblemError(`Unknown variable '${name}'`, { variable: name });
        }
        return variable;
    };

    const csp = new CSP<ProblemValue>(variables, definition.defaultDomain);
    for (const [name, values] of Object.entries(definition.domains)) {
        csp.setDomain(lookup(name), new Domain(values));
    }
    for (const spec of definition.constraints) {
        csp.addConstraint(toConstraint(spec, lookup));
    }
    return csp;
}

function toConstraint(
    spec: ProblemDefinition['constraints'][number],
    lookup: (name: string) => Variable
): Constraint<ProblemValue> {
    switch (spec.type) {
        case 'not-equal':
            return new NotEqualConstraint(lookup(spec.scope[0]), lookup(spec.scope[1]));
        case 'all-different':
            return new AllDifferentConstraint(spec.scope.map(lookup));
    }
}

/**
 * Read and validate a problem file.
 */
export function loadProblemFile(path: string): CSP<ProblemValue> {
    let raw: unknown;
    try {
        raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (e) {
        throw createProblemFileError(`Cannot read problem file: ${e instanceof Error ? e.message : String(e)}`, path);
    }
    return parseProblem(raw, path);
}
