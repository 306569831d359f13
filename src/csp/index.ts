export { Variable, createVariables } from './variable.js';
export { Domain } from './domain.js';
export {
    NotEqualConstraint,
    PredicateConstraint,
    AllDifferentConstraint,
    hasSupport,
} from './constraint.js';
export type { Constraint } from './constraint.js';
export { Assignment } from './assignment.js';
export { CSP } from './csp.js';
