export { CspSolver } from './solver.js';
export { FlexibleBacktrackingSolver } from './backtracking.js';
export { MinConflictsSolver } from './minConflicts.js';
export type { MinConflictsOptions } from './minConflicts.js';
export { TreeCspSolver } from './tree.js';
export type { TreeCspOptions } from './tree.js';
export { mrv, deg, mrvDeg, lcv, degree, countLostValues } from './heuristics.js';
export { ForwardCheckingStrategy } from './inference/forwardChecking.js';
export { AC3Strategy } from './inference/ac3.js';
export { InferenceLog } from './inference/log.js';
export { StepCounter } from './stepCounter.js';
export type { StepCounts } from './stepCounter.js';
export { SolverRegistry, createSolverRegistry } from './registry.js';
export type { SolverEntry } from './registry.js';
export type {
    CspListener,
    SolverState,
    SolveStatus,
    SolveOutcome,
    SolverStrategy,
    VariableSelectionStrategy,
    ValueOrderingStrategy,
    InferenceStrategy,
} from './interface.js';
