export {
    createAustraliaCsp,
    createTreeCsp,
    createDemoProblem,
    DEMO_PROBLEMS,
    MAP_COLORS,
    RED,
    GREEN,
    BLUE,
    WA,
    NT,
    SA,
    Q,
    NSW,
    V,
    T,
} from './mapColoring.js';
export type { MapColor, DemoProblem } from './mapColoring.js';
export { parseProblem, buildProblem, loadProblemFile, problemSchema } from './loader.js';
export type { ProblemDefinition, ProblemValue } from './loader.js';
