/**
 * Shared type definitions
 */

export {
    CspException,
    createMalformedProblemError,
    createNotATreeError,
    createInvalidConfigError,
    createUnknownSolverError,
    createProblemFileError,
    createEngineError,
    serializeCspError,
} from './errors.js';

export type {
    CspErrorCode,
    CspError,
} from './errors.js';

export {
    DEFAULTS,
    optionsFromEnv,
    parseInteger,
} from './options.js';

export type {
    SolverOptions,
    CliOptions,
} from './options.js';
