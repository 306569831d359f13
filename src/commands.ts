/**
 * cspsolve commands
 *
 * Argument parsing and command dispatch. Returns exit codes instead of
 * exiting: 0 solved, 1 not solved, 2 usage or problem error.
 */
import chalk from 'chalk';
import type { CSP } from './csp/csp.js';
import { createSolverRegistry } from './solvers/registry.js';
import { createDemoProblem, DEMO_PROBLEMS } from './problems/mapColoring.js';
import { loadProblemFile } from './problems/loader.js';
import { createInvalidConfigError } from './types/errors.js';
import { DEFAULTS, optionsFromEnv, parseInteger, type CliOptions } from './types/options.js';
import { describeError, describeOutcome, describeStep } from './utils/formatting.js';

export const VERSION = '1.0.0';
export const HELP = `
CSP Solver CLI v${VERSION}

Usage:
  cspsolve solve <problem.json>   Solve a problem file
  cspsolve demo <name>            Solve a built-in problem (${DEMO_PROBLEMS.join(', ')})
  cspsolve solvers                List solver configurations

Options:
  --solver=<name>     Solver configuration (default: backtracking, env CSP_SOLVER)
  --max-steps=<n>     Step budget for min-conflicts (default: 50, env CSP_MAX_STEPS)
  --seed=<n>          Seed for randomised solvers (env CSP_SEED)
  --trace             Print every progress step
  --help, -h          Show this help
  --version, -v       Show version

Examples:
  cspsolve demo australia --solver=backtracking-all --trace
  cspsolve solve examples/tree.json --solver=tree
`;

const registry = createSolverRegistry();

export interface ParsedArgs {
    options: CliOptions;
    positional: string[];
}

/**
 * Parse flags over the environment defaults. Throws INVALID_CONFIG for a
 * flag without a value or a non-integer number.
 */
export function parseArgs(args: string[], env: NodeJS.ProcessEnv = process.env): ParsedArgs {
    const options = optionsFromEnv(env);
    const positional: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        const [flag, inline] = arg.split('=', 2);
        const value = (): string => {
            const raw = inline ?? args[i + 1];
            if (raw === undefined || raw === '' || (inline === undefined && raw.startsWith('--'))) {
                throw createInvalidConfigError(`Missing value for ${flag}`, { flag });
            }
            if (inline === undefined) i++;
            return raw;
        };
        const integer = (): number => {
            const raw = value();
            const parsed = parseInteger(raw);
            if (parsed === undefined) {
                throw createInvalidConfigError(`${flag} expects an integer, got '${raw}'`, { flag, value: raw });
            }
            return parsed;
        };

        switch (flag) {
            case '--solver':
                options.solver = value();
                break;
            case '--max-steps':
                options.maxSteps = integer();
                break;
            case '--seed':
                options.seed = integer();
                break;
            case '--trace':
                options.trace = true;
                break;
            default:
                if (!arg.startsWith('-')) positional.push(arg);
        }
    }
    return { options, positional };
}

/**
 * Solve one problem with the configured solver and print the outcome.
 */
export function runSolver<VAL>(csp: CSP<VAL>, options: CliOptions): number {
    const name = options.solver ?? DEFAULTS.solver;
    try {
        const solver = registry.createSolver<VAL>(name, options);
        console.log(chalk.dim(`Solver: ${name}`));

        if (options.trace) {
            let step = 0;
            solver.addCspListener((state, variable, assignment) => {
                step++;
                console.log(chalk.gray(describeStep(step, state, variable, assignment)));
            });
        }

        const outcome = solver.run(csp);
        const [headline, ...rest] = describeOutcome(outcome);
        console.log(outcome.status === 'solved' ? chalk.green(`✓ ${headline}`) : chalk.yellow(`✗ ${headline}`));
        rest.forEach(line => console.log(chalk.dim(line)));
        return outcome.status === 'solved' ? 0 : 1;
    } catch (e) {
        console.error(chalk.red(`Error: ${describeError(e)}`));
        return 2;
    }
}

export function main(args: string[], env: NodeJS.ProcessEnv = process.env): number {
    if (args.includes('--version') || args.includes('-v')) {
        console.log(VERSION);
        return 0;
    }

    let parsed: ParsedArgs;
    try {
        parsed = parseArgs(args, env);
    } catch (e) {
        console.error(chalk.red(`Error: ${describeError(e)}`));
        return 2;
    }
    const { options, positional } = parsed;
    const [command, target] = positional;

    if (args.includes('--help') || args.includes('-h') || !command) {
        console.log(HELP);
        return 0;
    }

    if (options.solver && !registry.has(options.solver)) {
        console.error(`Error: Invalid solver '${options.solver}'. Valid options are: ${registry.getNames().join(', ')}`);
        return 2;
    }

    switch (command) {
        case 'solvers':
            for (const [name, entry] of registry.getEntries()) {
                console.log(`${chalk.bold(name.padEnd(22))}${entry.description}`);
            }
            return 0;
        case 'demo': {
            const problem = DEMO_PROBLEMS.find(p => p === target);
            if (!problem) {
                console.error(`Error: demo name required, one of: ${DEMO_PROBLEMS.join(', ')}`);
                return 2;
            }
            return runSolver(createDemoProblem(problem), options);
        }
        case 'solve': {
            if (!target) {
                console.error('Error: problem file argument required');
                return 2;
            }
            try {
                return runSolver(loadProblemFile(target), options);
            } catch (e) {
                console.error(chalk.red(`Error: ${describeError(e)}`));
                return 2;
            }
        }
        default:
            console.error(`Unknown command: ${command}`);
            console.log(HELP);
            return 2;
    }
}
