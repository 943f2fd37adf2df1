export {
  runSolve,
  parseSolveArgs,
  parseDiscount,
  parseIterations,
  solveFlags,
  SOLVE_USAGE,
} from './solve.js';
export type {
  SolveFlags,
  SolveInput,
  SolveResponse,
  SolveErrorResponse,
  SolveResult,
  PolicyLine,
} from './solve.js';
