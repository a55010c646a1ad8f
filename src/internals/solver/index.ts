export { Solver } from "./solver";
export { SolverResults } from "./results";
export { WorklistSolver } from "./worklist";
