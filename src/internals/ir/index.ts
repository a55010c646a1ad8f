export * from "./ast";
export * from "./cfg";
export * from "./occurrence";
export { CompilationUnit, ProjectName } from "./ir";
export { collectImplementedFunctions } from "./iterators";
export { FunctionFlowBuilder } from "./builders/flowBuilder";
export { ProgramLoader, ProgramJson } from "./builders/programLoader";
