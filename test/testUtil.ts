import { PtrguardContext } from "../src/internals/context";
import {
  AstFunctionDefinition,
  AstSite,
  AstTopLevelDeclaration,
  AstVariableDeclaration,
  Cfg,
  CompilationUnit,
  DataLocation,
  FunctionFlow,
  ProjectName,
  SourceLocation,
} from "../src/internals/ir";
import { CLIOptions } from "../src/cli";
import * as path from "path";

export const PROGRAMS_DIR = path.resolve(__dirname, "programs");
export const TEST_FILE = "Test.sol";

export function loc(start: number, end: number = start + 1): SourceLocation {
  return { file: TEST_FILE, start, end };
}

export function variable(
  id: number,
  name: string,
  storage: DataLocation = "storage",
  start: number = id,
): AstVariableDeclaration {
  return { kind: "variable_decl", id, name, storage, loc: loc(start) };
}

export function site(id: number, start: number): AstSite {
  return { id, loc: loc(start) };
}

export function functionDef(
  id: number,
  name: string,
  implemented: boolean = true,
): AstFunctionDefinition {
  return { kind: "function_def", id, name, implemented, loc: loc(id) };
}

/**
 * Creates a context that prints nothing.
 */
export function quietContext(
  options: Partial<CLIOptions> = {},
): PtrguardContext {
  return new PtrguardContext({ quiet: true, ...options });
}

/**
 * Puts the given functions into a single contract of a single source unit.
 */
export function compilationUnit(
  flows: FunctionFlow[],
  extraMembers: AstTopLevelDeclaration[] = [],
): CompilationUnit {
  const cfg = new Cfg();
  const functions = flows.map((flow) => {
    cfg.addFunctionFlow(flow);
    return functionDef(flow.functionId, flow.name);
  });
  return new CompilationUnit("test" as ProjectName, [
    {
      kind: "source_unit",
      path: TEST_FILE,
      content: undefined,
      nodes: [
        ...extraMembers,
        {
          kind: "contract_def",
          id: 0,
          name: "C",
          members: functions,
          loc: loc(0, 1000),
        },
      ],
    },
  ], cfg);
}
