import { AstFunctionDefinition, AstSourceUnit } from "./ast";
import { unreachable } from "../util";

/**
 * Collects functions with bodies in their declaration order: free functions
 * and contract methods. Function bodies are not entered.
 */
export function collectImplementedFunctions(
  sources: readonly AstSourceUnit[],
): AstFunctionDefinition[] {
  const result: AstFunctionDefinition[] = [];
  const addIfImplemented = (fn: AstFunctionDefinition) => {
    if (fn.implemented) result.push(fn);
  };
  sources.forEach((unit) =>
    unit.nodes.forEach((node) => {
      switch (node.kind) {
        case "function_def":
          addIfImplemented(node);
          break;
        case "contract_def":
          node.members.forEach((member) => {
            switch (member.kind) {
              case "function_def":
                addIfImplemented(member);
                break;
              case "state_variable":
              case "struct_def":
              case "event_def":
                break;
              default:
                unreachable(member);
            }
          });
          break;
        case "struct_def":
        case "import":
        case "pragma":
          break;
        default:
          unreachable(node);
      }
    }),
  );
  return result;
}
