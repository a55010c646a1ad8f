import { WorklistOrder } from "../../internals/config";
import { Diagnostic, DiagnosticSink } from "../../internals/diagnostics";
import {
  AstVariableDeclaration,
  CfgNode,
  CompilationUnit,
  FunctionFlow,
  OccurrenceKind,
  VariableOccurrence,
  collectImplementedFunctions,
  compareOccurrences,
  isStorageLocated,
} from "../../internals/ir";
import {
  GrowingJoinSemilattice,
  SetJoinSemilattice,
} from "../../internals/lattice";
import { SolverResults, WorklistSolver } from "../../internals/solver";
import { Transfer } from "../../internals/transfer";
import { unreachable } from "../../internals/util";
import { AnalysisPass } from "../pass";

export const UNINITIALIZED_ACCESS_MESSAGE =
  "this variable is of storage-pointer type and is accessed without a prior assignment.";
export const DECLARED_HERE = "declared here";

/**
 * Facts known at a program point.
 */
export interface NodeInfo {
  /** Variables that are not assigned on at least one path reaching the point. */
  unassigned: Set<AstVariableDeclaration>;
  /** Accesses to storage pointers that happened while they were unassigned. */
  uninitializedAccesses: Set<VariableOccurrence>;
}

/**
 * Joins NodeInfo sets by union.
 */
export class NodeInfoLattice implements GrowingJoinSemilattice<NodeInfo> {
  private readonly variables = new SetJoinSemilattice<AstVariableDeclaration>();
  private readonly accesses = new SetJoinSemilattice<VariableOccurrence>();

  bottom(): NodeInfo {
    return {
      unassigned: this.variables.bottom(),
      uninitializedAccesses: this.accesses.bottom(),
    };
  }

  copy(a: NodeInfo): NodeInfo {
    return {
      unassigned: this.variables.copy(a.unassigned),
      uninitializedAccesses: this.accesses.copy(a.uninitializedAccesses),
    };
  }

  join(a: NodeInfo, b: NodeInfo): NodeInfo {
    return {
      unassigned: this.variables.join(a.unassigned, b.unassigned),
      uninitializedAccesses: this.accesses.join(
        a.uninitializedAccesses,
        b.uninitializedAccesses,
      ),
    };
  }

  joinInto(target: NodeInfo, source: NodeInfo): boolean {
    const variablesGrew = this.variables.joinInto(
      target.unassigned,
      source.unassigned,
    );
    const accessesGrew = this.accesses.joinInto(
      target.uninitializedAccesses,
      source.uninitializedAccesses,
    );
    return variablesGrew || accessesGrew;
  }

  leq(a: NodeInfo, b: NodeInfo): boolean {
    return (
      this.variables.leq(a.unassigned, b.unassigned) &&
      this.accesses.leq(a.uninitializedAccesses, b.uninitializedAccesses)
    );
  }
}

/**
 * Applies the occurrences of a node in source order.
 */
export class UninitializedAccessTransfer implements Transfer<NodeInfo> {
  public transfer(inState: NodeInfo, node: CfgNode): NodeInfo {
    node.occurrences.forEach((occurrence) => {
      const decl = occurrence.declaration;
      switch (occurrence.kind) {
        case OccurrenceKind.Declaration:
          inState.unassigned.add(decl);
          break;
        case OccurrenceKind.Assignment:
          inState.unassigned.delete(decl);
          break;
        case OccurrenceKind.InlineReference:
          // Inline code may write to the variable
          inState.unassigned.delete(decl);
          break;
        case OccurrenceKind.Access:
          // Reported only if it reaches the exit
          if (inState.unassigned.has(decl) && isStorageLocated(decl)) {
            inState.uninitializedAccesses.add(occurrence);
          }
          break;
        default:
          unreachable(occurrence.kind);
      }
    });
    return inState;
  }
}

/**
 * Result of analyzing a single function.
 */
export type FunctionAnalysis = {
  /** Accesses that reach the exit of the function, in reporting order. */
  accesses: VariableOccurrence[];
  results: SolverResults<NodeInfo>;
};

/**
 * Finds accesses to storage pointers which are unassigned on some path from
 * the entry to the exit of the function.
 */
export function findUninitializedAccesses(
  flow: FunctionFlow,
  order: WorklistOrder = "lifo",
): FunctionAnalysis {
  const solver = new WorklistSolver<NodeInfo>(
    flow,
    new UninitializedAccessTransfer(),
    new NodeInfoLattice(),
    order,
  );
  const results = solver.solve();
  const exitInfo = results.getOutState(flow.exit);
  return {
    accesses: [...exitInfo.uninitializedAccesses].sort(compareOccurrences),
    results,
  };
}

/**
 * UninitializedStorageAccess Pass
 *
 * Reports local storage pointers that may be accessed before they are
 * assigned.
 *
 * ## Why is it bad?
 * An uninitialized storage pointer refers to the slot zero of the contract
 * storage. Writing through it overwrites unrelated state variables, and
 * reading through it returns their values.
 *
 * The analysis is path-insensitive: an access is reported if there is a path
 * in the CFG from the entry to the exit of the function that does not assign
 * the variable before the access, even if the path can never be executed.
 *
 * ## Example
 * ```solidity
 * function f(bool c) internal {
 *   S storage s;
 *   if (c) { s = items[0]; }
 *   s.value = 1; // Bad: `s` is unassigned when `c` is false
 * }
 * ```
 *
 * Use instead:
 * ```solidity
 * function f(bool c) internal {
 *   S storage s = c ? items[0] : items[1];
 *   s.value = 1;
 * }
 * ```
 */
export class UninitializedStorageAccess extends AnalysisPass {
  get id(): string {
    return "UninitializedStorageAccess";
  }

  protected check(cu: CompilationUnit, sink: DiagnosticSink): Diagnostic[] {
    return collectImplementedFunctions(cu.sources).reduce<Diagnostic[]>(
      (acc, fn) => {
        const flow = cu.cfg.functionFlow(fn);
        const diagnostics = this.ctx.logger.withContext(fn.name, () =>
          this.checkFunction(flow, sink),
        );
        acc.push(...diagnostics);
        return acc;
      },
      [],
    );
  }

  private checkFunction(
    flow: FunctionFlow,
    sink: DiagnosticSink,
  ): Diagnostic[] {
    const { accesses, results } = findUninitializedAccesses(
      flow,
      this.ctx.config.worklistOrder,
    );
    this.ctx.logger.debug(
      `${flow.nodes.length} nodes, ${flow.countOccurrences()} occurrences: fixpoint after ${results.iterations} iterations, ${results.growthEvents} growth events; ${accesses.length} uninitialized access(es)`,
    );
    return accesses.map((occurrence) =>
      sink.error(
        this.id,
        occurrence.location(),
        [{ message: DECLARED_HERE, location: occurrence.declaration.loc }],
        UNINITIALIZED_ACCESS_MESSAGE,
      ),
    );
  }
}
