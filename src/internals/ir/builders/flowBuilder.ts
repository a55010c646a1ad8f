import { AstFunctionDefinition, AstSite, AstVariableDeclaration } from "../ast";
import { CfgNode, CfgNodeIdx, FunctionFlow } from "../cfg";
import { OccurrenceKind, VariableOccurrence } from "../occurrence";
import { InternalException } from "../../exceptions";

type PendingNode = {
  occurrences: VariableOccurrence[];
  exits: CfgNodeIdx[];
};

/**
 * Incrementally constructs the CFG of a single function.
 *
 * Occurrences added to a node keep the order of the calls.
 */
export class FunctionFlowBuilder {
  private nodes: PendingNode[] = [];

  constructor(private readonly fn: AstFunctionDefinition) {}

  /**
   * Adds an empty node and returns its index.
   */
  public node(): CfgNodeIdx {
    this.nodes.push({ occurrences: [], exits: [] });
    return (this.nodes.length - 1) as CfgNodeIdx;
  }

  /**
   * Adds a control-flow edge. Duplicate edges are ignored.
   */
  public edge(src: CfgNodeIdx, dst: CfgNodeIdx): this {
    const exits = this.pending(src).exits;
    if (!exits.includes(dst)) exits.push(dst);
    return this;
  }

  public declare(node: CfgNodeIdx, decl: AstVariableDeclaration): this {
    return this.occurrence(
      node,
      new VariableOccurrence(OccurrenceKind.Declaration, decl),
    );
  }

  public assign(
    node: CfgNodeIdx,
    decl: AstVariableDeclaration,
    site?: AstSite,
  ): this {
    return this.occurrence(
      node,
      new VariableOccurrence(OccurrenceKind.Assignment, decl, site),
    );
  }

  public inlineReference(
    node: CfgNodeIdx,
    decl: AstVariableDeclaration,
    site?: AstSite,
  ): this {
    return this.occurrence(
      node,
      new VariableOccurrence(OccurrenceKind.InlineReference, decl, site),
    );
  }

  public access(
    node: CfgNodeIdx,
    decl: AstVariableDeclaration,
    site?: AstSite,
  ): this {
    return this.occurrence(
      node,
      new VariableOccurrence(OccurrenceKind.Access, decl, site),
    );
  }

  public occurrence(node: CfgNodeIdx, occurrence: VariableOccurrence): this {
    this.pending(node).occurrences.push(occurrence);
    return this;
  }

  /**
   * Freezes the collected nodes into a FunctionFlow.
   */
  public build(entry: CfgNodeIdx, exit: CfgNodeIdx): FunctionFlow {
    return new FunctionFlow(
      this.fn.id,
      this.fn.name,
      this.nodes.map(
        (node, position) =>
          new CfgNode(position as CfgNodeIdx, [...node.occurrences], [
            ...node.exits,
          ]),
      ),
      entry,
      exit,
    );
  }

  private pending(idx: CfgNodeIdx): PendingNode {
    const node = this.nodes[idx];
    if (node === undefined) {
      throw InternalException.make(
        `Node #${idx} is not defined in the CFG of ${this.fn.name}`,
      );
    }
    return node;
  }
}
