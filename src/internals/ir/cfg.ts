/**
 * Contains definitions of the intraprocedural Control Flow Graph (CFG) the
 * analysis runs on.
 *
 * Nodes of a function are kept in an arena and refer to each other by their
 * indices in it, which allows cyclic graphs without cyclic ownership.
 *
 * @packageDocumentation
 */
import { AstFunctionDefinition, AstId } from "./ast";
import { VariableOccurrence } from "./occurrence";
import { InternalException } from "../exceptions";

export type CfgNodeIdx = number & { readonly __brand: unique symbol };

/**
 * A node of the CFG: a straight-line sequence of variable occurrences.
 *
 * @param idx Position of the node in the arena of its function.
 * @param occurrences Variable occurrences in source order.
 * @param exits Indices of the successor nodes.
 */
export class CfgNode {
  constructor(
    public readonly idx: CfgNodeIdx,
    public readonly occurrences: readonly VariableOccurrence[],
    public readonly exits: readonly CfgNodeIdx[],
  ) {}
}

/**
 * The CFG of a single function with a distinguished entry and exit node.
 */
export class FunctionFlow {
  /**
   * @param functionId AST identifier of the function.
   * @param name Name of the function shown in logs.
   * @param nodes Arena of nodes; a node's `idx` is its position in it.
   * @param entry Index of the entry node.
   * @param exit Index of the exit node.
   */
  constructor(
    public readonly functionId: AstId,
    public readonly name: string,
    public readonly nodes: readonly CfgNode[],
    public readonly entry: CfgNodeIdx,
    public readonly exit: CfgNodeIdx,
  ) {
    this.checkIndex(entry, "entry node");
    this.checkIndex(exit, "exit node");
    nodes.forEach((node, position) => {
      if (node.idx !== position) {
        throw InternalException.make(
          `Node #${node.idx} of ${name} is stored at position ${position}`,
        );
      }
      node.exits.forEach((dst) =>
        this.checkIndex(dst, `successor of node #${node.idx}`),
      );
    });
  }

  private checkIndex(idx: CfgNodeIdx, what: string): void {
    if (!Number.isInteger(idx) || idx < 0 || idx >= this.nodes.length) {
      throw InternalException.make(
        `Incorrect definition of the CFG of ${this.name}: ${what} #${idx} is out of bounds (${this.nodes.length} nodes)`,
      );
    }
  }

  /**
   * Retrieves a node by its index.
   * @returns The node if found, otherwise undefined.
   */
  public getNode(idx: CfgNodeIdx): CfgNode | undefined {
    return this.nodes[idx];
  }

  public getEntry(): CfgNode {
    return getNode(this, this.entry);
  }

  /**
   * Returns the successors of the given node.
   */
  public getSuccessors(node: CfgNode): CfgNode[] {
    return node.exits.map((idx) => getNode(this, idx));
  }

  /**
   * Returns the number of variable occurrences in all the nodes.
   */
  public countOccurrences(): number {
    return this.nodes.reduce((acc, node) => acc + node.occurrences.length, 0);
  }
}

/**
 * An utility function that extracts a node from the arena.
 */
export function getNode(flow: FunctionFlow, idx: CfgNodeIdx): CfgNode {
  const node = flow.getNode(idx);
  if (node === undefined) {
    throw InternalException.make(
      `Incorrect definition in the CFG of ${flow.name}: cannot find node #${idx}`,
    );
  }
  return node;
}

/**
 * CFGs of all the functions with bodies in a compilation unit.
 */
export class Cfg {
  private flows: Map<AstId, FunctionFlow> = new Map();

  public addFunctionFlow(flow: FunctionFlow): void {
    if (this.flows.has(flow.functionId)) {
      throw InternalException.make(
        `CFG of function #${flow.functionId} (${flow.name}) is already defined`,
      );
    }
    this.flows.set(flow.functionId, flow);
  }

  /**
   * Returns the CFG of an implemented function.
   */
  public functionFlow(fn: AstFunctionDefinition): FunctionFlow {
    const flow = this.flows.get(fn.id);
    if (flow === undefined) {
      throw InternalException.make(
        `Cannot find the CFG of function ${fn.name} (#${fn.id})`,
        { loc: fn.loc },
      );
    }
    return flow;
  }

  public get size(): number {
    return this.flows.size;
  }
}
