import { CfgNode } from "./ir/cfg";

/**
 * Represents an interface for dataflow transfer functions.
 */
export interface Transfer<State> {
  /**
   * Transforms the input state based on the occurrences of a CFG node.
   *
   * @param inState The dataflow state prior to the execution of `node`. The
   *        solver passes a copy, so it can be updated in place and returned.
   * @param node The CFG node being analyzed.
   * @returns The dataflow state after the execution of `node`.
   */
  transfer(inState: State, node: CfgNode): State;
}
