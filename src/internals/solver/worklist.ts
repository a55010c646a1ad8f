import { SolverResults } from "./results";
import { Solver } from "./solver";
import { WorklistOrder } from "../config";
import { CfgNode, CfgNodeIdx, FunctionFlow } from "../ir/cfg";
import { GrowingJoinSemilattice } from "../lattice";
import { Transfer } from "../transfer";

/**
 * Pending CFG nodes. A node is kept at most once.
 */
class Worklist {
  private nodes: CfgNode[] = [];
  private queued: Set<CfgNodeIdx> = new Set();

  constructor(private readonly order: WorklistOrder) {}

  public push(node: CfgNode): void {
    if (this.queued.has(node.idx)) return;
    this.queued.add(node.idx);
    this.nodes.push(node);
  }

  public pop(): CfgNode | undefined {
    const node = this.order === "lifo" ? this.nodes.pop() : this.nodes.shift();
    if (node !== undefined) this.queued.delete(node.idx);
    return node;
  }
}

/**
 * Forward worklist solver that pushes facts from a node to its successors.
 *
 * Each processed node runs the transfer function over a copy of its incoming
 * facts and joins the result into the incoming facts of every successor. A
 * successor is (re)scheduled when its incoming facts grew or when it has not
 * been processed yet. Incoming facts only grow and are bounded by the
 * lattice height, so the iteration terminates on any graph, cyclic included.
 *
 * The worklist order affects the number of iterations but not the results.
 *
 * @template State The type representing the state in the analysis.
 */
export class WorklistSolver<State> implements Solver<State> {
  /**
   * @param flow The CFG of the analyzed function.
   * @param transfer An object that defines the transfer operation for a node and its state.
   * @param lattice A semilattice that reports whether an in-place join changed its target.
   * @param order Order of taking nodes from the worklist.
   */
  constructor(
    private readonly flow: FunctionFlow,
    private readonly transfer: Transfer<State>,
    private readonly lattice: GrowingJoinSemilattice<State>,
    private readonly order: WorklistOrder = "lifo",
  ) {}

  /**
   * Finds a fixpoint starting from the entry node of the function.
   */
  public solve(): SolverResults<State> {
    const results = new SolverResults<State>(this.lattice);
    const worklist = new Worklist(this.order);
    worklist.push(this.flow.getEntry());

    let node = worklist.pop();
    while (node !== undefined) {
      results.iterations++;
      const inState = this.lattice.copy(results.inState(node.idx));
      const outState = this.transfer.transfer(inState, node);
      results.setOutState(node.idx, outState);

      for (const successor of this.flow.getSuccessors(node)) {
        const grew = this.lattice.joinInto(
          results.inState(successor.idx),
          outState,
        );
        if (grew) results.growthEvents++;
        if (grew || !results.isVisited(successor.idx)) {
          worklist.push(successor);
        }
      }
      node = worklist.pop();
    }
    return results;
  }
}
