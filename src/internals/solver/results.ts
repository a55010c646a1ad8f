import { CfgNodeIdx } from "../ir/cfg";
import { JoinSemilattice } from "../lattice";

/**
 * Results of solving a forward dataflow problem over a single function.
 * @template State The type representing the state in the dataflow analysis.
 */
export class SolverResults<State> {
  /** Facts merged from all the predecessors of a node. */
  private inStates: Map<CfgNodeIdx, State> = new Map();
  /** Facts after applying the transfer function of a node. */
  private outStates: Map<CfgNodeIdx, State> = new Map();

  /** Number of nodes taken from the worklist. */
  public iterations: number = 0;
  /** Number of merges that extended the incoming facts of a node. */
  public growthEvents: number = 0;

  constructor(private readonly lattice: JoinSemilattice<State>) {}

  /**
   * Returns the incoming facts of the node, creating empty ones if the node
   * has not been reached yet.
   */
  public inState(idx: CfgNodeIdx): State {
    const state = this.inStates.get(idx);
    if (state !== undefined) return state;
    const bottom = this.lattice.bottom();
    this.inStates.set(idx, bottom);
    return bottom;
  }

  public setOutState(idx: CfgNodeIdx, state: State): void {
    this.outStates.set(idx, state);
  }

  /**
   * Returns the facts after the node. A node that was never processed
   * contributes its incoming facts, which are empty if it is unreachable.
   */
  public getOutState(idx: CfgNodeIdx): State {
    return (
      this.outStates.get(idx) ??
      this.inStates.get(idx) ??
      this.lattice.bottom()
    );
  }

  public isVisited(idx: CfgNodeIdx): boolean {
    return this.outStates.has(idx);
  }
}
