import { AstSourceUnit } from "./ast";
import { Cfg } from "./cfg";

export type ProjectName = string & { readonly __brand: unique symbol };

/**
 * The input of the analysis: source units of a project together with the CFGs
 * built for their functions.
 */
export class CompilationUnit {
  private contents: Map<string, string>;

  /**
   * @param projectName The name of the project this Compilation Unit belongs to.
   * @param sources Source units in the order they were given to the compiler.
   * @param cfg CFGs of the implemented functions found in `sources`.
   */
  constructor(
    public readonly projectName: ProjectName,
    public readonly sources: readonly AstSourceUnit[],
    public readonly cfg: Cfg,
  ) {
    this.contents = sources.reduce((acc, unit) => {
      if (unit.content !== undefined) acc.set(unit.path, unit.content);
      return acc;
    }, new Map<string, string>());
  }

  /**
   * Returns the texts of all the source files with known contents.
   */
  public getSourceContents(): ReadonlyMap<string, string> {
    return this.contents;
  }
}
