import { SuccessPolicyName } from "../internals/config";
import { PtrguardContext } from "../internals/context";
import { Diagnostic, DiagnosticSink, Severity } from "../internals/diagnostics";
import { CompilationUnit } from "../internals/ir";

/**
 * Decides whether a pass run is successful.
 *
 * @param sink All the diagnostics recorded so far, including those recorded
 *        before the pass was executed.
 * @param produced Diagnostics recorded by the pass itself.
 */
export type SuccessPolicy = (
  sink: DiagnosticSink,
  produced: readonly Diagnostic[],
) => boolean;

export const SuccessPolicies: Record<SuccessPolicyName, SuccessPolicy> = {
  sink: (sink) => sink.containsOnlyWarnings(),
  pass: (_sink, produced) =>
    produced.every((d) => d.severity !== Severity.ERROR),
};

/**
 * Abstract base class for an analysis pass executed on compilation units.
 */
export abstract class AnalysisPass {
  constructor(protected readonly ctx: PtrguardContext) {}

  /**
   * Gets the short identifier of the pass, used in diagnostics.
   */
  abstract get id(): string;

  /**
   * Executes the pass, appending the found diagnostics to `sink`.
   *
   * @param cu The compilation unit to be analyzed.
   * @param sink Diagnostics shared with the other passes of the run.
   * @param policy Decides on the success of the run. Defaults to the policy
   *        selected in the configuration.
   * @returns Whether the run is successful according to `policy`.
   */
  public analyze(
    cu: CompilationUnit,
    sink: DiagnosticSink,
    policy: SuccessPolicy = SuccessPolicies[this.ctx.config.successPolicy],
  ): boolean {
    const produced = this.check(cu, sink);
    this.ctx.logger.debug(
      `${this.id}: ${produced.length} diagnostic(s) in ${cu.projectName}`,
    );
    return policy(sink, produced);
  }

  /**
   * Runs the analysis itself.
   * @returns Diagnostics recorded to `sink` by this call.
   */
  protected abstract check(
    cu: CompilationUnit,
    sink: DiagnosticSink,
  ): Diagnostic[];
}

/**
 * A mapping of pass names to functions that load pass instances.
 * This allows for lazy loading of passes.
 */
export const BuiltInPasses: Record<
  string,
  (ctx: PtrguardContext) => Promise<AnalysisPass>
> = {
  UninitializedStorageAccess: (ctx) =>
    import("./builtin/uninitializedStorageAccess").then(
      (module) => new module.UninitializedStorageAccess(ctx),
    ),
};

/**
 * Returns names of all the built-in passes.
 */
export function getAllPasses(): string[] {
  return Object.keys(BuiltInPasses);
}

/**
 * Asynchronously retrieves a built-in pass by its name.
 *
 * @returns A Promise that resolves to a pass instance or `undefined` if the
 *          pass cannot be found or fails to load.
 */
export async function findBuiltInPass(
  ctx: PtrguardContext,
  name: string,
): Promise<AnalysisPass | undefined> {
  const passLoader = BuiltInPasses[name];
  if (!passLoader) {
    ctx.logger.warn(`Built-in pass ${name} not found.`);
    return undefined;
  }
  try {
    return await passLoader(ctx);
  } catch (error) {
    ctx.logger.error(`Error loading built-in pass ${name}: ${error}`);
    return undefined;
  }
}
