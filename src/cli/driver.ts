import { CLIOptions, cliOptionDefaults } from "./options";
import { Result } from "./result";
import { OutputFormat } from "./types";
import { PtrguardEnv } from "../internals/config";
import { PtrguardContext } from "../internals/context";
import { DiagnosticSink } from "../internals/diagnostics";
import { ExecutionException } from "../internals/exceptions";
import { CompilationUnit, ProgramLoader } from "../internals/ir";
import { AnalysisPass, findBuiltInPass, getAllPasses } from "../passes/pass";
import JSONbig from "json-bigint";

/**
 * Manages the initialization and execution of passes over compilation units.
 */
export class Driver {
  ctx: PtrguardContext;
  passes: AnalysisPass[] = [];
  /** Compilation units created from the program files given by the user. */
  cus: CompilationUnit[];
  outputFormat: OutputFormat;
  colorizeOutput: boolean;
  listPasses: boolean;
  /**
   * Diagnostics recorded during the run. It is shared by all the passes and
   * compilation units.
   */
  readonly sink: DiagnosticSink;

  private constructor(
    programPaths: string[],
    options: CLIOptions,
    sink: DiagnosticSink,
  ) {
    this.ctx = new PtrguardContext(options);
    this.sink = sink;
    this.outputFormat = options.outputFormat;
    this.colorizeOutput = options.colors;
    this.listPasses = options.listPasses;
    this.cus = [...new Set(programPaths)].map((programPath) =>
      ProgramLoader.fromFile(this.ctx, programPath),
    );
  }

  /**
   * Asynchronously creates a driver initializing all the passes.
   *
   * @param programPaths Paths to the program files.
   * @param sink Diagnostic sink to append to. It may already contain
   *        diagnostics recorded by the caller.
   */
  public static async create(
    programPaths: string[],
    options: Partial<CLIOptions> = {},
    sink: DiagnosticSink = new DiagnosticSink(),
  ): Promise<Driver> {
    const mergedOptions: CLIOptions = { ...cliOptionDefaults, ...options };
    this.checkCLIOptions(mergedOptions);
    const driver = new Driver(programPaths, mergedOptions, sink);
    await driver.initializePasses();
    return driver;
  }

  /**
   * Check CLI options for ambiguities.
   * @throws If ptrguard cannot be executed with the given options
   */
  private static checkCLIOptions(options: CLIOptions): void | never {
    if (options.verbose && options.quiet) {
      throw ExecutionException.make(
        `Please choose only one option: --verbose or --quiet`,
      );
    }
  }

  /**
   * Initializes the passes enabled in the configuration.
   * @throws If a pass cannot be found.
   */
  async initializePasses(): Promise<void> {
    this.passes = await Promise.all(
      this.ctx.config.passes.map(async (config) => {
        const pass = await findBuiltInPass(this.ctx, config.className);
        if (!pass) {
          throw ExecutionException.make(
            `Built-in pass ${config.className} not found`,
          );
        }
        return pass;
      }),
    );
    this.ctx.logger.debug(
      `Enabled passes (${this.passes.length}): ${this.passes.map((p) => p.id).join(", ")}`,
    );
  }

  /**
   * Returns the texts of all the known source files.
   */
  public getSourceContents(): Map<string, string> {
    return this.cus.reduce((acc, cu) => {
      cu.getSourceContents().forEach((content, file) =>
        acc.set(file, content),
      );
      return acc;
    }, new Map<string, string>());
  }

  /**
   * Actual implementation of the entry point.
   */
  private executeImpl(): Result {
    if (this.listPasses) {
      return { kind: "passes", passes: getAllPasses() };
    }
    if (this.passes.length === 0) {
      this.ctx.logger.warn(
        "Nothing to execute. Please specify at least one pass.",
      );
      return { kind: "ok" };
    }
    try {
      return this.executeAnalysis();
    } catch (err) {
      const result: string[] = [];
      if (err instanceof Error) {
        result.push(err.message);
        if (err.stack !== undefined && PtrguardEnv.PTRGUARD_TRACE) {
          result.push(err.stack);
        }
      } else {
        result.push(`An error occurred:\n${JSONbig.stringify(err)}`);
      }
      const error = result.join("\n");
      this.ctx.logger.error(error);
      return { kind: "error", error };
    }
  }

  /**
   * Wraps the entry point of execution with extra logging handling logic.
   */
  public async execute(): Promise<Result> {
    const result = this.executeImpl();
    if (this.outputFormat === "json") {
      return {
        ...result,
        logs: this.ctx.logger.getJsonLogs(),
      };
    }
    return result;
  }

  /**
   * Executes the passes on the compilation units in the order they were given.
   */
  private executeAnalysis(): Result {
    const recordedBefore = this.sink.size;
    const success = this.cus.reduce(
      (acc, cu) =>
        this.passes.reduce(
          (passAcc, pass) => pass.analyze(cu, this.sink) && passAcc,
          acc,
        ),
      true,
    );
    const diagnostics = this.sink.getDiagnostics().slice(recordedBefore);
    return diagnostics.length === 0 && success
      ? { kind: "ok" }
      : { kind: "diagnostics", diagnostics, success };
  }
}
