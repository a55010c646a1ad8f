import { ExitCode, OutputFormat } from "./types";
import { Diagnostic, formatDiagnostic } from "../internals/diagnostics";
import { unreachable } from "../internals/util";
import JSONbig from "json-bigint";

type LogMap = {
  logs?: Record<string, string[]>;
};

/**
 * Result of a run that did not record any diagnostics.
 */
export type ResultOK = LogMap & {
  kind: "ok";
};

/**
 * Result of a run that recorded diagnostics.
 */
export type ResultDiagnostics = LogMap & {
  kind: "diagnostics";
  diagnostics: Diagnostic[];
  /** Whether the program is accepted according to the success policy. */
  success: boolean;
};

/**
 * Result of a run that encountered an error.
 */
export type ResultError = LogMap & {
  kind: "error";
  /**
   * Error output when ptrguard cannot complete the requested operation.
   */
  error: string;
};

/**
 * Result of listing the available passes.
 */
export type ResultPasses = LogMap & {
  kind: "passes";
  passes: string[];
};

export type Result = ResultOK | ResultDiagnostics | ResultError | ResultPasses;

/**
 * Converts a Result object to a readable string based on its kind.
 *
 * @param contents Texts of the source files used to render positions.
 */
export function resultToString(
  result: Result,
  outputFormat: OutputFormat,
  colorizeOutput: boolean,
  contents: ReadonlyMap<string, string> = new Map(),
): string {
  if (outputFormat === "json") {
    return JSONbig.stringify(result, null, 2);
  }
  switch (result.kind) {
    case "ok":
      return "No errors found";
    case "error":
      return `ptrguard execution failed:\n${result.error}`;
    case "diagnostics":
      return result.diagnostics
        .map((diag) => formatDiagnostic(diag, contents, colorizeOutput))
        .join("\n\n");
    case "passes":
      return result.passes.map((name) => `- ${name}`).join("\n");
    default:
      unreachable(result);
  }
}

export function resultToExitCode(result: Result): ExitCode {
  switch (result.kind) {
    case "ok":
    case "passes":
      return ExitCode.SUCCESS;
    case "diagnostics":
      return result.success ? ExitCode.SUCCESS : ExitCode.FAILED;
    case "error":
      return ExitCode.EXECUTION_FAILURE;
    default:
      unreachable(result);
  }
}
