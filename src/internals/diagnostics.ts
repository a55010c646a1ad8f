import { SourceLocation } from "./ir/ast";
import { ansi, unreachable } from "./util";

/**
 * Enumerates the levels of severity of recorded diagnostics.
 */
export enum Severity {
  INFO = 1,
  WARNING,
  /** Hard errors that make the compilation fail. */
  ERROR,
}

/**
 * Returns string representation of `Severity` optionally wrapped in ANSI escape
 * sequences making it colorful for visual emphasis.
 */
export function severityToString(
  s: Severity,
  { colorize = false }: Partial<{ colorize: boolean }> = {},
): string {
  const severityString = (text: string, color: string): string =>
    colorize ? `${ansi.bold}${color}${text}${ansi.reset}` : text;
  switch (s) {
    case Severity.INFO:
      return severityString("Info", ansi.cyan);
    case Severity.WARNING:
      return severityString("Warning", ansi.yellow);
    case Severity.ERROR:
      return severityString("Error", ansi.red);
    default:
      unreachable(s);
  }
}

/**
 * An additional location explaining a diagnostic, e.g. the declaration of the
 * variable the diagnostic is about.
 */
export interface SecondaryLocation {
  readonly message: string;
  readonly location: SourceLocation;
}

/**
 * A finding recorded by an analysis pass.
 */
export type Diagnostic = {
  /** Unique identifier of the pass that produced the diagnostic. */
  readonly passId: string;
  readonly severity: Severity;
  readonly message: string;
  /** The place the diagnostic points to. */
  readonly location: SourceLocation;
  readonly secondaryLocations: readonly SecondaryLocation[];
};

/**
 * Append-only collection of diagnostics shared by the passes of a run.
 *
 * The sink is owned by the caller, which decides how diagnostics of several
 * passes are aggregated.
 */
export class DiagnosticSink {
  private diagnostics: Diagnostic[] = [];

  public record(diagnostic: Diagnostic): Diagnostic {
    this.diagnostics.push(diagnostic);
    return diagnostic;
  }

  /**
   * Records a hard error.
   */
  public error(
    passId: string,
    location: SourceLocation,
    secondaryLocations: readonly SecondaryLocation[],
    message: string,
  ): Diagnostic {
    return this.record({
      passId,
      severity: Severity.ERROR,
      message,
      location,
      secondaryLocations,
    });
  }

  public warning(
    passId: string,
    location: SourceLocation,
    secondaryLocations: readonly SecondaryLocation[],
    message: string,
  ): Diagnostic {
    return this.record({
      passId,
      severity: Severity.WARNING,
      message,
      location,
      secondaryLocations,
    });
  }

  public getDiagnostics(): readonly Diagnostic[] {
    return this.diagnostics;
  }

  /**
   * Returns true iff no hard errors were recorded.
   */
  public containsOnlyWarnings(): boolean {
    return this.diagnostics.every((d) => d.severity !== Severity.ERROR);
  }

  public get size(): number {
    return this.diagnostics.length;
  }
}

/**
 * Converts a character offset to 1-based line and column numbers.
 */
export function lineAndColumn(
  content: string,
  offset: number,
): { line: number; column: number } {
  const prefix = content.slice(0, Math.min(offset, content.length));
  const lines = prefix.split("\n");
  return { line: lines.length, column: lines[lines.length - 1].length + 1 };
}

/**
 * Returns the line of `content` containing `offset`.
 */
function lineAt(content: string, offset: number): string {
  const { line } = lineAndColumn(content, offset);
  return content.split("\n")[line - 1].trimEnd();
}

/**
 * Converts a location to the string shown to the user: `file:line:column` if
 * the source text is known, `file:start-end` otherwise.
 */
export function locationToString(
  loc: SourceLocation,
  contents: ReadonlyMap<string, string>,
): string {
  const file = loc.file ?? "<unknown>";
  const content = loc.file === undefined ? undefined : contents.get(loc.file);
  if (content === undefined) {
    return `${file}:${loc.start}-${loc.end}`;
  }
  const { line, column } = lineAndColumn(content, loc.start);
  return `${file}:${line}:${column}`;
}

/**
 * Formats the diagnostic to the human-readable multiline string.
 *
 * @param contents Texts of the source files used to render positions and code.
 * @param colorize Whether to use ANSI escape sequences.
 */
export function formatDiagnostic(
  diag: Diagnostic,
  contents: ReadonlyMap<string, string>,
  colorize: boolean = false,
): string {
  const content =
    diag.location.file === undefined
      ? undefined
      : contents.get(diag.location.file);
  const note = colorize ? `${ansi.bold}${ansi.cyan}Note${ansi.reset}` : "Note";
  return [
    `${locationToString(diag.location, contents)}: ${severityToString(diag.severity, { colorize })}: ${diag.message}`,
    ...(content === undefined
      ? []
      : [`    ${lineAt(content, diag.location.start)}`]),
    ...diag.secondaryLocations.map(
      (secondary) =>
        `${locationToString(secondary.location, contents)}: ${note}: ${secondary.message}`,
    ),
  ].join("\n");
}
