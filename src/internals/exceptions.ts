import { PTRGUARD_VERSION } from "../version";
import { SourceLocation } from "./ir/ast";
import JSONbig from "json-bigint";
import { ZodError } from "zod";

const SEPARATOR =
  "============================================================";

/**
 * Stringifies the input, returning a placeholder if it cannot be serialized.
 */
function stringifyNode(input: unknown): string {
  try {
    return JSONbig.stringify(input, null, 2);
  } catch (jsonError) {
    return `[Unable to stringify object: ${jsonError}]`;
  }
}

/**
 * Internal error, typically caused by a bug in ptrguard or incorrect API usage.
 */
export class InternalException {
  private constructor() {}
  static make(
    msg: string,
    {
      loc = undefined,
      node = undefined,
    }: Partial<{
      loc: SourceLocation;
      node: unknown;
    }> = {},
  ): Error {
    const locStr = makeLocationString(loc);
    const errorKind = `Internal ptrguard Error${locStr}:`;
    return new Error(
      [
        errorKind,
        msg,
        ...(node === undefined ? [] : [`${SEPARATOR}\n${stringifyNode(node)}`]),
        SEPARATOR,
        getCurrentStackTrace(),
        SEPARATOR,
        getVersions(),
      ].join("\n"),
    );
  }
}

/**
 * An error caused by incorrect actions of the user, such as wrong configuration,
 * malformed program files, wrong CLI options.
 */
export class ExecutionException {
  private constructor() {}
  static make(
    msg: string,
    {
      loc = undefined,
    }: Partial<{
      loc: SourceLocation;
    }> = {},
  ): Error {
    const locStr = makeLocationString(loc);
    const errorKind = `Execution Error${locStr}:`;
    const shortMsg = [errorKind, msg].join("\n");
    return new Error(shortMsg);
  }
}

function makeLocationString(loc: SourceLocation | undefined): string {
  if (loc === undefined) {
    return "";
  }
  return loc.file === undefined
    ? ` at offset ${loc.start}`
    : ` at ${loc.file}:${loc.start}`;
}

/**
 * Returns backtrace of the JS script upon execution.
 */
function getCurrentStackTrace(): string {
  const stack = new Error().stack;
  return stack === undefined
    ? "No stack trace available"
    : `ptrguard Backtrace: ${stack}`;
}

function getVersions(): string {
  return `Using ptrguard ${PTRGUARD_VERSION}`;
}

/**
 * Throws an ExecutionException with a human-readable ZodError message.
 * @param err The ZodError to throw.
 */
export function throwZodError(
  err: unknown,
  {
    msg = undefined,
    help = undefined,
  }: Partial<{ msg: string; help: string }> = {},
): never {
  if (err instanceof ZodError) {
    const formattedErrors = err.errors
      .map((e) => {
        const path = e.path.length ? e.path.join(" > ") : "root";
        return `- ${e.message} at ${path}`;
      })
      .join("\n");
    throw ExecutionException.make(
      `${msg ? msg + "\n" : ""}${formattedErrors}${help ? "\n\n" + help : ""}`,
    );
  } else {
    throw err;
  }
}
