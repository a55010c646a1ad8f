import { OutputFormat } from "./types";
import {
  SuccessPolicyName,
  SuccessPolicyNameSchema,
  WorklistOrder,
  WorklistOrderSchema,
} from "../internals/config";
import { throwZodError } from "../internals/exceptions";
import { Option } from "commander";
import { z } from "zod";

export interface CLIOptions {
  config: string | undefined;
  passes: string[] | undefined;
  listPasses: boolean;
  successPolicy: SuccessPolicyName | undefined;
  worklistOrder: WorklistOrder | undefined;
  outputFormat: OutputFormat;
  colors: boolean;
  verbose: boolean;
  quiet: boolean;
}

export const cliOptionDefaults: CLIOptions = {
  config: undefined,
  passes: undefined,
  listPasses: false,
  successPolicy: undefined,
  worklistOrder: undefined,
  outputFormat: "plain",
  colors: true,
  verbose: false,
  quiet: false,
};

const CLIOptionsSchema = z.object({
  config: z.string().optional(),
  passes: z.array(z.string()).optional(),
  listPasses: z.boolean().optional(),
  successPolicy: SuccessPolicyNameSchema.optional(),
  worklistOrder: WorklistOrderSchema.optional(),
  outputFormat: z.enum(["json", "plain"]).optional(),
  colors: z.boolean().optional(),
  verbose: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

/**
 * Validates options parsed by commander.
 */
export function parseCLIOptions(opts: unknown): Partial<CLIOptions> {
  try {
    return CLIOptionsSchema.parse(opts);
  } catch (err) {
    throwZodError(err, { msg: "Incorrect command-line options:" });
  }
}

export const cliOptions = [
  new Option("--config <PATH>", "Path to the ptrguard configuration file."),
  new Option(
    "--passes <names>",
    "A comma-separated list of passes to execute.",
  ).argParser((value) => {
    const passes = value
      .split(",")
      .map((pass) => pass.trim())
      .filter((pass) => pass !== "");
    if (passes.length === 0) {
      throw new Error(
        "The --passes option requires a non-empty list of pass names.",
      );
    }
    return passes;
  }),
  new Option("--list-passes", "List available built-in passes.").default(
    false,
  ),
  new Option(
    "--success-policy <policy>",
    "Diagnostics deciding on success: all the recorded ones or only those of the executed passes.",
  ).choices(SuccessPolicyNameSchema.options),
  new Option(
    "--worklist-order <order>",
    "Order of processing CFG nodes in the dataflow solver.",
  ).choices(WorklistOrderSchema.options),
  new Option("--output-format <format>", "Set the output format.")
    .choices(["json", "plain"])
    .default("plain"),
  new Option("--no-colors", "Disable colorized output."),
  new Option("--verbose", "Enable verbose output.").default(false),
  new Option("--quiet", "Suppress output.").default(false),
];
