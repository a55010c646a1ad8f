import { ExecutionException } from "./exceptions";
import { PassConfig } from "../cli/types";
import { getAllPasses } from "../passes/pass";
import * as fs from "fs";
import { z } from "zod";

const PassConfigSchema = z.object({
  className: z.string(),
});

export const SuccessPolicyNameSchema = z.enum(["sink", "pass"]);
export const WorklistOrderSchema = z.enum(["lifo", "fifo"]);
const VerbositySchema = z.enum(["quiet", "debug", "default"]);

const ConfigSchema = z
  .object({
    passes: z.array(PassConfigSchema).optional(),
    successPolicy: SuccessPolicyNameSchema.optional().default("sink"),
    worklistOrder: WorklistOrderSchema.optional().default("lifo"),
    verbosity: VerbositySchema.optional().default("default"),
  })
  .strict();

/**
 * Decides which diagnostics gate the success of a run:
 * - `sink`: the whole diagnostic sink must contain only warnings, including
 *   diagnostics recorded before the pass was executed;
 * - `pass`: only the diagnostics produced by the pass itself are considered.
 */
export type SuccessPolicyName = z.infer<typeof SuccessPolicyNameSchema>;

/**
 * The order nodes are taken from the worklist: `lifo` processes the most
 * recently updated node first, `fifo` the least recently updated one.
 */
export type WorklistOrder = z.infer<typeof WorklistOrderSchema>;

export type Verbosity = z.infer<typeof VerbositySchema>;

/**
 * Represents content of the configuration file (ptrguard.config.json).
 */
export class PtrguardConfig {
  public passes: PassConfig[];
  public successPolicy: SuccessPolicyName;
  public worklistOrder: WorklistOrder;
  public verbosity: Verbosity;

  constructor({
    configPath = undefined,
    passes = undefined,
  }: Partial<{
    configPath: string;
    passes: string[];
  }> = {}) {
    let configData: unknown = {};
    if (configPath) {
      try {
        const configFileContents = fs.readFileSync(configPath, "utf8");
        configData = JSON.parse(configFileContents);
      } catch (err) {
        if (err instanceof Error) {
          throw ExecutionException.make(
            `Could not load or parse config file (${configPath}): ${err.message}`,
          );
        } else {
          throw err;
        }
      }
    }
    // Zod errors are handled by the caller
    const parsedConfig = ConfigSchema.parse(configData);
    this.passes =
      passes !== undefined
        ? this.createPassConfigs(passes)
        : (parsedConfig.passes ?? this.createPassConfigs(getAllPasses()));
    this.successPolicy = parsedConfig.successPolicy;
    this.worklistOrder = parsedConfig.worklistOrder;
    this.verbosity = parsedConfig.verbosity;
  }

  private createPassConfigs(passes: string[]): PassConfig[] {
    const builtinPasses = new Set(getAllPasses());
    return passes
      .filter((name) => name !== "")
      .map((name) => {
        if (!builtinPasses.has(name)) {
          throw ExecutionException.make(`Cannot find built-in pass: ${name}`);
        }
        return { className: name };
      });
  }
}

/**
 * Environment variables to configure advanced options.
 */
export class PtrguardEnv {
  /**
   * Whether to trace the execution.
   */
  public static PTRGUARD_TRACE: boolean = process.env.PTRGUARD_TRACE
    ? process.env.PTRGUARD_TRACE === "1"
    : false;
}
