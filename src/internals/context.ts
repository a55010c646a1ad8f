import { PtrguardConfig, PtrguardEnv } from "./config";
import { throwZodError } from "./exceptions";
import { DebugLogger, Logger, QuietLogger, TraceLogger } from "./logger";
import { CLIOptions, cliOptionDefaults } from "../cli/options";

/**
 * Represents the context for a ptrguard run.
 */
export class PtrguardContext {
  public logger: Logger;
  public config: PtrguardConfig;

  /**
   * Initializes the context, setting up configuration and appropriate logger.
   */
  constructor(options: Partial<CLIOptions> = cliOptionDefaults) {
    try {
      this.config = new PtrguardConfig({
        passes: options.passes,
        configPath: options.config,
      });
    } catch (err) {
      throwZodError(err, {
        msg: `Error parsing ptrguard configuration${options.config ? " " + options.config : ""}`,
      });
    }

    // Prioritize CLI options to configuration file values
    if (options.successPolicy !== undefined) {
      this.config.successPolicy = options.successPolicy;
    }
    if (options.worklistOrder !== undefined) {
      this.config.worklistOrder = options.worklistOrder;
    }

    const saveJson = options.outputFormat === "json";
    if (PtrguardEnv.PTRGUARD_TRACE) {
      this.logger = new TraceLogger(saveJson);
    } else {
      this.logger = options.verbose
        ? new DebugLogger(saveJson, true)
        : options.quiet
          ? new QuietLogger(saveJson)
          : this.config.verbosity === "quiet"
            ? new QuietLogger(saveJson)
            : this.config.verbosity === "debug"
              ? new DebugLogger(saveJson)
              : new Logger(undefined, saveJson);
    }
  }
}
