/**
 * Configuration for a pass.
 */
export interface PassConfig {
  /**
   * Name of the class that implements the pass.
   */
  className: string;
}

export type OutputFormat = "json" | "plain";

/**
 * Exit codes after executing ptrguard.
 */
export enum ExitCode {
  /**
   * Successful execution. No hard errors reported.
   */
  SUCCESS = 0,
  /**
   * The analyzed program is rejected by at least one pass.
   */
  FAILED = 1,
  /**
   * Execution failed because of an error.
   */
  EXECUTION_FAILURE = 2,
}
