export { Driver } from "./driver";
export * from "./result";
export * from "./types";
export {
  CLIOptions,
  cliOptionDefaults,
  cliOptions,
  parseCLIOptions,
} from "./options";
export {
  createPtrguardCommand,
  runPtrguardCommand,
  executePtrguard,
  handlePtrguardResult,
} from "./cli";
