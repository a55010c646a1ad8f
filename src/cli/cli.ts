import { Driver } from "./driver";
import { cliOptions, parseCLIOptions } from "./options";
import { Result, resultToString } from "./result";
import { unreachable } from "../internals/util";
import { PTRGUARD_VERSION } from "../version";
import { Command } from "commander";

/**
 * Creates and configures the ptrguard CLI command.
 * @returns The configured commander Command instance.
 */
export function createPtrguardCommand(): Command {
  const command = new Command()
    .name("ptrguard")
    .description("Detects accesses to uninitialized storage pointers")
    .version(`ptrguard ${PTRGUARD_VERSION}`)
    .arguments("[paths...]");
  cliOptions.forEach((option) => command.addOption(option));
  command.action((_paths: string[], options: unknown) => {
    // Fails early on options commander cannot validate itself
    parseCLIOptions(options);
  });
  return command;
}

/**
 * Runs the ptrguard CLI command with the provided arguments.
 *
 * Note: This function throws execution and internal exceptions. Handle
 * exceptions appropriately when calling this function.
 *
 * @param args The list of arguments to pass to the CLI command.
 * @param command Optional pre-configured Command instance.
 * @returns The created Driver instance and the result of execution.
 */
export async function runPtrguardCommand(
  args: string[],
  command: Command = createPtrguardCommand(),
): Promise<[Driver, Result]> {
  await command.parseAsync(args, { from: "user" });
  const driver = await Driver.create(
    command.args,
    parseCLIOptions(command.opts()),
  );
  const result = await driver.execute();
  return [driver, result];
}

/**
 * Executes ptrguard capturing the output and returning it as a string.
 * @param args The list of arguments to pass to the CLI command.
 */
export async function executePtrguard(args: string[]): Promise<string> {
  const [driver, result] = await runPtrguardCommand(args);
  return resultToString(
    result,
    driver.outputFormat,
    driver.colorizeOutput,
    driver.getSourceContents(),
  );
}

/**
 * Prints the result of the execution to the console.
 */
export function handlePtrguardResult(driver: Driver, result: Result): void {
  const logger = driver.ctx.logger;
  const text = resultToString(
    result,
    driver.outputFormat,
    driver.colorizeOutput,
    driver.getSourceContents(),
  );
  if (driver.outputFormat === "json") {
    console.log(text);
    return;
  }
  switch (result.kind) {
    case "diagnostics":
    case "error":
      logger.error(text);
      break;
    case "ok":
    case "passes":
      logger.info(text);
      break;
    default:
      unreachable(result);
  }
}
