import { LogLevel, Logger } from "../src/internals/logger";

describe("Logger", () => {
  it("prefixes messages with nested contexts", () => {
    const messages: string[] = [];
    const logger = new Logger({
      [LogLevel.INFO]: (msg) => messages.push(msg),
    });
    const result = logger.withContext("C", () =>
      logger.withContext("f", () => {
        logger.info("inner");
        return 42;
      }),
    );
    logger.info("outer");
    expect(result).toBe(42);
    expect(messages).toEqual(["[C > f] inner", "outer"]);
  });

  it("saves messages in the JSON mode", () => {
    const printed: string[] = [];
    const logger = new Logger(
      { [LogLevel.WARN]: (msg) => printed.push(msg) },
      true,
    );
    logger.warn("careful");
    logger.debug("hidden");
    expect(printed).toEqual([]);
    expect(logger.getJsonLogs()).toEqual({
      debug: [],
      info: [],
      warn: ["careful"],
      error: [],
    });
  });

  it("refuses to return logs outside of the JSON mode", () => {
    expect(() => new Logger().getJsonLogs()).toThrow(
      "JSON logging not enabled",
    );
  });
});
