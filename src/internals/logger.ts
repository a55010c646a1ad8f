import { ExecutionException } from "./exceptions";

export enum LogLevel {
  DEBUG,
  INFO,
  WARN,
  ERROR,
}

const ALL_LEVELS: LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

type MessageType = string | Error;

export type LogFunction = (message: string) => void;

/**
 * Provides a customizable logging mechanism across different levels of verbosity.
 */
export class Logger {
  private logFunctions: Map<LogLevel, LogFunction | undefined>;
  private jsonLogs: Map<LogLevel, string[]>;
  /** Names of the nested scopes currently being logged, innermost last. */
  private contextStack: string[] = [];

  constructor(
    logMapping?: Partial<Record<LogLevel, LogFunction | undefined>>,
    private saveJson: boolean = false,
    private showTimestamps: boolean = false,
  ) {
    this.jsonLogs = new Map([
      [LogLevel.DEBUG, []],
      [LogLevel.INFO, []],
      [LogLevel.WARN, []],
      [LogLevel.ERROR, []],
    ]);
    this.logFunctions = new Map<LogLevel, LogFunction | undefined>([
      [LogLevel.DEBUG, undefined],
      [LogLevel.INFO, console.log],
      [LogLevel.WARN, console.warn],
      [LogLevel.ERROR, console.error],
    ]);
    if (logMapping) {
      ALL_LEVELS.filter((level) => level in logMapping).forEach((level) => {
        this.logFunctions.set(level, logMapping[level]);
      });
    }
  }

  public getJsonLogs(): Record<string, string[]> {
    if (!this.saveJson) {
      throw ExecutionException.make(
        "JSON logging not enabled for this logger instance",
      );
    }
    return {
      debug: this.jsonLogs.get(LogLevel.DEBUG) ?? [],
      info: this.jsonLogs.get(LogLevel.INFO) ?? [],
      warn: this.jsonLogs.get(LogLevel.WARN) ?? [],
      error: this.jsonLogs.get(LogLevel.ERROR) ?? [],
    };
  }

  /**
   * Executes `fn` prefixing every message logged meanwhile with `contextName`.
   */
  public withContext<T>(contextName: string, fn: () => T): T {
    this.contextStack.push(contextName);
    try {
      return fn();
    } finally {
      this.contextStack.pop();
    }
  }

  /**
   * Formats the current time as [HH:MM:SS.ms]
   */
  private getTimestamp(): string {
    const now = new Date();
    const hours = now.getHours().toString().padStart(2, "0");
    const minutes = now.getMinutes().toString().padStart(2, "0");
    const seconds = now.getSeconds().toString().padStart(2, "0");
    const milliseconds = now.getMilliseconds().toString().padStart(3, "0");
    return `[${hours}:${minutes}:${seconds}.${milliseconds}]`;
  }

  private formatMessage(msg: MessageType): string {
    const contextPrefix =
      this.contextStack.length > 0
        ? `[${this.contextStack.join(" > ")}] `
        : "";
    const timestampPrefix = this.showTimestamps
      ? `${this.getTimestamp()} `
      : "";
    const text = msg instanceof Error ? msg.message : msg;
    return `${timestampPrefix}${contextPrefix}${text}`;
  }

  /**
   * Logs a message at the specified log level if a corresponding log function is defined.
   * In the JSON mode the message is saved instead of being printed.
   */
  protected log(level: LogLevel, msg: MessageType): void {
    const logFunction = this.logFunctions.get(level);
    if (logFunction === undefined) {
      return;
    }
    const formatted = this.formatMessage(msg);
    if (this.saveJson) {
      this.jsonLogs.get(level)?.push(formatted);
    } else {
      logFunction(formatted);
    }
  }

  public debug(msg: MessageType): void {
    this.log(LogLevel.DEBUG, msg);
  }

  public info(msg: MessageType): void {
    this.log(LogLevel.INFO, msg);
  }

  public warn(msg: MessageType): void {
    this.log(LogLevel.WARN, msg);
  }

  public error(msg: MessageType): void {
    this.log(LogLevel.ERROR, msg);
  }
}

/**
 * Logger that silences all logs.
 */
export class QuietLogger extends Logger {
  constructor(saveJson: boolean = false, showTimestamps: boolean = false) {
    super(
      {
        [LogLevel.INFO]: undefined,
        [LogLevel.WARN]: undefined,
        [LogLevel.ERROR]: undefined,
      },
      saveJson,
      showTimestamps,
    );
  }
}

/**
 * Logger that enables debug level logging to stdout.
 */
export class DebugLogger extends Logger {
  constructor(saveJson: boolean = false, showTimestamps: boolean = false) {
    super(
      {
        [LogLevel.DEBUG]: console.log,
      },
      saveJson,
      showTimestamps,
    );
  }
}

function trace(msg: string): void {
  console.log(msg);
  console.trace();
}

/**
 * Logger that adds backtraces to each log function.
 */
export class TraceLogger extends Logger {
  constructor(saveJson: boolean = false, showTimestamps: boolean = false) {
    super(
      {
        [LogLevel.DEBUG]: trace,
        [LogLevel.INFO]: trace,
        [LogLevel.WARN]: trace,
        [LogLevel.ERROR]: trace,
      },
      saveJson,
      showTimestamps,
    );
  }
}
