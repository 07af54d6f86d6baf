import chalk from "chalk";
import { config } from "./config";
import type { Logger } from "./interfaces";
import type { Commit, LogLevel, MessageLike } from "./types";

type Color =
  | "red"
  | "green"
  | "yellow"
  | "blue"
  | "magenta"
  | "gray";

const Levels: Record<LogLevel, number> = {
  error: 0,
  info: 1,
  data: 2,
  trace: 3
};

const enabled =
  (threshold: LogLevel) =>
  (level: LogLevel): boolean =>
    Levels[level] <= Levels[threshold];

const json = (level: LogLevel, message: string, params: unknown[]): void => {
  console.log(
    JSON.stringify({
      level,
      severity: level === "error" ? "ERROR" : "INFO",
      message,
      params
    })
  );
};

const table =
  (active: (level: LogLevel) => boolean) =>
  (events: ReadonlyArray<MessageLike & Commit>): void => {
    active("trace") &&
      console.table(
        events.map(({ id, stream, name, version, created, data }) => ({
          id,
          stream,
          name,
          version,
          created,
          data: JSON.stringify(data).substring(0, 50)
        })),
        ["id", "stream", "name", "version", "created", "data"]
      );
  };

/**
 * Colored console logger
 * @param level the most detailed level logged, `LOG_LEVEL` by default
 */
export const devLogger = (level: LogLevel = config().logLevel): Logger => {
  const active = enabled(level);
  // colors and effects apply to the next message only
  let style: chalk.Chalk = chalk;
  const styled = (message: string): string => {
    const text = style(message);
    style = chalk;
    return text;
  };
  const color = (color: Color): Logger => {
    style = style[color];
    return logger;
  };
  const details = (params: unknown[]): string =>
    params.length ? chalk.gray(JSON.stringify(params)) : "";

  const logger: Logger = {
    name: "dev-logger",
    dispose: () => Promise.resolve(),
    red: () => color("red"),
    green: () => color("green"),
    yellow: () => color("yellow"),
    blue: () => color("blue"),
    magenta: () => color("magenta"),
    gray: () => color("gray"),
    bold: () => {
      style = style.bold;
      return logger;
    },
    dimmed: () => {
      style = style.dim;
      return logger;
    },
    write: (message: string) => {
      process.stdout.write(styled(message));
      return logger;
    },
    events: table(active),
    trace: (message: string, ...params: unknown[]) => {
      active("trace") && console.log(styled(message), details(params));
      style = chalk;
      return logger;
    },
    data: (message: string, ...params: unknown[]) => {
      active("data") && console.log(styled(message), details(params));
      style = chalk;
      return logger;
    },
    info: (message: string, ...params: unknown[]) => {
      active("info") && console.info(styled(message), details(params));
      style = chalk;
      return logger;
    },
    error: (error: unknown) => {
      if (error instanceof Error) {
        const { name, message, stack } = error;
        console.error(chalk.red(name), message, stack?.substring(0, 500));
      } else console.error(chalk.red(String(error)));
      return logger;
    }
  };
  return logger;
};

/**
 * JSON lines logger
 * @param level the most detailed level logged, `LOG_LEVEL` by default
 */
export const plainLogger = (level: LogLevel = config().logLevel): Logger => {
  const active = enabled(level);
  const logger: Logger = {
    name: "plain-logger",
    dispose: () => Promise.resolve(),
    red: () => logger,
    green: () => logger,
    yellow: () => logger,
    blue: () => logger,
    magenta: () => logger,
    gray: () => logger,
    bold: () => logger,
    dimmed: () => logger,
    write: (message: string) => {
      process.stdout.write(message);
      return logger;
    },
    events: table(active),
    trace: (message: string, ...params: unknown[]) => {
      active("trace") && json("trace", message, params);
      return logger;
    },
    data: (message: string, ...params: unknown[]) => {
      active("data") && json("data", message, params);
      return logger;
    },
    info: (message: string, ...params: unknown[]) => {
      active("info") && json("info", message, params);
      return logger;
    },
    error: (error: unknown) => {
      if (error instanceof Error) {
        const { name, message, stack } = error;
        json("error", message, [{ name, stack }]);
      } else json("error", String(error), []);
      return logger;
    }
  };
  return logger;
};

export const testLogger = (): Logger => {
  const logger: Logger = {
    name: "test-logger",
    dispose: () => Promise.resolve(),
    red: () => logger,
    green: () => logger,
    yellow: () => logger,
    blue: () => logger,
    magenta: () => logger,
    gray: () => logger,
    bold: () => logger,
    dimmed: () => logger,
    write: () => logger,
    events: () => undefined,
    trace: () => logger,
    data: () => logger,
    info: () => logger,
    error: () => logger
  };
  return logger;
};
