import chalk from "chalk";
import { devLogger, dispose, log, plainLogger, testLogger } from "..";
import { AccountRules } from "./account";

describe("loggers", () => {
  const { LOG_LEVEL } = process.env;
  let logSpy: jest.SpyInstance;
  let infoSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let tableSpy: jest.SpyInstance;
  let writeSpy: jest.SpyInstance;

  beforeEach(() => {
    process.env.LOG_LEVEL = "trace";
    logSpy = jest.spyOn(console, "log").mockImplementation();
    infoSpy = jest.spyOn(console, "info").mockImplementation();
    errorSpy = jest.spyOn(console, "error").mockImplementation();
    tableSpy = jest.spyOn(console, "table").mockImplementation();
    writeSpy = jest
      .spyOn(process.stdout, "write")
      .mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    if (LOG_LEVEL === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = LOG_LEVEL;
  });

  describe("dev logger", () => {
    it("should style messages", () => {
      devLogger()
        .red()
        .green()
        .yellow()
        .blue()
        .magenta()
        .gray()
        .bold()
        .dimmed()
        .trace("message");
      devLogger().green().info("message", 1, 2);
      expect(logSpy).toHaveBeenCalledWith(
        chalk.red.green.yellow.blue.magenta.gray.bold.dim("message"),
        ""
      );
      expect(infoSpy).toHaveBeenCalledWith(
        chalk.green("message"),
        chalk.gray("[1,2]")
      );
    });

    it("should filter by level", () => {
      process.env.LOG_LEVEL = "info";
      const logger = devLogger();
      logger.trace("hidden").data("hidden").info("shown");
      expect(logSpy).not.toHaveBeenCalled();
      expect(infoSpy).toHaveBeenCalledTimes(1);
    });

    it("should read the level once", () => {
      const logger = devLogger();
      process.env.LOG_LEVEL = "verbose";
      logger.trace("kept");
      devLogger("error").trace("hidden");
      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(logSpy).toHaveBeenCalledWith("kept", "");
    });

    it("should tabulate events at trace level only", () => {
      devLogger("data").events([
        {
          id: 0,
          stream: "Account-a-1",
          version: 0,
          created: new Date(),
          name: "Deposited",
          data: { amount: 1 }
        }
      ]);
      expect(tableSpy).not.toHaveBeenCalled();
    });

    it("should log errors", () => {
      const error = new Error("boom");
      devLogger().error(error).error("oops");
      expect(errorSpy).toHaveBeenNthCalledWith(
        1,
        chalk.red("Error"),
        "boom",
        error.stack?.substring(0, 500)
      );
      expect(errorSpy).toHaveBeenNthCalledWith(2, chalk.red("oops"));
    });

    it("should write and tabulate events", () => {
      const logger = devLogger();
      logger.blue().write("raw");
      logger.events([
        {
          id: 0,
          stream: "Account-a-1",
          version: 0,
          created: new Date(),
          name: "Deposited",
          data: { amount: 1 }
        }
      ]);
      expect(writeSpy).toHaveBeenCalledWith(chalk.blue("raw"));
      expect(tableSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("command logging", () => {
    afterEach(async () => {
      await dispose()();
    });

    it("should accept commands after the environment changes", async () => {
      await dispose()();
      log(devLogger("trace"));
      process.env.LOG_LEVEL = "verbose";
      const validation = await AccountRules.build().validateCreation({
        name: "OpenAccount",
        data: { id: "a-1", owner: "Alice" }
      });
      expect(validation.status).toBe("accepted");
      expect(logSpy).toHaveBeenCalledWith(
        chalk.green("Account OpenAccount => AccountOpened"),
        ""
      );
    });
  });

  describe("plain logger", () => {
    it("should log json lines", () => {
      plainLogger().red().info("message", { id: 1 });
      expect(logSpy).toHaveBeenCalledWith(
        JSON.stringify({
          level: "info",
          severity: "INFO",
          message: "message",
          params: [{ id: 1 }]
        })
      );
    });

    it("should log errors with severity", () => {
      plainLogger().error("oops");
      expect(logSpy).toHaveBeenCalledWith(
        JSON.stringify({
          level: "error",
          severity: "ERROR",
          message: "oops",
          params: []
        })
      );
    });

    it("should filter by level", () => {
      process.env.LOG_LEVEL = "error";
      plainLogger().trace("hidden").data("hidden").info("hidden");
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe("test logger", () => {
    it("should be silent", () => {
      testLogger().green().write("x").trace("x").data("x").info("x").error("x");
      testLogger().events([]);
      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).not.toHaveBeenCalled();
      expect(writeSpy).not.toHaveBeenCalled();
    });
  });
});
