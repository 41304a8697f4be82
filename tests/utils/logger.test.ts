/**
 * 構造化ロガーのテスト
 */

import { StructuredLogger } from "../../src/logger";

describe("StructuredLogger", () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  let debugSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    debugSpy = jest.spyOn(console, "debug").mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  function parsedOutput(spy: jest.SpyInstance): unknown {
    const [line]: unknown[] = spy.mock.calls[0];
    return typeof line === "string" ? JSON.parse(line) : undefined;
  }

  it("JSON 1行でメッセージとデータを出力する", () => {
    const logger = new StructuredLogger();
    logger.setLevel("info");

    logger.info("Rule evaluated", { ruleId: "HighErrorRate", breachCount: 2 });

    expect(parsedOutput(logSpy)).toMatchObject({
      level: "info",
      severity: "INFO",
      message: "Rule evaluated",
      service: "threshold-alert-engine",
      ruleId: "HighErrorRate",
      breachCount: 2,
    });
  });

  it("最小レベル未満は出力しない", () => {
    const logger = new StructuredLogger();
    logger.setLevel("warn");

    logger.info("ignored");
    logger.debug("ignored");

    expect(logSpy).not.toHaveBeenCalled();
    expect(debugSpy).not.toHaveBeenCalled();
  });

  it("error の Error オブジェクトは name / message / stack に展開する", () => {
    const logger = new StructuredLogger();

    logger.error("Dispatch cycle failed", { error: new TypeError("bad state") });

    expect(parsedOutput(errorSpy)).toMatchObject({
      level: "error",
      error: { name: "TypeError", message: "bad state" },
    });
  });
});
