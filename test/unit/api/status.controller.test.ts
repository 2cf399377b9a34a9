import { beforeAll, beforeEach, describe, it, expect } from "vitest";
import { getRecentLogs } from "../../../bin/api/controllers/status.controller";
import { LogLevel, logger } from "../../../bin/common/services/logger.service";
import { fakeRequest, fakeResponse } from "../../helpers/http";

beforeAll(() => {
  logger.configure({ logLevel: LogLevel.DEBUG, logToConsole: false, logDir: null });
});

beforeEach(() => {
  logger.clear();
  logger.info("Test", "one");
  logger.warn("Test", "two");
  logger.info("Test", "three");
});

function getLogs(query: Record<string, string>) {
  const { res, sent } = fakeResponse();
  getRecentLogs(fakeRequest({ method: "GET", query }), res);
  return sent();
}

describe("recent logs endpoint", () => {
  it("returns the most recent entries first", () => {
    expect(getLogs({})).toMatchObject({
      status: 200,
      body: {
        success: true,
        message: "Logs retrieved",
        data: {
          logs: [{ message: "three" }, { message: "two" }, { message: "one" }],
          pagination: { count: 100, offset: 0, hasMore: false },
        },
      },
    });
  });

  it("filters by level case-insensitively", () => {
    expect(getLogs({ level: "info", count: "1" })).toMatchObject({
      status: 200,
      body: {
        data: {
          logs: [{ level: LogLevel.INFO, component: "Test", message: "three" }],
          pagination: { count: 1, offset: 0, hasMore: true },
        },
      },
    });
  });

  it("skips entries by offset", () => {
    expect(getLogs({ offset: "1" })).toMatchObject({
      status: 200,
      body: {
        data: {
          logs: [{ message: "two" }, { message: "one" }],
          pagination: { count: 100, offset: 1, hasMore: false },
        },
      },
    });
  });

  it("rejects invalid query values", () => {
    expect(getLogs({ count: "-1", level: "loud" })).toMatchObject({
      status: 400,
      body: {
        error: true,
        message:
          "Validation failed: Query 'count' must be an integer from 0 to 500, " +
          "Query 'level' must be one of: DEBUG, INFO, WARN, ERROR, FATAL",
      },
    });
  });
});
