import type { Request, Response } from "express";
import { LogLevel, MAX_BUFFERED_ENTRIES, logger } from "../../common/services/logger.service";
import { ResponseHandler } from "../../common/services/response.service";
import { createSuccessResponse } from "../../common/utils";
import { HTTP_STATUS } from "../../common/constants/api.constants";

const DEFAULT_LOG_COUNT = 100;

/**
 * GET /health
 * Simple health check for load balancers
 */
export function getSimpleHealth(req: Request, res: Response): Response {
  return res.status(200).json({
    status: "ok",
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
}

function readQueryInteger(value: unknown, fallback: number, max: number): number | null {
  if (value === undefined) return fallback;
  if (typeof value !== "string" || !/^\d+$/.test(value)) return null;

  const parsed = Number(value);
  return parsed <= max ? parsed : null;
}

function readQueryLevel(value: unknown): LogLevel | undefined | null {
  if (value === undefined) return undefined;
  if (typeof value !== "string") return null;

  const upper = value.toUpperCase();
  return Object.values(LogLevel).find((level) => level === upper) ?? null;
}

/**
 * GET /logs
 * Recent in-memory log entries, most recent first.
 * Query: count (default 100), offset, level
 */
export function getRecentLogs(req: Request, res: Response): Response {
  const count = readQueryInteger(req.query.count, DEFAULT_LOG_COUNT, MAX_BUFFERED_ENTRIES);
  const offset = readQueryInteger(req.query.offset, 0, MAX_BUFFERED_ENTRIES);
  const level = readQueryLevel(req.query.level);

  const errors: string[] = [];
  if (count === null) {
    errors.push(`Query 'count' must be an integer from 0 to ${MAX_BUFFERED_ENTRIES}`);
  }
  if (offset === null) {
    errors.push(`Query 'offset' must be an integer from 0 to ${MAX_BUFFERED_ENTRIES}`);
  }
  if (level === null) {
    errors.push(`Query 'level' must be one of: ${Object.values(LogLevel).join(", ")}`);
  }
  if (count === null || offset === null || level === null) {
    return ResponseHandler.validationError(res, errors);
  }

  const logs = logger.getRecentLogs(count, offset, level);

  return res.status(HTTP_STATUS.OK).json(
    createSuccessResponse(
      {
        logs,
        pagination: { count, offset, hasMore: logs.length === count },
      },
      "Logs retrieved"
    )
  );
}
