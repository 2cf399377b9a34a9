import type { NextFunction, Request, Response } from "express";
import { createErrorResponse } from "./utils";
import { HTTP_STATUS } from "./constants/api.constants";
import { logger } from "./services/logger.service";

/* =========================
   🧩 LOGGING MONITOR
========================= */
function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = process.hrtime();

  res.on("finish", () => {
    const diff = process.hrtime(start);
    const responseTime = `${(diff[0] * 1e3 + diff[1] / 1e6).toFixed(2)}ms`;
    const line = `${res.statusCode} | ${responseTime} | ${req.method} | ${req.originalUrl}`;

    if (res.statusCode >= 500) {
      logger.error("HTTP", line);
    } else if (res.statusCode >= 400) {
      logger.warn("HTTP", line);
    } else {
      logger.info("HTTP", line);
    }
  });

  next();
}

/* =========================
   🪶 ERROR HANDLER
========================= */
function isBodyParseError(err: Error): boolean {
  return "type" in err && err.type === "entity.parse.failed";
}

function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler.
  _next: NextFunction
): void {
  if (isBodyParseError(err)) {
    logger.warn("HTTP", `Malformed JSON body at ${req.originalUrl}`);
    res.status(HTTP_STATUS.BAD_REQUEST).json(
      createErrorResponse("Request body is not valid JSON.", HTTP_STATUS.BAD_REQUEST)
    );
    return;
  }

  logger.error("HTTP", `An error occurred - ${err.message}`, { stack: err.stack });
  res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json(
    createErrorResponse("An internal server error occurred.", HTTP_STATUS.INTERNAL_SERVER_ERROR)
  );
}

/* =========================
   🚨 EMPTY BODY HANDLER
========================= */
function emptyBodyHandler(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (req.method !== "POST") {
    return next();
  }

  const body: unknown = req.body;
  if (!body || (typeof body === "object" && Object.keys(body).length === 0)) {
    logger.warn("HTTP", `Empty request body detected at ${req.originalUrl}`);
    res.status(HTTP_STATUS.BAD_REQUEST).json(
      createErrorResponse("Request body cannot be empty.", HTTP_STATUS.BAD_REQUEST)
    );
    return;
  }

  next();
}

/* =========================
   📦 EXPORTS
========================= */
export {
  requestLogger,
  errorHandler,
  emptyBodyHandler,
};
