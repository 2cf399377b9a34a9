import type { Request, Response, NextFunction } from "express";
import { createErrorResponse } from "../utils";
import { HTTP_STATUS } from "../constants/api.constants";
import { logger } from "./logger.service";

/**
 * Centralized async error handler wrapper
 * Eliminates the need for try-catch blocks in every controller
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.error("Controller", message);

      if (res.headersSent) {
        next(error);
        return;
      }

      res.status(HTTP_STATUS.INTERNAL_SERVER_ERROR).json(
        createErrorResponse(
          `An error occurred while processing your request: ${message}`,
          HTTP_STATUS.INTERNAL_SERVER_ERROR
        )
      );
    });
  };
}

/**
 * Response helper service to standardize controller responses
 */
export class ResponseHandler {
  /**
   * Send validation error response
   */
  static validationError(res: Response, errors: string[], statusCode: number = HTTP_STATUS.BAD_REQUEST) {
    return res.status(statusCode).json(
      createErrorResponse(
        `Validation failed: ${errors.join(", ")}`,
        statusCode
      )
    );
  }

  /**
   * Send unprocessable entity response (well-formed request, unusable content)
   */
  static unprocessable(res: Response, message: string) {
    return res.status(HTTP_STATUS.UNPROCESSABLE_ENTITY).json(
      createErrorResponse(message, HTTP_STATUS.UNPROCESSABLE_ENTITY)
    );
  }
}
