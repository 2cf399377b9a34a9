import type { Request, Response } from "express";
import { applyTransform, isInvalidEncodingError, listTransforms } from "../../common/cryptography";
import type { TransformOperation } from "../../common/cryptography";
import type { AppConfig } from "../../common/config";
import { logger } from "../../common/services/logger.service";
import { ResponseHandler } from "../../common/services/response.service";
import { validateTransformBody } from "../../common/services/validation.service";
import { createSuccessResponse } from "../../common/utils";
import { HTTP_STATUS } from "../../common/constants/api.constants";

type TransformSettings = Pick<AppConfig, "maxInputLength" | "defaultShift">;
type TransformHandler = (req: Request, res: Response) => Promise<Response>;

/**
 * GET /algorithms
 * Lists the available transforms
 */
export function getAlgorithms(req: Request, res: Response): Response {
  return res
    .status(HTTP_STATUS.OK)
    .json(createSuccessResponse(listTransforms(), "Available algorithms"));
}

function runTransform(operation: TransformOperation, settings: TransformSettings): TransformHandler {
  return async function (req: Request, res: Response): Promise<Response> {
    const validation = validateTransformBody(req.body, operation, settings);
    if (!validation.isValid) {
      return ResponseHandler.validationError(res, validation.errors);
    }

    const { request } = validation;

    try {
      const output = applyTransform(request);
      logger.debug("Transforms", `${operation} (${request.algorithm}) on ${request.input.length} characters`);

      const verb = operation === "encrypt" ? "Encrypted" : "Decrypted";
      return res.status(HTTP_STATUS.OK).json(
        createSuccessResponse(
          { algorithm: request.algorithm, operation, output },
          `${verb} successfully (${request.algorithm})`
        )
      );
    } catch (error) {
      if (isInvalidEncodingError(error)) {
        logger.warn("Transforms", `Rejected ${request.algorithm} input: ${error.reason}`);
        return ResponseHandler.unprocessable(res, error.message);
      }
      throw error;
    }
  };
}

/**
 * POST /encrypt
 * Body: { algorithm, input, shift? }
 */
export function createEncryptHandler(settings: TransformSettings): TransformHandler {
  return runTransform("encrypt", settings);
}

/**
 * POST /decrypt
 * Body: { algorithm, input, shift? }
 */
export function createDecryptHandler(settings: TransformSettings): TransformHandler {
  return runTransform("decrypt", settings);
}
