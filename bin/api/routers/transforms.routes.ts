import express from "express";
import type { Router } from "express";
import { asyncHandler } from "../../common/services/response.service";
import {
  getAlgorithms,
  createEncryptHandler,
  createDecryptHandler,
} from "../controllers/transforms.controller";
import { API_ROUTES } from "../../common/constants/api.constants";
import type { AppConfig } from "../../common/config";

export function createTransformsRouter(config: Pick<AppConfig, "maxInputLength" | "defaultShift">): Router {
  const ROUTER = express.Router();

  ROUTER.get(API_ROUTES.TRANSFORMS.ALGORITHMS, asyncHandler(async (req, res) => getAlgorithms(req, res)));

  ROUTER.post(API_ROUTES.TRANSFORMS.ENCRYPT, asyncHandler(createEncryptHandler(config)));
  ROUTER.post(API_ROUTES.TRANSFORMS.DECRYPT, asyncHandler(createDecryptHandler(config)));

  return ROUTER;
}
