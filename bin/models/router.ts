import express from "express";
import type { Router } from "express";

import { STATUS_ROUTER } from "../api/routers/status.routes";
import { createTransformsRouter } from "../api/routers/transforms.routes";
import { API_ROUTES } from "../common/constants/api.constants";
import type { AppConfig } from "../common/config";

export function createApiRouter(config: Pick<AppConfig, "maxInputLength" | "defaultShift">): Router {
  const ROUTER = express.Router();

  // Registering the status routes
  ROUTER.use(API_ROUTES.STATUS.BASE, STATUS_ROUTER);
  // Registering the transform routes
  ROUTER.use(API_ROUTES.TRANSFORMS.BASE, createTransformsRouter(config));

  return ROUTER;
}
