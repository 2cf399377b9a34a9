import express from "express";
import type { Router } from "express";
import { asyncHandler } from "../../common/services/response.service";
import { getRecentLogs, getSimpleHealth } from "../controllers/status.controller";
import { API_ROUTES } from "../../common/constants/api.constants";

const ROUTER: Router = express.Router();

// Simple health check (for load balancers)
ROUTER.get(API_ROUTES.STATUS.HEALTH, asyncHandler(async (req, res) => getSimpleHealth(req, res)));

// Recent in-memory log entries
ROUTER.get(API_ROUTES.STATUS.LOGS, asyncHandler(async (req, res) => getRecentLogs(req, res)));

export { ROUTER as STATUS_ROUTER };
