import express from "express";
import type { Express } from "express";
import cors from "cors";
import bodyparser from "body-parser";

import { requestLogger, errorHandler, emptyBodyHandler } from "./common/middleware";
import { createApiRouter } from "./models/router";
import { createErrorResponse } from "./common/utils";
import { HTTP_STATUS } from "./common/constants/api.constants";
import type { AppConfig } from "./common/config";

/**
 * Builds the Express application without binding a port.
 */
export function createApp(config: Pick<AppConfig, "maxInputLength" | "defaultShift">): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use(
    cors({
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type"],
    })
  );

  app.use(requestLogger);
  // A JSON-escaped character takes at most six bytes.
  app.use(bodyparser.json({ limit: config.maxInputLength * 6 + 1024 }));
  app.use(emptyBodyHandler);
  app.use(createApiRouter(config));

  app.use((req, res) => {
    res.status(HTTP_STATUS.NOT_FOUND).json(
      createErrorResponse(`Route ${req.method} ${req.path} not found.`, HTTP_STATUS.NOT_FOUND)
    );
  });

  app.use(errorHandler);

  return app;
}
