import dotenv from "dotenv";
import { createServer } from "node:http";

import { createApp } from "./bin/app";
import { loadConfig } from "./bin/common/config";
import { logger } from "./bin/common/services/logger.service";
import { printBanner, printError, printReady } from "./bin/common/services/startup.service";

dotenv.config({ quiet: true });

const config = loadConfig();
logger.configure({
  logLevel: config.logLevel,
  logDir: config.logDir,
  logToConsole: config.logToConsole,
});

const app = createApp(config);
const server = createServer(app);

printBanner();

server
  .listen(config.port, () => printReady(config.port))
  .on("error", (error) => {
    printError("Server failed to start", error.message);
    process.exitCode = 1;
    logger.flush().catch((flushError: unknown) => {
      console.error("[CIPHERBOX - Logger] Failed to flush logs:", flushError);
    });
  });
