#!/usr/bin/env node
import dotenv from "dotenv";

import { runCli } from "./bin/cli";
import { loadConfig } from "./bin/common/config";
import { EXIT_CODES } from "./bin/common/constants/app.constants";

dotenv.config({ quiet: true });

runCli(
  process.argv.slice(2),
  {
    stdout: (line) => process.stdout.write(`${line}\n`),
    stderr: (line) => process.stderr.write(`${line}\n`),
  },
  loadConfig()
)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("[CIPHERBOX - CLI] Unexpected failure:", error);
    process.exitCode = EXIT_CODES.FAILURE;
  });
