import "colorts/lib/string";
import { logger } from "./logger.service";

/**
 * Startup Service
 *
 * Console output for server start and failure
 */

const BANNER = `
  +-------------------------------------------+
  |   c i p h e r b o x                       |
  |   caesar shift  /  base64 text codec      |
  |   (not secure encryption)                 |
  +-------------------------------------------+
`.cyan;

/**
 * Print the startup banner
 */
export function printBanner(): void {
  console.log(BANNER);
}

/**
 * Print ready message
 */
export function printReady(port: number | string): void {
  const line = "=".repeat(50);
  console.log(`\n+${line}+`.green);
  console.log(`|${"  CIPHERBOX API IS READY".padEnd(50)}|`.green);
  console.log(`|${`  Listening on port ${port}`.padEnd(50)}|`.green);
  console.log(`|${`  Time: ${new Date().toLocaleString()}`.padEnd(50)}|`.green);
  console.log(`+${line}+\n`.green);

  logger.info("Startup", `Server ready on port ${port}`);
}

/**
 * Print error box
 */
export function printError(title: string, message: string): void {
  const line = "=".repeat(50);
  const shown = message.length > 46 ? `${message.substring(0, 43)}...` : message;
  console.error(`\n+${line}+`.red);
  console.error(`|${"  ERROR".padEnd(50)}|`.red);
  console.error(`|${`  ${title}`.padEnd(50)}|`.red);
  console.error(`|${`  ${shown}`.padEnd(50)}|`.red);
  console.error(`+${line}+\n`.red);

  logger.error("Startup", `${title}: ${message}`);
}
