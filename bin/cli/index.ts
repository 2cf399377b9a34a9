import {
  applyTransform,
  isInvalidEncodingError,
  listTransforms,
  TRANSFORM_ALGORITHMS,
} from "../common/cryptography";
import type { TransformOperation, TransformRequest } from "../common/cryptography";
import type { AppConfig } from "../common/config";
import { APP_NAME, APP_VERSION, EXIT_CODES } from "../common/constants/app.constants";
import { LogLevel, logger } from "../common/services/logger.service";
import { isTransformAlgorithm, parseShift } from "../common/services/validation.service";
import { resolveInput, writeTextFile } from "../common/utils";
import { parseCliArgs } from "./args";
import type { ParsedArgs } from "./args";
import { UsageError } from "./errors";

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const HELP_TEXT = [
  `Usage: ${APP_NAME} <command> [options]`,
  "",
  "Commands:",
  "  encrypt      Encrypt text with the selected algorithm",
  "  decrypt      Decrypt text with the selected algorithm",
  "  algorithms   List available algorithms",
  "  examples     Print usage examples",
  "",
  "Options:",
  `  --algo <name>    One of: ${TRANSFORM_ALGORITHMS.join(", ")}`,
  "  --in <value>     Text, or a path to a UTF-8 file",
  "  --shift <n>      Caesar shift (integer)",
  "  --out <path>     Write the result to a file instead of stdout",
  "  -v, --verbose    Log debug output to stderr",
  "  -h, --help       Show this help",
  "  -V, --version    Show the version",
].join("\n");

export const EXAMPLES_TEXT = [
  "Examples:",
  `  ${APP_NAME} encrypt --algo caesar --in "Hello" --shift 3`,
  `  ${APP_NAME} decrypt --algo caesar --in "Khoor" --shift 3`,
  `  ${APP_NAME} encrypt --algo base64 --in "Hello"`,
  `  ${APP_NAME} decrypt --algo base64 --in "SGVsbG8="`,
  `  ${APP_NAME} encrypt --algo caesar --in notes.txt --out notes.enc.txt`,
].join("\n");

function buildRequest(
  args: ParsedArgs,
  operation: TransformOperation,
  input: string,
  defaultShift: number
): TransformRequest {
  const { algo } = args;

  if (algo === undefined) {
    throw new UsageError("Missing required option '--algo'");
  }
  if (!isTransformAlgorithm(algo)) {
    throw new UsageError(`Invalid value for '--algo': '${algo}' (choose from ${TRANSFORM_ALGORITHMS.join(", ")})`);
  }

  if (algo === "base64") {
    return { algorithm: algo, operation, input };
  }

  const shift = args.shift === undefined ? defaultShift : parseShift(args.shift);
  if (shift === null) {
    throw new UsageError(`Invalid value for '--shift': '${args.shift}' is not an integer`);
  }

  return { algorithm: algo, operation, input, shift };
}

async function runTransformCommand(
  args: ParsedArgs,
  operation: TransformOperation,
  io: CliIO,
  config: Pick<AppConfig, "defaultShift">
): Promise<number> {
  if (args.input === undefined) {
    throw new UsageError("Missing required option '--in'");
  }
  // Validate the options before touching the filesystem.
  buildRequest(args, operation, "", config.defaultShift);

  const resolved = await resolveInput(args.input);
  let text = resolved.text;
  if (resolved.fromFile && args.algo === "base64" && operation === "decrypt") {
    text = text.trim();
  }
  logger.debug("CLI", `Read ${text.length} characters from ${resolved.fromFile ? "file" : "argument"}`);

  const request = buildRequest(args, operation, text, config.defaultShift);

  let result: string;
  try {
    result = applyTransform(request);
  } catch (error) {
    if (isInvalidEncodingError(error)) {
      logger.debug("CLI", `Decoding failed: ${error.reason}`);
      io.stderr(`Error: ${error.message}`);
      return EXIT_CODES.INVALID_ENCODING;
    }
    throw error;
  }

  let location: string;
  if (args.out) {
    await writeTextFile(args.out, result);
    location = `Saved to ${args.out}`;
  } else {
    io.stdout(result);
    location = "Printed to stdout";
  }

  const verb = operation === "encrypt" ? "Encrypted" : "Decrypted";
  io.stderr(`${verb} successfully (${request.algorithm}). ${location}`);
  return EXIT_CODES.OK;
}

function printAlgorithms(io: CliIO): void {
  for (const descriptor of listTransforms()) {
    const shiftNote = descriptor.usesShift ? " [--shift]" : "";
    io.stdout(`${descriptor.id.padEnd(8)} ${descriptor.label}${shiftNote}: ${descriptor.description}`);
  }
}

async function dispatch(args: ParsedArgs, io: CliIO, config: Pick<AppConfig, "defaultShift">): Promise<number> {
  if (args.version) {
    io.stdout(`${APP_NAME} ${APP_VERSION}`);
    return EXIT_CODES.OK;
  }

  if (args.help || args.command === undefined) {
    io.stdout(HELP_TEXT);
    return EXIT_CODES.OK;
  }

  switch (args.command) {
    case "encrypt":
    case "decrypt":
      return runTransformCommand(args, args.command, io, config);
    case "algorithms":
      printAlgorithms(io);
      return EXIT_CODES.OK;
    case "examples":
      io.stdout(EXAMPLES_TEXT);
      return EXIT_CODES.OK;
    default:
      throw new UsageError(`Unknown command '${args.command}'`);
  }
}

/**
 * Runs one CLI invocation and resolves to the process exit code.
 */
export async function runCli(
  argv: string[],
  io: CliIO,
  config: Pick<AppConfig, "defaultShift" | "logDir" | "logToConsole">
): Promise<number> {
  try {
    const args = parseCliArgs(argv);

    logger.configure({
      logLevel: args.verbose ? LogLevel.DEBUG : LogLevel.WARN,
      logDir: config.logDir,
      logToConsole: config.logToConsole,
    });

    return await dispatch(args, io, config);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}`);
      io.stderr(`Run '${APP_NAME} --help' for usage.`);
      return EXIT_CODES.USAGE;
    }

    const message = error instanceof Error ? error.message : String(error);
    logger.error("CLI", message, error instanceof Error ? { stack: error.stack } : undefined);
    io.stderr(`Error: ${message}`);
    return EXIT_CODES.FAILURE;
  } finally {
    await logger.flush();
  }
}
