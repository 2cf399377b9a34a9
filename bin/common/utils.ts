import fs from "fs-extra";
import path from "path";

export interface ErrorResponse {
  error: true;
  status: number;
  message: string;
  timestamp: string;
}

export interface SuccessResponse<T> {
  success: true;
  status: number;
  message: string;
  data: T;
  timestamp: string;
}

export function createErrorResponse(message: string, statusCode: number = 500): ErrorResponse {
  return {
    error: true,
    status: statusCode,
    message,
    timestamp: new Date().toISOString(),
  };
}

export function createSuccessResponse<T>(
  data: T,
  message: string = "Operation successful",
  statusCode: number = 200
): SuccessResponse<T> {
  return {
    success: true,
    status: statusCode,
    message,
    data,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Read a UTF-8 text file. Bytes that are not valid UTF-8 are rejected
 * instead of being replaced with U+FFFD.
 */
export async function readTextFile(filePath: string): Promise<string> {
  const bytes = await fs.readFile(filePath);
  try {
    return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
  } catch (error) {
    throw new Error(`File '${filePath}' is not valid UTF-8 text`, { cause: error });
  }
}

/**
 * Write UTF-8 text, creating parent directories when needed
 */
export async function writeTextFile(filePath: string, text: string): Promise<void> {
  await fs.ensureDir(path.dirname(path.resolve(filePath)));
  await fs.writeFile(filePath, text, "utf-8");
}

export interface ResolvedInput {
  text: string;
  fromFile: boolean;
}

/**
 * Treat the value as a path when it names an existing regular file,
 * otherwise as literal text.
 */
export async function resolveInput(value: string): Promise<ResolvedInput> {
  if (value.length > 0 && (await fs.pathExists(value))) {
    const stats = await fs.stat(value);
    if (stats.isFile()) {
      return { text: await readTextFile(value), fromFile: true };
    }
  }

  return { text: value, fromFile: false };
}
