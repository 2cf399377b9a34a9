import { TRANSFORM_ALGORITHMS } from "../cryptography";
import type { TransformAlgorithm, TransformOperation, TransformRequest } from "../cryptography";

const ALPHABET_SIZE = 26n;

/**
 * Validation service to consolidate common validation patterns
 */

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export type TransformBodyValidation =
  | { isValid: true; request: TransformRequest }
  | { isValid: false; errors: string[] };

/**
 * Validate required fields in request body. Empty strings count as present.
 */
export function validateRequiredFields(
  body: Record<string, unknown>,
  requiredFields: string[]
): ValidationResult {
  const errors: string[] = [];

  for (const field of requiredFields) {
    if (body[field] === undefined || body[field] === null) {
      errors.push(`Field '${field}' is required`);
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}

export function isTransformAlgorithm(value: unknown): value is TransformAlgorithm {
  return typeof value === "string" && TRANSFORM_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Accepts an integer number or a decimal integer string such as "-3".
 * Strings past the safe integer range are reduced modulo the alphabet size,
 * which leaves the Caesar rotation unchanged.
 */
export function parseShift(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isInteger(value) ? value : null;
  }

  if (typeof value === "string" && /^[+-]?\d+$/.test(value.trim())) {
    const parsed = BigInt(value.trim());
    if (parsed >= BigInt(Number.MIN_SAFE_INTEGER) && parsed <= BigInt(Number.MAX_SAFE_INTEGER)) {
      return Number(parsed);
    }
    return Number(parsed % ALPHABET_SIZE);
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate the JSON body of an encrypt or decrypt request
 */
export function validateTransformBody(
  body: unknown,
  operation: TransformOperation,
  options: { maxInputLength: number; defaultShift: number }
): TransformBodyValidation {
  if (!isRecord(body)) {
    return { isValid: false, errors: ["Request body must be a JSON object"] };
  }

  const required = validateRequiredFields(body, ["algorithm", "input"]);
  if (!required.isValid) {
    return { isValid: false, errors: required.errors };
  }

  const errors: string[] = [];
  const { algorithm, input, shift } = body;

  if (!isTransformAlgorithm(algorithm)) {
    errors.push(`Field 'algorithm' must be one of: ${TRANSFORM_ALGORITHMS.join(", ")}`);
  }

  if (typeof input !== "string") {
    errors.push("Field 'input' must be a string");
  } else if (input.length > options.maxInputLength) {
    errors.push(`Field 'input' exceeds ${options.maxInputLength} characters`);
  }

  const parsedShift = shift === undefined ? options.defaultShift : parseShift(shift);
  if (algorithm === "caesar" && parsedShift === null) {
    errors.push("Field 'shift' must be an integer");
  }

  if (errors.length > 0 || !isTransformAlgorithm(algorithm) || typeof input !== "string") {
    return { isValid: false, errors };
  }

  if (algorithm === "caesar") {
    return {
      isValid: true,
      request: { algorithm, operation, input, shift: parsedShift ?? options.defaultShift },
    };
  }

  return { isValid: true, request: { algorithm, operation, input } };
}
