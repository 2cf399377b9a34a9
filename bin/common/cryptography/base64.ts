import { InvalidEncodingError } from "./errors";

const BASE64_SYMBOL = /^[A-Za-z0-9+/=]$/;

export function bufferToBase64(data: Buffer): string {
    return data.toString("base64");
}

export function base64ToBuffer(data: string): Buffer {
    return Buffer.from(data, "base64");
}

/**
 * Returns why `encoded` is not well-formed standard Base64, or null when it is.
 */
function findStructuralProblem(encoded: string): string | null {
    for (let i = 0; i < encoded.length; i++) {
        const symbol = encoded[i];
        if (!BASE64_SYMBOL.test(symbol)) {
            return `illegal character ${JSON.stringify(symbol)} at position ${i}`;
        }
    }

    if (encoded.length % 4 !== 0) {
        return `length ${encoded.length} is not a multiple of 4`;
    }

    const firstPad = encoded.indexOf("=");
    if (firstPad !== -1) {
        const tail = encoded.slice(firstPad);
        if (firstPad < encoded.length - 2 || !/^=+$/.test(tail)) {
            return "padding is only allowed at the end";
        }
    }

    return null;
}

// Encodes text as standard Base64 over its UTF-8 bytes
//
// Example:
//
// encodeBase64("Hello")
//
// Output: SGVsbG8=
//
export function encodeBase64(text: string): string {
    return bufferToBase64(Buffer.from(text, "utf-8"));
}

/**
 * Decodes standard Base64 back into UTF-8 text.
 *
 * Input must be canonical: alphabet symbols only, a length that is a multiple
 * of 4, `=` only as trailing padding and zeroed unused bits.
 *
 * @throws {InvalidEncodingError} when the input is malformed or the decoded
 * bytes are not valid UTF-8
 */
export function decodeBase64(encoded: string): string {
    const problem = findStructuralProblem(encoded);
    if (problem) {
        throw new InvalidEncodingError(encoded, problem);
    }

    const bytes = base64ToBuffer(encoded);

    // Buffer silently drops non-zero trailing bits, so compare against the canonical form.
    if (bufferToBase64(bytes) !== encoded) {
        throw new InvalidEncodingError(encoded, "unused trailing bits are not zero");
    }

    try {
        return new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch (error) {
        throw new InvalidEncodingError(encoded, "decoded bytes are not valid UTF-8", { cause: error });
    }
}
