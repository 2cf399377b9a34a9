/**
 * Raised when text handed to the Base64 decoder is not well-formed Base64,
 * or when the decoded bytes are not valid UTF-8.
 */
export class InvalidEncodingError extends Error {
    readonly input: string;
    readonly reason: string;

    constructor(input: string, reason: string, options?: { cause?: unknown }) {
        super(`Invalid Base64 input (${reason})`, options);
        this.name = "InvalidEncodingError";
        this.input = input;
        this.reason = reason;
    }
}

export function isInvalidEncodingError(error: unknown): error is InvalidEncodingError {
    return error instanceof InvalidEncodingError;
}
