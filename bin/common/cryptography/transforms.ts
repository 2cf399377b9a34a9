import { decodeBase64, encodeBase64 } from "./base64";
import { decryptCaesar, encryptCaesar } from "./caesar";

export const TRANSFORM_ALGORITHMS = ["caesar", "base64"] as const;
export type TransformAlgorithm = typeof TRANSFORM_ALGORITHMS[number];

export type TransformOperation = "encrypt" | "decrypt";

export interface CaesarTransformRequest {
    algorithm: "caesar";
    operation: TransformOperation;
    input: string;
    shift: number;
}

export interface Base64TransformRequest {
    algorithm: "base64";
    operation: TransformOperation;
    input: string;
}

export type TransformRequest = CaesarTransformRequest | Base64TransformRequest;

export interface TransformDescriptor {
    id: TransformAlgorithm;
    label: string;
    usesShift: boolean;
    description: string;
}

const TRANSFORM_DESCRIPTORS: Record<TransformAlgorithm, TransformDescriptor> = {
    caesar: {
        id: "caesar",
        label: "Caesar shift",
        usesShift: true,
        description: "Rotates A-Z and a-z by a fixed shift, preserving case. Other characters are unchanged.",
    },
    base64: {
        id: "base64",
        label: "Base64",
        usesShift: false,
        description: "Encodes UTF-8 text with the RFC 4648 standard alphabet. Decoding rejects malformed input.",
    },
};

export function listTransforms(): TransformDescriptor[] {
    return TRANSFORM_ALGORITHMS.map((algorithm) => TRANSFORM_DESCRIPTORS[algorithm]);
}

/**
 * Runs a single transform. Only base64 decryption can fail, with an
 * InvalidEncodingError.
 */
export function applyTransform(request: TransformRequest): string {
    switch (request.algorithm) {
        case "caesar":
            return request.operation === "encrypt"
                ? encryptCaesar(request.input, request.shift)
                : decryptCaesar(request.input, request.shift);
        case "base64":
            return request.operation === "encrypt"
                ? encodeBase64(request.input)
                : decodeBase64(request.input);
        default: {
            const unreachable: never = request;
            throw new Error(`Unsupported transform: ${JSON.stringify(unreachable)}`);
        }
    }
}
