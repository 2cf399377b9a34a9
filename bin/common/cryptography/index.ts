export { encryptCaesar, decryptCaesar, normalizeShift } from "./caesar";
export { encodeBase64, decodeBase64 } from "./base64";
export { InvalidEncodingError, isInvalidEncodingError } from "./errors";
export { TRANSFORM_ALGORITHMS, listTransforms, applyTransform } from "./transforms";
export type {
    TransformAlgorithm,
    TransformOperation,
    TransformRequest,
    CaesarTransformRequest,
    Base64TransformRequest,
    TransformDescriptor,
} from "./transforms";
