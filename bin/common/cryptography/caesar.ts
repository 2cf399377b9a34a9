const ALPHABET_SIZE = 26;
const UPPER_BASE = "A".charCodeAt(0);
const LOWER_BASE = "a".charCodeAt(0);

// Only unaccented Latin letters rotate; everything else is left as-is.
const LATIN_LETTER = /[A-Za-z]/g;

/**
 * Reduces any shift to its equivalent rotation in [0, 25].
 *
 * Uses a true modulo so negative shifts wrap forward (-3 becomes 23).
 * Fractions are truncated toward zero and non-finite shifts rotate by 0.
 */
export function normalizeShift(shift: number): number {
    if (!Number.isFinite(shift)) return 0;

    const whole = Math.trunc(shift);
    return ((whole % ALPHABET_SIZE) + ALPHABET_SIZE) % ALPHABET_SIZE;
}

function rotate(text: string, rotation: number): string {
    if (rotation === 0) return text;

    return text.replace(LATIN_LETTER, (match) => {
        const charCode = match.charCodeAt(0);
        const baseCharCode = charCode >= LOWER_BASE ? LOWER_BASE : UPPER_BASE;
        const shiftedCharCode = ((charCode - baseCharCode + rotation) % ALPHABET_SIZE) + baseCharCode;
        return String.fromCharCode(shiftedCharCode);
    });
}

// Encrypts text with a Caesar shift
//
// Example:
//
// encryptCaesar("Hello, World!", 3)
//
// Output: Khoor, Zruog!
//
export function encryptCaesar(text: string, shift: number): string {
    return rotate(text, normalizeShift(shift));
}

// Decrypts Caesar-shifted text. Takes the same shift that was used to encrypt.
//
// Example:
//
// decryptCaesar("Khoor, Zruog!", 3)
//
// Output: Hello, World!
//
export function decryptCaesar(text: string, shift: number): string {
    return rotate(text, (ALPHABET_SIZE - normalizeShift(shift)) % ALPHABET_SIZE);
}
