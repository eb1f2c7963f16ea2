/**
 * An integer does not fit the width it is encoded into, is negative, or is not
 * an integer at all.
 */
export class EncodingError extends Error {
    readonly name = "EncodingError"
}

/**
 * A hex constant or a key does not have the expected shape.
 */
export class FormatError extends Error {
    readonly name = "FormatError"
}

/**
 * Raised by hash oracles. Key derivation hands it back to the caller untouched.
 */
export class HashOracleError extends Error {
    readonly name = "HashOracleError"
}
