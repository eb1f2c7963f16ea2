import type { HashOracleError } from "../errors"

export type Word = bigint

// Eight 32-bit sub-words, least significant first.
export type FieldElementArray = readonly [Word, Word, Word, Word, Word, Word, Word, Word]

// Four 64-bit words, least significant first.
export type Digest = readonly [Word, Word, Word, Word]

export type CapacityVector = Digest

// 32-byte tree leaf address, big-endian.
export type Key = Uint8Array

export type ScalarLike = bigint | string | Uint8Array

export type FieldWidth = 160 | 256

export type SafeResult<T> = [undefined, T]
export type SafeError<E extends Error> = [E, undefined]
export type Safe<T, E extends Error = Error> = SafeError<E> | SafeResult<T>

/**
 * Circuit-friendly hash with a fixed rate of 8 words and a capacity of 4 words.
 * Implementations reject words outside their field with a HashOracleError.
 */
export interface HashOracle {
    hash(input: FieldElementArray, capacity: CapacityVector): Safe<Digest, HashOracleError>
}
