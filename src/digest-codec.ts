import { bytesToBigInt, bytesToHex, Hex } from "viem"
import { FormatError } from "./errors"
import { safeError, safeResult } from "./safe"
import { checkHex, stripHexPrefix } from "./utils"
import { Digest, Key, Safe } from "./types"

export const KEY_BYTES = 32
export const DIGEST_WORDS = 4
const WORD_BYTES = 8
const WORD_BITS = 64n
const WORD_MASK = (1n << WORD_BITS) - 1n

/**
 * Serializes a digest into the canonical 32-byte key. Words are written most
 * significant first, each as 8 big-endian bytes.
 */
export function digestToKey(d: Digest): Key {
    const key = new Uint8Array(KEY_BYTES)
    const view = new DataView(key.buffer)

    for (let i = 0; i < DIGEST_WORDS; i += 1) {
        view.setBigUint64(i * WORD_BYTES, d[DIGEST_WORDS - 1 - i])
    }

    return key
}

/**
 * Reads a key back into the digest it was serialized from.
 * @param key A 32-byte key.
 * @returns The digest, or a FormatError if the key is not 32 bytes.
 */
export function keyToDigest(key: Key): Safe<Digest, FormatError> {
    if (key.length !== KEY_BYTES) {
        return safeError(new FormatError(`Key must be ${KEY_BYTES} bytes, got ${key.length}`))
    }

    const view = new DataView(key.buffer, key.byteOffset, key.byteLength)
    const word = (i: number): bigint => view.getBigUint64((DIGEST_WORDS - 1 - i) * WORD_BYTES)
    const digest: Digest = [word(0), word(1), word(2), word(3)]

    return safeResult(digest)
}

/**
 * Parses a 64-digit hex constant into a digest. The last 16 digits become
 * word 0.
 * @param s A hexadecimal string, with or without `0x`.
 * @returns The digest, or a FormatError on a wrong length or a non-hex digit.
 */
export function hexToDigest(s: string): Safe<Digest, FormatError> {
    const digits = KEY_BYTES * 2

    if (!checkHex(s, digits)) {
        return safeError(new FormatError(`Expected ${digits} hexadecimal digits, got "${s}"`))
    }

    const body = stripHexPrefix(s)
    const word = (i: number): bigint => {
        const end = digits - i * WORD_BYTES * 2
        return BigInt(`0x${body.slice(end - WORD_BYTES * 2, end)}`)
    }
    const digest: Digest = [word(0), word(1), word(2), word(3)]

    return safeResult(digest)
}

/**
 * Splits an integer below 2^256 into four 64-bit words, least significant first.
 * Higher bits are dropped.
 */
export function scalarToDigest(n: bigint): Digest {
    const word = (i: number): bigint => (n >> (WORD_BITS * BigInt(i))) & WORD_MASK
    return [word(0), word(1), word(2), word(3)]
}

/**
 * Joins the four words of a digest into the integer they denote.
 */
export function digestToScalar(d: Digest): bigint {
    return d.reduceRight((acc, word) => (acc << WORD_BITS) | (word & WORD_MASK), 0n)
}

/**
 * @returns The key as `0x` followed by 64 lowercase digits.
 */
export function keyToHex(key: Key): Hex {
    return bytesToHex(key)
}

/**
 * @returns The key read as a big-endian integer.
 */
export function keyToBigInt(key: Key): bigint {
    return key.length === 0 ? 0n : bytesToBigInt(key)
}

/**
 * Orders two keys by their big-endian integer value.
 * @returns -1, 0 or 1.
 */
export function compareKeys(a: Key, b: Key): -1 | 0 | 1 {
    const x = keyToBigInt(a)
    const y = keyToBigInt(b)
    return x < y ? -1 : x > y ? 1 : 0
}
