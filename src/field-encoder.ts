import { numberToBytes } from "viem"
import { EncodingError } from "./errors"
import { safeError, safeResult } from "./safe"
import { FieldElementArray, FieldWidth, Safe } from "./types"

export const FIELD_ELEMENTS = 8
export const FIELD_ELEMENT_BYTES = 4

/**
 * Splits a non-negative integer into eight 32-bit sub-words that are below any
 * field modulus the hash may work in.
 *
 * The integer is written as 32 big-endian bytes and cut into 4-byte groups. Each
 * group is read as a big-endian uint32 and the groups are placed least
 * significant first, so `encode(n)[i] === (n >> 32i) & 0xffffffff`. Sub-words
 * above `widthBits` are always zero.
 * @param n The integer to encode.
 * @param widthBits 160 for an address, 256 for a storage position.
 * @returns The eight sub-words, or an EncodingError if `n` does not fit.
 */
export function encode(n: bigint, widthBits: FieldWidth): Safe<FieldElementArray, EncodingError> {
    if (n < 0n) {
        return safeError(new EncodingError(`Cannot encode negative value ${n}`))
    }

    if (n >> BigInt(widthBits) !== 0n) {
        return safeError(new EncodingError(`Value 0x${n.toString(16)} does not fit in ${widthBits} bits`))
    }

    const bytes = numberToBytes(n, { size: FIELD_ELEMENTS * FIELD_ELEMENT_BYTES })
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    const group = (i: number): bigint => BigInt(view.getUint32((FIELD_ELEMENTS - 1 - i) * FIELD_ELEMENT_BYTES))

    const words: FieldElementArray = [group(0), group(1), group(2), group(3), group(4), group(5), group(6), group(7)]
    return safeResult(words)
}
