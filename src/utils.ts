import { bytesToBigInt, hexToBigInt } from "viem"
import { EncodingError } from "./errors"
import { safeError, safeResult } from "./safe"
import { Safe, ScalarLike } from "./types"

/**
 * Checks if a string is a hexadecimal number, with or without the `0x` prefix.
 * @param n A candidate hexadecimal string.
 * @param digits If given, the exact number of digits required.
 * @returns True if the string is a hexadecimal, false otherwise.
 */
export function checkHex(n: string, digits?: number): boolean {
    const body = stripHexPrefix(n)

    if (!/^[0-9A-Fa-f]+$/.test(body)) {
        return false
    }

    return digits === undefined || body.length === digits
}

export function stripHexPrefix(n: string): string {
    return n.startsWith("0x") || n.startsWith("0X") ? n.slice(2) : n
}

/**
 * Reads an address or storage position into a non-negative integer.
 * Byte arrays and hex strings are big-endian.
 */
export function toScalar(value: ScalarLike): Safe<bigint, EncodingError> {
    if (typeof value === "bigint") {
        if (value < 0n) {
            return safeError(new EncodingError(`Value ${value} is negative`))
        }
        return safeResult(value)
    }

    if (typeof value === "string") {
        if (!checkHex(value)) {
            return safeError(new EncodingError(`Value "${value}" is not a hexadecimal`))
        }
        return safeResult(hexToBigInt(`0x${stripHexPrefix(value)}`))
    }

    return safeResult(value.length === 0 ? 0n : bytesToBigInt(value))
}
