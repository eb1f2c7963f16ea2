import { HashOracleError } from "../errors"
import { CapacityVector, Digest, FieldElementArray } from "../types"

export const WORD_LIMIT = 1n << 64n

/**
 * Lays out an oracle call as one sequence: capacity first, then the rate input.
 */
export function absorb(input: FieldElementArray, capacity: CapacityVector): bigint[] {
    return [...capacity, ...input]
}

/**
 * @returns An error naming the first word that is negative or not below `limit`.
 */
export function checkWords(words: readonly bigint[], limit: bigint, oracle: string): HashOracleError | undefined {
    const index = words.findIndex(w => w < 0n || w >= limit)
    if (index === -1) {
        return undefined
    }

    return new HashOracleError(`${oracle}: word ${index} (${words[index]}) is outside the field`)
}

/**
 * Digest words must be 64-bit; anything else would alias another key once
 * serialized.
 */
export function checkDigest(digest: Digest): HashOracleError | undefined {
    const index = digest.findIndex(w => w < 0n || w >= WORD_LIMIT)
    if (index === -1) {
        return undefined
    }

    return new HashOracleError(`digest word ${index} (${digest[index]}) is not a 64-bit word`)
}
