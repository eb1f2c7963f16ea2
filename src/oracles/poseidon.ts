import { buildPoseidonReference } from "circomlibjs"
import { scalarToDigest } from "../digest-codec"
import { HashOracleError } from "../errors"
import { logger } from "../logger"
import { safeError, safeResult } from "../safe"
import { HashOracle } from "../types"
import { absorb, checkWords, WORD_LIMIT } from "./words"

/**
 * Poseidon over the BN254 scalar field, absorbing the 12 words
 * `capacity || input` in a single permutation. The output element is split
 * into four 64-bit words, least significant first.
 */
export async function buildPoseidonOracle(): Promise<HashOracle> {
    const poseidon = await buildPoseidonReference()
    const F = poseidon.F
    const modulus: bigint = F.p
    const limit = modulus < WORD_LIMIT ? modulus : WORD_LIMIT

    logger.debug("Poseidon oracle ready", { modulus: modulus.toString(16) })

    return {
        hash(input, capacity) {
            const words = absorb(input, capacity)
            const outOfRange = checkWords(words, limit, "poseidon")
            if (outOfRange) {
                return safeError(outOfRange)
            }

            let out: bigint
            try {
                out = F.toObject(poseidon(words))
            } catch (error) {
                return safeError(new HashOracleError("poseidon: permutation failed", { cause: error }))
            }

            return safeResult(scalarToDigest(out))
        },
    }
}
