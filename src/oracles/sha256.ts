import sha256 from "crypto-js/sha256"
import Hex from "crypto-js/enc-hex"
import { hexToDigest } from "../digest-codec"
import { HashOracleError } from "../errors"
import { safeError, safeResult } from "../safe"
import { HashOracle } from "../types"
import { absorb, checkWords, WORD_LIMIT } from "./words"

/**
 * SHA-256 over the 96 bytes `capacity || input`, each word written as 8
 * big-endian bytes. Not circuit-friendly: meant for tooling and tests that need
 * a real collision-resistant hash without a proving backend.
 */
export function createSha256Oracle(): HashOracle {
    return {
        hash(input, capacity) {
            const words = absorb(input, capacity)
            const outOfRange = checkWords(words, WORD_LIMIT, "sha256")
            if (outOfRange) {
                return safeError(outOfRange)
            }

            const message = words.map(w => w.toString(16).padStart(16, "0")).join("")
            const [formatError, digest] = hexToDigest(sha256(Hex.parse(message)).toString(Hex))
            if (formatError) {
                return safeError(new HashOracleError("sha256: unexpected digest length", { cause: formatError }))
            }

            return safeResult(digest)
        },
    }
}
