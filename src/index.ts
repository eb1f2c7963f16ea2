export { default as KeyDeriver, DEFAULT_CAPACITY_SEED, ZERO_CAPACITY, defaultCapacity } from "./key-deriver"
export { LeafType, AccountLeafType } from "./leaf-type"
export { encode, FIELD_ELEMENTS, FIELD_ELEMENT_BYTES } from "./field-encoder"
export {
    digestToKey,
    keyToDigest,
    hexToDigest,
    scalarToDigest,
    digestToScalar,
    keyToHex,
    keyToBigInt,
    compareKeys,
    KEY_BYTES,
    DIGEST_WORDS,
} from "./digest-codec"
export { EncodingError, FormatError, HashOracleError } from "./errors"
export { safeError, safeResult } from "./safe"
export { toScalar, checkHex } from "./utils"
export { buildPoseidonOracle, createSha256Oracle, createOracle } from "./oracles"
export { loadEnv, parseEnv, Env, OracleName } from "./config"
export { logger } from "./logger"
export * from "./types"
