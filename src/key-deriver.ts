import { digestToKey, hexToDigest } from "./digest-codec"
import { EncodingError, FormatError } from "./errors"
import { encode } from "./field-encoder"
import { AccountLeafType, LeafType } from "./leaf-type"
import { checkDigest } from "./oracles/words"
import { safeError, safeResult } from "./safe"
import { toScalar } from "./utils"
import { CapacityVector, FieldElementArray, FieldWidth, HashOracle, Key, Safe, ScalarLike } from "./types"

/**
 * Seed of the capacity shared by balance, nonce, code and code length keys.
 * Every implementation addressing the same tree must use this exact value.
 */
export const DEFAULT_CAPACITY_SEED = "0xc71603f33a1144ca7953db0ab48808f4c4055e3364a246c33c18a9786cb0b359"

export const ZERO_CAPACITY: CapacityVector = Object.freeze([0n, 0n, 0n, 0n] as const)

let cachedDefaultCapacity: CapacityVector | undefined

/**
 * The default capacity, parsed from DEFAULT_CAPACITY_SEED on first use and
 * cached read-only afterwards.
 */
export function defaultCapacity(): Safe<CapacityVector, FormatError> {
    if (cachedDefaultCapacity === undefined) {
        const [error, digest] = hexToDigest(DEFAULT_CAPACITY_SEED)
        if (error) {
            return safeError(error)
        }
        cachedDefaultCapacity = Object.freeze(digest)
    }

    return safeResult(cachedDefaultCapacity)
}

/**
 * Derives the sparse Merkle tree keys of account attributes.
 *
 * Every key is one call to the hash oracle over an 8-word preimage
 *
 *     [addr[0], addr[1], addr[2], addr[3], addr[4], 0, leafType, 0]
 *
 * where `addr` is the address split into 32-bit sub-words, least significant
 * first. The capacity separates the domains:
 * - balance, nonce, code and code length keys use the default capacity and differ
 *   by the leaf type tag;
 * - a storage key uses `H(position, [0, 0, 0, 0])` as its capacity, which binds the
 *   key to both the account and the slot while keeping every call 8 words wide.
 *
 * Inputs are encoded before the oracle is first called, so an out-of-range input
 * never reaches it. Oracle errors are returned as they are, never retried.
 */
export default class KeyDeriver {
    private oracle: HashOracle // Circuit-friendly hash.

    /**
     * @param oracle Hash used for every key.
     */
    constructor(oracle: HashOracle) {
        this.oracle = oracle
    }

    /**
     * Derives the key of the balance leaf of an account.
     * @param address The account address, up to 160 bits.
     * @returns The key, or an encoding or oracle error.
     */
    deriveBalanceKey(address: ScalarLike): Safe<Key> {
        return this.deriveAccountKey(address, LeafType.Balance)
    }

    /**
     * Derives the key of the nonce leaf of an account.
     * @param address The account address, up to 160 bits.
     * @returns The key, or an encoding or oracle error.
     */
    deriveNonceKey(address: ScalarLike): Safe<Key> {
        return this.deriveAccountKey(address, LeafType.Nonce)
    }

    /**
     * Derives the key of the leaf holding the contract bytecode hash.
     * @param address The contract address, up to 160 bits.
     * @returns The key, or an encoding or oracle error.
     */
    deriveCodeKey(address: ScalarLike): Safe<Key> {
        return this.deriveAccountKey(address, LeafType.Code)
    }

    /**
     * Derives the key of the leaf holding the contract bytecode length.
     * @param address The contract address, up to 160 bits.
     * @returns The key, or an encoding or oracle error.
     */
    deriveCodeLengthKey(address: ScalarLike): Safe<Key> {
        return this.deriveAccountKey(address, LeafType.CodeLength)
    }

    /**
     * Derives the key of one storage slot of a contract.
     * @param address The contract address, up to 160 bits.
     * @param storagePosition The slot, up to 256 bits.
     * @returns The key, or the first encoding or oracle error.
     */
    deriveStorageKey(address: ScalarLike, storagePosition: ScalarLike): Safe<Key> {
        const [positionError, position] = encodeScalar(storagePosition, 256)
        if (positionError) {
            return safeError(positionError)
        }

        const [addressError, addr] = encodeScalar(address, 160)
        if (addressError) {
            return safeError(addressError)
        }

        const [hashError, positionCapacity] = this.oracle.hash(position, ZERO_CAPACITY)
        if (hashError) {
            return safeError(hashError)
        }

        const badCapacity = checkDigest(positionCapacity)
        if (badCapacity) {
            return safeError(badCapacity)
        }

        return this.hashAddress(addr, LeafType.Storage, positionCapacity)
    }

    /**
     * Derives the key of a leaf that depends on the address alone.
     * @param address The account address, up to 160 bits.
     * @param leafType Which attribute of the account the leaf holds.
     */
    deriveAccountKey(address: ScalarLike, leafType: AccountLeafType): Safe<Key> {
        const [capacityError, capacity] = defaultCapacity()
        if (capacityError) {
            return safeError(capacityError)
        }

        const [addressError, addr] = encodeScalar(address, 160)
        if (addressError) {
            return safeError(addressError)
        }

        return this.hashAddress(addr, leafType, capacity)
    }

    private hashAddress(addr: FieldElementArray, leafType: LeafType, capacity: CapacityVector): Safe<Key> {
        const preimage: FieldElementArray = [addr[0], addr[1], addr[2], addr[3], addr[4], 0n, BigInt(leafType), 0n]

        const [hashError, digest] = this.oracle.hash(preimage, capacity)
        if (hashError) {
            return safeError(hashError)
        }

        const badDigest = checkDigest(digest)
        if (badDigest) {
            return safeError(badDigest)
        }

        return safeResult(digestToKey(digest))
    }
}

function encodeScalar(value: ScalarLike, widthBits: FieldWidth): Safe<FieldElementArray, EncodingError> {
    const [error, n] = toScalar(value)
    if (error) {
        return safeError(error)
    }

    return encode(n, widthBits)
}
