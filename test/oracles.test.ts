import { digestToScalar } from "../src/digest-codec"
import { HashOracleError } from "../src/errors"
import { buildPoseidonOracle, createOracle, createSha256Oracle } from "../src/oracles"
import { CapacityVector, FieldElementArray, HashOracle } from "../src/types"

const input: FieldElementArray = [1n, 2n, 3n, 4n, 5n, 0n, 0n, 0n]
const zero: CapacityVector = [0n, 0n, 0n, 0n]
const other: CapacityVector = [0n, 0n, 0n, 1n]

function behavesLikeAHash(name: string, build: () => Promise<HashOracle>) {
    describe(name, () => {
        let oracle: HashOracle

        beforeAll(async () => {
            oracle = await build()
        }, 60000)

        it("Should be deterministic", () => {
            expect(oracle.hash(input, zero)).toEqual(oracle.hash(input, zero))
        })

        it("Should return four 64-bit words", () => {
            const [error, digest] = oracle.hash(input, zero)

            expect(error).toBeUndefined()
            expect(digest).toHaveLength(4)
            expect(digest?.every(w => w >= 0n && w < 1n << 64n)).toBeTruthy()
        })

        it("Should depend on the capacity", () => {
            const [, a] = oracle.hash(input, zero)
            const [, b] = oracle.hash(input, other)

            expect(a).not.toEqual(b)
        })

        it("Should depend on every input word", () => {
            const [, a] = oracle.hash(input, zero)
            const [, b] = oracle.hash([1n, 2n, 3n, 4n, 5n, 0n, 0n, 1n], zero)

            expect(a).not.toEqual(b)
        })

        it("Should reject words outside the field", () => {
            const [error, digest] = oracle.hash(input, [1n << 64n, 0n, 0n, 0n])

            expect(error).toBeInstanceOf(HashOracleError)
            expect(digest).toBeUndefined()
        })

        it("Should reject negative words", () => {
            const [error] = oracle.hash([-1n, 0n, 0n, 0n, 0n, 0n, 0n, 0n], zero)

            expect(error).toBeInstanceOf(HashOracleError)
            expect(error?.message).toBe(`${name}: word 4 (-1) is outside the field`)
        })
    })
}

describe("Hash oracles", () => {
    behavesLikeAHash("sha256", async () => createSha256Oracle())
    behavesLikeAHash("poseidon", buildPoseidonOracle)

    it("Should keep Poseidon output below the BN254 modulus", async () => {
        const oracle = await buildPoseidonOracle()
        const [, digest] = oracle.hash(input, zero)
        const modulus = 21888242871839275222246405745257275088548364400416034343698204186575808495617n

        expect(digest && digestToScalar(digest) < modulus).toBeTruthy()
    }, 60000)

    it("Should pick an oracle by name", async () => {
        const byName = await createOracle("sha256")

        expect(byName.hash(input, zero)).toEqual(createSha256Oracle().hash(input, zero))
    })
})
