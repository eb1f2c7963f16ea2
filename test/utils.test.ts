import { EncodingError } from "../src/errors"
import { checkHex, stripHexPrefix, toScalar } from "../src/utils"

describe("Utility functions", () => {
    describe("Check hexadecimal", () => {
        it("Should return true if the number is a hexadecimal", () => {
            expect(checkHex("be12")).toBeTruthy()
            expect(checkHex("0xBE12")).toBeTruthy()
        })

        it("Should return false if the number is not a hexadecimal", () => {
            expect(checkHex("gbe12")).toBeFalsy()
            expect(checkHex("0x")).toBeFalsy()
            expect(checkHex("")).toBeFalsy()
        })

        it("Should check the number of digits when asked", () => {
            expect(checkHex("0x00ff", 4)).toBeTruthy()
            expect(checkHex("0x00ff", 6)).toBeFalsy()
        })
    })

    describe("Strip hexadecimal prefix", () => {
        it("Should drop a leading 0x only", () => {
            expect(stripHexPrefix("0xab")).toBe("ab")
            expect(stripHexPrefix("0Xab")).toBe("ab")
            expect(stripHexPrefix("ab0x")).toBe("ab0x")
        })
    })

    describe("Convert inputs to integers", () => {
        it("Should read hexadecimals with and without prefix", () => {
            expect(toScalar("0x0100")).toEqual([undefined, 256n])
            expect(toScalar("ff")).toEqual([undefined, 255n])
        })

        it("Should read bytes as big-endian", () => {
            expect(toScalar(new Uint8Array([0x01, 0x02]))).toEqual([undefined, 0x0102n])
            expect(toScalar(new Uint8Array(0))).toEqual([undefined, 0n])
        })

        it("Should pass non-negative big numbers through", () => {
            expect(toScalar(42n)).toEqual([undefined, 42n])
        })

        it("Should reject negative numbers and malformed strings", () => {
            const [negativeError] = toScalar(-1n)
            expect(negativeError).toBeInstanceOf(EncodingError)

            const [hexError, value] = toScalar("0xzz")
            expect(hexError).toBeInstanceOf(EncodingError)
            expect(value).toBeUndefined()
        })
    })
})
