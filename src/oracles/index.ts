import { OracleName } from "../config"
import { HashOracle } from "../types"
import { buildPoseidonOracle } from "./poseidon"
import { createSha256Oracle } from "./sha256"

export { buildPoseidonOracle, createSha256Oracle }

export async function createOracle(name: OracleName): Promise<HashOracle> {
    switch (name) {
        case "poseidon":
            return buildPoseidonOracle()
        case "sha256":
            return createSha256Oracle()
    }
}
