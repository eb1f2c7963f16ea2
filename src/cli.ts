#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander"
import { envSchema, loadEnv, OracleName } from "./config"
import { keyToHex } from "./digest-codec"
import KeyDeriver, { defaultCapacity } from "./key-deriver"
import { logger } from "./logger"
import { createOracle } from "./oracles"
import { Key, Safe } from "./types"

interface DeriveOptions {
    oracle?: OracleName
}

function parseOracle(value: string): OracleName {
    const parsed = envSchema.shape.KEY_ORACLE.safeParse(value)
    if (!parsed.success) {
        throw new InvalidArgumentError("Expected poseidon or sha256.")
    }
    return parsed.data
}

function report(result: Safe<Key>) {
    const [error, key] = result
    if (error) {
        logger.error("Key derivation failed", error)
        process.exitCode = 1
        return
    }
    console.log(keyToHex(key))
}

/**
 * Builds the `smt-keys` command line. Each subcommand derives one key and prints
 * it as hex.
 * @param defaults Configuration used when `--oracle` is not given.
 */
export function createProgram(defaults: { oracle: OracleName }): Command {
    const program = new Command("smt-keys")
        .description("Derive sparse Merkle tree leaf keys for account state")

    const deriver = async (options: DeriveOptions) => {
        const name = options.oracle ?? defaults.oracle
        logger.debug("Using hash oracle", { name })
        return new KeyDeriver(await createOracle(name))
    }

    const accountCommand = (name: string, description: string, derive: (d: KeyDeriver, address: string) => Safe<Key>) =>
        program
            .command(name)
            .description(description)
            .argument("<address>", "20-byte account address in hex")
            .option("--oracle <name>", "hash oracle: poseidon or sha256", parseOracle)
            .action(async (address: string, options: DeriveOptions) => {
                report(derive(await deriver(options), address))
            })

    accountCommand("balance", "Key of the balance leaf", (d, address) => d.deriveBalanceKey(address))
    accountCommand("nonce", "Key of the nonce leaf", (d, address) => d.deriveNonceKey(address))
    accountCommand("code", "Key of the contract code leaf", (d, address) => d.deriveCodeKey(address))
    accountCommand("code-length", "Key of the contract code length leaf", (d, address) => d.deriveCodeLengthKey(address))

    program
        .command("storage")
        .description("Key of a contract storage slot leaf")
        .argument("<address>", "20-byte contract address in hex")
        .argument("<position>", "storage position in hex, up to 32 bytes")
        .option("--oracle <name>", "hash oracle: poseidon or sha256", parseOracle)
        .action(async (address: string, position: string, options: DeriveOptions) => {
            report((await deriver(options)).deriveStorageKey(address, position))
        })

    program
        .command("capacity")
        .description("Print the default capacity words, least significant first")
        .action(() => {
            const [error, capacity] = defaultCapacity()
            if (error) {
                logger.error("Default capacity is malformed", error)
                process.exitCode = 1
                return
            }
            capacity.forEach(word => console.log(`0x${word.toString(16).padStart(16, "0")}`))
        })

    return program
}

async function main() {
    const env = loadEnv()
    logger.setLevel(env.LOG_LEVEL)
    await createProgram({ oracle: env.KEY_ORACLE }).parseAsync(process.argv)
}

if (require.main === module) {
    main().catch(error => {
        logger.error("smt-keys failed", error)
        process.exitCode = 1
    })
}
