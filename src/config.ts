import { config as dotenvConfig } from "dotenv"
import { z } from "zod"

export const envSchema = z.object({
    LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
    KEY_ORACLE: z.enum(["poseidon", "sha256"]).default("poseidon"),
})

export type Env = z.infer<typeof envSchema>

export type OracleName = Env["KEY_ORACLE"]

/**
 * Validates configuration taken from an environment-like record.
 * @throws ZodError on an unknown log level or oracle name.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    return envSchema.parse(source)
}

/**
 * Loads `.env` (if present) into the process environment, then validates it.
 * @param envPath Optional path to the .env file.
 */
export function loadEnv(envPath?: string): Env {
    dotenvConfig({ path: envPath })
    return parseEnv(process.env)
}
