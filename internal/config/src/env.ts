import { type StandardSchemaV1, createEnv } from "@t3-oss/env-core"
import { z } from "zod"

const flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((v) => v === "true")

export const env = createEnv({
  shared: {
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  },
  server: {
    DATABASE_URL: z.string().url(),
    DATABASE_READ1_URL: z.string().url().optional(),
    DATABASE_READ2_URL: z.string().url().optional(),
    VPN_API_URL: z.string().url(),
    VPN_API_TOKEN: z.string().min(1),
    VPN_API_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    VPN_API_IDEMPOTENT: flag,
    PROVISIONING_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(4),
    PROVISIONING_BASE_DELAY_MS: z.coerce.number().int().min(0).default(200),
    PROVISIONING_MAX_DELAY_MS: z.coerce.number().int().min(0).default(5_000),
    MAX_PEERS_PER_USER: z.coerce.number().int().min(1).default(3),
    LOCK_TTL_MS: z.coerce.number().int().positive().default(30_000),
    LOCK_WAIT_MS: z.coerce.number().int().min(0).default(5_000),
    INTENT_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    EXPIRY_SWEEP_BATCH: z.coerce.number().int().positive().default(200),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "off"]).default("info"),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  onValidationError: (issues: readonly StandardSchemaV1.Issue[]) => {
    console.error("❌ Invalid environment variables:", issues)
    throw new Error("Invalid environment variables")
  },
})
