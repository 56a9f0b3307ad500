// server/src/config/env.ts
/** Environment loader: reads .env, validates with Zod, exports typed config and CORS origins array. */
import "dotenv/config";
import { z } from "zod";

const boolFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((v) => v.trim().toLowerCase() === "true");

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86_400 };

/** "900" | "15m" | "12h" | "7d" -> seconds */
const durationSeconds = z
  .string()
  .trim()
  .regex(/^\d+[smhd]?$/, "expected a duration such as 900, 15m, 12h or 7d")
  .transform((v) => {
    const unit = /[smhd]$/.test(v) ? v.slice(-1) : "s";
    return parseInt(v, 10) * (UNIT_SECONDS[unit] ?? 1);
  });

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://localhost:3000"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info"),

  // Data layer
  STORE_DRIVER: z.enum(["mongo", "memory"]).default("mongo"),
  MONGO_URI: z.string().default("mongodb://localhost:27017/dealership_dev"),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_NAMESPACE: z.string().default("dealership:dev"),

  // Auth (tokens are issued by the identity service; we only verify them)
  JWT_SECRET: z
    .string()
    .min(16, "JWT_SECRET must be at least 16 chars")
    .default("dev_only_change_me"),
  JWT_ACCESS_TTL: durationSeconds.default("15m"),
  JWT_ISS: z.string().default("dealership-auth"),
  JWT_AUD: z.string().default("dealership-clients"),

  // Per-vehicle locking
  LOCK_DRIVER: z.enum(["redis", "memory"]).default("redis"),
  LOCK_TTL_MS: z.coerce.number().int().min(100).default(10_000),
  LOCK_WAIT_MS: z.coerce.number().int().min(0).default(3_000),
  LOCK_RETRY_MS: z.coerce.number().int().min(5).default(50),

  // Reservation policy
  ALLOW_MIDTERM_CANCEL: boolFlag("false"),
  AVAILABILITY_SWEEP_MS: z.coerce.number().int().min(0).default(60_000), // 0 disables
});

export type Env = z.infer<typeof EnvSchema>;

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  // Pretty-print Zod issues then exit
  console.error("Invalid environment variables:", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;

// parsed CORS allowlist as array
export const corsOrigins = env.CORS_ORIGINS.split(",")
  .map((s) => s.trim())
  .filter(Boolean);
