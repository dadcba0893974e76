import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const envSchema = z
  .object({
    DATABASE_URL: z.string().min(1).optional(),
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    OBJECTDB_CONFIG_DIR: z.string().min(1).default("config/templates"),
    OBJECTDB_EUID_ENVIRONMENT: z.enum(["production", "sandbox"]).default("production"),
    OBJECTDB_SANDBOX_PREFIX: z.string().trim().length(1).optional(),
    OBJECTDB_EXTRA_PREFIXES: z
      .string()
      .default("")
      .transform((raw) =>
        raw
          .split(",")
          .map((p) => p.trim())
          .filter((p) => p.length > 0),
      ),
    OBJECTDB_SEED_ON_START: booleanFlag,
    OBJECTDB_SEED_OVERWRITE: booleanFlag,
  })
  .refine((env) => env.OBJECTDB_EUID_ENVIRONMENT !== "sandbox" || env.OBJECTDB_SANDBOX_PREFIX !== undefined, {
    message: "OBJECTDB_SANDBOX_PREFIX is required when OBJECTDB_EUID_ENVIRONMENT is sandbox",
    path: ["OBJECTDB_SANDBOX_PREFIX"],
  });

export type ServerConfig = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid environment: ${detail}`);
  }
  return parsed.data;
}
