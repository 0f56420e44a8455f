import dotenv from "dotenv";
import { existsSync } from "fs";
import { resolve as pathResolve } from "path";
import { z } from "zod";

// Runtime configuration.
// .env is resolved from deterministic locations so startup cwd does not matter,
// then process.env is parsed once. Modules read `config`, never process.env.

const envPathCandidates = [
  pathResolve(__dirname, "..", "..", ".env"),
  pathResolve(process.cwd(), ".env"),
];

const resolvedEnvPath = envPathCandidates.find((p) => existsSync(p));
if (resolvedEnvPath) {
  dotenv.config({ path: resolvedEnvPath });
}

const BooleanFlag = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((v) => v === "true" || v === "1");

const PositiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const ConflictPolicySchema = z.enum(["reject", "warn"]);
export type ConflictPolicy = z.infer<typeof ConflictPolicySchema>;

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: PositiveInt(3001),

  DATABASE_URL: z.string().min(1).optional(),
  DB_POOL_MAX: PositiveInt(20),
  DB_IDLE_TIMEOUT: PositiveInt(30000),
  DB_CONNECT_TIMEOUT: PositiveInt(5000),
  DB_SSL: z.enum(["true", "false"]).default("true"),
  DB_SSL_REJECT_UNAUTHORIZED: z.enum(["true", "false"]).default("true"),

  JWT_SECRET: z.string().min(1).default("allergies-dev-secret-change-in-production"),
  DISABLE_AUTH: BooleanFlag,

  CORS_ORIGINS: z.string().optional(),

  CATALOG_CONFLICT_POLICY: ConflictPolicySchema.default("reject"),
});

export interface AppConfig {
  readonly nodeEnv: "development" | "test" | "production";
  readonly port: number;
  readonly database: {
    readonly url?: string;
    readonly poolMax: number;
    readonly idleTimeoutMillis: number;
    readonly connectionTimeoutMillis: number;
    readonly ssl: false | { readonly rejectUnauthorized: boolean };
  };
  readonly jwtSecret: string;
  readonly disableAuth: boolean;
  readonly corsOrigins: readonly string[];
  readonly catalogConflictPolicy: ConflictPolicy;
}

const DEFAULT_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://127.0.0.1:3000",
];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment configuration: ${detail}`);
  }

  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    database: {
      url: e.DATABASE_URL,
      poolMax: e.DB_POOL_MAX,
      idleTimeoutMillis: e.DB_IDLE_TIMEOUT,
      connectionTimeoutMillis: e.DB_CONNECT_TIMEOUT,
      ssl: e.DB_SSL === "false"
        ? false
        : { rejectUnauthorized: e.DB_SSL_REJECT_UNAUTHORIZED !== "false" },
    },
    jwtSecret: e.JWT_SECRET,
    disableAuth: e.DISABLE_AUTH,
    corsOrigins: e.CORS_ORIGINS
      ? e.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
      : DEFAULT_ORIGINS,
    catalogConflictPolicy: e.CATALOG_CONFLICT_POLICY,
  };
}

export const config: AppConfig = loadConfig();
