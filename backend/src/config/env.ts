import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

dotenv.config({ path: path.resolve(__dirname, "../../../.env") });

const ConfigSchema = z.object({
  databasePath: z.string().min(1).default("./data/inventory.db"),
  databaseBusyTimeoutMs: z.number().int().nonnegative().default(5000),
  uploadDir: z.string().min(1).default("./data/uploads"),
  maxImageSizeBytes: z.number().int().positive().default(5 * 1024 * 1024),
  pageSize: z.number().int().positive().max(100).default(10),
  port: z.number().int().nonnegative().default(3001),
  corsOrigin: z.string().default("http://localhost:5173"),
  rateLimitWindowMs: z.number().int().positive().default(60000),
  rateLimitMaxWrites: z.number().int().positive().default(60),
  logLevel: z
    .enum(["trace", "debug", "info", "warn", "error", "silent"])
    .default("info"),
  nodeEnv: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

function parseInteger(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const rawConfig = {
    databasePath: env.DATABASE_PATH,
    databaseBusyTimeoutMs: parseInteger(env.DATABASE_BUSY_TIMEOUT_MS),
    uploadDir: env.UPLOAD_DIR,
    maxImageSizeBytes: parseInteger(env.MAX_IMAGE_SIZE_BYTES),
    pageSize: parseInteger(env.PAGE_SIZE),
    port: parseInteger(env.PORT),
    corsOrigin: env.CORS_ORIGIN,
    rateLimitWindowMs: parseInteger(env.RATE_LIMIT_WINDOW_MS),
    rateLimitMaxWrites: parseInteger(env.RATE_LIMIT_MAX_WRITES),
    // Test runs stay quiet unless a level is asked for explicitly
    logLevel: env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : undefined),
    nodeEnv: env.NODE_ENV,
  };

  return ConfigSchema.parse(rawConfig);
}

export function getConfig(): Config {
  if (config) {
    return config;
  }

  config = loadConfig();
  return config;
}

export function resetConfig(): void {
  config = null;
}
