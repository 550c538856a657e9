import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),

  // Snapklik search API
  SNAPKLIK_API_URL: z.string().url().default("https://sk-backend-xxhrslt5oq-uc.a.run.app/a/sr/"),
  SNAPKLIK_SEARCH_TERM: z.string().min(1).default("skin care"),
  SNAPKLIK_PAGE_DELAY_MS: z.coerce.number().min(0).default(1_000),
  SNAPKLIK_TIMEOUT_MS: z.coerce.number().min(1).default(10_000),
  SNAPKLIK_MAX_PAGES: z.coerce.number().int().min(1).default(100),

  // Saved search page used when the API is unreachable
  HTML_SNAPSHOT_PATH: z.string().default("debug.html"),

  // Output tables
  PRODUCTS_CSV_PATH: z.string().default("output/snapklik-products.csv"),
  GROUPED_CSV_PATH: z.string().default("output/grouped-skincare-products.csv"),
  GROUP_TOP_N: z.coerce.number().int().min(1).default(3),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}
