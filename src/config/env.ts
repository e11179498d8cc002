import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

export function parseDotEnvLine(line: string): [string, string] | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith("#")) {
    return null;
  }

  const separatorIndex = trimmed.indexOf("=");
  if (separatorIndex <= 0) {
    return null;
  }

  const key = trimmed.slice(0, separatorIndex).trim();
  let value = trimmed.slice(separatorIndex + 1).trim();

  if (
    (value.startsWith('"') && value.endsWith('"')) ||
    (value.startsWith("'") && value.endsWith("'"))
  ) {
    value = value.slice(1, -1);
  }

  return [key, value];
}

export interface LoadModeEnvFileOptions {
  cwd?: string;
  processEnv?: NodeJS.ProcessEnv;
  existsSync?: typeof fs.existsSync;
  readFileSync?: typeof fs.readFileSync;
}

export function loadModeEnvFile(options: LoadModeEnvFileOptions = {}): string | null {
  const cwd = options.cwd ?? process.cwd();
  const processEnv = options.processEnv ?? process.env;
  const existsSync = options.existsSync ?? fs.existsSync;
  const readFileSync = options.readFileSync ?? fs.readFileSync;
  const protectedKeys = new Set(
    Object.keys(processEnv).filter((key) => processEnv[key] !== undefined)
  );
  const rawMode = processEnv.APP_MODE?.trim().toLowerCase();
  const explicitMode = rawMode === "local" || rawMode === "prod" ? rawMode : undefined;

  const modeCandidates = explicitMode ? [explicitMode] : ["local", "prod"];
  const envFilePath = modeCandidates
    .map((mode) => path.join(cwd, `.env.${mode}`))
    .find((candidate) => existsSync(candidate));
  if (!envFilePath) {
    return null;
  }

  const content = readFileSync(envFilePath, "utf8");
  for (const line of content.split(/\r?\n/)) {
    const entry = parseDotEnvLine(line);
    if (!entry) {
      continue;
    }
    const [key, value] = entry;
    if (protectedKeys.has(key)) {
      continue;
    }
    processEnv[key] = value;
  }

  return envFilePath;
}

loadModeEnvFile();

const runtimeModeSchema = z.enum(["prod", "local"]);
const booleanFlagSchema = z
  .union([z.boolean(), z.string()])
  .transform((value) => {
    if (typeof value === "boolean") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    return normalized === "1" || normalized === "true" || normalized === "yes" || normalized === "on";
  });

const optionalTrimmedString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const envSchema = z.object({
  APP_MODE: runtimeModeSchema.default("prod"),
  PORT: z.coerce.number().int().positive().default(3000),
  FRONTEND_ORIGIN: z.string().min(1).default("http://localhost:5173"),
  ENABLE_INFRA_BOOTSTRAP: booleanFlagSchema.default(false),
  RUN_STARTUP_CHECKS: booleanFlagSchema.default(false),
  OPENAI_API_KEY: z.string().min(1, "OPENAI_API_KEY is required"),
  OPENAI_BASE_URL: optionalTrimmedString,
  LLM_DEFAULT_MODEL: z.string().min(1).default("gemma3:27b"),
  LLM_RERANK_MODEL: z.string().min(1).default("gemma3:27b"),
  EMBEDDING_MODEL: z.string().min(1).default("bge-m3"),
  OLLAMA_URL: optionalTrimmedString,
  POSTGRES_URL: z.string().min(1, "POSTGRES_URL is required"),
  QDRANT_URL: optionalTrimmedString,
  QDRANT_API_KEY: optionalTrimmedString,
  QDRANT_COLLECTION: z.string().min(1).default("ppee_applications"),
  LOCAL_VECTOR_STORE_FILE: optionalTrimmedString,
  PIPELINE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  TASK_RETENTION_MS: z.coerce.number().int().positive().default(3_600_000),
  TASK_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  EXTERNAL_CALL_RETRIES: z.coerce.number().int().min(1).max(10).default(2),
  EXTERNAL_CALL_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(300),
  FULL_SCAN_BATCH_SIZE: z.coerce.number().int().positive().default(1)
}).superRefine((value, ctx) => {
  if (value.APP_MODE === "prod" && !value.QDRANT_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["QDRANT_URL"],
      message: "QDRANT_URL is required in prod mode"
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(rawEnv: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(rawEnv);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("\n");
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return parsed.data;
}

export const env: Env = parseEnv(process.env);
