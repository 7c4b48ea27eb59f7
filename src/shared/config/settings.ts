import { z } from "zod";

const booleanFlag = z
  .string()
  .transform((value) => ["1", "true", "yes", "on"].includes(value.trim().toLowerCase()));

const optionalText = z
  .string()
  .transform((value) => value.trim())
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

/**
 * 运行时配置：全部来自环境变量，缺省值即推荐取值。
 */
export const SettingsSchema = z.object({
  CALCULATOR_BASE_URL: z.string().url().default("https://calculator.aws/#/"),
  BROWSER_HEADLESS: booleanFlag.default("false"),
  BROWSER_EXECUTABLE_PATH: optionalText,
  BROWSER_CHANNEL: optionalText,
  ESTIMATE_RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  LOCATE_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  APPLY_RETRIES: z.coerce.number().int().min(0).max(10).default(1),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  SERVICE_SCHEMAS_PATH: optionalText,
  OPENAI_API_KEY: optionalText,
  OPENAI_BASE_URL: optionalText,
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  SOW_MAPPING_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(3),
  ESTIMATE_SERVICE_HOST: z.string().min(1).default("127.0.0.1"),
  ESTIMATE_SERVICE_PORT: z.coerce.number().int().min(0).max(65_535).default(3000),
  ESTIMATE_SERVICE_BASE_PATH: z.string().startsWith("/").default("/api/v1"),
  ESTIMATE_MAX_CONCURRENT_RUNS: z.coerce.number().int().min(1).default(1)
});

export type RawSettings = z.infer<typeof SettingsSchema>;

export interface RetrySettings {
  readonly locateRetries: number;
  readonly applyRetries: number;
  readonly baseDelayMs: number;
}

export interface Settings {
  readonly calculatorUrl: string;
  readonly browser: {
    readonly headless: boolean;
    readonly executablePath?: string;
    readonly channel?: string;
  };
  readonly runTimeoutMs: number;
  readonly retry: RetrySettings;
  readonly schemasPath?: string;
  readonly openai: {
    readonly apiKey?: string;
    readonly baseUrl?: string;
    readonly model: string;
    readonly concurrency: number;
  };
  readonly service: {
    readonly host: string;
    readonly port: number;
    readonly basePath: string;
    readonly maxConcurrentRuns: number;
  };
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SettingsError";
    Object.setPrototypeOf(this, SettingsError.prototype);
  }
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = SettingsSchema.safeParse(env);
  if (!parsed.success) {
    const brief = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new SettingsError(`环境变量配置无效：${brief}`);
  }
  const raw = parsed.data;
  return {
    calculatorUrl: raw.CALCULATOR_BASE_URL,
    browser: {
      headless: raw.BROWSER_HEADLESS,
      executablePath: raw.BROWSER_EXECUTABLE_PATH,
      channel: raw.BROWSER_CHANNEL
    },
    runTimeoutMs: raw.ESTIMATE_RUN_TIMEOUT_MS,
    retry: {
      locateRetries: raw.LOCATE_RETRIES,
      applyRetries: raw.APPLY_RETRIES,
      baseDelayMs: raw.RETRY_BASE_DELAY_MS
    },
    schemasPath: raw.SERVICE_SCHEMAS_PATH,
    openai: {
      apiKey: raw.OPENAI_API_KEY,
      baseUrl: raw.OPENAI_BASE_URL,
      model: raw.OPENAI_MODEL,
      concurrency: raw.SOW_MAPPING_CONCURRENCY
    },
    service: {
      host: raw.ESTIMATE_SERVICE_HOST,
      port: raw.ESTIMATE_SERVICE_PORT,
      basePath: raw.ESTIMATE_SERVICE_BASE_PATH.replace(/\/$/, ""),
      maxConcurrentRuns: raw.ESTIMATE_MAX_CONCURRENT_RUNS
    }
  };
}
