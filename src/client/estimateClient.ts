import { z } from "zod";

import type { ValidationSummary } from "../estimate/pipeline.js";
import type { EstimateReport } from "../estimate/report/aggregator.js";
import type { FieldSchema } from "../estimate/schema/types.js";

export interface EstimateClientOptions {
  /** 服务根地址，例如 http://127.0.0.1:3100 */
  readonly baseUrl: string;
  readonly basePath?: string;
  readonly fetchImpl?: typeof fetch;
}

export interface SubmitEstimateOptions {
  readonly validateOnly?: boolean;
  readonly headless?: boolean;
  readonly useMockSession?: boolean;
}

const isObject = (value: unknown): boolean => typeof value === "object" && value !== null;

const ErrorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string() })
});

const HealthSchema = z.object({
  status: z.string(),
  services: z.number(),
  automated: z.number(),
  timestamp: z.string()
});

const ServiceSummarySchema = z.object({
  serviceType: z.string(),
  displayName: z.string(),
  aliases: z.array(z.string()),
  automated: z.boolean()
});

const ServiceListSchema = z.object({
  total: z.number(),
  services: z.array(ServiceSummarySchema)
});

const ServiceDetailSchema = ServiceSummarySchema.extend({
  fields: z.array(z.custom<FieldSchema>(isObject))
});

const EstimateResponseSchema = z.object({
  status: z.enum(["validated", "complete", "partial", "failed"]),
  message: z.string(),
  shareableUrl: z.string().nullable(),
  report: z.custom<EstimateReport>(isObject).nullable(),
  validation: z.custom<ValidationSummary>(isObject),
  timestamp: z.string()
});

export type HealthResponse = z.infer<typeof HealthSchema>;
export type ServiceSummary = z.infer<typeof ServiceSummarySchema>;
export type ServiceDetail = z.infer<typeof ServiceDetailSchema>;
export type EstimateResponse = z.infer<typeof EstimateResponseSchema>;

export class EstimateServiceError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "EstimateServiceError";
  }
}

export class EstimateClient {
  private readonly origin: string;

  private readonly apiBase: string;

  private readonly fetchImpl: typeof fetch;

  constructor(options: EstimateClientOptions) {
    this.origin = options.baseUrl.replace(/\/$/, "");
    this.apiBase = `${this.origin}${(options.basePath ?? "/api/v1").replace(/\/$/, "")}`;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async health(): Promise<HealthResponse> {
    return this.request(`${this.origin}/health`, HealthSchema, "健康检查失败");
  }

  async listServices(): Promise<ServiceSummary[]> {
    const body = await this.request(`${this.apiBase}/services`, ServiceListSchema, "获取服务列表失败");
    return body.services;
  }

  async getService(serviceType: string): Promise<ServiceDetail> {
    return this.request(
      `${this.apiBase}/services/${encodeURIComponent(serviceType)}`,
      ServiceDetailSchema,
      "获取服务定义失败"
    );
  }

  async submitEstimate(
    document: Record<string, unknown>,
    options: SubmitEstimateOptions = {}
  ): Promise<EstimateResponse> {
    const payload = {
      ...document,
      ...(options.validateOnly !== undefined ? { validate_only: options.validateOnly } : {}),
      ...(options.headless !== undefined ? { headless: options.headless } : {}),
      ...(options.useMockSession !== undefined ? { use_mock_session: options.useMockSession } : {})
    };
    return this.request(`${this.apiBase}/estimates`, EstimateResponseSchema, "提交估算失败", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload)
    });
  }

  async validateDocument(document: Record<string, unknown>): Promise<EstimateResponse> {
    return this.submitEstimate(document, { validateOnly: true });
  }

  private async request<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    failure: string,
    init?: RequestInit
  ): Promise<T> {
    const response = await this.fetchImpl(url, init);
    const body: unknown = await response.json().catch(() => null);
    if (!response.ok) {
      const parsedError = ErrorBodySchema.safeParse(body);
      if (parsedError.success) {
        const { code, message } = parsedError.data.error;
        throw new EstimateServiceError(response.status, code, message);
      }
      throw new EstimateServiceError(response.status, "http_error", `${failure} (${response.status})`);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new EstimateServiceError(response.status, "invalid_response", `${failure}：响应格式不符合预期`);
    }
    return parsed.data;
  }
}
